import { StateBackend } from '../../src/ledger';

export interface RecordedEvent {
    name: string;
    payload: Record<string, unknown>;
}

/** In-process stand-in for the chaincode stub. */
export class MemoryBackend implements StateBackend {
    readonly store = new Map<string, Uint8Array>();
    readonly events: RecordedEvent[] = [];
    private seconds: number;

    constructor(startSeconds: number) {
        this.seconds = startSeconds;
    }

    async getState(key: string): Promise<Uint8Array> {
        return this.store.get(key) ?? new Uint8Array(0);
    }

    async putState(key: string, value: Uint8Array): Promise<void> {
        this.store.set(key, value);
    }

    // Same layout and empty-part check as the shim: \u0000type\u0000attr1\u0000attr2\u0000
    createCompositeKey(objectType: string, attributes: string[]): string {
        if ([objectType, ...attributes].some(part => part.length === 0)) {
            throw new Error('object type or attribute not a non-zero length string');
        }
        return `\u0000${[objectType, ...attributes].join('\u0000')}\u0000`;
    }

    setEvent(name: string, payload: Uint8Array): void {
        this.events.push({ name, payload: JSON.parse(Buffer.from(payload).toString('utf8')) });
    }

    getDateTimestamp(): Date {
        return new Date(this.seconds * 1000);
    }

    now(): number {
        return this.seconds;
    }

    advance(seconds: number): void {
        this.seconds += seconds;
    }

    lastEvent(): RecordedEvent | undefined {
        return this.events[this.events.length - 1];
    }
}
