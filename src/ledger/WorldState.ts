/*
 * SPDX-License-Identifier: Apache-2.0
 */

import { LedgerEvent, LedgerEventName } from '../models/LedgerEvent';
import { EventLog, EventSink, encodeJson } from './EventLog';

/**
 * The part of the chaincode stub the ledger needs. ChaincodeStub satisfies
 * it as is; tests supply an in-memory implementation.
 */
export interface StateBackend extends EventSink {
    getState(key: string): Promise<Uint8Array>;
    putState(key: string, value: Uint8Array): Promise<void>;
    createCompositeKey(objectType: string, attributes: string[]): string;
    getDateTimestamp(): Date;
}

export interface Checkpoint {
    writes: Map<string, Uint8Array>;
    event: LedgerEvent | undefined;
}

/**
 * Transaction-scoped view of the world state.
 *
 * The stub does not return a transaction's own writes from getState, so
 * writes are buffered here and read back from the buffer. Nothing reaches
 * the stub until flush(), which the contract calls once the transaction
 * function has returned; a thrown error therefore leaves the ledger
 * untouched. checkpoint()/rollback() undo part of a transaction that is
 * otherwise allowed to continue.
 */
export class WorldState {
    private writes = new Map<string, Uint8Array>();
    private readonly events = new EventLog();

    constructor(private readonly backend: StateBackend) {}

    key(objectType: string, ...attributes: Array<string | number>): string {
        return this.backend.createCompositeKey(objectType, attributes.map(String));
    }

    /** Transaction timestamp in whole seconds; identical on every endorser. */
    now(): number {
        return Math.floor(this.backend.getDateTimestamp().getTime() / 1000);
    }

    async exists(key: string): Promise<boolean> {
        const data = await this.raw(key);
        return data !== null;
    }

    async read<T>(key: string): Promise<T | undefined> {
        const data = await this.raw(key);
        if (data === null) return undefined;
        const value: T = JSON.parse(Buffer.from(data).toString('utf8'));
        return value;
    }

    write<T>(key: string, value: T): void {
        this.writes.set(key, encodeJson(value));
    }

    emit(name: LedgerEventName, payload: Record<string, unknown>): void {
        this.events.emit(name, payload);
    }

    pendingEvent(): LedgerEvent | undefined {
        return this.events.peek();
    }

    checkpoint(): Checkpoint {
        return { writes: new Map(this.writes), event: this.events.peek() };
    }

    rollback(checkpoint: Checkpoint): void {
        this.writes = new Map(checkpoint.writes);
        this.events.restore(checkpoint.event);
    }

    async flush(): Promise<void> {
        for (const [key, value] of this.writes) {
            await this.backend.putState(key, value);
        }
        this.writes.clear();
        this.events.flushTo(this.backend);
    }

    private async raw(key: string): Promise<Uint8Array | null> {
        const pending = this.writes.get(key);
        if (pending) return pending;
        const data = await this.backend.getState(key);
        return data && data.length > 0 ? data : null;
    }
}
