/*
 * SPDX-License-Identifier: Apache-2.0
 */

import { LedgerEvent, LedgerEventName } from '../models/LedgerEvent';

export interface EventSink {
    setEvent(name: string, payload: Uint8Array): void;
}

export function encodeJson(value: unknown): Uint8Array {
    return Buffer.from(JSON.stringify(value, (_key, v: unknown) => (typeof v === 'bigint' ? v.toString() : v)));
}

/**
 * Holds the one chaincode event a transaction may emit. Fabric keeps only
 * the last setEvent call per transaction, so the event is buffered and
 * handed to the sink when the transaction's writes are flushed.
 */
export class EventLog {
    private pending?: LedgerEvent;

    emit(name: LedgerEventName, payload: Record<string, unknown>): void {
        this.pending = { name, payload };
    }

    peek(): LedgerEvent | undefined {
        return this.pending;
    }

    restore(event: LedgerEvent | undefined): void {
        this.pending = event;
    }

    flushTo(sink: EventSink): LedgerEvent | undefined {
        const event = this.pending;
        if (event) {
            sink.setEvent(event.name, encodeJson(event.payload));
            this.pending = undefined;
        }
        return event;
    }
}
