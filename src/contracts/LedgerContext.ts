/*
 * SPDX-License-Identifier: Apache-2.0
 */

import { Context } from 'fabric-contract-api';
import type { Logger } from 'winston';
import { LEDGER_CONFIG, resolveLedgerConfig } from '../config';
import { Ledger, openLedger } from '../ledger';
import { StateBackend, WorldState } from '../ledger/WorldState';

const config = resolveLedgerConfig(LEDGER_CONFIG);

/**
 * Per-transaction context. The runtime creates one for every invocation,
 * so the buffered world state and the ledger services built on it never
 * leak between transactions.
 */
export class LedgerContext extends Context {
    private worldState?: WorldState;
    private services?: Ledger;

    getWorldState(): WorldState {
        if (!this.worldState) {
            this.worldState = new WorldState(this.getBackend());
        }
        return this.worldState;
    }

    getLedger(): Ledger {
        if (!this.services) {
            this.services = openLedger({ state: this.getWorldState(), logger: this.getLogger('ledger'), config });
        }
        return this.services;
    }

    getCallerId(): string {
        return this.clientIdentity.getID();
    }

    getCallerMspId(): string {
        return this.clientIdentity.getMSPID();
    }

    getLogger(name: string): Logger {
        return this.logging.getLogger(name);
    }

    protected getBackend(): StateBackend {
        return this.stub;
    }
}
