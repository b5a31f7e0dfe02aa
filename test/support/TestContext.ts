import { LedgerContext } from '../../src/contracts/LedgerContext';
import { StateBackend } from '../../src/ledger';
import { silentLogger } from './harness';

/** A LedgerContext bound to an in-memory backend and a fixed caller. */
export class TestContext extends LedgerContext {
    constructor(private readonly backend: StateBackend, private readonly caller: string) {
        super();
        this.logging = {
            setLevel: () => undefined,
            getLogger: () => silentLogger
        };
    }

    getCallerId(): string {
        return this.caller;
    }

    getCallerMspId(): string {
        return 'Org1MSP';
    }

    protected getBackend(): StateBackend {
        return this.backend;
    }
}
