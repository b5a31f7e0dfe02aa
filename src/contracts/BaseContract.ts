/*
 * SPDX-License-Identifier: Apache-2.0
 */

import 'reflect-metadata';
import { Contract } from 'fabric-contract-api';
import { ErrorCode, LedgerError } from '../errors';
import { Ledger } from '../ledger';
import { LedgerContext } from './LedgerContext';

const UNSIGNED_INTEGER = /^\d+$/;

export class BaseContract extends Contract {
    constructor(name?: string) {
        super(name);
    }

    createContext(): LedgerContext {
        return new LedgerContext();
    }

    // Writes and the chaincode event reach the stub only once the
    // transaction function has returned without throwing
    async afterTransaction(ctx: LedgerContext, _result: unknown): Promise<void> {
        await ctx.getWorldState().flush();
    }

    // Helper: Get Client Identity
    protected getClient(ctx: LedgerContext) {
        return {
            id: ctx.getCallerId(),
            mspId: ctx.getCallerMspId()
        };
    }

    // Helper: run a ledger operation, logging rejected calls before they propagate
    protected async run<T>(ctx: LedgerContext, action: string, fn: (ledger: Ledger, caller: string) => Promise<T>): Promise<T> {
        const client = this.getClient(ctx);
        const logger = ctx.getLogger(this.getName());
        try {
            const result = await fn(ctx.getLedger(), client.id);
            logger.debug(`${action} by ${client.id} (${client.mspId}) succeeded`);
            return result;
        } catch (err) {
            const reason = err instanceof Error ? err.message : String(err);
            logger.warn(`${action} by ${client.id} (${client.mspId}) rejected: ${reason}`);
            throw err;
        }
    }

    protected parseAmount(value: string, code: ErrorCode, field: string): bigint {
        if (!UNSIGNED_INTEGER.test(value)) {
            throw new LedgerError(code, `${field} must be a whole number of base units, got "${value}"`);
        }
        return BigInt(value);
    }

    protected parseInteger(value: string, code: ErrorCode, field: string): number {
        const parsed = Number(value);
        if (!UNSIGNED_INTEGER.test(value) || !Number.isSafeInteger(parsed)) {
            throw new LedgerError(code, `${field} must be a non-negative integer, got "${value}"`);
        }
        return parsed;
    }

    protected parseDonationId(value: string): number {
        return this.parseInteger(value, 'DonationNotFound', 'donationId');
    }
}
