/*
 * SPDX-License-Identifier: Apache-2.0
 */

import { LedgerError } from '../errors';

export type OperationClass = 'donation' | 'reputation' | 'wallet';

/**
 * Rejects a mutating call that starts while another call of the same class
 * is still in flight, e.g. one made from inside an outbound transfer.
 */
export class ReentrancyGuard {
    private readonly held = new Set<OperationClass>();

    async run<T>(operation: OperationClass, fn: () => Promise<T>): Promise<T> {
        if (this.held.has(operation)) {
            throw new LedgerError('ReentrantCall', `a ${operation} operation is already in progress`);
        }
        this.held.add(operation);
        try {
            return await fn();
        } finally {
            this.held.delete(operation);
        }
    }
}
