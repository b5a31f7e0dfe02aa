/*
 * SPDX-License-Identifier: Apache-2.0
 */

import { Info, Returns, Transaction } from 'fabric-contract-api';
import { requireIdentity } from '../ledger/AccessControlRegistry';
import { BaseContract } from './BaseContract';
import { LedgerContext } from './LedgerContext';

@Info({ title: 'WalletContract', description: 'Participant balances outside escrow' })
export class WalletContract extends BaseContract {

    @Transaction()
    @Returns('string')
    async IssueFunds(ctx: LedgerContext, recipient: string, amount: string): Promise<string> {
        const value = this.parseAmount(amount, 'InvalidAmount', 'amount');
        const balance = await this.run(ctx, 'IssueFunds', (ledger, caller) => ledger.wallets.issue(caller, recipient, value));
        return balance.toString();
    }

    @Transaction(false)
    @Returns('string')
    async GetBalance(ctx: LedgerContext, identity: string): Promise<string> {
        requireIdentity(identity);
        const balance = await ctx.getLedger().wallets.balanceOf(identity);
        return balance.toString();
    }

    @Transaction(false)
    @Returns('string')
    async GetVaultBalance(ctx: LedgerContext): Promise<string> {
        const total = await ctx.getLedger().vault.totalCustodied();
        return total.toString();
    }
}
