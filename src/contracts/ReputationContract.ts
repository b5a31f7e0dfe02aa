/*
 * SPDX-License-Identifier: Apache-2.0
 */

import { Info, Returns, Transaction } from 'fabric-contract-api';
import { requireIdentity } from '../ledger/AccessControlRegistry';
import { BaseContract } from './BaseContract';
import { LedgerContext } from './LedgerContext';

@Info({ title: 'ReputationContract', description: 'Participant ratings' })
export class ReputationContract extends BaseContract {

    @Transaction()
    async UpdateReputation(ctx: LedgerContext, subject: string, rating: string, review: string): Promise<void> {
        const score = this.parseInteger(rating, 'InvalidRating', 'rating');
        await this.run(ctx, 'UpdateReputation', (ledger, caller) => ledger.reputation.rate(subject, caller, score, review));
    }

    @Transaction(false)
    @Returns('string')
    async GetReputation(ctx: LedgerContext, identity: string): Promise<string> {
        requireIdentity(identity);
        const summary = await ctx.getLedger().reputation.getReputation(identity);
        return JSON.stringify(summary);
    }
}
