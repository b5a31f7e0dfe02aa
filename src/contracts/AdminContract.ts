/*
 * SPDX-License-Identifier: Apache-2.0
 */

import { Info, Returns, Transaction } from 'fabric-contract-api';
import { LedgerError } from '../errors';
import { requireIdentity } from '../ledger/AccessControlRegistry';
import { Role, parseRole } from '../models/Participant';
import { BaseContract } from './BaseContract';
import { LedgerContext } from './LedgerContext';

@Info({ title: 'AdminContract', description: 'Roles, circuit breaker and emergency withdrawal' })
export class AdminContract extends BaseContract {

    // The submitting identity becomes the ledger admin
    @Transaction()
    async InitLedger(ctx: LedgerContext): Promise<void> {
        await this.run(ctx, 'InitLedger', (ledger, caller) => ledger.access.initialize(caller));
    }

    @Transaction()
    async Pause(ctx: LedgerContext): Promise<void> {
        await this.run(ctx, 'Pause', (ledger, caller) => ledger.access.pause(caller));
    }

    @Transaction()
    async Unpause(ctx: LedgerContext): Promise<void> {
        await this.run(ctx, 'Unpause', (ledger, caller) => ledger.access.unpause(caller));
    }

    @Transaction(false)
    @Returns('boolean')
    async IsPaused(ctx: LedgerContext): Promise<boolean> {
        return ctx.getLedger().access.isPaused();
    }

    @Transaction()
    @Returns('string')
    async EmergencyWithdraw(ctx: LedgerContext): Promise<string> {
        const amount = await this.run(ctx, 'EmergencyWithdraw', (ledger, caller) => ledger.donations.emergencyWithdraw(caller));
        return amount.toString();
    }

    @Transaction()
    async GrantRole(ctx: LedgerContext, identity: string, role: string): Promise<void> {
        const parsed = this.toRole(role);
        await this.run(ctx, 'GrantRole', (ledger, caller) => ledger.access.grantRole(caller, identity, parsed));
    }

    @Transaction()
    async RevokeRole(ctx: LedgerContext, identity: string, role: string): Promise<void> {
        const parsed = this.toRole(role);
        await this.run(ctx, 'RevokeRole', (ledger, caller) => ledger.access.revokeRole(caller, identity, parsed));
    }

    @Transaction(false)
    @Returns('boolean')
    async HasRole(ctx: LedgerContext, identity: string, role: string): Promise<boolean> {
        requireIdentity(identity);
        return ctx.getLedger().access.hasRole(identity, this.toRole(role));
    }

    @Transaction(false)
    @Returns('string')
    async GetRoles(ctx: LedgerContext, identity: string): Promise<string> {
        requireIdentity(identity);
        const roles = await ctx.getLedger().access.rolesOf(identity);
        return JSON.stringify(roles);
    }

    private toRole(value: string): Role {
        const role = parseRole(value);
        if (!role) throw new LedgerError('InvalidRole', `unknown role "${value}"`);
        return role;
    }
}
