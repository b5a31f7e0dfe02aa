/*
 * SPDX-License-Identifier: Apache-2.0
 */

import type { Logger } from 'winston';
import { LedgerError } from '../errors';
import { LedgerEventName } from '../models/LedgerEvent';
import { LedgerSettings, Role, RoleAssignment } from '../models/Participant';
import { WorldState } from './WorldState';

export class AccessControlRegistry {
    constructor(private readonly state: WorldState, private readonly logger: Logger) {}

    async settings(): Promise<LedgerSettings> {
        const settings = await this.state.read<LedgerSettings>(this.state.key('settings'));
        return settings ?? { docType: 'settings', admin: null, paused: false };
    }

    async rolesOf(identity: string): Promise<Role[]> {
        const assignment = await this.state.read<RoleAssignment>(this.state.key('role', identity));
        return assignment ? assignment.roles : [];
    }

    async hasRole(identity: string, role: Role): Promise<boolean> {
        const roles = await this.rolesOf(identity);
        return roles.includes(role);
    }

    async requireRole(identity: string, role: Role): Promise<void> {
        if (!(await this.hasRole(identity, role))) {
            throw new LedgerError('UnauthorizedAccess', `${identity} does not hold the ${role} role`);
        }
    }

    /**
     * Adds a role without an authorization check. Used by the donation
     * ledger to grant DONOR/NONPROFIT on first use. Returns false when the
     * identity already held the role.
     */
    async grant(identity: string, role: Role): Promise<boolean> {
        const roles = await this.rolesOf(identity);
        if (roles.includes(role)) return false;

        const assignment: RoleAssignment = { identity, docType: 'role', roles: [...roles, role] };
        this.state.write(this.state.key('role', identity), assignment);
        this.logger.info(`Granted ${role} to ${identity}`);
        return true;
    }

    async initialize(caller: string): Promise<void> {
        requireIdentity(caller);
        const settings = await this.settings();
        if (settings.admin !== null) {
            throw new LedgerError('AlreadyInitialized', `ledger already administered by ${settings.admin}`);
        }

        this.state.write(this.state.key('settings'), { ...settings, admin: caller });
        await this.grant(caller, Role.ADMIN);
        this.state.emit(LedgerEventName.LEDGER_INITIALIZED, { admin: caller });
    }

    async grantRole(caller: string, identity: string, role: Role): Promise<void> {
        await this.requireRole(caller, Role.ADMIN);
        requireIdentity(identity);

        if (await this.grant(identity, role)) {
            this.state.emit(LedgerEventName.ROLE_GRANTED, { identity, role, grantedBy: caller, roles: await this.rolesOf(identity) });
        }
    }

    async revokeRole(caller: string, identity: string, role: Role): Promise<void> {
        await this.requireRole(caller, Role.ADMIN);
        requireIdentity(identity);

        const roles = await this.rolesOf(identity);
        if (!roles.includes(role)) return;

        const remaining = roles.filter(r => r !== role);
        const assignment: RoleAssignment = { identity, docType: 'role', roles: remaining };
        this.state.write(this.state.key('role', identity), assignment);
        this.logger.info(`Revoked ${role} from ${identity}`);
        this.state.emit(LedgerEventName.ROLE_REVOKED, { identity, role, revokedBy: caller, roles: remaining });
    }

    async isPaused(): Promise<boolean> {
        return (await this.settings()).paused;
    }

    async requireNotPaused(): Promise<void> {
        if (await this.isPaused()) {
            throw new LedgerError('Paused', 'ledger is paused');
        }
    }

    async pause(caller: string): Promise<void> {
        await this.requireRole(caller, Role.ADMIN);
        const settings = await this.settings();
        if (settings.paused) throw new LedgerError('Paused', 'ledger is already paused');

        this.state.write(this.state.key('settings'), { ...settings, paused: true });
        this.logger.warn(`Ledger paused by ${caller}`);
        this.state.emit(LedgerEventName.LEDGER_PAUSED, { admin: caller, paused: true });
    }

    async unpause(caller: string): Promise<void> {
        await this.requireRole(caller, Role.ADMIN);
        const settings = await this.settings();
        if (!settings.paused) throw new LedgerError('NotPaused', 'ledger is not paused');

        this.state.write(this.state.key('settings'), { ...settings, paused: false });
        this.logger.warn(`Ledger unpaused by ${caller}`);
        this.state.emit(LedgerEventName.LEDGER_UNPAUSED, { admin: caller, paused: false });
    }
}

export function requireIdentity(identity: string): void {
    if (identity.trim().length === 0) {
        throw new LedgerError('InvalidAddress', 'identity must not be empty');
    }
}
