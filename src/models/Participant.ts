/*
 * SPDX-License-Identifier: Apache-2.0
 */

export enum Role {
    ADMIN = 'ADMIN',
    NONPROFIT = 'NONPROFIT',
    DONOR = 'DONOR'
}

export interface RoleAssignment {
    identity: string;       // X.509 client identity (ctx.clientIdentity.getID())
    docType: 'role';
    roles: Role[];
}

export interface Wallet {
    identity: string;
    docType: 'wallet';
    balance: string;        // Base units
}

export interface LedgerSettings {
    docType: 'settings';
    admin: string | null;
    paused: boolean;
}

export function parseRole(value: string): Role | undefined {
    return Object.values(Role).find(role => role === value);
}
