/*
 * SPDX-License-Identifier: Apache-2.0
 */

export interface EscrowBalance {
    donationId: number;
    docType: 'escrow';
    balance: string;        // Base units, "0" once released or refunded
}

export interface VaultTotals {
    docType: 'vault';
    total: string;          // Everything the vault custodies, in base units
}
