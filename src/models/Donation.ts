/*
 * SPDX-License-Identifier: Apache-2.0
 */

export enum DonationStatus {
    ACTIVE = 'ACTIVE',             // Open for funding
    FUNDED = 'FUNDED',             // Escrow holds the amount
    DISTRIBUTED = 'DISTRIBUTED',   // Paid out to the nonprofit
    CANCELLED = 'CANCELLED'        // Withdrawn by the donor before funding
}

export interface Donation {
    id: number;             // Sequential, starting at 0
    docType: 'donation';

    donor: string;          // Client identity of the creator
    nonprofit: string | null; // Set by FundDonation

    amount: string;         // Base units, decimal string
    equityPercentage: number;
    valuation: string;      // Base units, decimal string

    nonprofitName: string;
    description: string;

    fundingDeadline: number; // Seconds since epoch
    extensionDays: number;   // Cumulative days added by ExtendFundingPeriod

    active: boolean;
    distributed: boolean;
    createdAt: number;
}

export interface Counter {
    docType: 'counter';
    count: number;
}

export function donationStatus(donation: Donation): DonationStatus {
    if (donation.distributed) return DonationStatus.DISTRIBUTED;
    if (donation.active) return DonationStatus.ACTIVE;
    return donation.nonprofit === null ? DonationStatus.CANCELLED : DonationStatus.FUNDED;
}
