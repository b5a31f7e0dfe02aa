/*
 * SPDX-License-Identifier: Apache-2.0
 */

import { Info, Returns, Transaction } from 'fabric-contract-api';
import { donationStatus } from '../models/Donation';
import { BaseContract } from './BaseContract';
import { LedgerContext } from './LedgerContext';

@Info({ title: 'DonationContract', description: 'Donation offers, funding and escrow release' })
export class DonationContract extends BaseContract {

    @Transaction()
    @Returns('string')
    async CreateDonation(
        ctx: LedgerContext,
        amount: string,           // Base units
        equityPercentage: string,
        nonprofitName: string,
        description: string,
        valuation: string         // Base units
    ): Promise<string> {
        const input = {
            amount: this.parseAmount(amount, 'InvalidAmount', 'amount'),
            equityPercentage: this.parseInteger(equityPercentage, 'InvalidPercentage', 'equityPercentage'),
            nonprofitName,
            description,
            valuation: this.parseAmount(valuation, 'ZeroValue', 'valuation')
        };
        const donation = await this.run(ctx, 'CreateDonation', (ledger, caller) => ledger.donations.createDonation(input, caller));
        return donation.id.toString();
    }

    // The caller attaches the donation amount from their wallet
    @Transaction()
    async FundDonation(ctx: LedgerContext, donationId: string, value: string): Promise<void> {
        const id = this.parseDonationId(donationId);
        const supplied = this.parseAmount(value, 'InvalidAmount', 'value');
        await this.run(ctx, 'FundDonation', (ledger, caller) => ledger.donations.fundDonation(id, caller, supplied));
    }

    @Transaction()
    async DistributeDonation(ctx: LedgerContext, donationId: string): Promise<void> {
        const id = this.parseDonationId(donationId);
        await this.run(ctx, 'DistributeDonation', (ledger, caller) => ledger.donations.distributeDonation(id, caller));
    }

    @Transaction()
    async CancelDonation(ctx: LedgerContext, donationId: string): Promise<void> {
        const id = this.parseDonationId(donationId);
        await this.run(ctx, 'CancelDonation', (ledger, caller) => ledger.donations.cancelDonation(id, caller));
    }

    @Transaction()
    async ExtendFundingPeriod(ctx: LedgerContext, donationId: string, extensionDays: string): Promise<void> {
        const id = this.parseDonationId(donationId);
        const days = this.parseInteger(extensionDays, 'InvalidDeadline', 'extensionDays');
        await this.run(ctx, 'ExtendFundingPeriod', (ledger, caller) => ledger.donations.extendFundingPeriod(id, caller, days));
    }

    @Transaction(false)
    @Returns('string')
    async GetDonation(ctx: LedgerContext, donationId: string): Promise<string> {
        const donation = await ctx.getLedger().donations.getDonation(this.parseDonationId(donationId));
        return JSON.stringify({ ...donation, status: donationStatus(donation) });
    }

    @Transaction(false)
    @Returns('string')
    async GetDonationCount(ctx: LedgerContext): Promise<string> {
        const count = await ctx.getLedger().donations.getDonationCount();
        return count.toString();
    }

    @Transaction(false)
    @Returns('string')
    async GetEscrowBalance(ctx: LedgerContext, donationId: string): Promise<string> {
        const balance = await ctx.getLedger().donations.getEscrowBalance(this.parseDonationId(donationId));
        return balance.toString();
    }
}
