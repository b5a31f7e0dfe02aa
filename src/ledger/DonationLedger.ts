/*
 * SPDX-License-Identifier: Apache-2.0
 */

import type { Logger } from 'winston';
import { LedgerConfig, SECONDS_PER_DAY } from '../config';
import { LedgerError } from '../errors';
import { Counter, Donation } from '../models/Donation';
import { LedgerEventName } from '../models/LedgerEvent';
import { Role } from '../models/Participant';
import { AccessControlRegistry, requireIdentity } from './AccessControlRegistry';
import { EscrowVault } from './EscrowVault';
import { ReentrancyGuard } from './ReentrancyGuard';
import { WalletBook } from './WalletBook';
import { WorldState } from './WorldState';

export interface CreateDonationInput {
    amount: bigint;
    equityPercentage: number;
    nonprofitName: string;
    description: string;
    valuation: bigint;
}

export interface DonationLedgerDeps {
    state: WorldState;
    access: AccessControlRegistry;
    vault: EscrowVault;
    wallets: WalletBook;
    guard: ReentrancyGuard;
    config: LedgerConfig;
    logger: Logger;
}

/**
 * Donation state machine: Active -> Funded -> Distributed, or
 * Active -> Cancelled. Every operation validates before it writes; fund
 * movements go through the escrow vault and are undone together with the
 * record change when the outbound transfer fails.
 */
export class DonationLedger {
    private readonly state: WorldState;
    private readonly access: AccessControlRegistry;
    private readonly vault: EscrowVault;
    private readonly wallets: WalletBook;
    private readonly guard: ReentrancyGuard;
    private readonly config: LedgerConfig;
    private readonly logger: Logger;

    constructor(deps: DonationLedgerDeps) {
        this.state = deps.state;
        this.access = deps.access;
        this.vault = deps.vault;
        this.wallets = deps.wallets;
        this.guard = deps.guard;
        this.config = deps.config;
        this.logger = deps.logger;
    }

    async createDonation(input: CreateDonationInput, donor: string): Promise<Donation> {
        await this.access.requireNotPaused();
        return this.guard.run('donation', async () => {
            requireIdentity(donor);
            this.validateTerms(input);

            const now = this.state.now();
            const fundingDeadline = this.addSeconds(now, this.config.fundingPeriod);
            const id = await this.getDonationCount();

            const donation: Donation = {
                id,
                docType: 'donation',
                donor,
                nonprofit: null,
                amount: input.amount.toString(),
                equityPercentage: input.equityPercentage,
                valuation: input.valuation.toString(),
                nonprofitName: input.nonprofitName,
                description: input.description,
                fundingDeadline,
                extensionDays: 0,
                active: true,
                distributed: false,
                createdAt: now
            };

            this.save(donation);
            this.setCounter(this.state.key('donationCount'), id + 1);
            const donorKey = this.state.key('donationCounter', donor);
            this.setCounter(donorKey, (await this.readCounter(donorKey)) + 1);
            await this.access.grant(donor, Role.DONOR);

            this.logger.info(`Donation ${id} created by ${donor} for ${donation.amount}, deadline ${fundingDeadline}`);
            this.state.emit(LedgerEventName.DONATION_CREATED, { ...donation });
            return donation;
        });
    }

    async fundDonation(donationId: number, funder: string, suppliedValue: bigint): Promise<Donation> {
        await this.access.requireNotPaused();
        return this.guard.run('donation', async () => {
            requireIdentity(funder);
            const donation = await this.load(donationId);
            if (!donation || !donation.active) {
                throw new LedgerError('DonationNotActive', `donation ${donationId} is not open for funding`);
            }
            if (funder === donation.donor) {
                throw new LedgerError('UnauthorizedAccess', 'the donor cannot fund their own donation');
            }
            const amount = BigInt(donation.amount);
            if (suppliedValue !== amount) {
                throw new LedgerError('InvalidAmount', `donation ${donationId} must be funded with exactly ${amount}, got ${suppliedValue}`);
            }
            if (this.state.now() > donation.fundingDeadline) {
                throw new LedgerError('DeadlinePassed', `funding deadline ${donation.fundingDeadline} has passed`);
            }

            await this.wallets.debit(funder, amount);
            const funded: Donation = { ...donation, nonprofit: funder, active: false };
            this.save(funded);
            await this.vault.deposit(donationId, amount);
            await this.access.grant(funder, Role.NONPROFIT);

            this.logger.info(`Donation ${donationId} funded by ${funder}`);
            this.state.emit(LedgerEventName.DONATION_FUNDED, { ...funded, escrowBalance: amount });
            return funded;
        });
    }

    async distributeDonation(donationId: number, caller: string): Promise<Donation> {
        await this.access.requireNotPaused();
        return this.guard.run('donation', async () => {
            const donation = await this.requireDonor(donationId, caller);
            if (donation.distributed) {
                throw new LedgerError('UnauthorizedAccess', `donation ${donationId} was already distributed`);
            }
            if ((await this.vault.balanceOf(donationId)) === 0n) {
                throw new LedgerError('InsufficientFunds', `donation ${donationId} holds no escrow`);
            }
            const nonprofit = donation.nonprofit;
            if (nonprofit === null) {
                throw new LedgerError('InvalidAddress', `donation ${donationId} has no nonprofit to pay`);
            }

            const checkpoint = this.state.checkpoint();
            const distributed: Donation = { ...donation, active: false, distributed: true };
            this.save(distributed);
            let released: bigint;
            try {
                released = await this.vault.release(donationId, nonprofit);
            } catch (err) {
                this.state.rollback(checkpoint);
                throw err;
            }

            this.logger.info(`Donation ${donationId}: ${released} distributed to ${nonprofit}`);
            this.state.emit(LedgerEventName.DONATION_DISTRIBUTED, { ...distributed, released, escrowBalance: 0n });
            return distributed;
        });
    }

    /**
     * Withdraws an offer that has not been funded. The deadline does not
     * matter: an expired offer can still be cancelled.
     */
    async cancelDonation(donationId: number, caller: string): Promise<Donation> {
        await this.access.requireNotPaused();
        return this.guard.run('donation', async () => {
            const donation = await this.requireDonor(donationId, caller);
            if (!donation.active) {
                throw new LedgerError('DonationNotActive', `donation ${donationId} is no longer active`);
            }

            const checkpoint = this.state.checkpoint();
            const cancelled: Donation = { ...donation, active: false };
            this.save(cancelled);
            let refunded = 0n;
            if ((await this.vault.balanceOf(donationId)) > 0n) {
                try {
                    refunded = await this.vault.refund(donationId, donation.donor);
                } catch (err) {
                    this.state.rollback(checkpoint);
                    throw err;
                }
            }

            this.logger.info(`Donation ${donationId} cancelled by ${caller}` + (refunded > 0n ? `, refunded ${refunded}` : ''));
            this.state.emit(LedgerEventName.DONATION_CANCELLED, { ...cancelled, refunded, escrowBalance: 0n });
            return cancelled;
        });
    }

    async extendFundingPeriod(donationId: number, caller: string, extensionDays: number): Promise<Donation> {
        await this.access.requireNotPaused();
        return this.guard.run('donation', async () => {
            const donation = await this.requireDonor(donationId, caller);
            if (!donation.active) {
                throw new LedgerError('DonationNotActive', `donation ${donationId} is no longer active`);
            }
            if (this.state.now() > donation.fundingDeadline) {
                throw new LedgerError('DeadlinePassed', `funding deadline ${donation.fundingDeadline} has passed`);
            }
            if (!Number.isSafeInteger(extensionDays) || extensionDays < 0) {
                throw new LedgerError('InvalidDeadline', 'extension must be a whole number of days');
            }
            if (extensionDays === 0) throw new LedgerError('ZeroValue', 'extension must be at least one day');

            const totalDays = donation.extensionDays + extensionDays;
            if (totalDays * SECONDS_PER_DAY > this.config.maxExtensionPeriod) {
                throw new LedgerError('InvalidDeadline', `cumulative extension of ${totalDays} days exceeds the limit`);
            }
            const fundingDeadline = this.addSeconds(donation.fundingDeadline, extensionDays * SECONDS_PER_DAY);

            const extended: Donation = { ...donation, fundingDeadline, extensionDays: totalDays };
            this.save(extended);

            this.logger.info(`Donation ${donationId} deadline extended by ${extensionDays} days to ${fundingDeadline}`);
            this.state.emit(LedgerEventName.FUNDING_PERIOD_EXTENDED, { ...extended });
            return extended;
        });
    }

    /**
     * Sends everything the vault holds to the admin. Crisis use only: the
     * per-donation escrow balances are not touched and stop matching the
     * vault total.
     */
    async emergencyWithdraw(caller: string): Promise<bigint> {
        return this.guard.run('donation', async () => {
            await this.access.requireRole(caller, Role.ADMIN);
            const amount = await this.vault.sweep(caller);
            this.state.emit(LedgerEventName.EMERGENCY_WITHDRAWAL, { admin: caller, amount, vaultTotal: 0n });
            return amount;
        });
    }

    async getDonation(donationId: number): Promise<Donation> {
        const donation = await this.load(donationId);
        if (!donation) throw new LedgerError('DonationNotFound', `donation ${donationId} does not exist`);
        return donation;
    }

    async getDonationCount(): Promise<number> {
        return this.readCounter(this.state.key('donationCount'));
    }

    getEscrowBalance(donationId: number): Promise<bigint> {
        return this.vault.balanceOf(donationId);
    }

    /** Number of donations the identity has created. */
    donationCountOf(identity: string): Promise<number> {
        return this.readCounter(this.state.key('donationCounter', identity));
    }

    private validateTerms(input: CreateDonationInput): void {
        const { minDonationAmount, maxDonationAmount, minEquityPercentage, maxEquityPercentage } = this.config;
        if (input.amount < minDonationAmount || input.amount > maxDonationAmount) {
            throw new LedgerError('InvalidAmount', `amount must be between ${minDonationAmount} and ${maxDonationAmount}`);
        }
        if (!Number.isInteger(input.equityPercentage)
            || input.equityPercentage < minEquityPercentage
            || input.equityPercentage > maxEquityPercentage) {
            throw new LedgerError('InvalidPercentage', `equity percentage must be between ${minEquityPercentage} and ${maxEquityPercentage}`);
        }
        if (input.nonprofitName.trim().length === 0) throw new LedgerError('EmptyString', 'nonprofit name must not be empty');
        if (input.description.trim().length === 0) throw new LedgerError('EmptyString', 'description must not be empty');
        if (input.valuation <= 0n) throw new LedgerError('ZeroValue', 'valuation must be positive');
    }

    private addSeconds(timestamp: number, seconds: number): number {
        const result = timestamp + seconds;
        if (!Number.isSafeInteger(result) || result > this.config.maxTimestamp) {
            throw new LedgerError('InvalidDeadline', `deadline ${timestamp} + ${seconds}s is out of range`);
        }
        return result;
    }

    private async requireDonor(donationId: number, caller: string): Promise<Donation> {
        const donation = await this.load(donationId);
        if (!donation || donation.donor !== caller) {
            throw new LedgerError('UnauthorizedAccess', `only the donor may manage donation ${donationId}`);
        }
        return donation;
    }

    private load(donationId: number): Promise<Donation | undefined> {
        return this.state.read<Donation>(this.state.key('donation', donationId));
    }

    private save(donation: Donation): void {
        this.state.write(this.state.key('donation', donation.id), donation);
    }

    private async readCounter(key: string): Promise<number> {
        const counter = await this.state.read<Counter>(key);
        return counter ? counter.count : 0;
    }

    private setCounter(key: string, count: number): void {
        const counter: Counter = { docType: 'counter', count };
        this.state.write(key, counter);
    }
}
