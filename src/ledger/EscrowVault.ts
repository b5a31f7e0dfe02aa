/*
 * SPDX-License-Identifier: Apache-2.0
 */

import type { Logger } from 'winston';
import { LedgerError, isLedgerError } from '../errors';
import { EscrowBalance, VaultTotals } from '../models/Escrow';
import { TransferGateway } from './WalletBook';
import { Checkpoint, WorldState } from './WorldState';

/**
 * Custody of donation funds, one balance per donation id plus the vault
 * total. Payouts follow checks-effects-interactions: the zeroed balance
 * and reduced total are written before the gateway is called, so anything
 * the transfer calls back into sees the money as gone. A failed transfer
 * restores both.
 */
export class EscrowVault {
    constructor(
        private readonly state: WorldState,
        private readonly gateway: TransferGateway,
        private readonly logger: Logger
    ) {}

    async balanceOf(donationId: number): Promise<bigint> {
        const escrow = await this.state.read<EscrowBalance>(this.state.key('escrow', donationId));
        return escrow ? BigInt(escrow.balance) : 0n;
    }

    async totalCustodied(): Promise<bigint> {
        const totals = await this.state.read<VaultTotals>(this.state.key('vault'));
        return totals ? BigInt(totals.total) : 0n;
    }

    async deposit(donationId: number, amount: bigint): Promise<void> {
        if (amount <= 0n) throw new LedgerError('ZeroValue', 'deposit must be positive');

        this.setBalance(donationId, (await this.balanceOf(donationId)) + amount);
        this.setTotal((await this.totalCustodied()) + amount);
        this.logger.debug(`Escrow ${donationId}: deposited ${amount}`);
    }

    release(donationId: number, to: string): Promise<bigint> {
        return this.payOut(donationId, to, 'release');
    }

    refund(donationId: number, to: string): Promise<bigint> {
        return this.payOut(donationId, to, 'refund');
    }

    /**
     * Moves the whole vault total to one recipient. Per-donation balances
     * are left as they are, so they no longer add up to the total.
     */
    async sweep(to: string): Promise<bigint> {
        const total = await this.totalCustodied();
        if (total === 0n) throw new LedgerError('InsufficientFunds', 'vault is empty');

        const checkpoint = this.state.checkpoint();
        this.setTotal(0n);
        await this.send(to, total, checkpoint);
        this.logger.warn(`Vault swept: ${total} sent to ${to}`);
        return total;
    }

    private async payOut(donationId: number, to: string, kind: 'release' | 'refund'): Promise<bigint> {
        const amount = await this.balanceOf(donationId);
        if (amount === 0n) {
            throw new LedgerError('InsufficientFunds', `escrow for donation ${donationId} is empty`);
        }
        const total = await this.totalCustodied();
        if (total < amount) {
            throw new LedgerError('TransferFailed', `vault holds ${total}, escrow ${donationId} needs ${amount}`);
        }

        const checkpoint = this.state.checkpoint();
        this.setBalance(donationId, 0n);
        this.setTotal(total - amount);
        await this.send(to, amount, checkpoint);
        this.logger.info(`Escrow ${donationId}: ${kind} of ${amount} to ${to}`);
        return amount;
    }

    private async send(to: string, amount: bigint, checkpoint: Checkpoint): Promise<void> {
        try {
            await this.gateway.transfer(to, amount);
        } catch (err) {
            this.state.rollback(checkpoint);
            if (isLedgerError(err, 'TransferFailed')) throw err;
            const reason = err instanceof Error ? err.message : String(err);
            throw new LedgerError('TransferFailed', `transfer of ${amount} to ${to} failed: ${reason}`);
        }
    }

    private setBalance(donationId: number, balance: bigint): void {
        const escrow: EscrowBalance = { donationId, docType: 'escrow', balance: balance.toString() };
        this.state.write(this.state.key('escrow', donationId), escrow);
    }

    private setTotal(total: bigint): void {
        const totals: VaultTotals = { docType: 'vault', total: total.toString() };
        this.state.write(this.state.key('vault'), totals);
    }
}
