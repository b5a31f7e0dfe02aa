/*
 * SPDX-License-Identifier: Apache-2.0
 */

import type { Logger } from 'winston';
import { LedgerError } from '../errors';
import { LedgerEventName } from '../models/LedgerEvent';
import { Role, Wallet } from '../models/Participant';
import { AccessControlRegistry, requireIdentity } from './AccessControlRegistry';
import { ReentrancyGuard } from './ReentrancyGuard';
import { WorldState } from './WorldState';

/**
 * Outbound transfer port. The escrow vault commits its own state before
 * calling transfer() and undoes it when transfer() throws.
 */
export interface TransferGateway {
    transfer(to: string, amount: bigint): Promise<void>;
}

/**
 * Balances held by participants outside the escrow: where funding comes
 * from and where payouts land.
 */
export class WalletBook {
    constructor(
        private readonly state: WorldState,
        private readonly access: AccessControlRegistry,
        private readonly guard: ReentrancyGuard,
        private readonly maxBalance: bigint,
        private readonly logger: Logger
    ) {}

    async balanceOf(identity: string): Promise<bigint> {
        const wallet = await this.state.read<Wallet>(this.state.key('wallet', identity));
        return wallet ? BigInt(wallet.balance) : 0n;
    }

    async credit(identity: string, amount: bigint): Promise<bigint> {
        const balance = (await this.balanceOf(identity)) + amount;
        if (balance > this.maxBalance) {
            throw new LedgerError('TransferFailed', `wallet of ${identity} cannot hold ${balance}`);
        }
        this.save(identity, balance);
        return balance;
    }

    async debit(identity: string, amount: bigint): Promise<bigint> {
        const current = await this.balanceOf(identity);
        if (current < amount) {
            throw new LedgerError('InsufficientFunds', `wallet of ${identity} holds ${current}, needs ${amount}`);
        }
        const balance = current - amount;
        this.save(identity, balance);
        return balance;
    }

    async issue(caller: string, recipient: string, amount: bigint): Promise<bigint> {
        await this.access.requireNotPaused();
        return this.guard.run('wallet', async () => {
            await this.access.requireRole(caller, Role.ADMIN);
            requireIdentity(recipient);
            if (amount <= 0n) throw new LedgerError('ZeroValue', 'issued amount must be positive');

            const balance = await this.credit(recipient, amount);
            this.logger.info(`Issued ${amount} to ${recipient}`);
            this.state.emit(LedgerEventName.FUNDS_ISSUED, { recipient, amount, balance, issuedBy: caller });
            return balance;
        });
    }

    private save(identity: string, balance: bigint): void {
        const wallet: Wallet = { identity, docType: 'wallet', balance: balance.toString() };
        this.state.write(this.state.key('wallet', identity), wallet);
    }
}

export class WalletTransferGateway implements TransferGateway {
    constructor(private readonly wallets: WalletBook) {}

    async transfer(to: string, amount: bigint): Promise<void> {
        await this.wallets.credit(to, amount);
    }
}
