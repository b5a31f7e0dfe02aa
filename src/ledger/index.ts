/*
 * SPDX-License-Identifier: Apache-2.0
 */

import type { Logger } from 'winston';
import { LedgerConfig, resolveLedgerConfig } from '../config';
import { AccessControlRegistry } from './AccessControlRegistry';
import { DonationLedger } from './DonationLedger';
import { EscrowVault } from './EscrowVault';
import { ReentrancyGuard } from './ReentrancyGuard';
import { ReputationStore } from './ReputationStore';
import { TransferGateway, WalletBook, WalletTransferGateway } from './WalletBook';
import { WorldState } from './WorldState';

export interface LedgerOptions {
    state: WorldState;
    logger: Logger;
    config?: LedgerConfig;
    /** Defaults to crediting the recipient's wallet. */
    gateway?: (wallets: WalletBook) => TransferGateway;
}

export interface Ledger {
    state: WorldState;
    access: AccessControlRegistry;
    wallets: WalletBook;
    vault: EscrowVault;
    donations: DonationLedger;
    reputation: ReputationStore;
}

/** Wires the ledger services for one transaction's world state. */
export function openLedger(options: LedgerOptions): Ledger {
    const { state, logger } = options;
    const config = options.config ?? resolveLedgerConfig();
    const guard = new ReentrancyGuard();

    const access = new AccessControlRegistry(state, logger.child({ component: 'access' }));
    const wallets = new WalletBook(state, access, guard, config.maxWalletBalance, logger.child({ component: 'wallets' }));
    const gateway = options.gateway ? options.gateway(wallets) : new WalletTransferGateway(wallets);
    const vault = new EscrowVault(state, gateway, logger.child({ component: 'escrow' }));
    const donations = new DonationLedger({
        state,
        access,
        vault,
        wallets,
        guard,
        config,
        logger: logger.child({ component: 'donations' })
    });
    const reputation = new ReputationStore(
        state,
        access,
        guard,
        identity => donations.donationCountOf(identity),
        config,
        logger.child({ component: 'reputation' })
    );

    return { state, access, wallets, vault, donations, reputation };
}

export { AccessControlRegistry, DonationLedger, EscrowVault, ReentrancyGuard, ReputationStore, WalletBook, WalletTransferGateway, WorldState };
export type { TransferGateway };
export type { CreateDonationInput } from './DonationLedger';
export type { StateBackend, Checkpoint } from './WorldState';
