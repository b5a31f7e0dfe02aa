/*
 * SPDX-License-Identifier: Apache-2.0
 */

import { LedgerError } from './errors';

export const SECONDS_PER_DAY = 24 * 60 * 60;

// 18 decimals: one whole unit is 10^18 base units
export const UNIT = 10n ** 18n;

export interface LedgerConfig {
    /** Smallest donation amount, in base units. */
    minDonationAmount: bigint;
    /** Largest donation amount, in base units. */
    maxDonationAmount: bigint;
    minEquityPercentage: number;
    maxEquityPercentage: number;
    /** Seconds between creation and the initial funding deadline. */
    fundingPeriod: number;
    /** Cap on the cumulative extension of a funding deadline, in seconds. */
    maxExtensionPeriod: number;
    /** Largest representable deadline, in seconds since the epoch. */
    maxTimestamp: number;
    maxWalletBalance: bigint;
    minRating: number;
    maxRating: number;
}

export const LEDGER_CONFIG: LedgerConfig = {
    minDonationAmount: UNIT / 10n,
    maxDonationAmount: 10n * UNIT,
    minEquityPercentage: 1,
    maxEquityPercentage: 10,
    // Deadlines are part of the write set: every endorsing peer must run the
    // chaincode with the same FUNDING_PERIOD_DAYS and MAX_EXTENSION_DAYS.
    fundingPeriod: parseInt(process.env.FUNDING_PERIOD_DAYS || '30', 10) * SECONDS_PER_DAY,
    maxExtensionPeriod: parseInt(process.env.MAX_EXTENSION_DAYS || '90', 10) * SECONDS_PER_DAY,
    maxTimestamp: Number.MAX_SAFE_INTEGER,
    maxWalletBalance: 2n ** 128n - 1n,
    minRating: 1,
    maxRating: 5
};

/**
 * Merges overrides onto the defaults and rejects settings the ledger
 * cannot run with.
 */
export function resolveLedgerConfig(overrides: Partial<LedgerConfig> = {}): LedgerConfig {
    const config: LedgerConfig = { ...LEDGER_CONFIG, ...overrides };

    if (config.minDonationAmount <= 0n || config.minDonationAmount > config.maxDonationAmount) {
        throw new LedgerError('InvalidAmount', 'donation bounds must satisfy 0 < min <= max');
    }
    if (config.minEquityPercentage < 1 || config.minEquityPercentage > config.maxEquityPercentage) {
        throw new LedgerError('InvalidPercentage', 'equity bounds must satisfy 1 <= min <= max');
    }
    for (const [name, value] of [
        ['fundingPeriod', config.fundingPeriod],
        ['maxExtensionPeriod', config.maxExtensionPeriod],
        ['maxTimestamp', config.maxTimestamp]
    ] as const) {
        if (!Number.isSafeInteger(value) || value <= 0) {
            throw new LedgerError('InvalidDeadline', `${name} must be a positive whole number of seconds`);
        }
    }
    if (config.minRating < 1 || config.minRating > config.maxRating) {
        throw new LedgerError('InvalidRating', 'rating bounds must satisfy 1 <= min <= max');
    }
    if (config.maxWalletBalance <= 0n) {
        throw new LedgerError('InvalidAmount', 'maxWalletBalance must be positive');
    }
    return config;
}
