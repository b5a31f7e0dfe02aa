/*
 * SPDX-License-Identifier: Apache-2.0
 */

export enum LedgerEventName {
    LEDGER_INITIALIZED = 'LedgerInitialized',
    DONATION_CREATED = 'DonationCreated',
    DONATION_FUNDED = 'DonationFunded',
    DONATION_DISTRIBUTED = 'DonationDistributed',
    DONATION_CANCELLED = 'DonationCancelled',
    FUNDING_PERIOD_EXTENDED = 'FundingPeriodExtended',
    REPUTATION_UPDATED = 'ReputationUpdated',
    ROLE_GRANTED = 'RoleGranted',
    ROLE_REVOKED = 'RoleRevoked',
    LEDGER_PAUSED = 'LedgerPaused',
    LEDGER_UNPAUSED = 'LedgerUnpaused',
    EMERGENCY_WITHDRAWAL = 'EmergencyWithdrawal',
    FUNDS_ISSUED = 'FundsIssued'
}

export interface LedgerEvent {
    name: LedgerEventName;
    payload: Record<string, unknown>;
}
