/*
 * SPDX-License-Identifier: Apache-2.0
 */

export enum ErrorCategory {
    VALIDATION = 'validation',
    AUTHORIZATION = 'authorization',
    STATE = 'state',
    RESOURCE = 'resource'
}

const CATEGORY_BY_CODE = {
    InvalidAmount: ErrorCategory.VALIDATION,
    InvalidPercentage: ErrorCategory.VALIDATION,
    EmptyString: ErrorCategory.VALIDATION,
    ZeroValue: ErrorCategory.VALIDATION,
    InvalidRating: ErrorCategory.VALIDATION,
    InvalidDeadline: ErrorCategory.VALIDATION,
    InvalidAddress: ErrorCategory.VALIDATION,
    InvalidRole: ErrorCategory.VALIDATION,

    UnauthorizedAccess: ErrorCategory.AUTHORIZATION,

    DonationNotActive: ErrorCategory.STATE,
    DeadlinePassed: ErrorCategory.STATE,
    AlreadyRated: ErrorCategory.STATE,
    DonationNotFound: ErrorCategory.STATE,
    Paused: ErrorCategory.STATE,
    NotPaused: ErrorCategory.STATE,
    ReentrantCall: ErrorCategory.STATE,
    AlreadyInitialized: ErrorCategory.STATE,

    InsufficientFunds: ErrorCategory.RESOURCE,
    TransferFailed: ErrorCategory.RESOURCE
} as const;

export type ErrorCode = keyof typeof CATEGORY_BY_CODE;

/**
 * Failure of a ledger operation. The message is prefixed with the code so
 * Fabric clients, which only receive the message text, can branch on it.
 */
export class LedgerError extends Error {
    readonly code: ErrorCode;
    readonly category: ErrorCategory;

    constructor(code: ErrorCode, detail: string) {
        super(`${code}: ${detail}`);
        this.name = 'LedgerError';
        this.code = code;
        this.category = CATEGORY_BY_CODE[code];
    }
}

export function isLedgerError(err: unknown, code?: ErrorCode): err is LedgerError {
    return err instanceof LedgerError && (code === undefined || err.code === code);
}
