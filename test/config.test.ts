import { LEDGER_CONFIG, SECONDS_PER_DAY, UNIT, resolveLedgerConfig } from '../src/config';
import { ErrorCategory, LedgerError, isLedgerError } from '../src/errors';

describe('resolveLedgerConfig', () => {
    it('defaults to 0.1..10 units and 1..10 percent', () => {
        const config = resolveLedgerConfig({ fundingPeriod: 30 * SECONDS_PER_DAY });

        expect(config.minDonationAmount).toBe(100_000_000_000_000_000n);
        expect(config.maxDonationAmount).toBe(10n * UNIT);
        expect(config.minEquityPercentage).toBe(1);
        expect(config.maxEquityPercentage).toBe(10);
        expect(config.fundingPeriod).toBe(2_592_000);
        expect(config.maxRating).toBe(5);
    });

    it('keeps values that are not overridden', () => {
        expect(resolveLedgerConfig({ maxRating: 10 }).maxWalletBalance).toBe(LEDGER_CONFIG.maxWalletBalance);
    });

    it.each([
        [{ minDonationAmount: 0n }, 'InvalidAmount'],
        [{ minDonationAmount: 11n * UNIT }, 'InvalidAmount'],
        [{ minEquityPercentage: 0 }, 'InvalidPercentage'],
        [{ fundingPeriod: Number.NaN }, 'InvalidDeadline'],
        [{ maxExtensionPeriod: -1 }, 'InvalidDeadline'],
        [{ minRating: 6 }, 'InvalidRating']
    ] as const)('rejects %p', (overrides, code) => {
        expect(() => resolveLedgerConfig(overrides)).toThrow(expect.objectContaining({ code }));
    });
});

describe('LedgerError', () => {
    it('prefixes the message with the code and classifies it', () => {
        const err = new LedgerError('DeadlinePassed', 'funding deadline 5 has passed');

        expect(err.message).toBe('DeadlinePassed: funding deadline 5 has passed');
        expect(err.category).toBe(ErrorCategory.STATE);
        expect(new LedgerError('TransferFailed', 'x').category).toBe(ErrorCategory.RESOURCE);
        expect(isLedgerError(err, 'DeadlinePassed')).toBe(true);
        expect(isLedgerError(err, 'InvalidAmount')).toBe(false);
        expect(isLedgerError(new Error('DeadlinePassed: x'))).toBe(false);
    });
});
