import { UNIT } from '../src/config';
import { Role } from '../src/models/Participant';
import { ADMIN, DONOR, LedgerHarness, NONPROFIT, STRANGER, T0, expectLedgerError } from './support/harness';

const RATER_A = 'x509::/CN=rater-a::/CN=ca.org3';
const RATER_B = 'x509::/CN=rater-b::/CN=ca.org3';
const RATER_C = 'x509::/CN=rater-c::/CN=ca.org3';

describe('ReputationStore', () => {
    let h: LedgerHarness;

    beforeEach(async () => {
        h = new LedgerHarness();
        await h.bootstrap();
    });

    function rate(subject: string, rater: string, rating: number, review = 'Smooth handover') {
        return h.submit(ledger => ledger.reputation.rate(subject, rater, rating, review));
    }

    it('keeps a truncated integer average', async () => {
        await rate(DONOR, RATER_A, 5, 'first');
        await rate(DONOR, RATER_B, 3, 'second');
        h.backend.advance(60);
        const updated = await rate(DONOR, RATER_C, 4, 'third');

        expect(updated).toEqual({
            identity: DONOR,
            docType: 'reputation',
            role: Role.DONOR,
            rating: 4,
            totalRatings: 3,
            lastUpdated: T0 + 60,
            review: 'third'
        });
    });

    it('truncates rather than rounds', async () => {
        await rate(DONOR, RATER_A, 2);
        const updated = await rate(DONOR, RATER_B, 5);

        expect(updated.rating).toBe(3);
    });

    it('updates the nonprofit aggregate when the subject holds NONPROFIT', async () => {
        await h.fundedDonation();

        await rate(NONPROFIT, RATER_A, 5);
        const summary = await h.view(ledger => ledger.reputation.getReputation(NONPROFIT));

        expect(summary.nonprofit).toMatchObject({ rating: 5, totalRatings: 1 });
        expect(summary.donor).toMatchObject({ rating: 0, totalRatings: 0, review: '' });
    });

    it('uses the donor aggregate for identities without NONPROFIT', async () => {
        await h.createDonation();

        await rate(DONOR, RATER_A, 4);
        const summary = await h.view(ledger => ledger.reputation.getReputation(DONOR));

        expect(summary.donor).toMatchObject({ rating: 4, totalRatings: 1 });
        expect(summary.nonprofit.totalRatings).toBe(0);
    });

    it('rejects a second rating from the same rater in the same round', async () => {
        await rate(DONOR, RATER_A, 4);

        await expectLedgerError(rate(DONOR, RATER_A, 1), 'AlreadyRated');
        const summary = await h.view(ledger => ledger.reputation.getReputation(DONOR));
        expect(summary.donor).toMatchObject({ rating: 4, totalRatings: 1 });
    });

    it('opens a new round when the subject creates another donation', async () => {
        await rate(DONOR, RATER_A, 4);
        await h.createDonation();

        const updated = await rate(DONOR, RATER_A, 2);
        expect(updated).toMatchObject({ rating: 3, totalRatings: 2 });
    });

    it('lets one rater rate different subjects in the same round', async () => {
        await rate(DONOR, RATER_A, 4);

        const other = await rate(STRANGER, RATER_A, 5);
        expect(other.totalRatings).toBe(1);
    });

    it.each([0, 6, 3.5])('rejects rating %p', async rating => {
        await expectLedgerError(rate(DONOR, RATER_A, rating), 'InvalidRating');
    });

    it('rejects an empty review or subject', async () => {
        await expectLedgerError(rate(DONOR, RATER_A, 3, ''), 'EmptyString');
        await expectLedgerError(rate('', RATER_A, 3), 'InvalidAddress');
    });

    it('is blocked while paused', async () => {
        await h.submit(ledger => ledger.access.pause(ADMIN));

        await expectLedgerError(rate(DONOR, RATER_A, 3), 'Paused');
        expect((await h.view(ledger => ledger.reputation.getReputation(DONOR))).donor.totalRatings).toBe(0);
    });

    it('emits ReputationUpdated', async () => {
        await rate(DONOR, RATER_A, 5, 'Prompt and clear');

        expect(h.backend.lastEvent()).toEqual({
            name: 'ReputationUpdated',
            payload: {
                subject: DONOR,
                rater: RATER_A,
                role: 'DONOR',
                rating: 5,
                totalRatings: 1,
                lastUpdated: T0,
                review: 'Prompt and clear'
            }
        });
    });

    it('leaves funds untouched', async () => {
        await rate(NONPROFIT, RATER_A, 5);

        expect(await h.wallet(NONPROFIT)).toBe(100n * UNIT);
    });
});
