/*
 * SPDX-License-Identifier: Apache-2.0
 */

import type { Logger } from 'winston';
import { LedgerConfig } from '../config';
import { LedgerError } from '../errors';
import { LedgerEventName } from '../models/LedgerEvent';
import { Role } from '../models/Participant';
import { RatedRole, ReputationSummary, UserReputation, emptyReputation } from '../models/Reputation';
import { AccessControlRegistry, requireIdentity } from './AccessControlRegistry';
import { ReentrancyGuard } from './ReentrancyGuard';
import { WorldState } from './WorldState';

interface RatingReceipt {
    docType: 'ratingReceipt';
    rater: string;
    subject: string;
    donationCount: number;
    ratedAt: number;
}

export class ReputationStore {
    constructor(
        private readonly state: WorldState,
        private readonly access: AccessControlRegistry,
        private readonly guard: ReentrancyGuard,
        private readonly donationCountOf: (identity: string) => Promise<number>,
        private readonly config: LedgerConfig,
        private readonly logger: Logger
    ) {}

    async getReputation(identity: string): Promise<ReputationSummary> {
        return {
            identity,
            donor: await this.load(identity, Role.DONOR),
            nonprofit: await this.load(identity, Role.NONPROFIT)
        };
    }

    /**
     * Folds one rating into the subject's aggregate. The aggregate is the
     * NONPROFIT one when the subject currently holds that role, the DONOR
     * one otherwise.
     *
     * A rater may rate a subject once per value of the subject's donation
     * counter: creating another donation opens a new rating round.
     */
    async rate(subject: string, rater: string, rating: number, review: string): Promise<UserReputation> {
        await this.access.requireNotPaused();
        return this.guard.run('reputation', async () => {
            requireIdentity(subject);
            if (!Number.isInteger(rating) || rating < this.config.minRating || rating > this.config.maxRating) {
                throw new LedgerError('InvalidRating', `rating must be between ${this.config.minRating} and ${this.config.maxRating}`);
            }
            if (review.trim().length === 0) throw new LedgerError('EmptyString', 'review must not be empty');

            const donationCount = await this.donationCountOf(subject);
            const receiptKey = this.state.key('rating', rater, subject, donationCount);
            if (await this.state.exists(receiptKey)) {
                throw new LedgerError('AlreadyRated', `${rater} already rated ${subject} in round ${donationCount}`);
            }

            const role: RatedRole = (await this.access.hasRole(subject, Role.NONPROFIT)) ? Role.NONPROFIT : Role.DONOR;
            const current = await this.load(subject, role);
            const now = this.state.now();
            const updated: UserReputation = {
                ...current,
                rating: Math.floor((current.rating * current.totalRatings + rating) / (current.totalRatings + 1)),
                totalRatings: current.totalRatings + 1,
                lastUpdated: now,
                review
            };

            const receipt: RatingReceipt = { docType: 'ratingReceipt', rater, subject, donationCount, ratedAt: now };
            this.state.write(this.state.key('reputation', subject, role), updated);
            this.state.write(receiptKey, receipt);

            this.logger.info(`${rater} rated ${subject} (${role}) ${rating}; average now ${updated.rating}`);
            this.state.emit(LedgerEventName.REPUTATION_UPDATED, { subject, rater, role, rating: updated.rating, totalRatings: updated.totalRatings, lastUpdated: now, review });
            return updated;
        });
    }

    private async load(identity: string, role: RatedRole): Promise<UserReputation> {
        const stored = await this.state.read<UserReputation>(this.state.key('reputation', identity, role));
        return stored ?? emptyReputation(identity, role);
    }
}
