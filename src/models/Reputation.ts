/*
 * SPDX-License-Identifier: Apache-2.0
 */

import { Role } from './Participant';

export type RatedRole = Role.DONOR | Role.NONPROFIT;

export interface UserReputation {
    identity: string;
    docType: 'reputation';
    role: RatedRole;
    rating: number;         // Integer average, 1-5 (0 before the first rating)
    totalRatings: number;
    lastUpdated: number;    // Seconds since epoch
    review: string;         // Latest review only
}

export interface ReputationSummary {
    identity: string;
    donor: UserReputation;
    nonprofit: UserReputation;
}

export function emptyReputation(identity: string, role: RatedRole): UserReputation {
    return {
        identity,
        docType: 'reputation',
        role,
        rating: 0,
        totalRatings: 0,
        lastUpdated: 0,
        review: ''
    };
}
