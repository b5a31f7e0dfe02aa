/*
 * SPDX-License-Identifier: Apache-2.0
 */

import {type Contract} from 'fabric-contract-api';
import { AdminContract } from './contracts/AdminContract';
import { WalletContract } from './contracts/WalletContract';
import { DonationContract } from './contracts/DonationContract';
import { ReputationContract } from './contracts/ReputationContract';

export { AdminContract, WalletContract, DonationContract, ReputationContract };
export { LedgerError, ErrorCategory } from './errors';
export type { ErrorCode } from './errors';

export const contracts: typeof Contract[] = [
    AdminContract,
    WalletContract,
    DonationContract,
    ReputationContract
];
