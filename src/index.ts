/*
 * SPDX-License-Identifier: Apache-2.0
 */

import 'reflect-metadata';
import {type Contract} from 'fabric-contract-api';
import { AdminContract } from './contracts/AdminContract';
import { WalletContract } from './contracts/WalletContract';
import { ProductContract } from './contracts/ProductContract';
import { OrderContract } from './contracts/OrderContract';
import { DisputeContract } from './contracts/DisputeContract';

export { AdminContract, WalletContract, ProductContract, OrderContract, DisputeContract };
export { MarketError, MarketErrorCodes } from './errors';
export type { MarketErrorCode } from './errors';

export const contracts: typeof Contract[] = [
    AdminContract,
    WalletContract,
    ProductContract,
    OrderContract,
    DisputeContract,
];
