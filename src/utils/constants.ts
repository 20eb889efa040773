// Copyright (c) Mysten Labs, Inc.
// SPDX-License-Identifier: Apache-2.0

import { normalizeTypeArgument } from '../transactions/Commands.js';

/** Coin type of the native gas coin */
export const GAS_COIN_TYPE = normalizeTypeArgument('0x2::sui::SUI');
