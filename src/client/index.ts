// Copyright (c) Mysten Labs, Inc.
// SPDX-License-Identifier: Apache-2.0

export {
	StateQueryError,
	type CoinStruct,
	type GetCoinsParams,
	type PaginatedCoins,
	type StateQueryClient,
} from './types.js';
