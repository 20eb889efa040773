// Copyright (c) Mysten Labs, Inc.
// SPDX-License-Identifier: Apache-2.0

export interface CoinStruct {
	coinObjectId: string;
	coinType: string;
	version: string;
	digest: string;
	/** Decimal string, coin balances do not fit in a double */
	balance: string;
}

export interface PaginatedCoins {
	data: CoinStruct[];
	hasNextPage: boolean;
	nextCursor?: string | null;
}

export interface GetCoinsParams {
	owner: string;
	coinType?: string | null;
	cursor?: string | null;
	limit?: number | null;
}

/**
 * Read access to chain state that intent resolvers need. Implementations own their
 * transport, timeouts and cancellation.
 */
export interface StateQueryClient {
	getCoins(input: GetCoinsParams): Promise<PaginatedCoins>;
}

export class StateQueryError extends Error {
	/** Whether repeating the same query may succeed */
	transient: boolean;

	constructor(
		message: string,
		{ transient = false, cause }: { transient?: boolean; cause?: unknown } = {},
	) {
		super(message, { cause });
		this.name = 'StateQueryError';
		this.transient = transient;
	}
}
