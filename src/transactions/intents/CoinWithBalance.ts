// Copyright (c) Mysten Labs, Inc.
// SPDX-License-Identifier: Apache-2.0

import type { InferOutput } from 'valibot';
import { boolean, check, object, parse, pipe, string } from 'valibot';

import type { CoinStruct, StateQueryClient } from '../../client/types.js';
import { GAS_COIN_TYPE } from '../../utils/constants.js';
import { normalizeAddress } from '../../utils/move-types.js';
import type { TransactionArgument } from '../ArgumentTable.js';
import { normalizeTypeArgument } from '../Commands.js';
import { InputError, ResolutionError } from '../errors.js';
import type { IntentRequest, IntentResolver } from '../resolver.js';
import type { TransactionBuilder } from '../TransactionBuilder.js';

export const COIN_WITH_BALANCE = 'CoinWithBalance';

const CoinWithBalanceData = object({
	type: string(),
	balance: pipe(
		string(),
		check((value) => /^\d+$/.test(value), 'Balance must be a non-negative integer'),
	),
	useGasCoin: boolean(),
});
type CoinWithBalanceData = InferOutput<typeof CoinWithBalanceData>;

/**
 * A coin of `type` holding exactly `balance`. The coin is taken from the gas coin, or from the
 * sender's coins when the transaction is finalized.
 */
export function coinWithBalance({
	type = GAS_COIN_TYPE,
	balance,
	useGasCoin = true,
}: {
	balance: bigint | number | string;
	type?: string;
	useGasCoin?: boolean;
}) {
	let amount: bigint;
	try {
		amount = BigInt(balance);
	} catch (error) {
		throw new InputError('InvalidValue', `Invalid coin balance ${String(balance)}`, {
			cause: error,
		});
	}

	if (amount < 0n) {
		throw new InputError('InvalidValue', `Invalid coin balance ${String(balance)}`);
	}

	const coinType = normalizeTypeArgument(type);

	return (tx: TransactionBuilder) => {
		tx.addIntentResolver(COIN_WITH_BALANCE, coinWithBalanceResolver);

		return tx.intent({
			name: COIN_WITH_BALANCE,
			data: {
				type: coinType,
				balance: amount.toString(),
				useGasCoin,
			} satisfies CoinWithBalanceData,
		});
	};
}

// Coins that earlier intents merged, per builder and coin type. Later intents of the same type
// split off these instead of selecting again.
const mergedCoins = new WeakMap<TransactionBuilder, Map<string, TransactionArgument>>();

function usesOwnedCoins({ type, balance, useGasCoin }: CoinWithBalanceData) {
	return BigInt(balance) > 0n && !(type === GAS_COIN_TYPE && useGasCoin);
}

/** Balance still owed to every unresolved intent of `type`, including the one being resolved */
function outstandingBalance(tx: TransactionBuilder, type: string) {
	let total = 0n;

	for (const intent of tx.getIntents()) {
		if (
			intent.name !== COIN_WITH_BALANCE ||
			(intent.status !== 'pending' && intent.status !== 'resolving')
		) {
			continue;
		}

		const data = parse(CoinWithBalanceData, intent.data);
		if (data.type === type && usesOwnedCoins(data)) {
			total += BigInt(data.balance);
		}
	}

	return total;
}

export const coinWithBalanceResolver: IntentResolver = {
	async resolve(
		intent: IntentRequest,
		tx: TransactionBuilder,
		client: StateQueryClient,
	): Promise<void> {
		const data = parse(CoinWithBalanceData, intent.data);
		const { type } = data;
		const amount = BigInt(data.balance);

		if (amount === 0n) {
			tx.alias(
				intent.argument,
				tx.moveCall({ target: '0x2::coin::zero', typeArguments: [type] }),
			);
			return;
		}

		if (!usesOwnedCoins(data)) {
			tx.alias(intent.argument, tx.nestedResult(tx.splitCoins(tx.gas, [amount]), 0));
			return;
		}

		const coinsByType = mergedCoins.get(tx) ?? new Map<string, TransactionArgument>();
		mergedCoins.set(tx, coinsByType);

		let merged = coinsByType.get(type);

		if (!merged) {
			const owner = tx.sender;
			if (!owner) {
				throw new ResolutionError(
					'NotFound',
					intent.name,
					`Sender must be set to resolve ${intent.name}`,
				);
			}

			// Query first, so a failed query leaves the transaction untouched
			const coins = await selectCoins({
				client,
				owner,
				coinType: type,
				balance: outstandingBalance(tx, type),
				usedIds: tx.getUsedObjectIds(),
				intent: intent.name,
			});

			const [first, ...rest] = coins.map((coin) =>
				tx.objectRef({
					objectId: coin.coinObjectId,
					version: coin.version,
					digest: coin.digest,
				}),
			);

			if (rest.length > 0) {
				tx.mergeCoins(first, rest);
			}

			merged = first;
			coinsByType.set(type, merged);
		}

		tx.alias(intent.argument, tx.nestedResult(tx.splitCoins(merged, [amount]), 0));
	},
};

/** Picks the sender's largest coins until they cover `balance` */
async function selectCoins({
	client,
	owner,
	coinType,
	balance,
	usedIds,
	intent,
}: {
	client: StateQueryClient;
	owner: string;
	coinType: string;
	balance: bigint;
	usedIds: Set<string>;
	intent: string;
}): Promise<CoinStruct[]> {
	let remainingBalance = balance;
	const coins: CoinStruct[] = [];
	let cursor: string | null = null;

	while (true) {
		const page = await client.getCoins({ owner, coinType, cursor });
		const sortedCoins = [...page.data].sort((a, b) => {
			const diff = BigInt(b.balance) - BigInt(a.balance);
			return diff > 0n ? 1 : diff < 0n ? -1 : 0;
		});

		for (const coin of sortedCoins) {
			if (usedIds.has(normalizeAddress(coin.coinObjectId))) {
				continue;
			}

			coins.push(coin);
			remainingBalance -= BigInt(coin.balance);

			if (remainingBalance <= 0n) {
				return coins;
			}
		}

		if (!page.hasNextPage || !page.nextCursor) {
			break;
		}
		cursor = page.nextCursor;
	}

	throw new ResolutionError(
		'NotFound',
		intent,
		`Not enough coins of type ${coinType} to satisfy requested balance`,
	);
}
