// Copyright (c) Mysten Labs, Inc.
// SPDX-License-Identifier: Apache-2.0

import { toBase58 } from '@mysten/bcs';
import { blake2b } from '@noble/hashes/blake2b';

/**
 * Blake2b-256 of `data` prefixed with `${typeTag}::`.
 *
 * @param typeTag domain tag such as TransactionData
 */
export function hashTypedData(typeTag: string, data: Uint8Array): Uint8Array {
	const typeTagBytes = new TextEncoder().encode(`${typeTag}::`);

	const dataWithTag = new Uint8Array(typeTagBytes.length + data.length);
	dataWithTag.set(typeTagBytes);
	dataWithTag.set(data, typeTagBytes.length);

	return blake2b(dataWithTag, { dkLen: 32 });
}

/** Base58 digest of encoded transaction data, the transaction's identifier once executed */
export function getTransactionDigest(bytes: Uint8Array): string {
	return toBase58(hashTypedData('TransactionData', bytes));
}
