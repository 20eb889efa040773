// Copyright (c) Mysten Labs, Inc.
// SPDX-License-Identifier: Apache-2.0

import { fromBase58 } from '@mysten/bcs';

export const ADDRESS_LENGTH = 32;
const DIGEST_LENGTH = 32;

const ADDRESS_LITERAL = new RegExp(`^(?:0x)?[0-9a-fA-F]{1,${ADDRESS_LENGTH * 2}}$`);
const NORMALIZED_ADDRESS = new RegExp(`^0x[0-9a-f]{${ADDRESS_LENGTH * 2}}$`);
// Same grammar the Move bytecode verifier applies to module, function and struct names
const MOVE_IDENTIFIER = /^(?:[a-zA-Z][a-zA-Z0-9_]*|_[a-zA-Z0-9_]+)$/;

/** Lowercases `value`, drops a leading `0x` and left-pads it to a full address */
export function normalizeAddress(value: string): string {
	const hex = value.toLowerCase().replace(/^0x/, '');
	return `0x${hex.padStart(ADDRESS_LENGTH * 2, '0')}`;
}

/** True for hex addresses in short or full form, with or without `0x`. Empty input is not one. */
export function isAddressLiteral(value: string): boolean {
	return ADDRESS_LITERAL.test(value);
}

/** True for normalized addresses only: `0x` followed by 64 lowercase hex digits */
export function isValidAddress(value: string): boolean {
	return NORMALIZED_ADDRESS.test(value);
}

export function isValidMoveIdentifier(value: string): boolean {
	return MOVE_IDENTIFIER.test(value);
}

export function isValidDigest(value: string): boolean {
	try {
		return fromBase58(value).length === DIGEST_LENGTH;
	} catch {
		return false;
	}
}
