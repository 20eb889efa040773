// Copyright (c) Mysten Labs, Inc.
// SPDX-License-Identifier: Apache-2.0

export {
	ADDRESS_LENGTH,
	isAddressLiteral,
	isValidAddress,
	isValidDigest,
	isValidMoveIdentifier,
	normalizeAddress,
} from './move-types.js';

export { GAS_COIN_TYPE } from './constants.js';
