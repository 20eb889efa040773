// Copyright (c) Mysten Labs, Inc.
// SPDX-License-Identifier: Apache-2.0

export {
	ArgumentTable,
	type ResolutionEntry,
	type ResolvedArgument,
	type TransactionArgument,
} from './ArgumentTable.js';
export { Commands, type MoveCallTarget } from './Commands.js';
export type {
	Argument,
	CallArg,
	Command,
	GasData,
	ObjectInput,
	ObjectRef,
	TerminalCommand,
	TransactionData,
	TransactionExpiration,
} from './data/internal.js';
export {
	ArgumentReferenceError,
	EncodingError,
	InputError,
	NamingError,
	ResolutionError,
	TransactionBuilderError,
	type ArgumentReferenceErrorCode,
	type InputErrorCode,
	type ResolutionErrorReason,
} from './errors.js';
export { getTransactionDigest, hashTypedData } from './hash.js';
export { Inputs } from './Inputs.js';
export { coinWithBalance, COIN_WITH_BALANCE } from './intents/CoinWithBalance.js';
export { DEFAULT_LIMITS, resolveLimits, type BuilderLimits } from './limits.js';
export type {
	BuildTransactionOptions,
	IntentRequest,
	IntentResolver,
	IntentStatus,
} from './resolver.js';
export {
	TransactionBuilder,
	type MoveCallArgument,
	type TransactionArgumentInput,
	type TransactionBuilderOptions,
	type TransactionExpirationInput,
} from './TransactionBuilder.js';
export {
	encodeTransactionData,
	type EncodeTransactionOptions,
	type TransactionSnapshot,
} from './TransactionData.js';
