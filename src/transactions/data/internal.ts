// Copyright (c) Mysten Labs, Inc.
// SPDX-License-Identifier: Apache-2.0

import type { InferInput, InferOutput } from 'valibot';
import {
	bigint,
	check,
	integer,
	number,
	object,
	pipe,
	string,
	transform,
	union,
} from 'valibot';

import { isAddressLiteral, isValidDigest, normalizeAddress } from '../../utils/move-types.js';

export const Address = pipe(
	string(),
	check(isAddressLiteral, 'Invalid address'),
	transform((value) => normalizeAddress(value)),
);
export const ObjectID = Address;

export const JsonU64 = pipe(
	union([string(), pipe(number(), integer()), bigint()]),
	check((val) => {
		try {
			return BigInt(val) >= 0n && BigInt(val) <= 18446744073709551615n;
		} catch {
			return false;
		}
	}, 'Invalid u64'),
	transform((val) => BigInt(val).toString()),
);

export type JsonU64Input = InferInput<typeof JsonU64>;

export const ObjectDigest = pipe(string(), check(isValidDigest, 'Invalid digest'));

export const ObjectRef = object({
	objectId: ObjectID,
	version: JsonU64,
	digest: ObjectDigest,
});
export type ObjectRef = InferOutput<typeof ObjectRef>;
export type ObjectRefInput = InferInput<typeof ObjectRef>;

/** Object inputs as callers describe them, before they become call arguments */
export type ObjectInput =
	| {
			kind: 'owned' | 'immutable' | 'receiving';
			objectId: string;
			version: JsonU64Input;
			digest?: string;
	  }
	| { kind: 'shared'; objectId: string; version: JsonU64Input; mutable?: boolean };

export type Argument =
	| { $kind: 'GasCoin'; GasCoin: true }
	| { $kind: 'Input'; Input: number }
	| { $kind: 'Result'; Result: number }
	| { $kind: 'NestedResult'; NestedResult: [number, number] };

export interface SharedObjectRef {
	objectId: string;
	initialSharedVersion: string;
	mutable: boolean;
}

export type ObjectArg =
	| { $kind: 'ImmOrOwnedObject'; ImmOrOwnedObject: ObjectRef }
	| { $kind: 'SharedObject'; SharedObject: SharedObjectRef }
	| { $kind: 'Receiving'; Receiving: ObjectRef };

export type CallArg =
	| { $kind: 'Pure'; Pure: { bytes: string } }
	| { $kind: 'Object'; Object: ObjectArg };

export interface ProgrammableMoveCall<Arg = Argument> {
	package: string;
	module: string;
	function: string;
	typeArguments: string[];
	arguments: Arg[];
}

export interface Intent {
	name: string;
	data: Record<string, unknown>;
}

export type Command<Arg = Argument> =
	| { $kind: 'MoveCall'; MoveCall: ProgrammableMoveCall<Arg> }
	| { $kind: 'TransferObjects'; TransferObjects: { objects: Arg[]; address: Arg } }
	| { $kind: 'SplitCoins'; SplitCoins: { coin: Arg; amounts: Arg[] } }
	| { $kind: 'MergeCoins'; MergeCoins: { destination: Arg; sources: Arg[] } }
	| { $kind: 'MakeMoveVec'; MakeMoveVec: { type: string | null; elements: Arg[] } }
	| { $kind: 'Publish'; Publish: { modules: string[]; dependencies: string[] } }
	| {
			$kind: 'Upgrade';
			Upgrade: { modules: string[]; dependencies: string[]; package: string; ticket: Arg };
	  }
	| { $kind: '$Intent'; $Intent: Intent };

export type CommandKind = Command['$kind'];

/** Commands as they appear in a finalized transaction */
export type TerminalCommand = Exclude<Command<Argument>, { $kind: '$Intent' }>;

export type TransactionExpiration =
	| { $kind: 'None'; None: true }
	| { $kind: 'Epoch'; Epoch: number };

export interface GasData {
	budget: string | null;
	price: string | null;
	owner: string | null;
	payment: ObjectRef[];
}

export interface TransactionData {
	version: 2;
	sender: string | null;
	expiration: TransactionExpiration;
	gasData: GasData;
	inputs: CallArg[];
	commands: TerminalCommand[];
}
