// Copyright (c) Mysten Labs, Inc.
// SPDX-License-Identifier: Apache-2.0

import { bcs } from '@mysten/bcs';

import {
	Address,
	Argument,
	CallArg,
	Command,
	GasData,
	ObjectArg,
	ObjectDigest,
	ObjectRef,
	ProgrammableMoveCall,
	ProgrammableTransaction,
	SharedObjectRef,
	StructTag,
	TransactionData,
	TransactionDataV1,
	TransactionExpiration,
	TransactionKind,
	TypeTag,
} from './bcs.js';

export type { TypeTag } from './types.js';

export { parseTypeTag, TypeTagParseError, typeTagToString } from './type-tag.js';
export { BcsType, type BcsTypeOptions } from '@mysten/bcs';

const txBcs = {
	...bcs,
	U8: bcs.u8(),
	U16: bcs.u16(),
	U32: bcs.u32(),
	U64: bcs.u64(),
	U128: bcs.u128(),
	U256: bcs.u256(),
	ULEB128: bcs.uleb128(),
	Bool: bcs.bool(),
	String: bcs.string(),
	Address,
	Argument,
	CallArg,
	Command,
	GasData,
	ObjectArg,
	ObjectDigest,
	ObjectRef,
	ProgrammableMoveCall,
	ProgrammableTransaction,
	SharedObjectRef,
	StructTag,
	TransactionData,
	TransactionDataV1,
	TransactionExpiration,
	TransactionKind,
	TypeTag,
};

export { txBcs as bcs };
