// Copyright (c) Mysten Labs, Inc.
// SPDX-License-Identifier: Apache-2.0

import { isSerializedBcs } from '@mysten/bcs';
import type { BcsType, SerializedBcs } from '@mysten/bcs';

import { bcs } from '../bcs/index.js';
import { InputError } from './errors.js';

export type PureBytes = SerializedBcs<any, any> | Uint8Array;

const BASE_SCHEMAS = {
	u8: bcs.U8,
	u16: bcs.U16,
	u32: bcs.U32,
	u64: bcs.U64,
	u128: bcs.U128,
	u256: bcs.U256,
	bool: bcs.Bool,
	string: bcs.String,
	address: bcs.Address,
	id: bcs.Address,
};

export type BasePureType = keyof typeof BASE_SCHEMAS;
export type PureTypeName = BasePureType | `vector<${string}>` | `option<${string}>`;

export type ValidPureTypeName<T extends string> = T extends BasePureType
	? PureTypeName
	: T extends `vector<${infer U}>`
		? ValidPureTypeName<U>
		: T extends `option<${infer U}>`
			? ValidPureTypeName<U>
			: T & { error: `Invalid pure type name: ${T}` };

export type ShapeFromPureTypeName<T extends PureTypeName> = T extends BasePureType
	? Parameters<(typeof BASE_SCHEMAS)[T]['serialize']>[0]
	: T extends `vector<${infer U extends PureTypeName}>`
		? ShapeFromPureTypeName<U>[]
		: T extends `option<${infer U extends PureTypeName}>`
			? ShapeFromPureTypeName<U> | null
			: never;

function isBasePureType(name: string): name is BasePureType {
	return Object.hasOwn(BASE_SCHEMAS, name);
}

function schemaFromName(name: string): BcsType<any, any> {
	if (isBasePureType(name)) {
		return BASE_SCHEMAS[name];
	}

	const generic = name.match(/^(vector|option)<(.+)>$/);
	if (generic) {
		const [, kind, inner] = generic;
		const innerSchema = schemaFromName(inner.trim());
		return kind === 'vector' ? bcs.vector(innerSchema) : bcs.option(innerSchema);
	}

	throw new InputError('InvalidValue', `Invalid pure type name: ${name}`);
}

/** Serializes `value` as the named Move type, reporting codec rejections as invalid input */
export function serializePure(type: string, value: unknown): SerializedBcs<unknown> {
	const schema = schemaFromName(type);

	try {
		return schema.serialize(value);
	} catch (error) {
		throw new InputError('InvalidValue', `Invalid ${type} value: ${String(value)}`, {
			cause: error,
		});
	}
}

/**
 * Builds the `pure` helper a builder exposes. `makePure` receives the encoded bytes and
 * returns whatever handle the builder hands out for the new input.
 */
export function createPure<T>(makePure: (value: PureBytes) => T) {
	function pure<Type extends PureTypeName>(
		type: Type extends PureTypeName ? ValidPureTypeName<Type> : Type,
		value: ShapeFromPureTypeName<Type>,
	): T;

	function pure(
		/** Pre-encoded bytes, used as they are */
		value: PureBytes,
	): T;

	function pure(typeOrSerializedValue?: string | PureBytes, value?: unknown): T {
		if (typeof typeOrSerializedValue === 'string') {
			return makePure(serializePure(typeOrSerializedValue, value));
		}

		if (typeOrSerializedValue instanceof Uint8Array || isSerializedBcs(typeOrSerializedValue)) {
			return makePure(typeOrSerializedValue);
		}

		throw new InputError(
			'InvalidValue',
			'pure must be called with a type name and a value, or with serialized bytes',
		);
	}

	pure.u8 = (value: number) => makePure(serializePure('u8', value));
	pure.u16 = (value: number) => makePure(serializePure('u16', value));
	pure.u32 = (value: number) => makePure(serializePure('u32', value));
	pure.u64 = (value: bigint | number | string) => makePure(serializePure('u64', value));
	pure.u128 = (value: bigint | number | string) => makePure(serializePure('u128', value));
	pure.u256 = (value: bigint | number | string) => makePure(serializePure('u256', value));
	pure.bool = (value: boolean) => makePure(serializePure('bool', value));
	pure.string = (value: string) => makePure(serializePure('string', value));
	pure.address = (value: string) => makePure(serializePure('address', value));
	pure.id = pure.address;
	pure.vector = <Type extends PureTypeName>(
		type: Type extends PureTypeName ? ValidPureTypeName<Type> : Type,
		value: Iterable<ShapeFromPureTypeName<Type>> & { length: number },
	) => makePure(serializePure(`vector<${type}>`, value));
	pure.option = <Type extends PureTypeName>(
		type: Type extends PureTypeName ? ValidPureTypeName<Type> : Type,
		value: ShapeFromPureTypeName<Type> | null | undefined,
	) => makePure(serializePure(`option<${type}>`, value));

	return pure;
}
