// Copyright (c) Mysten Labs, Inc.
// SPDX-License-Identifier: Apache-2.0

import { isAddressLiteral, isValidMoveIdentifier, normalizeAddress } from '../utils/move-types.js';
import type { TypeTag } from './types.js';

const PRIMITIVE_TYPES = ['address', 'bool', 'signer', 'u8', 'u16', 'u32', 'u64', 'u128', 'u256'];
const TOKEN = /\s*(::|<|>|,|[A-Za-z0-9_]+)/y;

export class TypeTagParseError extends Error {
	constructor(input: string, detail: string) {
		super(`Invalid type "${input}": ${detail}`);
		this.name = 'TypeTagParseError';
	}
}

function tokenize(input: string): string[] {
	const tokens: string[] = [];
	TOKEN.lastIndex = 0;

	while (TOKEN.lastIndex < input.length) {
		const start = TOKEN.lastIndex;
		const match = TOKEN.exec(input);

		if (!match) {
			if (input.slice(start).trim() === '') {
				break;
			}
			throw new TypeTagParseError(input, `unexpected character at ${start}`);
		}

		tokens.push(match[1]);
	}

	return tokens;
}

class TypeTagParser {
	#input: string;
	#tokens: string[];
	#position = 0;
	#normalize: boolean;

	constructor(input: string, normalize: boolean) {
		this.#input = input;
		this.#tokens = tokenize(input);
		this.#normalize = normalize;
	}

	parse(): TypeTag {
		const tag = this.#type();

		if (this.#position < this.#tokens.length) {
			throw this.#error(`unexpected "${this.#tokens[this.#position]}"`);
		}

		return tag;
	}

	#type(): TypeTag {
		const token = this.#next('a type');

		if (!/^\w+$/.test(token)) {
			throw this.#error(`expected a type but found "${token}"`);
		}

		if (PRIMITIVE_TYPES.includes(token) && this.#peek() !== '::') {
			return primitiveTag(token);
		}

		if (token === 'vector' && this.#peek() === '<') {
			this.#expect('<');
			const element = this.#type();
			this.#expect('>');
			return { vector: element };
		}

		return { struct: this.#struct(token) };
	}

	#struct(address: string) {
		if (!isAddressLiteral(address)) {
			throw this.#error(`"${address}" is not an address`);
		}

		this.#expect('::');
		const module = this.#identifier('module');
		this.#expect('::');
		const name = this.#identifier('struct');
		const typeParams: TypeTag[] = [];

		if (this.#peek() === '<') {
			this.#expect('<');
			do {
				typeParams.push(this.#type());
			} while (this.#accept(','));
			this.#expect('>');
		}

		return {
			address: this.#normalize ? normalizeAddress(address) : address,
			module,
			name,
			typeParams,
		};
	}

	#identifier(kind: string) {
		const token = this.#next(`a ${kind} name`);
		if (!isValidMoveIdentifier(token)) {
			throw this.#error(`invalid ${kind} name "${token}"`);
		}
		return token;
	}

	#peek(): string | undefined {
		return this.#tokens[this.#position];
	}

	#next(expected: string): string {
		const token = this.#peek();
		if (token === undefined) {
			throw this.#error(`expected ${expected}`);
		}
		this.#position += 1;
		return token;
	}

	#accept(token: string) {
		if (this.#peek() !== token) {
			return false;
		}
		this.#position += 1;
		return true;
	}

	#expect(token: string) {
		const found = this.#next(`"${token}"`);
		if (found !== token) {
			throw this.#error(`expected "${token}" but found "${found}"`);
		}
	}

	#error(detail: string) {
		return new TypeTagParseError(this.#input, detail);
	}
}

function primitiveTag(name: string): TypeTag {
	switch (name) {
		case 'address':
			return { address: null };
		case 'bool':
			return { bool: null };
		case 'signer':
			return { signer: null };
		case 'u8':
			return { u8: null };
		case 'u16':
			return { u16: null };
		case 'u32':
			return { u32: null };
		case 'u64':
			return { u64: null };
		case 'u128':
			return { u128: null };
		default:
			return { u256: null };
	}
}

/**
 * Parses a Move type such as `vector<u8>` or `0x2::coin::Coin<0x2::token::TOKEN>`. Struct
 * addresses are padded to their full length when `normalize` is set.
 */
export function parseTypeTag(input: string, { normalize = false } = {}): TypeTag {
	return new TypeTagParser(input, normalize).parse();
}

export function typeTagToString(tag: TypeTag): string {
	if ('vector' in tag) {
		return `vector<${typeTagToString(tag.vector)}>`;
	}

	if ('struct' in tag) {
		const { address, module, name, typeParams } = tag.struct;
		const params = typeParams.length > 0 ? `<${typeParams.map(typeTagToString).join(', ')}>` : '';
		return `${address}::${module}::${name}${params}`;
	}

	const primitive = PRIMITIVE_TYPES.find((name) => name in tag);
	if (!primitive) {
		throw new Error(`Unknown type tag ${JSON.stringify(tag)}`);
	}
	return primitive;
}
