// Copyright (c) Mysten Labs, Inc.
// SPDX-License-Identifier: Apache-2.0

import { toBase64 } from '@mysten/bcs';

import { parseTypeTag, typeTagToString } from '../bcs/type-tag.js';
import { isAddressLiteral, isValidMoveIdentifier, normalizeAddress } from '../utils/move-types.js';
import type { Command, CommandKind } from './data/internal.js';
import { InputError, NamingError } from './errors.js';

export type MoveCallTarget =
	| {
			package: string;
			module: string;
			function: string;
	  }
	| {
			/** `package::module::function` */
			target: string;
	  };

type CommandShape<T extends CommandKind, Arg> = Extract<Command<Arg>, { $kind: T }>;

export function normalizeAddressInput(value: string, label = 'address'): string {
	if (!isAddressLiteral(value)) {
		throw new InputError('InvalidAddress', `Invalid ${label} "${value}"`);
	}

	return normalizeAddress(value);
}

export function parseMoveCallTarget(input: MoveCallTarget) {
	let pkg: string;
	let mod: string;
	let fn: string;

	if ('target' in input) {
		const parts = input.target.split('::');
		if (parts.length !== 3) {
			throw new InputError(
				'InvalidValue',
				`Invalid move call target "${input.target}", expected package::module::function`,
			);
		}
		[pkg, mod, fn] = parts;
	} else {
		pkg = input.package;
		mod = input.module;
		fn = input.function;
	}

	if (!isValidMoveIdentifier(mod)) {
		throw new NamingError('module', mod);
	}

	if (!isValidMoveIdentifier(fn)) {
		throw new NamingError('function', fn);
	}

	return { package: normalizeAddressInput(pkg, 'package id'), module: mod, function: fn };
}

/** Parses a type argument and returns it in normalized string form */
export function normalizeTypeArgument(type: string): string {
	try {
		return typeTagToString(parseTypeTag(type, { normalize: true }));
	} catch (error) {
		throw new InputError('InvalidTypeTag', `Invalid type argument "${type}"`, { cause: error });
	}
}

function encodeModules(modules: (Uint8Array | string)[]) {
	return modules.map((module) => (typeof module === 'string' ? module : toBase64(module)));
}

/**
 * Constructors for the commands a transaction can contain. They validate names and type
 * arguments but leave operands exactly as they are given.
 */
export const Commands = {
	MoveCall<Arg>(
		input: MoveCallTarget & { typeArguments?: string[]; arguments?: Arg[] },
	): CommandShape<'MoveCall', Arg> {
		const target = parseMoveCallTarget(input);

		return {
			$kind: 'MoveCall',
			MoveCall: {
				...target,
				typeArguments: (input.typeArguments ?? []).map(normalizeTypeArgument),
				arguments: input.arguments ?? [],
			},
		};
	},
	TransferObjects<Arg>(objects: Arg[], address: Arg): CommandShape<'TransferObjects', Arg> {
		return { $kind: 'TransferObjects', TransferObjects: { objects, address } };
	},
	SplitCoins<Arg>(coin: Arg, amounts: Arg[]): CommandShape<'SplitCoins', Arg> {
		return { $kind: 'SplitCoins', SplitCoins: { coin, amounts } };
	},
	MergeCoins<Arg>(destination: Arg, sources: Arg[]): CommandShape<'MergeCoins', Arg> {
		return { $kind: 'MergeCoins', MergeCoins: { destination, sources } };
	},
	MakeMoveVec<Arg>({
		type,
		elements,
	}: {
		type?: string | null;
		elements: Arg[];
	}): CommandShape<'MakeMoveVec', Arg> {
		return {
			$kind: 'MakeMoveVec',
			MakeMoveVec: {
				type: type ? normalizeTypeArgument(type) : null,
				elements,
			},
		};
	},
	Publish<Arg>({
		modules,
		dependencies,
	}: {
		modules: (Uint8Array | string)[];
		dependencies: string[];
	}): CommandShape<'Publish', Arg> {
		return {
			$kind: 'Publish',
			Publish: {
				modules: encodeModules(modules),
				dependencies: dependencies.map((dep) => normalizeAddressInput(dep, 'dependency')),
			},
		};
	},
	Upgrade<Arg>({
		modules,
		dependencies,
		package: packageId,
		ticket,
	}: {
		modules: (Uint8Array | string)[];
		dependencies: string[];
		package: string;
		ticket: Arg;
	}): CommandShape<'Upgrade', Arg> {
		return {
			$kind: 'Upgrade',
			Upgrade: {
				modules: encodeModules(modules),
				dependencies: dependencies.map((dep) => normalizeAddressInput(dep, 'dependency')),
				package: normalizeAddressInput(packageId, 'package id'),
				ticket,
			},
		};
	},
	Intent<Arg>({
		name,
		data = {},
	}: {
		name: string;
		data?: Record<string, unknown>;
	}): CommandShape<'$Intent', Arg> {
		return { $kind: '$Intent', $Intent: { name, data } };
	},
};

/** Number of results a command declares, or null when only the callee knows */
export function declaredOutputs<Arg>(command: Command<Arg>): number | null {
	switch (command.$kind) {
		case 'SplitCoins':
			return command.SplitCoins.amounts.length;
		case 'MergeCoins':
		case 'TransferObjects':
		case '$Intent':
			return 0;
		case 'MakeMoveVec':
		case 'Publish':
		case 'Upgrade':
			return 1;
		case 'MoveCall':
			return null;
	}
}

/** Every operand of a command in encoding order */
export function commandOperands<Arg>(command: Command<Arg>): Arg[] {
	switch (command.$kind) {
		case 'MoveCall':
			return [...command.MoveCall.arguments];
		case 'TransferObjects':
			return [...command.TransferObjects.objects, command.TransferObjects.address];
		case 'SplitCoins':
			return [command.SplitCoins.coin, ...command.SplitCoins.amounts];
		case 'MergeCoins':
			return [command.MergeCoins.destination, ...command.MergeCoins.sources];
		case 'MakeMoveVec':
			return [...command.MakeMoveVec.elements];
		case 'Upgrade':
			return [command.Upgrade.ticket];
		case 'Publish':
		case '$Intent':
			return [];
	}
}

export function mapCommandArguments<From, To>(
	command: Exclude<Command<From>, { $kind: '$Intent' }>,
	fn: (arg: From) => To,
): Exclude<Command<To>, { $kind: '$Intent' }> {
	switch (command.$kind) {
		case 'MoveCall':
			return {
				$kind: 'MoveCall',
				MoveCall: { ...command.MoveCall, arguments: command.MoveCall.arguments.map(fn) },
			};
		case 'TransferObjects':
			return {
				$kind: 'TransferObjects',
				TransferObjects: {
					objects: command.TransferObjects.objects.map(fn),
					address: fn(command.TransferObjects.address),
				},
			};
		case 'SplitCoins':
			return {
				$kind: 'SplitCoins',
				SplitCoins: {
					coin: fn(command.SplitCoins.coin),
					amounts: command.SplitCoins.amounts.map(fn),
				},
			};
		case 'MergeCoins':
			return {
				$kind: 'MergeCoins',
				MergeCoins: {
					destination: fn(command.MergeCoins.destination),
					sources: command.MergeCoins.sources.map(fn),
				},
			};
		case 'MakeMoveVec':
			return {
				$kind: 'MakeMoveVec',
				MakeMoveVec: { ...command.MakeMoveVec, elements: command.MakeMoveVec.elements.map(fn) },
			};
		case 'Publish':
			return { $kind: 'Publish', Publish: { ...command.Publish } };
		case 'Upgrade':
			return {
				$kind: 'Upgrade',
				Upgrade: { ...command.Upgrade, ticket: fn(command.Upgrade.ticket) },
			};
	}
}
