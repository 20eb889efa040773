// Copyright (c) Mysten Labs, Inc.
// SPDX-License-Identifier: Apache-2.0

import { bcs } from '../bcs/index.js';
import { ArgumentTable } from './ArgumentTable.js';
import type { ResolutionEntry, TransactionArgument } from './ArgumentTable.js';
import { commandOperands, declaredOutputs, mapCommandArguments } from './Commands.js';
import type {
	Argument,
	CallArg,
	Command,
	GasData,
	TerminalCommand,
	TransactionData,
	TransactionExpiration,
} from './data/internal.js';
import { ArgumentReferenceError, EncodingError, InputError } from './errors.js';
import { getObjectId } from './Inputs.js';
import type { BuilderLimits } from './limits.js';
import { MAX_TX_SIZE_BYTES } from './limits.js';

interface CommandEntry {
	/** Stable across insertions, unlike the position */
	key: number;
	command: Command<TransactionArgument>;
}

export interface TransactionSnapshot {
	version: 2;
	sender: string | null;
	expiration: TransactionExpiration;
	gasData: GasData;
	inputs: CallArg[];
	commands: Command<TransactionArgument>[];
	arguments: ResolutionEntry[];
}

/**
 * Mutable state of a transaction under construction. Operands stay argument handles until
 * `finalize` rewrites them into positional wire arguments.
 */
export class TransactionDataBuilder {
	version = 2 as const;
	sender: string | null = null;
	expiration: TransactionExpiration = { $kind: 'None', None: true };
	gasData: GasData = { budget: null, price: null, owner: null, payment: [] };
	inputs: CallArg[] = [];
	readonly arguments = new ArgumentTable();

	#commands: CommandEntry[] = [];
	#nextKey = 0;
	#insertAt: number | null = null;

	get commands(): Command<TransactionArgument>[] {
		return this.#commands.map((entry) => entry.command);
	}

	addInput(arg: CallArg): TransactionArgument {
		const index = this.inputs.push(arg) - 1;
		return this.arguments.allocate({ $kind: 'Input', Input: index });
	}

	findObjectInput(objectId: string) {
		return this.inputs.findIndex((input) => getObjectId(input) === objectId);
	}

	/**
	 * Appends a command, or inserts it at the current splice position. Returns the command key
	 * and, for commands that produce values, a handle to the result.
	 */
	addCommand(command: Command<TransactionArgument>) {
		const key = this.#nextKey++;

		if (this.#insertAt === null) {
			this.#commands.push({ key, command });
		} else {
			this.#commands.splice(this.#insertAt, 0, { key, command });
			this.#insertAt++;
		}

		const result =
			declaredOutputs(command) === 0
				? null
				: this.arguments.allocate({ $kind: 'Result', Result: key });

		return { key, result };
	}

	/** Runs `fn` with every command it adds placed in front of the command with `key` */
	async spliceBefore<T>(key: number, fn: () => Promise<T>): Promise<T> {
		const position = this.#position(key);
		if (this.#insertAt !== null) {
			throw new Error('Command splicing is already in progress');
		}

		this.#insertAt = position;
		try {
			return await fn();
		} finally {
			this.#insertAt = null;
		}
	}

	removeCommand(key: number) {
		this.#commands.splice(this.#position(key), 1);
	}

	getUsedObjectIds() {
		const ids = new Set<string>();

		for (const input of this.inputs) {
			const objectId = getObjectId(input);
			if (objectId) {
				ids.add(objectId);
			}
		}

		for (const ref of this.gasData.payment) {
			ids.add(ref.objectId);
		}

		return ids;
	}

	#position(key: number) {
		const position = this.#commands.findIndex((entry) => entry.key === key);
		if (position === -1) {
			throw new Error(`Unknown command key ${key}`);
		}
		return position;
	}

	/**
	 * Collapses every alias and command key into the flat positional form the codec takes.
	 * Intents must already be resolved.
	 */
	finalize(
		limits: BuilderLimits,
		{ onlyTransactionKind = false }: { onlyTransactionKind?: boolean } = {},
	): TransactionData {
		this.#validateLimits(limits);

		const positions = new Map<number, number>();
		this.#commands.forEach((entry, index) => positions.set(entry.key, index));

		const commands = this.#commands.map((entry, index): TerminalCommand => {
			if (entry.command.$kind === '$Intent') {
				throw new InputError(
					'UnresolvedIntents',
					`Intent ${entry.command.$Intent.name} was never resolved`,
				);
			}

			return mapCommandArguments(entry.command, (arg) =>
				this.#toWireArgument(arg, index, positions),
			);
		});

		if (!onlyTransactionKind) {
			this.#validateGasData();
		}

		return structuredClone({
			version: this.version,
			sender: this.sender,
			expiration: this.expiration,
			gasData: {
				...this.gasData,
				owner: this.gasData.owner ?? this.sender,
			},
			inputs: this.inputs,
			commands,
		});
	}

	snapshot(): TransactionSnapshot {
		return structuredClone({
			version: this.version,
			sender: this.sender,
			expiration: this.expiration,
			gasData: this.gasData,
			inputs: this.inputs,
			commands: this.commands,
			arguments: this.arguments.snapshot(),
		});
	}

	#validateLimits(limits: BuilderLimits) {
		const checks: [string, number, number][] = [
			['gas objects', this.gasData.payment.length, limits.maxGasObjects],
			['inputs', this.inputs.length, limits.maxInputs],
			['commands', this.#commands.length, limits.maxCommands],
		];

		for (const [label, count, max] of checks) {
			if (count > max) {
				throw new InputError('LimitExceeded', `Too many ${label}: ${count} (max ${max})`);
			}
		}

		this.#commands.forEach(({ command }, index) => {
			const operands = commandOperands(command).length;
			if (operands > limits.maxArguments) {
				throw new InputError(
					'LimitExceeded',
					`Command ${index} has ${operands} arguments (max ${limits.maxArguments})`,
				);
			}
		});
	}

	#validateGasData() {
		if (!this.sender) {
			throw new InputError('MissingSender', 'Missing transaction sender');
		}

		if (this.gasData.budget === null) {
			throw new InputError('MissingGasBudget', 'Missing gas budget');
		}

		if (this.gasData.price === null) {
			throw new InputError('MissingGasPrice', 'Missing gas price');
		}

		if (this.gasData.payment.length === 0) {
			throw new InputError('MissingGasPayment', 'Missing gas payment');
		}
	}

	#toWireArgument(
		arg: TransactionArgument,
		commandIndex: number,
		positions: Map<number, number>,
	): Argument {
		const { entry, subIndex } = this.arguments.resolve(arg);

		switch (entry.$kind) {
			case 'GasCoin':
			case 'Input':
				if (subIndex !== undefined) {
					throw new ArgumentReferenceError(
						'InvalidSubIndex',
						arg.id,
						`Argument ${arg.id} selects sub-index ${subIndex} of a value with a single result`,
					);
				}
				return entry;
			case 'Pending':
				throw new ArgumentReferenceError(
					'UnresolvedArgument',
					arg.id,
					`Argument ${arg.id} refers to an unresolved intent`,
				);
			case 'Result': {
				const position = positions.get(entry.Result);

				if (position === undefined) {
					throw new ArgumentReferenceError(
						'UnresolvedArgument',
						arg.id,
						`Argument ${arg.id} refers to a command that is no longer part of the transaction`,
					);
				}

				if (position >= commandIndex) {
					throw new ArgumentReferenceError(
						'ForwardReference',
						arg.id,
						`Command ${commandIndex} uses the result of command ${position}, ` +
							'which does not precede it',
					);
				}

				if (subIndex === undefined) {
					return { $kind: 'Result', Result: position };
				}

				const outputs = declaredOutputs(this.#commands[position].command);
				if (outputs !== null && subIndex >= outputs) {
					throw new ArgumentReferenceError(
						'InvalidSubIndex',
						arg.id,
						`Sub-index ${subIndex} is out of range, command ${position} has ${outputs} results`,
					);
				}

				return { $kind: 'NestedResult', NestedResult: [position, subIndex] };
			}
		}
	}
}

export interface EncodeTransactionOptions {
	maxSizeBytes?: number;
	onlyTransactionKind?: boolean;
}

/** Canonical BCS bytes of a finalized transaction, or of its kind alone */
export function encodeTransactionData(
	data: TransactionData,
	{
		maxSizeBytes = MAX_TX_SIZE_BYTES,
		onlyTransactionKind = false,
	}: EncodeTransactionOptions = {},
): Uint8Array {
	const kind = {
		ProgrammableTransaction: {
			inputs: data.inputs,
			commands: data.commands,
		},
	};

	let bytes: Uint8Array;

	try {
		if (onlyTransactionKind) {
			bytes = bcs.TransactionKind.serialize(kind, { maxSize: maxSizeBytes }).toBytes();
		} else {
			const { sender, gasData } = data;
			if (!sender) {
				throw new InputError('MissingSender', 'Missing transaction sender');
			}

			if (gasData.budget === null || gasData.price === null) {
				throw new InputError(
					gasData.budget === null ? 'MissingGasBudget' : 'MissingGasPrice',
					'Gas budget and price are required to encode transaction data',
				);
			}

			bytes = bcs.TransactionData.serialize(
				{
					V1: {
						kind,
						sender,
						expiration: data.expiration,
						gasData: {
							payment: gasData.payment,
							owner: gasData.owner ?? sender,
							price: gasData.price,
							budget: gasData.budget,
						},
					},
				},
				{ maxSize: maxSizeBytes },
			).toBytes();
		}
	} catch (error) {
		if (error instanceof InputError) {
			throw error;
		}

		throw new EncodingError(
			`Failed to encode transaction: ${error instanceof Error ? error.message : String(error)}`,
			{ cause: error },
		);
	}

	// The writer only enforces maxSize once it grows past its initial buffer
	if (bytes.length > maxSizeBytes) {
		throw new EncodingError(
			`Transaction is ${bytes.length} bytes, more than the maximum of ${maxSizeBytes}`,
		);
	}

	return bytes;
}
