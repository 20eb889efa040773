// Copyright (c) Mysten Labs, Inc.
// SPDX-License-Identifier: Apache-2.0

import { isSerializedBcs } from '@mysten/bcs';
import { safeParse } from 'valibot';

import type { StateQueryClient } from '../client/types.js';
import { getDefaultLogger } from '../logger.js';
import type { Logger } from '../logger.js';
import type { ResolvedArgument, TransactionArgument } from './ArgumentTable.js';
import { Commands, normalizeAddressInput } from './Commands.js';
import type { MoveCallTarget } from './Commands.js';
import { JsonU64 } from './data/internal.js';
import type {
	CallArg,
	Command,
	JsonU64Input,
	ObjectArg,
	ObjectInput,
	ObjectRef,
	ObjectRefInput,
	TransactionData,
} from './data/internal.js';
import { InputError, ResolutionError } from './errors.js';
import { getObjectId, Inputs, parseObjectRef } from './Inputs.js';
import { resolveLimits } from './limits.js';
import type { BuilderLimits } from './limits.js';
import { createPure, serializePure } from './pure.js';
import type { PureBytes } from './pure.js';
import { toResolutionError } from './resolver.js';
import type {
	BuildTransactionOptions,
	IntentRequest,
	IntentResolver,
	IntentStatus,
} from './resolver.js';
import { encodeTransactionData, TransactionDataBuilder } from './TransactionData.js';
import type { TransactionSnapshot } from './TransactionData.js';

export type TransactionArgumentInput =
	| TransactionArgument
	| ((tx: TransactionBuilder) => TransactionArgument);

/** Move call operands may also be pre-encoded pure values, which become new inputs */
export type MoveCallArgument = TransactionArgumentInput | PureBytes;

export type TransactionExpirationInput = { None: true } | { Epoch: number | string } | null;

export interface TransactionBuilderOptions {
	limits?: Partial<BuilderLimits>;
	logger?: Logger;
	/** Resolvers registered up front, keyed by intent name */
	resolvers?: Record<string, IntentResolver>;
}

interface IntentRecord extends IntentRequest {
	commandKey: number;
	status: IntentStatus;
}

type ObjectCallArg = Extract<CallArg, { $kind: 'Object' }>;

type BuilderState = 'building' | 'finalizing' | 'consumed';

function isPureBytes(value: unknown): value is PureBytes {
	return value instanceof Uint8Array || isSerializedBcs(value);
}

function objectRefOf(arg: ObjectArg): ObjectRef | null {
	switch (arg.$kind) {
		case 'ImmOrOwnedObject':
			return arg.ImmOrOwnedObject;
		case 'Receiving':
			return arg.Receiving;
		case 'SharedObject':
			return null;
	}
}

/** Combines two descriptions of the same object into one input */
function mergeObjectInputs(existing: CallArg, added: ObjectCallArg): ObjectCallArg {
	const conflict = new InputError(
		'ConflictingObjectInput',
		`Object ${getObjectId(added)} is already an input with different metadata`,
	);

	if (existing.$kind !== 'Object' || existing.Object.$kind !== added.Object.$kind) {
		throw conflict;
	}

	const current = existing.Object;
	const next = added.Object;

	if (current.$kind === 'SharedObject' && next.$kind === 'SharedObject') {
		if (current.SharedObject.initialSharedVersion !== next.SharedObject.initialSharedVersion) {
			throw conflict;
		}

		return {
			$kind: 'Object',
			Object: {
				$kind: 'SharedObject',
				SharedObject: {
					...current.SharedObject,
					mutable: current.SharedObject.mutable || next.SharedObject.mutable,
				},
			},
		};
	}

	const currentRef = objectRefOf(current);
	const nextRef = objectRefOf(next);
	if (
		!currentRef ||
		!nextRef ||
		currentRef.version !== nextRef.version ||
		currentRef.digest !== nextRef.digest
	) {
		throw conflict;
	}

	return { $kind: 'Object', Object: current };
}

function assertModules(command: string, modules: (Uint8Array | string)[]) {
	if (modules.length === 0) {
		throw new InputError('EmptyOperands', `${command} requires at least one module`);
	}
}

function parseU64(value: JsonU64Input, label: string) {
	const result = safeParse(JsonU64, value);
	if (!result.success) {
		throw new InputError('InvalidValue', `Invalid ${label} "${String(value)}"`);
	}

	return result.output;
}

/**
 * Builds a programmable transaction. Values are referenced through argument handles, and the
 * graph is only flattened into positional arguments when the builder is finalized.
 */
export class TransactionBuilder {
	#data = new TransactionDataBuilder();
	#limits: BuilderLimits;
	#logger: Logger;
	#resolvers = new Map<string, IntentResolver>();
	#intents = new Map<number, IntentRecord>();
	#gas: TransactionArgument | null = null;
	#state: BuilderState = 'building';

	/** Adds a pure input, either from pre-encoded bytes or from a Move type name and value */
	readonly pure = createPure((value) => this.#addPure(value));

	constructor({ limits, logger, resolvers = {} }: TransactionBuilderOptions = {}) {
		this.#limits = resolveLimits(limits);
		this.#logger = logger ?? getDefaultLogger();

		for (const [name, resolver] of Object.entries(resolvers)) {
			this.addIntentResolver(name, resolver);
		}
	}

	get limits(): Readonly<BuilderLimits> {
		return { ...this.#limits };
	}

	get sender() {
		return this.#data.sender;
	}

	/** Number of argument identifiers allocated so far */
	get argumentCount() {
		return this.#data.arguments.size;
	}

	get consumed() {
		return this.#state === 'consumed';
	}

	/** The coin paying for gas. Every access returns the same handle. */
	get gas(): TransactionArgument {
		this.#assertMutable();
		this.#gas ??= this.#data.arguments.allocate({ $kind: 'GasCoin', GasCoin: true });
		return this.#gas;
	}

	setSender(sender: string) {
		this.#assertMutable();
		this.#data.sender = normalizeAddressInput(sender, 'sender');
	}

	/** Sets the sender only if it has not already been set. */
	setSenderIfNotSet(sender: string) {
		if (!this.#data.sender) {
			this.setSender(sender);
		}
	}

	setExpiration(expiration: TransactionExpirationInput) {
		this.#assertMutable();

		if (!expiration || 'None' in expiration) {
			this.#data.expiration = { $kind: 'None', None: true };
			return;
		}

		const epoch = Number(parseU64(expiration.Epoch, 'expiration epoch'));
		if (!Number.isSafeInteger(epoch)) {
			throw new InputError('InvalidValue', `Expiration epoch ${expiration.Epoch} is too large`);
		}

		this.#data.expiration = { $kind: 'Epoch', Epoch: epoch };
	}

	setGasBudget(budget: JsonU64Input) {
		this.#assertMutable();
		this.#data.gasData.budget = parseU64(budget, 'gas budget');
	}

	setGasBudgetIfNotSet(budget: JsonU64Input) {
		if (this.#data.gasData.budget === null) {
			this.setGasBudget(budget);
		}
	}

	setGasPrice(price: JsonU64Input) {
		this.#assertMutable();
		this.#data.gasData.price = parseU64(price, 'gas price');
	}

	/** Sponsor paying for gas, defaults to the sender */
	setGasOwner(owner: string) {
		this.#assertMutable();
		this.#data.gasData.owner = normalizeAddressInput(owner, 'gas owner');
	}

	setConfig({
		sender,
		gasBudget,
		gasPrice,
	}: {
		sender: string;
		gasBudget?: JsonU64Input;
		gasPrice?: JsonU64Input;
	}) {
		// Validate everything before changing anything
		const normalizedSender = normalizeAddressInput(sender, 'sender');
		const budget = gasBudget === undefined ? null : parseU64(gasBudget, 'gas budget');
		const price = gasPrice === undefined ? null : parseU64(gasPrice, 'gas price');

		this.#assertMutable();
		this.#data.sender = normalizedSender;
		if (budget !== null) {
			this.#data.gasData.budget = budget;
		}
		if (price !== null) {
			this.#data.gasData.price = price;
		}
	}

	/** Replaces the gas payment */
	setGasPayment(payments: ObjectRefInput[]) {
		this.#assertMutable();
		const refs = this.#parseGasObjects(payments, 0);
		this.#data.gasData.payment = refs;
	}

	/** Appends to the gas payment */
	addGasObjects(payments: ObjectRefInput[]) {
		this.#assertMutable();
		const refs = this.#parseGasObjects(payments, this.#data.gasData.payment.length);
		this.#data.gasData.payment.push(...refs);
	}

	/**
	 * Adds an object input. Adding an object that is already an input returns a new handle for
	 * the same input.
	 */
	object(input: ObjectInput | ObjectCallArg): TransactionArgument {
		this.#assertMutable();

		const arg = '$kind' in input ? input : Inputs.Object(input);
		const objectId = getObjectId(arg);
		const index = objectId === null ? -1 : this.#data.findObjectInput(objectId);

		if (index === -1) {
			return this.#data.addInput(arg);
		}

		this.#data.inputs[index] = mergeObjectInputs(this.#data.inputs[index], arg);
		return this.#data.arguments.allocate({ $kind: 'Input', Input: index });
	}

	objectRef(ref: ObjectRefInput) {
		return this.object({ kind: 'owned', ...ref });
	}

	immutableRef(ref: ObjectRefInput) {
		return this.object({ kind: 'immutable', ...ref });
	}

	receivingRef(ref: ObjectRefInput) {
		return this.object({ kind: 'receiving', ...ref });
	}

	sharedObjectRef({
		objectId,
		initialSharedVersion,
		mutable = true,
	}: {
		objectId: string;
		initialSharedVersion: JsonU64Input;
		mutable?: boolean;
	}) {
		return this.object({ kind: 'shared', objectId, version: initialSharedVersion, mutable });
	}

	/** A new handle for output `subIndex` of the command that produced `base` */
	nestedResult(base: TransactionArgument, subIndex: number): TransactionArgument {
		this.#assertMutable();
		return this.#data.arguments.nestedResult(base, subIndex);
	}

	/** Rebinds `argument` so that every use of it refers to `target` */
	alias(argument: TransactionArgument, target: TransactionArgumentInput) {
		this.#assertMutable();
		this.#data.arguments.alias(argument, this.#normalizeArgument(target));
	}

	/** Follows aliases to the value an argument currently refers to */
	resolveArgument(argument: TransactionArgument): ResolvedArgument {
		return this.#data.arguments.resolve(argument);
	}

	moveCall({
		arguments: args = [],
		typeArguments,
		...target
	}: MoveCallTarget & {
		typeArguments?: string[];
		arguments?: MoveCallArgument[];
	}): TransactionArgument {
		this.#assertMutable();
		const command = Commands.MoveCall<TransactionArgument>({ ...target, typeArguments });
		const operands = this.#prepareOperands(args);

		command.MoveCall.arguments = this.#bindOperands(operands);

		return this.#addResultCommand(command);
	}

	/** Splits `amounts` off `coin`. The result has one coin per amount. */
	splitCoins(
		coin: TransactionArgumentInput,
		amounts: (TransactionArgumentInput | bigint | number | string)[],
	): TransactionArgument {
		this.#assertMutable();
		if (amounts.length === 0) {
			throw new InputError('EmptyOperands', 'splitCoins requires at least one amount');
		}
		const [source, ...encoded] = this.#prepareOperands([
			coin,
			...amounts.map((amount) =>
				typeof amount === 'function' || typeof amount === 'object'
					? amount
					: serializePure('u64', amount),
			),
		]);

		return this.#addResultCommand(
			Commands.SplitCoins(this.#bindOperand(source), this.#bindOperands(encoded)),
		);
	}

	mergeCoins(destination: TransactionArgumentInput, sources: TransactionArgumentInput[]) {
		this.#assertMutable();
		if (sources.length === 0) {
			throw new InputError('EmptyOperands', 'mergeCoins requires at least one source coin');
		}
		const [target, ...merged] = this.#prepareOperands([destination, ...sources]);

		this.#addCommand(
			Commands.MergeCoins(this.#bindOperand(target), this.#bindOperands(merged)),
		);
	}

	/** Transfers `objects` to `address`, given as a handle or as an address string */
	transferObjects(objects: TransactionArgumentInput[], address: TransactionArgumentInput | string) {
		this.#assertMutable();
		if (objects.length === 0) {
			throw new InputError('EmptyOperands', 'transferObjects requires at least one object');
		}

		const operands = this.#prepareOperands([
			...objects,
			typeof address === 'string' ? serializePure('address', address) : address,
		]);
		const transferred = this.#bindOperands(operands.slice(0, -1));
		const recipient = this.#bindOperand(operands[operands.length - 1]);

		this.#addCommand(Commands.TransferObjects(transferred, recipient));
	}

	makeMoveVec({
		type,
		elements,
	}: {
		type?: string | null;
		elements: TransactionArgumentInput[];
	}): TransactionArgument {
		this.#assertMutable();
		if (elements.length === 0) {
			throw new InputError(
				'EmptyOperands',
				'makeMoveVec requires at least one element, use 0x1::vector::empty for empty vectors',
			);
		}

		const command = Commands.MakeMoveVec<TransactionArgument>({ type, elements: [] });
		command.MakeMoveVec.elements = this.#bindOperands(this.#prepareOperands(elements));

		return this.#addResultCommand(command);
	}

	/** Publishes a package and returns its upgrade capability */
	publish({
		modules,
		dependencies,
	}: {
		modules: (Uint8Array | string)[];
		dependencies: string[];
	}): TransactionArgument {
		this.#assertMutable();
		assertModules('publish', modules);
		return this.#addResultCommand(
			Commands.Publish<TransactionArgument>({ modules, dependencies }),
		);
	}

	/** Upgrades `package` with an authorized upgrade ticket and returns the upgrade receipt */
	upgrade({
		modules,
		dependencies,
		package: packageId,
		ticket,
	}: {
		modules: (Uint8Array | string)[];
		dependencies: string[];
		package: string;
		ticket: TransactionArgumentInput;
	}): TransactionArgument {
		this.#assertMutable();
		assertModules('upgrade', modules);
		const { Upgrade } = Commands.Upgrade({ modules, dependencies, package: packageId, ticket });
		const [upgradeTicket] = this.#prepareOperands([ticket]);

		return this.#addResultCommand({
			$kind: 'Upgrade',
			Upgrade: { ...Upgrade, ticket: this.#bindOperand(upgradeTicket) },
		});
	}

	/**
	 * Declares a value that a resolver produces while the transaction is finalized. The
	 * returned handle can be used as an operand right away.
	 */
	intent({ name, data = {} }: { name: string; data?: Record<string, unknown> }) {
		this.#assertMutable();

		const { key } = this.#data.addCommand(Commands.Intent({ name, data }));
		const argument = this.#data.arguments.allocate({ $kind: 'Pending', Pending: key });

		this.#intents.set(argument.id, {
			argument,
			name,
			data: structuredClone(data),
			commandKey: key,
			status: 'pending',
		});

		return argument;
	}

	addIntentResolver(name: string, resolver: IntentResolver) {
		const existing = this.#resolvers.get(name);
		if (existing && existing !== resolver) {
			throw new Error(`Intent resolver for ${name} already exists`);
		}

		this.#resolvers.set(name, resolver);
	}

	getIntents(): (IntentRequest & { status: IntentStatus })[] {
		return [...this.#intents.values()].map(({ argument, name, data, status }) => ({
			argument,
			name,
			data,
			status,
		}));
	}

	/** Object ids already taken by inputs or gas payment */
	getUsedObjectIds(): Set<string> {
		return this.#data.getUsedObjectIds();
	}

	/** A copy of the current state, including the argument table */
	getData(): TransactionSnapshot {
		return this.#data.snapshot();
	}

	/**
	 * Resolves every intent and flattens the graph into a transaction. The builder cannot be used
	 * afterwards, unless resolution failed with a retryable error.
	 */
	async finalize(options: BuildTransactionOptions = {}): Promise<TransactionData> {
		if (this.#state === 'finalizing') {
			throw new InputError(
				'BuilderFinalizing',
				'This transaction builder is still being finalized',
			);
		}
		this.#assertMutable();

		this.#state = 'finalizing';

		try {
			await this.#drainIntents(options.client);
		} catch (error) {
			this.#state = error instanceof ResolutionError && error.retryable ? 'building' : 'consumed';
			throw error;
		}

		try {
			const data = this.#data.finalize(this.#limits, {
				onlyTransactionKind: options.onlyTransactionKind,
			});

			this.#logger.debug(
				{ inputs: data.inputs.length, commands: data.commands.length },
				'finalized transaction',
			);

			return data;
		} finally {
			this.#state = 'consumed';
		}
	}

	/** Finalizes the builder and returns the canonical encoding of the transaction */
	async build(options: BuildTransactionOptions = {}): Promise<Uint8Array> {
		const data = await this.finalize(options);

		return encodeTransactionData(data, {
			maxSizeBytes: options.maxSizeBytes ?? this.#limits.maxSizeBytes,
			onlyTransactionKind: options.onlyTransactionKind,
		});
	}

	async #drainIntents(client: StateQueryClient | undefined) {
		while (true) {
			const next = [...this.#intents.values()]
				.filter((intent) => intent.status === 'pending')
				.sort((a, b) => a.argument.id - b.argument.id)[0];

			if (!next) {
				return;
			}

			if (!client) {
				throw new InputError('UnresolvedIntents', 'unable to resolve intents offline');
			}

			const resolver = this.#resolvers.get(next.name);
			if (!resolver) {
				throw new InputError(
					'MissingIntentResolver',
					`No resolver registered for intent ${next.name}`,
				);
			}

			await this.#resolveIntent(next, resolver, client);
		}
	}

	async #resolveIntent(intent: IntentRecord, resolver: IntentResolver, client: StateQueryClient) {
		const { argument, name, data } = intent;
		this.#logger.debug({ intent: name, argument: argument.id }, 'resolving intent');
		intent.status = 'resolving';

		try {
			await this.#data.spliceBefore(intent.commandKey, () =>
				resolver.resolve({ argument, name, data }, this, client),
			);
		} catch (error) {
			const resolutionError = toResolutionError(name, error);
			this.#logger.warn({ intent: name, err: resolutionError }, 'intent resolution failed');
			intent.status =
				resolutionError instanceof ResolutionError && resolutionError.retryable
					? 'pending'
					: 'failed';
			throw resolutionError;
		}

		if (this.#data.arguments.get(argument.id).$kind === 'Pending') {
			intent.status = 'failed';
			throw new ResolutionError(
				'Unbound',
				name,
				`Resolver for ${name} did not bind argument ${argument.id}`,
			);
		}

		this.#data.removeCommand(intent.commandKey);
		intent.status = 'resolved';
	}

	#assertMutable() {
		if (this.#state === 'consumed') {
			throw new InputError('BuilderConsumed', 'This transaction builder was already finalized');
		}
	}

	#parseGasObjects(payments: ObjectRefInput[], existing: number): ObjectRef[] {
		if (existing + payments.length > this.#limits.maxGasObjects) {
			throw new InputError(
				'LimitExceeded',
				`Too many gas objects: ${existing + payments.length} (max ${this.#limits.maxGasObjects})`,
			);
		}

		return payments.map((ref) => parseObjectRef(ref));
	}

	/**
	 * Runs thunks and checks operand count and that every handle belongs to this builder. Nothing
	 * is allocated for pre-encoded operands until `#bindOperands`.
	 */
	#prepareOperands(
		operands: (TransactionArgumentInput | PureBytes)[],
	): (TransactionArgument | PureBytes)[] {
		if (operands.length > this.#limits.maxArguments) {
			throw new InputError(
				'LimitExceeded',
				`Too many arguments: ${operands.length} (max ${this.#limits.maxArguments})`,
			);
		}

		const prepared = operands.map((operand) =>
			typeof operand === 'function' ? operand(this) : operand,
		);

		for (const operand of prepared) {
			if (!isPureBytes(operand)) {
				this.#data.arguments.assertKnown(operand);
			}
		}

		return prepared;
	}

	#bindOperand(operand: TransactionArgument | PureBytes): TransactionArgument {
		return isPureBytes(operand) ? this.#addPure(operand) : operand;
	}

	#bindOperands(operands: (TransactionArgument | PureBytes)[]): TransactionArgument[] {
		return operands.map((operand) => this.#bindOperand(operand));
	}

	#normalizeArgument(arg: TransactionArgumentInput): TransactionArgument {
		const argument = typeof arg === 'function' ? arg(this) : arg;
		this.#data.arguments.assertKnown(argument);
		return argument;
	}

	#addPure(value: PureBytes): TransactionArgument {
		this.#assertMutable();
		return this.#data.addInput(Inputs.Pure(value));
	}

	#addCommand(command: Command<TransactionArgument>) {
		return this.#data.addCommand(command);
	}

	#addResultCommand(command: Command<TransactionArgument>): TransactionArgument {
		const { result } = this.#addCommand(command);
		if (!result) {
			throw new Error(`${command.$kind} does not produce a result`);
		}
		return result;
	}
}
