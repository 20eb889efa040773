// Copyright (c) Mysten Labs, Inc.
// SPDX-License-Identifier: Apache-2.0

import { fromBase58, fromBase64 } from '@mysten/bcs';
import { describe, expect, it } from 'vitest';

import { bcs } from '../../src/bcs/index.js';
import { ArgumentReferenceError, InputError } from '../../src/transactions/errors.js';
import { getTransactionDigest } from '../../src/transactions/hash.js';
import type { IntentResolver } from '../../src/transactions/resolver.js';
import { TransactionBuilder } from '../../src/transactions/TransactionBuilder.js';
import { encodeTransactionData } from '../../src/transactions/TransactionData.js';
import { InMemoryStateQueryClient } from '../mocks/in-memory-client.js';
import { captureAsyncError, captureError } from '../utils/errors.js';
import { digest, GAS_OBJECT_ID, RECIPIENT, ref, SENDER } from '../utils/fixtures.js';

function setup(tx = new TransactionBuilder()) {
	tx.setSender(SENDER);
	tx.setGasPayment([ref(GAS_OBJECT_ID, 2, 7)]);
	tx.setGasBudget(10_000_000);
	tx.setGasPrice(1000);
	return tx;
}

function splitAndTransfer(tx: TransactionBuilder) {
	const amount = tx.pure.u64(5);
	const recipient = tx.pure.address(RECIPIENT);
	const coin = tx.splitCoins(tx.gas, [amount]);
	tx.transferObjects([tx.nestedResult(coin, 0)], recipient);
	return tx;
}

describe('TransactionBuilder', () => {
	it('finalizes a split and transfer paid from the gas coin', async () => {
		const tx = splitAndTransfer(setup());

		const data = await tx.finalize();

		expect(data.inputs).toHaveLength(2);
		expect(data.commands).toEqual([
			{
				$kind: 'SplitCoins',
				SplitCoins: {
					coin: { $kind: 'GasCoin', GasCoin: true },
					amounts: [{ $kind: 'Input', Input: 0 }],
				},
			},
			{
				$kind: 'TransferObjects',
				TransferObjects: {
					objects: [{ $kind: 'NestedResult', NestedResult: [0, 0] }],
					address: { $kind: 'Input', Input: 1 },
				},
			},
		]);
		expect(data.sender).toBe(SENDER);
		expect(data.expiration).toEqual({ $kind: 'None', None: true });
		expect(data.gasData).toEqual({
			budget: '10000000',
			price: '1000',
			owner: SENDER,
			payment: [{ objectId: GAS_OBJECT_ID, version: '2', digest: digest(7) }],
		});
	});

	it('encodes the finalized transaction canonically', async () => {
		const data = await splitAndTransfer(setup()).finalize();
		const bytes = encodeTransactionData(data);

		const parsed = bcs.TransactionData.parse(bytes);
		const { kind, sender, gasData } = parsed.V1;

		expect(sender).toBe(SENDER);
		expect(gasData).toEqual({
			payment: [{ objectId: GAS_OBJECT_ID, version: '2', digest: digest(7) }],
			owner: SENDER,
			price: '1000',
			budget: '10000000',
		});
		expect(kind.ProgrammableTransaction?.commands).toEqual(data.commands);
		expect(kind.ProgrammableTransaction?.inputs).toEqual(data.inputs);

		const recipient = data.inputs[1];
		expect(recipient.$kind).toBe('Pure');
		if (recipient.$kind === 'Pure') {
			expect(bcs.Address.parse(fromBase64(recipient.Pure.bytes))).toBe(RECIPIENT);
		}
	});

	it('builds identical bytes for identical transactions', async () => {
		const first = await splitAndTransfer(setup()).build();
		const second = await splitAndTransfer(setup()).build();

		expect(second).toEqual(first);
		expect(getTransactionDigest(second)).toBe(getTransactionDigest(first));
		expect(fromBase58(getTransactionDigest(first))).toHaveLength(32);
	});

	it('leaves the builder usable after a rejected command', async () => {
		const tx = setup();
		const amount = tx.pure.u64(5);
		const coin = tx.splitCoins(tx.gas, [amount]);

		const error = captureError(() => tx.splitCoins(coin, []));

		expect(error).toBeInstanceOf(InputError);
		expect(error).toMatchObject({ code: 'EmptyOperands' });
		expect(tx.getData().inputs).toHaveLength(1);
		expect(tx.getData().commands).toHaveLength(1);

		tx.transferObjects([coin], RECIPIENT);
		const data = await tx.finalize();
		expect(data.commands).toHaveLength(2);
		expect(data.commands[1]).toEqual({
			$kind: 'TransferObjects',
			TransferObjects: {
				objects: [{ $kind: 'Result', Result: 0 }],
				address: { $kind: 'Input', Input: 1 },
			},
		});
	});

	it('does not produce bytes while an intent is unresolved', async () => {
		const offline = setup();
		offline.intent({ name: 'Custom' });

		const error = await captureAsyncError(offline.build());
		expect(error).toBeInstanceOf(InputError);
		expect(error).toMatchObject({
			code: 'UnresolvedIntents',
			message: 'unable to resolve intents offline',
		});
		expect(offline.consumed).toBe(true);

		const unregistered = setup();
		unregistered.intent({ name: 'Custom' });
		expect(
			await captureAsyncError(unregistered.build({ client: new InMemoryStateQueryClient() })),
		).toMatchObject({ code: 'MissingIntentResolver' });
	});

	it('returns the same gas handle on every access', () => {
		const tx = new TransactionBuilder();

		expect(tx.gas).toBe(tx.gas);
		expect(tx.argumentCount).toBe(1);
		expect(tx.getData().arguments).toEqual([{ $kind: 'GasCoin', GasCoin: true }]);
	});
});

describe('transaction metadata', () => {
	it('reports the first missing field', async () => {
		const missing = async (configure: (tx: TransactionBuilder) => void) => {
			const tx = new TransactionBuilder();
			configure(tx);
			return captureAsyncError(tx.finalize());
		};

		expect(await missing(() => {})).toMatchObject({ code: 'MissingSender' });
		expect(await missing((tx) => tx.setSender(SENDER))).toMatchObject({
			code: 'MissingGasBudget',
		});
		expect(
			await missing((tx) => {
				tx.setSender(SENDER);
				tx.setGasBudget(1);
			}),
		).toMatchObject({ code: 'MissingGasPrice' });
		expect(
			await missing((tx) => tx.setConfig({ sender: SENDER, gasBudget: 1, gasPrice: 1 })),
		).toMatchObject({ code: 'MissingGasPayment' });
	});

	it('skips gas checks when only the transaction kind is needed', async () => {
		const tx = splitAndTransfer(new TransactionBuilder());

		const bytes = await tx.build({ onlyTransactionKind: true });
		const kind = bcs.TransactionKind.parse(bytes);

		expect(kind.$kind).toBe('ProgrammableTransaction');
		expect(kind.ProgrammableTransaction?.inputs).toHaveLength(2);
		expect(kind.ProgrammableTransaction?.commands).toHaveLength(2);
	});

	it('only fills unset values with the IfNotSet setters', async () => {
		const tx = setup();
		tx.setSenderIfNotSet(RECIPIENT);
		tx.setGasBudgetIfNotSet(5);
		tx.setGasOwner(RECIPIENT);
		tx.setExpiration({ Epoch: 10 });

		const data = await tx.finalize();

		expect(data.sender).toBe(SENDER);
		expect(data.gasData.budget).toBe('10000000');
		expect(data.gasData.owner).toBe(RECIPIENT);
		expect(data.expiration).toEqual({ $kind: 'Epoch', Epoch: 10 });
	});

	it('validates a whole config before applying it', () => {
		const tx = new TransactionBuilder();

		expect(captureError(() => tx.setConfig({ sender: SENDER, gasBudget: 'lots' }))).toMatchObject({
			code: 'InvalidValue',
		});
		expect(captureError(() => tx.setSender('0xnothex'))).toMatchObject({
			code: 'InvalidAddress',
		});
		expect(captureError(() => tx.setSender(''))).toMatchObject({
			code: 'InvalidAddress',
			message: 'Invalid sender ""',
		});
		expect(captureError(() => tx.setGasOwner('0x'))).toMatchObject({ code: 'InvalidAddress' });
		expect(captureError(() => tx.setGasPrice(-1))).toMatchObject({ code: 'InvalidValue' });
		expect(tx.sender).toBeNull();
		expect(tx.getData().gasData).toEqual({ budget: null, price: null, owner: null, payment: [] });
	});

	it('checks the gas object limit before changing the payment', () => {
		const tx = new TransactionBuilder({ limits: { maxGasObjects: 1 } });
		tx.setGasPayment([ref(GAS_OBJECT_ID, 1, 1)]);

		const error = captureError(() => tx.addGasObjects([ref(RECIPIENT, 1, 2)]));

		expect(error).toMatchObject({ code: 'LimitExceeded' });
		expect(tx.getData().gasData.payment).toHaveLength(1);
		expect(tx.getUsedObjectIds()).toEqual(new Set([GAS_OBJECT_ID]));
	});
});

describe('argument references', () => {
	it('rejects a command that consumes its own or a later result', async () => {
		const tx = new TransactionBuilder();
		const value = tx.pure.u64(1);
		tx.moveCall({ target: '0x2::example::first' });
		const second = tx.moveCall({ target: '0x2::example::second', arguments: [value] });

		tx.alias(value, second);

		const error = await captureAsyncError(tx.finalize({ onlyTransactionKind: true }));
		expect(error).toBeInstanceOf(ArgumentReferenceError);
		expect(error).toMatchObject({ code: 'ForwardReference', argumentId: 0 });
	});

	it('rejects sub-indices past the declared results', async () => {
		const tx = new TransactionBuilder();
		const coins = tx.splitCoins(tx.gas, [1]);
		const missing = tx.nestedResult(coins, 1);
		tx.transferObjects([missing], RECIPIENT);

		expect(await captureAsyncError(tx.finalize({ onlyTransactionKind: true }))).toMatchObject({
			code: 'InvalidSubIndex',
			argumentId: 3,
		});
	});

	it('rejects sub-indices of inputs', async () => {
		const tx = new TransactionBuilder();
		const input = tx.pure.u64(1);
		tx.moveCall({ target: '0x2::example::run', arguments: [tx.nestedResult(input, 0)] });

		expect(await captureAsyncError(tx.finalize({ onlyTransactionKind: true }))).toMatchObject({
			code: 'InvalidSubIndex',
			argumentId: 1,
		});
	});

	it('allows any sub-index of a move call result', async () => {
		const tx = new TransactionBuilder();
		const results = tx.moveCall({ target: '0x2::example::pair' });
		tx.moveCall({ target: '0x2::example::consume', arguments: [tx.nestedResult(results, 5)] });

		const data = await tx.finalize({ onlyTransactionKind: true });

		expect(data.commands[1]).toMatchObject({
			MoveCall: { arguments: [{ $kind: 'NestedResult', NestedResult: [0, 5] }] },
		});
	});

	it('rewrites every use of an aliased argument', async () => {
		const tx = new TransactionBuilder();
		const placeholder = tx.pure.u64(1);
		const real = tx.pure.u64(2);
		tx.moveCall({ target: '0x2::example::run', arguments: [placeholder, placeholder] });

		tx.alias(placeholder, real);
		const data = await tx.finalize({ onlyTransactionKind: true });

		expect(data.commands[0]).toMatchObject({
			MoveCall: {
				arguments: [
					{ $kind: 'Input', Input: 1 },
					{ $kind: 'Input', Input: 1 },
				],
			},
		});
		expect(data.inputs).toHaveLength(2);
	});

	it('rejects aliasing a single output of a result', () => {
		const tx = new TransactionBuilder();
		const coins = tx.splitCoins(tx.gas, [1, 2]);
		const target = tx.pure.u8(1);

		const error = captureError(() => tx.alias({ id: coins.id, subIndex: 1 }, target));

		expect(error).toBeInstanceOf(ArgumentReferenceError);
		expect(error).toMatchObject({
			code: 'InvalidSubIndex',
			argumentId: 3,
			message: 'Cannot alias sub-index 1 of argument 3',
		});
		expect(tx.resolveArgument(coins).entry).toEqual({ $kind: 'Result', Result: 0 });
	});
});

describe('finalization', () => {
	it('refuses a second finalize while intents are resolving', async () => {
		let release: () => void = () => {};
		const gate = new Promise<void>((resolve) => {
			release = () => resolve();
		});
		const slow: IntentResolver = {
			resolve: async (intent, tx) => {
				await gate;
				tx.alias(intent.argument, tx.pure.u8(1));
			},
		};
		const client = new InMemoryStateQueryClient();
		const tx = new TransactionBuilder({ resolvers: { Slow: slow } });
		tx.moveCall({ target: '0x2::example::run', arguments: [tx.intent({ name: 'Slow' })] });

		const first = tx.finalize({ client, onlyTransactionKind: true });
		const second = await captureAsyncError(tx.finalize({ client, onlyTransactionKind: true }));
		release();

		expect(second).toBeInstanceOf(InputError);
		expect(second).toMatchObject({
			code: 'BuilderFinalizing',
			message: 'This transaction builder is still being finalized',
		});
		expect((await first).commands).toHaveLength(1);
		expect(tx.consumed).toBe(true);
	});

	it('consumes the builder', async () => {
		const tx = splitAndTransfer(setup());
		await tx.finalize();

		expect(tx.consumed).toBe(true);
		expect(captureError(() => tx.pure.u64(1))).toMatchObject({ code: 'BuilderConsumed' });
		expect(captureError(() => tx.gas)).toMatchObject({ code: 'BuilderConsumed' });
		expect(await captureAsyncError(tx.build())).toMatchObject({ code: 'BuilderConsumed' });
		expect(tx.getData().commands).toHaveLength(2);
	});

	it('rejects transactions larger than the size limit', async () => {
		const tx = splitAndTransfer(setup());

		const error = await captureAsyncError(tx.build({ maxSizeBytes: 10 }));

		expect(error).toMatchObject({ code: 'EncodingFailed', name: 'EncodingError' });
		expect(error).toHaveProperty('message', expect.stringMatching(/more than the maximum of 10$/));
	});
});
