// Copyright (c) Mysten Labs, Inc.
// SPDX-License-Identifier: Apache-2.0

import { describe, expect, it } from 'vitest';

import { ArgumentTable } from '../../src/transactions/ArgumentTable.js';
import { ArgumentReferenceError } from '../../src/transactions/errors.js';
import { captureError } from '../utils/errors.js';

describe('ArgumentTable', () => {
	it('allocates dense identifiers in order', () => {
		const table = new ArgumentTable();

		const gas = table.allocate({ $kind: 'GasCoin', GasCoin: true });
		const input = table.allocate({ $kind: 'Input', Input: 0 });
		const result = table.allocate({ $kind: 'Result', Result: 0 });

		expect([gas.id, input.id, result.id]).toEqual([0, 1, 2]);
		expect(table.size).toBe(3);
		expect(table.has(2)).toBe(true);
		expect(table.has(3)).toBe(false);
	});

	it('rejects identifiers it never allocated', () => {
		const table = new ArgumentTable();
		table.allocate({ $kind: 'Input', Input: 0 });

		const error = captureError(() => table.get(5));

		expect(error).toBeInstanceOf(ArgumentReferenceError);
		expect(error).toMatchObject({ code: 'UnknownArgument', argumentId: 5 });
		expect(captureError(() => table.alias({ id: 0 }, { id: 1 }))).toMatchObject({
			code: 'UnknownArgument',
			argumentId: 1,
		});
	});

	it('follows alias chains to the terminal entry', () => {
		const table = new ArgumentTable();
		const a = table.allocate({ $kind: 'Input', Input: 0 });
		const b = table.allocate({ $kind: 'Input', Input: 1 });
		const c = table.allocate({ $kind: 'Input', Input: 2 });

		table.alias(c, b);
		table.alias(b, a);

		expect(table.resolve(c)).toEqual({ entry: { $kind: 'Input', Input: 0 } });
		expect(table.get(c.id)).toEqual({ $kind: 'Replacement', Replacement: { id: 1 } });
		expect(table.size).toBe(3);
	});

	it('carries the sub-index of a nested result to the terminal entry', () => {
		const table = new ArgumentTable();
		const result = table.allocate({ $kind: 'Result', Result: 4 });
		const nested = table.nestedResult(result, 1);
		const alias = table.allocate({ $kind: 'Input', Input: 0 });
		table.alias(alias, nested);

		expect(nested.id).toBe(1);
		expect(table.resolve(nested)).toEqual({ entry: { $kind: 'Result', Result: 4 }, subIndex: 1 });
		expect(table.resolve(alias)).toEqual({ entry: { $kind: 'Result', Result: 4 }, subIndex: 1 });
		expect(table.resolve({ id: nested.id, subIndex: 1 })).toEqual({
			entry: { $kind: 'Result', Result: 4 },
			subIndex: 1,
		});
	});

	it('rejects conflicting sub-indices', () => {
		const table = new ArgumentTable();
		const result = table.allocate({ $kind: 'Result', Result: 0 });
		const nested = table.nestedResult(result, 1);

		expect(captureError(() => table.resolve({ id: nested.id, subIndex: 2 }))).toMatchObject({
			code: 'InvalidSubIndex',
		});
		expect(table.resolve({ id: nested.id, subIndex: 1 }).subIndex).toBe(1);
	});

	it('rejects nesting a handle that already selects a sub-index', () => {
		const table = new ArgumentTable();
		table.allocate({ $kind: 'Result', Result: 0 });

		expect(captureError(() => table.nestedResult({ id: 0, subIndex: 0 }, 1))).toMatchObject({
			code: 'InvalidSubIndex',
		});
		expect(captureError(() => table.nestedResult({ id: 0 }, -1))).toMatchObject({
			code: 'InvalidSubIndex',
		});
		expect(table.size).toBe(1);
	});

	it('detects alias cycles', () => {
		const table = new ArgumentTable();
		const a = table.allocate({ $kind: 'Input', Input: 0 });
		const b = table.allocate({ $kind: 'Input', Input: 1 });

		table.alias(a, b);
		table.alias(b, a);

		const error = captureError(() => table.resolve(a));
		expect(error).toBeInstanceOf(ArgumentReferenceError);
		expect(error).toMatchObject({ code: 'CyclicReference', argumentId: 0 });
	});

	it('detects self aliases', () => {
		const table = new ArgumentTable();
		const a = table.allocate({ $kind: 'Input', Input: 0 });

		table.alias(a, a);

		expect(captureError(() => table.resolve(a))).toMatchObject({ code: 'CyclicReference' });
	});

	it('returns snapshots that do not track later changes', () => {
		const table = new ArgumentTable();
		const a = table.allocate({ $kind: 'Input', Input: 0 });
		const snapshot = table.snapshot();

		table.alias(a, table.allocate({ $kind: 'GasCoin', GasCoin: true }));

		expect(snapshot).toEqual([{ $kind: 'Input', Input: 0 }]);
	});
});
