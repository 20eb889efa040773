// Copyright (c) Mysten Labs, Inc.
// SPDX-License-Identifier: Apache-2.0

// Defaults sit a little below the protocol maximums (256 gas objects, 1024 commands,
// 2048 inputs, 512 arguments per command).
export const MAX_GAS_OBJECTS = 250;
export const MAX_COMMANDS = 1000;
export const MAX_INPUTS = 2000;
export const MAX_ARGUMENTS = 500;
export const MAX_TX_SIZE_BYTES = 128 * 1024;

export interface BuilderLimits {
	maxGasObjects: number;
	maxCommands: number;
	maxInputs: number;
	/** Maximum number of operands a single command may reference */
	maxArguments: number;
	maxSizeBytes: number;
}

export const DEFAULT_LIMITS: Readonly<BuilderLimits> = Object.freeze({
	maxGasObjects: MAX_GAS_OBJECTS,
	maxCommands: MAX_COMMANDS,
	maxInputs: MAX_INPUTS,
	maxArguments: MAX_ARGUMENTS,
	maxSizeBytes: MAX_TX_SIZE_BYTES,
});

const LIMIT_KEYS = [
	'maxGasObjects',
	'maxCommands',
	'maxInputs',
	'maxArguments',
	'maxSizeBytes',
] as const satisfies readonly (keyof BuilderLimits)[];

export function resolveLimits(overrides: Partial<BuilderLimits> = {}): BuilderLimits {
	const limits: BuilderLimits = { ...DEFAULT_LIMITS };

	for (const key of LIMIT_KEYS) {
		const value = overrides[key];
		if (value === undefined) {
			continue;
		}

		if (!Number.isInteger(value) || value < 0) {
			throw new TypeError(`Invalid limit ${key}: ${String(value)}`);
		}

		limits[key] = value;
	}

	return limits;
}
