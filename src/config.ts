// Copyright (c) Mysten Labs, Inc.
// SPDX-License-Identifier: Apache-2.0

import { config as loadDotenv } from 'dotenv';
import type { InferOutput } from 'valibot';
import {
	integer,
	minValue,
	number,
	object,
	optional,
	parse,
	picklist,
	pipe,
	string,
	transform,
} from 'valibot';

import { createLogger, Level } from './logger.js';
import type { Logger } from './logger.js';
import type { BuilderLimits } from './transactions/limits.js';
import { resolveLimits } from './transactions/limits.js';

const EnvLimit = optional(
	pipe(
		string(),
		transform((value) => Number(value)),
		number(),
		integer(),
		minValue(0),
	),
);

const ConfigEnv = object({
	TX_BUILDER_LOG_LEVEL: optional(picklist(Object.values(Level)), Level.error),
	TX_BUILDER_MAX_GAS_OBJECTS: EnvLimit,
	TX_BUILDER_MAX_COMMANDS: EnvLimit,
	TX_BUILDER_MAX_INPUTS: EnvLimit,
	TX_BUILDER_MAX_ARGUMENTS: EnvLimit,
	TX_BUILDER_MAX_SIZE_BYTES: EnvLimit,
});
export type ConfigEnv = InferOutput<typeof ConfigEnv>;

export interface BuilderConfig {
	logLevel: Level;
	limits: BuilderLimits;
}

export interface LoadConfigOptions {
	/** Path of a dotenv file. Values already present in `env` take precedence over the file. */
	path?: string;
	env?: Record<string, string | undefined>;
}

export function loadConfig({ path, env = process.env }: LoadConfigOptions = {}): BuilderConfig {
	const fileEnv: Record<string, string> = {};

	if (path) {
		const result = loadDotenv({ path, processEnv: fileEnv });
		if (result.error) {
			throw result.error;
		}
	}

	const parsed = parse(ConfigEnv, { ...fileEnv, ...definedEntries(env) });

	return {
		logLevel: parsed.TX_BUILDER_LOG_LEVEL,
		limits: resolveLimits({
			maxGasObjects: parsed.TX_BUILDER_MAX_GAS_OBJECTS,
			maxCommands: parsed.TX_BUILDER_MAX_COMMANDS,
			maxInputs: parsed.TX_BUILDER_MAX_INPUTS,
			maxArguments: parsed.TX_BUILDER_MAX_ARGUMENTS,
			maxSizeBytes: parsed.TX_BUILDER_MAX_SIZE_BYTES,
		}),
	};
}

export function createConfiguredLogger(config: BuilderConfig): Logger {
	return createLogger(config.logLevel);
}

function definedEntries(env: Record<string, string | undefined>) {
	const entries: Record<string, string> = {};

	for (const [key, value] of Object.entries(env)) {
		if (value !== undefined) {
			entries[key] = value;
		}
	}

	return entries;
}
