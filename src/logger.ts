// Copyright (c) Mysten Labs, Inc.
// SPDX-License-Identifier: Apache-2.0

import pino from 'pino';

export enum Level {
	fatal = 'fatal',
	error = 'error',
	warn = 'warn',
	info = 'info',
	debug = 'debug',
	trace = 'trace',
	silent = 'silent', // use this to disable logging
}

const levelsTranslator: Record<number, string> = {
	10: 'trace',
	20: 'debug',
	30: 'info',
	40: 'warn',
	50: 'error',
	60: 'fatal',
};

export type Logger = pino.Logger;

/**
 * Creates a JSON logger writing to stdout (or to `destination` when one is given).
 * Builders accept their own logger, so callers can route or silence output per builder.
 */
export function createLogger(
	level: Level = Level.error,
	destination: pino.DestinationStream = process.stdout,
): Logger {
	return pino(
		{
			base: null,
			level,
			timestamp: () => `,"time":"${new Date().toISOString()}"`,
			formatters: {
				level(_label, number) {
					return { level: levelsTranslator[number] ?? String(number) };
				},
			},
			depthLimit: 10,
		},
		destination,
	);
}

export function isLevel(value: string): value is Level {
	return Object.values<string>(Level).includes(value);
}

let defaultLogger: Logger | undefined;

export function getDefaultLogger(): Logger {
	const envLevel = process.env.TX_BUILDER_LOG_LEVEL;
	defaultLogger ??= createLogger(envLevel && isLevel(envLevel) ? envLevel : Level.error);
	return defaultLogger;
}

export function setDefaultLogger(logger: Logger) {
	defaultLogger = logger;
}
