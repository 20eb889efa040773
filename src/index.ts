// Copyright (c) Mysten Labs, Inc.
// SPDX-License-Identifier: Apache-2.0

export * from './transactions/index.js';
export * from './client/index.js';
export {
	bcs,
	parseTypeTag,
	TypeTagParseError,
	typeTagToString,
	type TypeTag,
} from './bcs/index.js';
export { createConfiguredLogger, loadConfig, type BuilderConfig } from './config.js';
export { createLogger, getDefaultLogger, Level, setDefaultLogger, type Logger } from './logger.js';
export * from './utils/index.js';
