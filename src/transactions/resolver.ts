// Copyright (c) Mysten Labs, Inc.
// SPDX-License-Identifier: Apache-2.0

import { StateQueryError } from '../client/types.js';
import type { StateQueryClient } from '../client/types.js';
import type { TransactionArgument } from './ArgumentTable.js';
import { ResolutionError, TransactionBuilderError } from './errors.js';
import type { TransactionBuilder } from './TransactionBuilder.js';

export interface BuildTransactionOptions {
	/** Channel used to resolve intents. Without it, any pending intent fails the build. */
	client?: StateQueryClient;
	/** Skip the sender and gas checks and encode only the transaction kind */
	onlyTransactionKind?: boolean;
	maxSizeBytes?: number;
}

export type IntentStatus = 'pending' | 'resolving' | 'resolved' | 'failed';

export interface IntentRequest {
	/** The identifier reserved for the intent. Resolvers must alias it before returning. */
	readonly argument: TransactionArgument;
	readonly name: string;
	readonly data: Readonly<Record<string, unknown>>;
}

/**
 * Turns one kind of intent into concrete inputs and commands. Commands the resolver adds
 * are placed where the intent was declared.
 */
export interface IntentResolver {
	resolve(
		intent: IntentRequest,
		transaction: TransactionBuilder,
		client: StateQueryClient,
	): Promise<void>;
}

export function toResolutionError(intent: string, error: unknown): TransactionBuilderError {
	if (error instanceof TransactionBuilderError) {
		return error;
	}

	if (error instanceof StateQueryError) {
		return new ResolutionError(
			'Channel',
			intent,
			`State query failed while resolving ${intent}: ${error.message}`,
			{ cause: error, retryable: error.transient },
		);
	}

	return new ResolutionError(
		'NotFound',
		intent,
		`Failed to resolve ${intent}: ${error instanceof Error ? error.message : String(error)}`,
		{ cause: error },
	);
}
