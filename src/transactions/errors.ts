// Copyright (c) Mysten Labs, Inc.
// SPDX-License-Identifier: Apache-2.0

export class TransactionBuilderError extends Error {
	code: string;

	constructor(message: string, code: string, options?: ErrorOptions) {
		super(message, options);
		this.name = new.target.name;
		this.code = code;
	}
}

export type InputErrorCode =
	| 'MissingDigest'
	| 'InvalidDigest'
	| 'InvalidObjectKind'
	| 'InvalidAddress'
	| 'InvalidTypeTag'
	| 'InvalidValue'
	| 'EmptyOperands'
	| 'LimitExceeded'
	| 'MissingSender'
	| 'MissingGasBudget'
	| 'MissingGasPrice'
	| 'MissingGasPayment'
	| 'UnresolvedIntents'
	| 'MissingIntentResolver'
	| 'ConflictingObjectInput'
	| 'BuilderFinalizing'
	| 'BuilderConsumed';

/** Malformed or out-of-policy input. The caller can fix the input and retry. */
export class InputError extends TransactionBuilderError {
	declare code: InputErrorCode;

	constructor(code: InputErrorCode, message: string, options?: ErrorOptions) {
		super(message, code, options);
	}
}

export type ArgumentReferenceErrorCode =
	| 'UnknownArgument'
	| 'CyclicReference'
	| 'InvalidSubIndex'
	| 'UnresolvedArgument'
	| 'ForwardReference';

/** Use of an unknown, cyclic or otherwise unusable argument identifier. */
export class ArgumentReferenceError extends TransactionBuilderError {
	declare code: ArgumentReferenceErrorCode;
	argumentId: number;

	constructor(code: ArgumentReferenceErrorCode, argumentId: number, message: string) {
		super(message, code);
		this.argumentId = argumentId;
	}
}

export type NamingErrorField = 'module' | 'function';

export class NamingError extends TransactionBuilderError {
	field: NamingErrorField;
	identifier: string;

	constructor(field: NamingErrorField, identifier: string) {
		super(
			`Invalid ${field} name "${identifier}"`,
			field === 'module' ? 'InvalidModuleName' : 'InvalidFunctionName',
		);
		this.field = field;
		this.identifier = identifier;
	}
}

/** The codec rejected a transaction that passed every structural check. */
export class EncodingError extends TransactionBuilderError {
	constructor(message: string, options?: ErrorOptions) {
		super(message, 'EncodingFailed', options);
	}
}

export type ResolutionErrorReason = 'NotFound' | 'Ambiguous' | 'Channel' | 'Unbound';

export class ResolutionError extends TransactionBuilderError {
	reason: ResolutionErrorReason;
	intent: string;
	/** Whether finalizing again may succeed, true for transient channel failures */
	retryable: boolean;

	constructor(
		reason: ResolutionErrorReason,
		intent: string,
		message: string,
		{ retryable = reason === 'Channel', ...options }: ErrorOptions & { retryable?: boolean } = {},
	) {
		super(message, reason, options);
		this.reason = reason;
		this.intent = intent;
		this.retryable = retryable;
	}
}
