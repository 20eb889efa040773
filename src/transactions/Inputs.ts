// Copyright (c) Mysten Labs, Inc.
// SPDX-License-Identifier: Apache-2.0

import { toBase64 } from '@mysten/bcs';
import { safeParse } from 'valibot';

import { isValidDigest } from '../utils/move-types.js';
import { JsonU64, ObjectID } from './data/internal.js';
import type {
	CallArg,
	JsonU64Input,
	ObjectArg,
	ObjectInput,
	ObjectRef,
	ObjectRefInput,
} from './data/internal.js';
import { InputError } from './errors.js';

type ObjectCallArg = Extract<CallArg, { $kind: 'Object' }>;

/** Accepts raw bytes or a serialized bcs value */
function Pure(data: Uint8Array | { toBase64(): string }): Extract<CallArg, { $kind: 'Pure' }> {
	return {
		$kind: 'Pure',
		Pure: {
			bytes: data instanceof Uint8Array ? toBase64(data) : data.toBase64(),
		},
	};
}

function objectCallArg(arg: ObjectArg): ObjectCallArg {
	return { $kind: 'Object', Object: arg };
}

export const Inputs = {
	Pure,
	ObjectRef(ref: ObjectRefInput): ObjectCallArg {
		return Inputs.Object({ kind: 'owned', ...ref });
	},
	ReceivingRef(ref: ObjectRefInput): ObjectCallArg {
		return Inputs.Object({ kind: 'receiving', ...ref });
	},
	SharedObjectRef({
		objectId,
		mutable = true,
		initialSharedVersion,
	}: {
		objectId: string;
		mutable?: boolean;
		initialSharedVersion: JsonU64Input;
	}): ObjectCallArg {
		return Inputs.Object({ kind: 'shared', objectId, version: initialSharedVersion, mutable });
	},
	/** Validates the metadata each object kind requires and builds the matching call argument */
	Object(input: ObjectInput): ObjectCallArg {
		const kind: string = input.kind;

		if (input.kind === 'shared') {
			return objectCallArg({
				$kind: 'SharedObject',
				SharedObject: {
					objectId: parseObjectId(input.objectId),
					initialSharedVersion: parseVersion(input.version),
					mutable: input.mutable ?? true,
				},
			});
		}

		if (input.kind !== 'owned' && input.kind !== 'immutable' && input.kind !== 'receiving') {
			throw new InputError('InvalidObjectKind', `Unknown object kind "${kind}"`);
		}

		const ref = parseObjectRef(input);

		return objectCallArg(
			input.kind === 'receiving'
				? { $kind: 'Receiving', Receiving: ref }
				: { $kind: 'ImmOrOwnedObject', ImmOrOwnedObject: ref },
		);
	},
};

/** Validates an owned object reference, as used for gas payment */
export function parseObjectRef({
	objectId,
	version,
	digest,
}: {
	objectId: string;
	version: JsonU64Input;
	digest?: string;
}): ObjectRef {
	const normalizedId = parseObjectId(objectId);

	return {
		objectId: normalizedId,
		version: parseVersion(version),
		digest: parseDigest(normalizedId, digest),
	};
}

export function getObjectId(arg: CallArg): string | null {
	if (arg.$kind !== 'Object') {
		return null;
	}

	switch (arg.Object.$kind) {
		case 'ImmOrOwnedObject':
			return arg.Object.ImmOrOwnedObject.objectId;
		case 'Receiving':
			return arg.Object.Receiving.objectId;
		case 'SharedObject':
			return arg.Object.SharedObject.objectId;
	}
}

function parseObjectId(objectId: string) {
	const result = safeParse(ObjectID, objectId);
	if (!result.success) {
		throw new InputError('InvalidAddress', `Invalid object id "${objectId}"`);
	}

	return result.output;
}

function parseVersion(version: JsonU64Input) {
	const result = safeParse(JsonU64, version);
	if (!result.success) {
		throw new InputError('InvalidValue', `Invalid object version "${String(version)}"`);
	}

	return result.output;
}

function parseDigest(objectId: string, digest: string | undefined) {
	if (digest === undefined || digest === '') {
		throw new InputError('MissingDigest', `Object ${objectId} requires a digest`);
	}

	if (!isValidDigest(digest)) {
		throw new InputError('InvalidDigest', `Invalid digest "${digest}" for object ${objectId}`);
	}

	return digest;
}
