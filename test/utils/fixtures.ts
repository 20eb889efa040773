// Copyright (c) Mysten Labs, Inc.
// SPDX-License-Identifier: Apache-2.0

import { toBase58 } from '@mysten/bcs';

export const SENDER = `0x${'1'.repeat(64)}`;
export const RECIPIENT = `0x${'2'.repeat(64)}`;
export const GAS_OBJECT_ID = `0x${'3'.repeat(64)}`;

export function digest(fill: number) {
	return toBase58(new Uint8Array(32).fill(fill));
}

export function ref(objectId: string, version: number | string = 1, fill = 1) {
	return { objectId, version, digest: digest(fill) };
}
