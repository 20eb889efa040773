// Copyright (c) Mysten Labs, Inc.
// SPDX-License-Identifier: Apache-2.0

import { ArgumentReferenceError } from './errors.js';

/**
 * A handle to a value that commands can consume. Handles never carry the value itself,
 * they are keys into the builder's argument table.
 */
export interface TransactionArgument {
	readonly id: number;
	/** Selects one output of a command that returns several results */
	readonly subIndex?: number;
}

export type ResolutionEntry =
	| { $kind: 'GasCoin'; GasCoin: true }
	| { $kind: 'Input'; Input: number }
	// Results point at a command key rather than a position, so commands can be spliced in
	// while intents resolve without renumbering anything.
	| { $kind: 'Result'; Result: number }
	| { $kind: 'Replacement'; Replacement: TransactionArgument }
	| { $kind: 'Pending'; Pending: number };

export type TerminalEntry = Exclude<ResolutionEntry, { $kind: 'Replacement' }>;

export interface ResolvedArgument {
	entry: TerminalEntry;
	subIndex?: number;
}

export function createArgument(id: number, subIndex?: number): TransactionArgument {
	return Object.freeze(subIndex === undefined ? { id } : { id, subIndex });
}

export class ArgumentTable {
	#entries: ResolutionEntry[] = [];

	get size() {
		return this.#entries.length;
	}

	allocate(entry: ResolutionEntry): TransactionArgument {
		const id = this.#entries.push(entry) - 1;
		return createArgument(id);
	}

	has(id: number) {
		return Number.isInteger(id) && id >= 0 && id < this.#entries.length;
	}

	get(id: number): ResolutionEntry {
		if (!this.has(id)) {
			throw new ArgumentReferenceError(
				'UnknownArgument',
				id,
				`Argument ${id} was never allocated by this builder`,
			);
		}

		return this.#entries[id];
	}

	/** Throws when the handle does not belong to this table */
	assertKnown(argument: TransactionArgument) {
		this.get(argument.id);

		if (
			argument.subIndex !== undefined &&
			(!Number.isInteger(argument.subIndex) || argument.subIndex < 0)
		) {
			throw new ArgumentReferenceError(
				'InvalidSubIndex',
				argument.id,
				`Invalid sub-index ${argument.subIndex} for argument ${argument.id}`,
			);
		}
	}

	/**
	 * Rebinds `argument` to `target`. Existing identifiers are never renumbered, so every
	 * handle given out earlier keeps pointing at the same slot. The aliased handle must be a
	 * plain identifier: the whole slot is rebound.
	 */
	alias(argument: TransactionArgument, target: TransactionArgument) {
		this.assertKnown(argument);
		this.assertKnown(target);

		if (argument.subIndex !== undefined) {
			throw new ArgumentReferenceError(
				'InvalidSubIndex',
				argument.id,
				`Cannot alias sub-index ${argument.subIndex} of argument ${argument.id}`,
			);
		}

		this.#entries[argument.id] = {
			$kind: 'Replacement',
			Replacement: createArgument(target.id, target.subIndex),
		};
	}

	/** Allocates an identifier for output `subIndex` of the value `base` refers to */
	nestedResult(base: TransactionArgument, subIndex: number): TransactionArgument {
		const target = createArgument(base.id, subIndex);

		this.assertKnown(base);
		this.assertKnown(target);

		if (base.subIndex !== undefined) {
			throw new ArgumentReferenceError(
				'InvalidSubIndex',
				base.id,
				`Argument ${base.id} already selects sub-index ${base.subIndex}`,
			);
		}

		return this.allocate({ $kind: 'Replacement', Replacement: target });
	}

	/**
	 * Follows replacement links until an entry that is not an alias. A sub-index seen on the way
	 * is carried to the terminal entry.
	 */
	resolve(argument: TransactionArgument): ResolvedArgument {
		this.assertKnown(argument);

		const visited = new Set<number>();
		let subIndex = argument.subIndex;
		let id = argument.id;

		while (true) {
			if (visited.has(id)) {
				throw new ArgumentReferenceError(
					'CyclicReference',
					argument.id,
					`Argument ${argument.id} is part of a cyclic alias chain (revisited ${id})`,
				);
			}
			visited.add(id);

			const entry = this.get(id);

			if (entry.$kind !== 'Replacement') {
				return subIndex === undefined ? { entry } : { entry, subIndex };
			}

			const target = entry.Replacement;

			if (target.subIndex !== undefined) {
				if (subIndex !== undefined && subIndex !== target.subIndex) {
					throw new ArgumentReferenceError(
						'InvalidSubIndex',
						argument.id,
						`Argument ${argument.id} selects sub-index ${subIndex}, but its target is already ` +
							`sub-index ${target.subIndex} of argument ${target.id}`,
					);
				}
				subIndex = target.subIndex;
			}

			id = target.id;
		}
	}

	snapshot(): ResolutionEntry[] {
		return structuredClone(this.#entries);
	}
}
