/**
 * xmpkit — Sync flags
 *
 * Mutations never happen implicitly; each transition has to be permitted by
 * a flag:
 *
 *   Create   write to an absent destination
 *   Replace  overwrite a non-empty destination (lists: replace all items)
 *   Delete   clear the destination when the new value is empty
 *   Append   lists only: always add the value
 *   Unique   lists only: add the value unless an equal item exists
 *   NoFail   turn operational errors into silent no-ops
 *
 * With no explicit index, lists honour Unique before Append before Replace.
 */

import { InvalidFlagError } from './errors.ts';

export const SyncFlags = {
	Create: 1 << 0,
	Replace: 1 << 1,
	Delete: 1 << 2,
	Append: 1 << 3,
	Unique: 1 << 4,
	NoFail: 1 << 5,
	Default: (1 << 0) | (1 << 1) | (1 << 2) | (1 << 4),
	/** Fill gaps and overwrite, extend lists with new unique items. */
	Merge: (1 << 0) | (1 << 1) | (1 << 4),
	/** Fill gaps and always grow lists. */
	Extend: (1 << 0) | (1 << 3),
	/** Fill gaps only; existing values stay untouched. */
	Add: (1 << 0) | (1 << 4),
} as const;

export type SyncFlagName = keyof typeof SyncFlags;

const TOKENS: ReadonlyMap<string, number> = new Map(Object.entries(SyncFlags).map(([k, v]) => [k.toLowerCase(), v]));

const SINGLE: readonly SyncFlagName[] = ['Create', 'Replace', 'Delete', 'Append', 'Unique', 'NoFail'];

export function has(flags: number, flag: number): boolean {
	return (flags & flag) !== 0;
}

/** Zero means `Default`. */
export function effectiveFlags(flags: number | undefined): number {
	return flags === undefined || flags === 0 ? SyncFlags.Default : flags;
}

/**
 * Parses a comma-separated, case-insensitive flag list such as
 * `create,replace` or `merge,nofail`. An empty string yields 0.
 *
 * @throws {InvalidFlagError} on an unknown token.
 */
export function parseSyncFlags(text: string): number {
	if (text.trim() === '') return 0;
	let flags = 0;
	for (const raw of text.split(',')) {
		const f = TOKENS.get(raw.trim().toLowerCase());
		if (f === undefined) throw new InvalidFlagError(raw);
		flags |= f;
	}
	return flags;
}

/** Renders single flags in canonical order, e.g. `create,replace`. */
export function formatSyncFlags(flags: number): string {
	return SINGLE.filter((name) => has(flags, SyncFlags[name]))
		.map((name) => name.toLowerCase())
		.join(',');
}
