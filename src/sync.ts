/**
 * xmpkit — Sync descriptions and diffs
 */

import { SyncFlags } from './flags.ts';
import { normalizePaths } from './path.ts';
import type { Path, PathValue } from './path.ts';

/** Pure value transformation applied while syncing. */
export type ConverterFunc = (value: string) => string;

/** One `source → dest` copy, as run by `Document.syncMulti`. */
export interface SyncDesc {
	readonly source: Path;
	readonly dest: Path;
	readonly flags: number;
	readonly convert?: ConverterFunc;
}

/**
 * Compares two path lists. Paths only in `a` come back flagged `Delete`,
 * paths only in `b` flagged `Create` and paths whose values differ flagged
 * `Replace` with the value from `a`. Equal entries are left out.
 */
export function diffPaths(a: readonly PathValue[], b: readonly PathValue[]): PathValue[] {
	const left = normalizePaths(a);
	const right = normalizePaths(b);
	const out: PathValue[] = [];
	let i = 0;
	let j = 0;
	while (i < left.length || j < right.length) {
		const x = left[i];
		const y = right[j];
		if (y === undefined || (x !== undefined && x.path.toString() < y.path.toString())) {
			if (x !== undefined) out.push({ ...x, flags: SyncFlags.Delete });
			i++;
			continue;
		}
		if (x === undefined || y.path.toString() < x.path.toString()) {
			out.push({ ...y, flags: SyncFlags.Create });
			j++;
			continue;
		}
		if (x.value !== y.value) out.push({ ...x, flags: SyncFlags.Replace });
		i++;
		j++;
	}
	return out;
}
