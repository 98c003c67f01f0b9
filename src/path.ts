/**
 * xmpkit — Path language
 *
 * Paths address a single value inside a document:
 *
 *     prefix:segment/segment[index]/segment[lang]
 *
 * `[]` is index 0, a numeric qualifier is an index (`-1` means "last" when
 * reading and "append" when writing) and anything else is a language tag.
 * A segment may carry its own prefix (`xmpMM:Pantry[0]/dc:format`), which
 * then becomes the active namespace for the rest of the path.
 */

import { InvalidPathSegmentError } from './errors.ts';
import { splitName } from './namespace.ts';

// ---------------------------------------------------------------------------
// Segments
// ---------------------------------------------------------------------------

export type SegmentQualifier = { readonly kind: 'none' } | { readonly kind: 'index'; readonly index: number } | { readonly kind: 'lang'; readonly lang: string };

export interface PathSegment {
	/** The segment as written, qualifier included. */
	readonly text: string;
	/** Field name without the qualifier; may carry a prefix. */
	readonly name: string;
	readonly qualifier: SegmentQualifier;
}

const NONE: SegmentQualifier = { kind: 'none' };
const SEGMENT_CACHE_SIZE = 1024;
const segmentCache = new Map<string, PathSegment>();

/**
 * Tokenizes one segment. Results are cached by segment text.
 *
 * @throws {InvalidPathSegmentError} for unbalanced brackets or an index below -1.
 */
export function parseSegment(text: string): PathSegment {
	const cached = segmentCache.get(text);
	if (cached !== undefined) return cached;
	const m = /^([^[\]]*)(?:\[([^[\]]*)\])?$/.exec(text);
	if (m === null) throw new InvalidPathSegmentError(text, 'unbalanced brackets');
	const name = m[1] ?? '';
	const inner = m[2];
	let qualifier = NONE;
	if (inner !== undefined) {
		if (inner === '') {
			qualifier = { kind: 'index', index: 0 };
		} else if (/^-?\d+$/.test(inner)) {
			const index = Number.parseInt(inner, 10);
			if (index < -1) throw new InvalidPathSegmentError(text, `index ${index} out of range`);
			qualifier = { kind: 'index', index };
		} else {
			qualifier = { kind: 'lang', lang: inner };
		}
	}
	const seg: PathSegment = { text, name, qualifier };
	if (segmentCache.size >= SEGMENT_CACHE_SIZE) {
		const oldest = segmentCache.keys().next();
		if (oldest.done !== true) segmentCache.delete(oldest.value);
	}
	segmentCache.set(text, seg);
	return seg;
}

/** Qualifies a segment name with `prefix` unless it carries its own. */
export function expandName(prefix: string, name: string): string {
	return name.includes(':') ? name : `${prefix}:${name}`;
}

// ---------------------------------------------------------------------------
// Path
// ---------------------------------------------------------------------------

export class Path {
	private readonly prefix: string;
	private readonly list: readonly string[];
	private readonly qualified: boolean;

	/** Parses `prefix:f1/f2`; with `fields`, `text` is taken as the prefix. */
	constructor(text: string, fields?: readonly string[]) {
		if (fields !== undefined) {
			this.prefix = text;
			this.list = fields;
			this.qualified = true;
			return;
		}
		const i = text.indexOf(':');
		this.qualified = i !== -1;
		this.prefix = i === -1 ? text : text.slice(0, i);
		const rest = i === -1 ? '' : text.slice(i + 1);
		this.list = rest === '' ? [] : rest.split('/');
	}

	/** Builds `prefix:f1/f2/...`. A first field with its own prefix is kept as written. */
	static from(prefix: string, fields: readonly string[]): Path {
		return new Path(prefix, fields);
	}

	/**
	 * Parses and validates every segment of `text`.
	 *
	 * @throws {InvalidPathSegmentError} when the prefix is missing or a segment does not parse.
	 */
	static parse(text: string): Path {
		const path = new Path(text);
		if (!path.isXmpPath()) throw new InvalidPathSegmentError(text, 'missing namespace prefix');
		path.segments();
		return path;
	}

	toString(): string {
		if (!this.qualified) return this.prefix;
		const [first] = this.list;
		if (first !== undefined && ownPrefix(first) !== '') return this.list.join('/');
		return `${this.prefix}:${this.list.join('/')}`;
	}

	equals(other: Path): boolean {
		return this.toString() === other.toString();
	}

	/** Whether the path has the `prefix:` form at all. */
	isXmpPath(): boolean {
		return this.qualified;
	}

	/** The prefix the first field resolves under: its own, or the path's. */
	namespacePrefix(): string {
		const [first] = this.list;
		const own = first === undefined ? '' : ownPrefix(first);
		return own !== '' ? own : this.prefix;
	}

	fields(): string[] {
		return [...this.list];
	}

	segments(): PathSegment[] {
		return this.list.map(parseSegment);
	}

	len(): number {
		return this.list.length;
	}

	push(...segments: string[]): Path {
		return new Path(this.prefix, [...this.list, ...segments]);
	}

	/** Removes the last segment. */
	pop(): [segment: string, rest: Path] {
		const fields = this.fields();
		const last = fields.pop() ?? '';
		return [last, new Path(this.prefix, fields)];
	}

	/** Removes the first segment as written; a prefix on it becomes the prefix of the rest. */
	popFront(): [segment: string, rest: Path] {
		const [first = '', ...rest] = this.list;
		return [first, new Path(this.namespacePrefix(), rest)];
	}

	/** Qualifies the last segment with `[index]`. */
	appendIndex(index: number): Path {
		return this.qualifyLast(`[${index}]`);
	}

	/** Qualifies the last segment with `[tag]`. */
	appendIndexString(tag: string): Path {
		return this.qualifyLast(`[${tag}]`);
	}

	private qualifyLast(q: string): Path {
		const fields = this.fields();
		fields.push(`${fields.pop() ?? ''}${q}`);
		return new Path(this.prefix, fields);
	}
}

function ownPrefix(field: string): string {
	return splitName(field.split('[', 1)[0] ?? '')[0];
}

// ---------------------------------------------------------------------------
// Path values
// ---------------------------------------------------------------------------

export interface PathValue {
	readonly path: Path;
	readonly value: string;
	/** Namespace URI for a prefix the registry does not know. */
	readonly namespace?: string;
	readonly flags?: number;
}

export function comparePathValues(a: PathValue, b: PathValue): number {
	const x = a.path.toString();
	const y = b.path.toString();
	return x < y ? -1 : x > y ? 1 : 0;
}

/** Sorted by path, keeping the first entry of each path. */
export function normalizePaths(list: readonly PathValue[]): PathValue[] {
	const sorted = [...list].sort(comparePathValues);
	const out: PathValue[] = [];
	for (const v of sorted) {
		const prev = out[out.length - 1];
		if (prev !== undefined && prev.path.equals(v.path)) continue;
		out.push(v);
	}
	return out;
}
