/**
 * xmpkit — Paths over typed models
 *
 * Walks a model's registered schema segment by segment. Records are entered
 * while segments remain; lists take an `[index]`, alternative strings a
 * `[lang]`, maps the next segment as key and extension containers hand the
 * rest of the path to the nested model or raw node.
 *
 * A segment that names no field raises `PathNotFoundError`, which the
 * document catches to retry against raw nodes.
 */

import { defaultContext } from './context.ts';
import type { XmpContext } from './context.ts';
import { PathNotFoundError, UnmarshalError, UnsupportedFlagsError } from './errors.ts';
import { SyncFlags, effectiveFlags, has } from './flags.ts';
import { localOf, prefixOf } from './namespace.ts';
import type { Model } from './namespace.ts';
import { Path, expandName, normalizePaths, parseSegment } from './path.ts';
import type { PathValue, SegmentQualifier } from './path.ts';
import {
	FieldFlags,
	findField,
	getFieldValue,
	hasFlag,
	isConstructorType,
	isEmptyValue,
	isListType,
	isMapType,
	isScalarType,
	isTextMarshaler,
	isTextUnmarshaler,
	setFieldValue,
	zeroValue,
} from './typeinfo.ts';
import type { FieldInfo, FieldType } from './typeinfo.ts';
import { AltString, X_DEFAULT, isScalarList } from './array.ts';
import { Extension, ExtensionArray, NamedExtensionArray } from './extension.ts';
import { formatScalar } from './marshal.ts';
import { parseScalar } from './unmarshal.ts';
import { getNodePath, listNodePaths, setNodePath } from './nodepath.ts';

const NONE: SegmentQualifier = { kind: 'none' };
const EMPTY = new Path('');

function isObject(v: unknown): v is object {
	return typeof v === 'object' && v !== null;
}

/** Map keys drop the prefix they share with their field. */
function mapKey(name: string, f: FieldInfo): string {
	return prefixOf(name) === prefixOf(f.name) ? localOf(name) : name;
}

function formatItem(v: unknown): string {
	if (isTextMarshaler(v)) return v.marshalText();
	return formatScalar(v) ?? '';
}

function itemIndex(q: SegmentQualifier, length: number): number {
	if (q.kind !== 'index') return 0;
	return q.index === -1 ? length - 1 : q.index;
}

// ---------------------------------------------------------------------------
// Get
// ---------------------------------------------------------------------------

/**
 * Reads the value at `path` from `model`. Absent and empty values read as
 * the empty string.
 *
 * @throws {PathNotFoundError} when a segment names no field of the schema.
 */
export function getModelPath(model: Model, path: Path, ctx: XmpContext = defaultContext()): string {
	return getRecord(ctx, model, path, path);
}

function getRecord(ctx: XmpContext, record: object, p: Path, full: Path): string {
	const info = ctx.types.typeInfoOf(record);
	if (info === undefined || p.len() === 0) throw new PathNotFoundError(full.toString());
	const [text, rest] = p.popFront();
	const seg = parseSegment(text);
	const name = expandName(p.namespacePrefix(), seg.name);
	const f = findField(info, name);
	if (f === undefined) throw new PathNotFoundError(full.toString());
	const value = getFieldValue(record, f);
	if (isMapType(f.type) && hasFlag(f, FieldFlags.Flat) && name !== f.name) {
		return value instanceof Map ? getValue(ctx, value.get(mapKey(name, f)), seg.qualifier, rest, full) : '';
	}
	if (hasFlag(f, FieldFlags.Any)) return '';
	if (!hasFlag(f, FieldFlags.Empty) && isEmptyValue(value, ctx.types)) return '';
	return getValue(ctx, value, seg.qualifier, rest, full);
}

function getValue(ctx: XmpContext, value: unknown, q: SegmentQualifier, rest: Path, full: Path): string {
	if (value === undefined || value === null) return '';
	if (value instanceof AltString) {
		switch (q.kind) {
			case 'lang':
				return value.get(q.lang);
			case 'index':
				return value.items[itemIndex(q, value.length)]?.value ?? '';
			case 'none':
				return value.default();
		}
	}
	if (value instanceof ExtensionArray) {
		const ext = value.items[itemIndex(q, value.length)];
		return ext === undefined ? '' : getExtension(ctx, ext, rest, full);
	}
	if (value instanceof Extension) return getExtension(ctx, value, rest, full);
	if (value instanceof NamedExtensionArray) {
		if (rest.len() === 0) return '';
		const [name, inner] = rest.popFront();
		const ext = value.find(parseSegment(name).name);
		return ext === undefined ? '' : getExtension(ctx, ext, inner, full);
	}
	if (isScalarList(value) || Array.isArray(value)) {
		const items: readonly unknown[] = Array.isArray(value) ? value : value.items;
		return getValue(ctx, items[itemIndex(q, items.length)], NONE, rest, full);
	}
	if (value instanceof Map) {
		if (rest.len() === 0) return '';
		const [text, inner] = rest.popFront();
		const seg = parseSegment(text);
		const entry = value.get(seg.name) ?? value.get(localOf(seg.name));
		return getValue(ctx, entry, seg.qualifier, inner, full);
	}
	if (isTextMarshaler(value)) return value.marshalText();
	const scalar = formatScalar(value);
	if (scalar !== undefined) return scalar;
	if (isObject(value) && rest.len() > 0) return getRecord(ctx, value, rest, full);
	return '';
}

function getExtension(ctx: XmpContext, ext: Extension, rest: Path, full: Path): string {
	if (rest.len() === 0) return '';
	const node = ext.findNode(rest.namespacePrefix());
	if (node === undefined) return '';
	if (node.model !== undefined) {
		try {
			return getModelPath(node.model, rest, ctx);
		} catch (err) {
			if (!(err instanceof PathNotFoundError)) throw err;
		}
	}
	try {
		return getNodePath(node, rest);
	} catch (err) {
		if (err instanceof PathNotFoundError) throw new PathNotFoundError(full.toString());
		throw err;
	}
}

// ---------------------------------------------------------------------------
// Set
// ---------------------------------------------------------------------------

/**
 * Writes `value` at `path` into `model` under `flags` (0 means default).
 * Growing a list needs `Create` or `Append`; an empty value with `Delete`
 * clears the addressed value, or removes the addressed list item.
 *
 * @throws {PathNotFoundError} when a segment names no field of the schema.
 * @throws {UnsupportedFlagsError} when the flags do not permit the change.
 */
export function setModelPath(model: Model, path: Path, value: string, flags: number, ctx: XmpContext = defaultContext()): void {
	setRecord(ctx, model, path, value, effectiveFlags(flags), path);
}

function setRecord(ctx: XmpContext, record: object, p: Path, value: string, flags: number, full: Path): void {
	const info = ctx.types.typeInfoOf(record);
	if (info === undefined || p.len() === 0) throw new PathNotFoundError(full.toString());
	const [text, rest] = p.popFront();
	const seg = parseSegment(text);
	const name = expandName(p.namespacePrefix(), seg.name);
	const f = findField(info, name);
	if (f === undefined) throw new PathNotFoundError(full.toString());
	const current = getFieldValue(record, f);
	if (isMapType(f.type) && hasFlag(f, FieldFlags.Flat) && name !== f.name) {
		const map = current instanceof Map ? current : new Map<string, unknown>();
		const key = mapKey(name, f);
		const next = setValue(ctx, map.get(key), f.type.of, seg.qualifier, rest, value, flags, full);
		if (value === '' && isEmptyValue(next, ctx.types)) map.delete(key);
		else map.set(key, next);
		setFieldValue(record, f, map);
		return;
	}
	if (hasFlag(f, FieldFlags.Any)) return;
	setFieldValue(record, f, setValue(ctx, current, f.type, seg.qualifier, rest, value, flags, full));
}

/** Returns the updated value; containers are changed in place and returned. */
function setValue(ctx: XmpContext, current: unknown, type: FieldType | undefined, q: SegmentQualifier, rest: Path, value: string, flags: number, full: Path): unknown {
	let target = current;
	if (type !== undefined && isConstructorType(type) && !isObject(target)) target = new type();

	if (target instanceof AltString) {
		setAlt(target, q, value, flags);
		return target;
	}
	if (target instanceof ExtensionArray) {
		setItems(target.items, q, rest, value, flags, full, undefined, () => new Extension(), (ext, inner) => {
			setExtension(ctx, ext, inner, value, flags, full);
			return ext;
		});
		return target;
	}
	if (target instanceof Extension) {
		setExtension(ctx, target, rest, value, flags, full);
		return target;
	}
	if (target instanceof NamedExtensionArray) {
		setNamedExtension(ctx, target, rest, value, flags, full);
		return target;
	}
	if (isScalarList(target)) {
		const list = target;
		setItems(list.items, q, rest, value, flags, full, undefined, () => list.zeroItem(), () => list.parseItem(value));
		return list;
	}
	if (type !== undefined && isListType(type)) {
		const items: unknown[] = Array.isArray(current) ? current : [];
		const of = type.of;
		setItems(items, q, rest, value, flags, full, type.fixed, () => zeroValue(of), (el, inner) => setValue(ctx, el, of, NONE, inner, value, flags, full));
		return items;
	}
	if (type !== undefined && isMapType(type)) {
		const map = current instanceof Map ? current : new Map<string, unknown>();
		if (rest.len() === 0) {
			if (value === '' && has(flags, SyncFlags.Delete)) return new Map<string, unknown>();
			throw new UnmarshalError(`map at '${full}' needs a key segment`);
		}
		const [text, inner] = rest.popFront();
		const seg = parseSegment(text);
		const next = setValue(ctx, map.get(seg.name), type.of, seg.qualifier, inner, value, flags, full);
		if (value === '' && isEmptyValue(next, ctx.types)) map.delete(seg.name);
		else map.set(seg.name, next);
		return map;
	}
	if (isTextUnmarshaler(target)) {
		target.unmarshalText(value);
		return target;
	}
	if (type !== undefined && isScalarType(type)) return parseScalar(value, type, full.toString());
	if (type === undefined) {
		switch (typeof current) {
			case 'number':
				return parseScalar(value, 'float', full.toString());
			case 'boolean':
				return parseScalar(value, 'bool', full.toString());
			case 'string':
			case 'undefined':
				return value;
		}
	}
	if (isObject(target)) {
		if (rest.len() > 0) {
			setRecord(ctx, target, rest, value, flags, full);
			return target;
		}
		if (value === '' && has(flags, SyncFlags.Delete)) return type !== undefined && isConstructorType(type) ? new type() : undefined;
	}
	throw new UnmarshalError(`cannot assign text to '${full}'`);
}

/**
 * Applies a write to a list. With an index (or more segments to follow)
 * exactly one item is addressed; without one, `Unique` beats `Append`
 * beats `Replace`.
 */
function setItems<T>(
	items: T[],
	q: SegmentQualifier,
	rest: Path,
	value: string,
	flags: number,
	full: Path,
	fixed: number | undefined,
	zero: () => T,
	assign: (item: T, rest: Path) => T,
): void {
	if (q.kind === 'index' || rest.len() > 0) {
		const i = q.kind === 'index' && q.index !== -1 ? q.index : q.kind === 'index' ? items.length : 0;
		if (rest.len() === 0 && value === '') {
			if (has(flags, SyncFlags.Delete) && i < items.length) items.splice(i, 1);
			return;
		}
		if (i >= items.length) {
			if (value === '') return;
			if (!has(flags, SyncFlags.Create) && !has(flags, SyncFlags.Append)) {
				throw new UnsupportedFlagsError(`create or append flag required to grow '${full}' to index ${i}`, flags);
			}
			if (fixed !== undefined && i >= fixed) throw new UnsupportedFlagsError(`index ${i} out of range for fixed-size '${full}'`, flags);
			while (items.length <= i) items.push(zero());
		}
		const item = items[i];
		if (item !== undefined) items[i] = assign(item, rest);
		return;
	}
	if (value === '') {
		if (has(flags, SyncFlags.Delete)) items.length = 0;
		return;
	}
	if (has(flags, SyncFlags.Unique)) {
		if (!items.some((v) => formatItem(v) === value)) items.push(assign(zero(), EMPTY));
	} else if (has(flags, SyncFlags.Append)) {
		items.push(assign(zero(), EMPTY));
	} else if (has(flags, SyncFlags.Replace)) {
		items.splice(0, items.length, assign(zero(), EMPTY));
	} else if (has(flags, SyncFlags.Create) && items.length === 0) {
		items.push(assign(zero(), EMPTY));
	} else {
		throw new UnsupportedFlagsError(`update flag required to change '${full}'`, flags);
	}
}

/**
 * `Append` adds an entry for a language, or makes an untagged value the new
 * default in place of the old one. Every other flag writes the entry for the
 * language, adding it when missing. Without a language, `Replace` alone
 * resets the array to a single default entry.
 */
function setAlt(alt: AltString, q: SegmentQualifier, value: string, flags: number): void {
	const lang = q.kind === 'lang' && q.lang !== X_DEFAULT ? q.lang : '';
	if (value === '') {
		if (!has(flags, SyncFlags.Delete)) return;
		if (lang !== '') alt.removeLang(lang);
		else alt.items = [];
		return;
	}
	if (has(flags, SyncFlags.Append)) {
		alt.add(lang, value);
	} else if (lang === '' && has(flags, SyncFlags.Replace) && !has(flags, SyncFlags.Unique)) {
		alt.items = [{ value, lang: '', isDefault: true }];
	} else {
		alt.set(lang, value);
	}
}

function setExtension(ctx: XmpContext, ext: Extension, rest: Path, value: string, flags: number, full: Path): void {
	if (rest.len() === 0) throw new UnmarshalError(`cannot assign text to extension '${full}'`);
	const prefix = rest.namespacePrefix();
	let node = ext.findNode(prefix);
	if (node === undefined) {
		if (value === '') return;
		if (!has(flags, SyncFlags.Create)) throw new UnsupportedFlagsError(`create flag required to make '${full}'`, flags);
		node = ctx.pool.acquire(prefix);
		node.model = ctx.registry.getNamespace(prefix)?.newModel();
		ext.nodes.push(node);
	}
	if (node.model !== undefined) {
		try {
			setModelPath(node.model, rest, value, flags, ctx);
			return;
		} catch (err) {
			if (!(err instanceof PathNotFoundError)) throw err;
		}
	}
	setNodePath(ctx.pool, node, rest, value, flags);
}

/** Routes `NAME/prefix:field` into the entry called `NAME`. */
function setNamedExtension(ctx: XmpContext, arr: NamedExtensionArray, rest: Path, value: string, flags: number, full: Path): void {
	if (rest.len() === 0) {
		if (value === '' && has(flags, SyncFlags.Delete)) {
			arr.items = [];
			return;
		}
		throw new UnmarshalError(`named extension at '${full}' needs an entry name`);
	}
	const [text, inner] = rest.popFront();
	const name = parseSegment(text).name;
	let ext = arr.find(name);
	if (ext === undefined) {
		if (value === '') return;
		if (!has(flags, SyncFlags.Create)) throw new UnsupportedFlagsError(`create flag required to make '${full}'`, flags);
		ext = arr.ensure(name);
	}
	if (inner.len() === 0) {
		if (value === '' && has(flags, SyncFlags.Delete)) {
			arr.remove(name);
			return;
		}
		throw new UnmarshalError(`cannot assign text to extension '${full}'`);
	}
	setExtension(ctx, ext, inner, value, flags, full);
	const empty = ext.nodes.every((n) => n.value === '' && n.attrs.length === 0 && n.nodes.length === 0 && isEmptyValue(n.model, ctx.types));
	if (empty) arr.remove(name);
}

// ---------------------------------------------------------------------------
// List
// ---------------------------------------------------------------------------

/**
 * Every non-empty value of `model` as a sorted path list. List items get
 * `[index]`, alternative entries `[lang]` (`[x-default]` for an untagged
 * default) and extensions their nested paths.
 */
export function listModelPaths(model: Model, ctx: XmpContext = defaultContext()): PathValue[] {
	const prefix = model.namespaces()[0]?.name ?? '';
	const out: PathValue[] = [];
	listRecord(ctx, model, prefix, [], out);
	return normalizePaths(out);
}

function segmentName(prefix: string, name: string): string {
	return name.includes(':') && prefixOf(name) === prefix ? localOf(name) : name;
}

function listRecord(ctx: XmpContext, record: object, prefix: string, base: readonly string[], out: PathValue[]): void {
	const info = ctx.types.typeInfoOf(record);
	if (info === undefined) return;
	for (const f of info.fields) {
		const value = getFieldValue(record, f);
		if (isEmptyValue(value, ctx.types)) continue;
		if (isMapType(f.type) && hasFlag(f, FieldFlags.Flat) && value instanceof Map) {
			const fieldPrefix = prefixOf(f.name);
			for (const [k, v] of value) {
				const key = String(k);
				listValue(ctx, v, prefix, [...base, segmentName(prefix, key.includes(':') ? key : `${fieldPrefix}:${key}`)], out);
			}
			continue;
		}
		listValue(ctx, value, prefix, [...base, segmentName(prefix, f.name)], out);
	}
}

function listValue(ctx: XmpContext, value: unknown, prefix: string, fields: readonly string[], out: PathValue[]): void {
	if (value === undefined || value === null) return;
	const qualified = (q: string): string[] => [...fields.slice(0, -1), `${fields[fields.length - 1] ?? ''}${q}`];
	const push = (f: readonly string[], v: string): void => {
		if (v !== '') out.push({ path: Path.from(prefix, f), value: v });
	};

	if (value instanceof AltString) {
		for (const item of value.items) push(qualified(`[${item.lang || X_DEFAULT}]`), item.value);
		return;
	}
	if (value instanceof ExtensionArray) {
		value.items.forEach((ext, i) => listExtension(ctx, ext, Path.from(prefix, qualified(`[${i}]`)), out));
		return;
	}
	if (value instanceof Extension) {
		listExtension(ctx, value, Path.from(prefix, fields), out);
		return;
	}
	if (value instanceof NamedExtensionArray) {
		for (const ext of value.items) listExtension(ctx, ext, Path.from(prefix, [...fields, ext.name]), out);
		return;
	}
	if (isScalarList(value) || Array.isArray(value)) {
		const items: readonly unknown[] = Array.isArray(value) ? value : value.items;
		items.forEach((item, i) => {
			if (isObject(item) && ctx.types.typeInfoOf(item) !== undefined) listRecord(ctx, item, prefix, qualified(`[${i}]`), out);
			else push(qualified(`[${i}]`), formatItem(item));
		});
		return;
	}
	if (value instanceof Map) {
		for (const [k, v] of value) listValue(ctx, v, prefix, [...fields, String(k)], out);
		return;
	}
	if (isTextMarshaler(value)) {
		push(fields, value.marshalText());
		return;
	}
	const scalar = formatScalar(value);
	if (scalar !== undefined) {
		push(fields, scalar);
		return;
	}
	if (isObject(value)) listRecord(ctx, value, prefix, fields, out);
}

function listExtension(ctx: XmpContext, ext: Extension, base: Path, out: PathValue[]): void {
	for (const node of ext.nodes) {
		const inner = node.model !== undefined ? listModelPaths(node.model, ctx) : [];
		for (const pv of [...inner, ...listNodePaths(node)]) out.push({ path: new Path(`${base}/${pv.path}`), value: pv.value });
	}
}
