/**
 * xmpkit — Type metadata
 *
 * Record types describe their serialized fields once through
 * `registerType`. The `TypeCache` compiles those descriptions into an
 * ordered, immutable `TypeInfo` on first use: directives are parsed,
 * embedded records are promoted into their parent, capability flags are
 * taken from the field types' prototypes and conflicting names are rejected.
 *
 * ```ts
 * class Ref {
 *   id = '';
 *   paths: string[] = [];
 * }
 * registerType(Ref, {
 *   id: ['stRef:documentID', 'string'],
 *   paths: ['stRef:alternatePaths', listOf('string')],
 * });
 * ```
 */

import { SchemaConflictError, MarshalError } from './errors.ts';
import { ANY_VERSION, parseVersionDirective, rangesOverlap, Version } from './version.ts';
import type { VersionRange } from './version.ts';
import { localOf } from './namespace.ts';
import type { Node, Attr, XmlName } from './node.ts';
import type { Encoder } from './marshal.ts';
import type { Decoder } from './unmarshal.ts';

// ---------------------------------------------------------------------------
// Field types
// ---------------------------------------------------------------------------

export type ArrayType = 'Seq' | 'Bag' | 'Alt';

export type ScalarKind = 'string' | 'int' | 'float' | 'bool' | 'bytes';

export type Constructor<T extends object = object> = new () => T;

/** A plain JS array field. `fixed` limits the length, like a tuple. */
export interface ListType {
	readonly kind: 'list';
	readonly of: FieldType;
	readonly array: ArrayType;
	readonly fixed?: number;
}

/** A `Map<string, V>` field. */
export interface MapType {
	readonly kind: 'map';
	readonly of: FieldType;
}

export type FieldType = ScalarKind | Constructor | ListType | MapType;

export function listOf(of: FieldType, options: { array?: ArrayType; fixed?: number } = {}): ListType {
	const array = options.array ?? (options.fixed !== undefined ? 'Bag' : 'Seq');
	return options.fixed !== undefined ? { kind: 'list', of, array, fixed: options.fixed } : { kind: 'list', of, array };
}

export function mapOf(of: FieldType): MapType {
	return { kind: 'map', of };
}

export function isScalarType(t: FieldType): t is ScalarKind {
	return typeof t === 'string';
}

export function isListType(t: FieldType): t is ListType {
	return typeof t === 'object' && t.kind === 'list';
}

export function isMapType(t: FieldType): t is MapType {
	return typeof t === 'object' && t.kind === 'map';
}

export function isConstructorType(t: FieldType): t is Constructor {
	return typeof t === 'function';
}

// ---------------------------------------------------------------------------
// Capabilities
// ---------------------------------------------------------------------------

/** Writes itself into `node` instead of the generic record walk. */
export interface XmpMarshaler {
	marshalXmp(e: Encoder, node: Node): void;
}

/** Reads itself from `node` instead of the generic record walk. */
export interface XmpUnmarshaler {
	unmarshalXmp(d: Decoder, node: Node): void;
}

/** Produces its own attribute; `undefined` omits it. */
export interface XmpAttrMarshaler {
	marshalXmpAttr(e: Encoder, name: XmlName): Attr | undefined;
}

export interface XmpAttrUnmarshaler {
	unmarshalXmpAttr(d: Decoder, attr: Attr): void;
}

export interface TextMarshaler {
	marshalText(): string;
}

export interface TextUnmarshaler {
	unmarshalText(text: string): void;
}

export interface ZeroChecker {
	isZero(): boolean;
}

function hasMethod<K extends string>(v: unknown, name: K): v is Record<K, (...args: never[]) => unknown> {
	return typeof v === 'object' && v !== null && name in v && typeof Reflect.get(v, name) === 'function';
}

export function isXmpMarshaler(v: unknown): v is XmpMarshaler {
	return hasMethod(v, 'marshalXmp');
}

export function isXmpUnmarshaler(v: unknown): v is XmpUnmarshaler {
	return hasMethod(v, 'unmarshalXmp');
}

export function isXmpAttrMarshaler(v: unknown): v is XmpAttrMarshaler {
	return hasMethod(v, 'marshalXmpAttr');
}

export function isXmpAttrUnmarshaler(v: unknown): v is XmpAttrUnmarshaler {
	return hasMethod(v, 'unmarshalXmpAttr');
}

export function isTextMarshaler(v: unknown): v is TextMarshaler {
	return hasMethod(v, 'marshalText');
}

export function isTextUnmarshaler(v: unknown): v is TextUnmarshaler {
	return hasMethod(v, 'unmarshalText');
}

export function isZeroChecker(v: unknown): v is ZeroChecker {
	return hasMethod(v, 'isZero');
}

// ---------------------------------------------------------------------------
// Registration
// ---------------------------------------------------------------------------

/** `[directive, type]` for a serialized field, or an embedded record. */
export type FieldSpec = readonly [directive: string, type: FieldType] | { readonly embed: Constructor };

export type FieldSpecs<T> = { readonly [K in keyof T & string]?: FieldSpec };

interface TypeDefinition {
	readonly ctor: Constructor;
	readonly specs: ReadonlyArray<readonly [key: string, spec: FieldSpec]>;
}

// tag namespace → constructor → definition
const definitions = new Map<string, Map<Function, TypeDefinition>>();

/**
 * Declares the serialized fields of `ctor` under `tagNamespace`. Directives
 * read `name[,attr][,empty][,omit][,any][,flat][,v<range>]`; a name of `-`
 * excludes the field, an empty name uses the property name.
 */
export function registerType<T extends object>(ctor: Constructor<T>, fields: FieldSpecs<T>, tagNamespace = 'xmp'): void {
	const specs: Array<readonly [string, FieldSpec]> = [];
	for (const key of Object.keys(fields)) {
		const spec: FieldSpec | undefined = Reflect.get(fields, key);
		if (spec !== undefined) specs.push([key, spec]);
	}
	const byCtor = definitions.get(tagNamespace) ?? new Map<Function, TypeDefinition>();
	byCtor.set(ctor, { ctor, specs });
	definitions.set(tagNamespace, byCtor);
}

export function isRegistered(value: object, tagNamespace = 'xmp'): boolean {
	return definitions.get(tagNamespace)?.has(value.constructor) ?? false;
}

// ---------------------------------------------------------------------------
// Field info
// ---------------------------------------------------------------------------

export const FieldFlags = {
	Element: 1 << 0,
	Attr: 1 << 1,
	/** Emit even when empty. */
	Empty: 1 << 2,
	/** Never emit; still decoded. */
	Omit: 1 << 3,
	/** Catch-all for otherwise unmatched names. */
	Any: 1 << 4,
	/** Map entries are written directly below the parent. */
	Flat: 1 << 5,
	Array: 1 << 6,
	Marshal: 1 << 7,
	Unmarshal: 1 << 8,
	MarshalAttr: 1 << 9,
	UnmarshalAttr: 1 << 10,
	TextMarshal: 1 << 11,
	TextUnmarshal: 1 << 12,
} as const;

/** One step from a record into an embedded record. */
export interface EmbedStep {
	readonly key: string;
	readonly ctor: Constructor;
}

export interface FieldInfo {
	/** Property name on the innermost owner. */
	readonly key: string;
	/** Embedded records between the outer record and the owner. */
	readonly embeds: readonly EmbedStep[];
	/** Serialized, qualified name. */
	readonly name: string;
	readonly type: FieldType;
	readonly flags: number;
	readonly versions: VersionRange;
}

export interface TypeInfo {
	readonly ctor: Constructor;
	readonly fields: readonly FieldInfo[];
}

export function hasFlag(f: FieldInfo, flag: number): boolean {
	return (f.flags & flag) !== 0;
}

export function inVersion(f: FieldInfo, v: Version): boolean {
	return v.between(f.versions.min, f.versions.max);
}

function capabilityFlags(type: FieldType): number {
	if (isListType(type)) return FieldFlags.Array;
	if (!isConstructorType(type)) return 0;
	const proto: unknown = type.prototype;
	let flags = 0;
	if (isXmpMarshaler(proto)) flags |= FieldFlags.Marshal;
	if (isXmpUnmarshaler(proto)) flags |= FieldFlags.Unmarshal;
	if (isXmpAttrMarshaler(proto)) flags |= FieldFlags.MarshalAttr;
	if (isXmpAttrUnmarshaler(proto)) flags |= FieldFlags.UnmarshalAttr;
	if (isTextMarshaler(proto)) flags |= FieldFlags.TextMarshal;
	if (isTextUnmarshaler(proto)) flags |= FieldFlags.TextUnmarshal;
	if (hasMethod(proto, 'arrayType')) flags |= FieldFlags.Array;
	return flags;
}

function parseDirective(key: string, directive: string, type: FieldType, owner: string): FieldInfo | undefined {
	const [rawName = '', ...tokens] = directive.split(',');
	const name = rawName.trim();
	if (name === '-') return undefined;
	let flags = 0;
	let versions = ANY_VERSION;
	for (const token of tokens.map((t) => t.trim())) {
		switch (token) {
			case 'attr':
				flags |= FieldFlags.Attr;
				break;
			case 'empty':
				flags |= FieldFlags.Empty;
				break;
			case 'omit':
				flags |= FieldFlags.Omit;
				break;
			case 'any':
				flags |= FieldFlags.Any;
				break;
			case 'flat':
				flags |= FieldFlags.Flat;
				break;
			case '':
				break;
			default: {
				const range = token.startsWith('v') ? parseVersionDirective(token) : undefined;
				if (range === undefined) throw new SchemaConflictError(`${owner}.${key}: unknown directive '${token}'`);
				versions = range;
			}
		}
	}
	if ((flags & FieldFlags.Attr) === 0) flags |= FieldFlags.Element;
	if ((flags & FieldFlags.Flat) !== 0 && !isMapType(type)) {
		throw new SchemaConflictError(`${owner}.${key}: flat is only valid on map fields`);
	}
	return { key, embeds: [], name: name || key, type, flags: flags | capabilityFlags(type), versions };
}

// ---------------------------------------------------------------------------
// Cache
// ---------------------------------------------------------------------------

/**
 * Memoizes compiled `TypeInfo` per (tag namespace, type). Compilation is
 * deterministic, so a repeated build can only ever yield an equal schema.
 */
export class TypeCache {
	private readonly cache = new Map<string, Map<Function, TypeInfo>>();

	getTypeInfo(ctor: Function, tagNamespace = 'xmp'): TypeInfo {
		const cached = this.cache.get(tagNamespace)?.get(ctor);
		if (cached !== undefined) return cached;
		const info = this.build(ctor, tagNamespace, []);
		const byCtor = this.cache.get(tagNamespace) ?? new Map<Function, TypeInfo>();
		byCtor.set(ctor, info);
		this.cache.set(tagNamespace, byCtor);
		return info;
	}

	/** Type info for a record value, or `undefined` when its type is unregistered. */
	typeInfoOf(value: object, tagNamespace = 'xmp'): TypeInfo | undefined {
		return isRegistered(value, tagNamespace) ? this.getTypeInfo(value.constructor, tagNamespace) : undefined;
	}

	private build(ctor: Function, tagNamespace: string, seen: Function[]): TypeInfo {
		const def = definitions.get(tagNamespace)?.get(ctor);
		if (def === undefined) throw new MarshalError(`type ${ctor.name} is not registered for '${tagNamespace}'`);
		if (seen.includes(ctor)) throw new SchemaConflictError(`${ctor.name}: recursive embedding`);
		const fields: FieldInfo[] = [];
		for (const [key, spec] of def.specs) {
			if ('embed' in spec) {
				const inner = this.build(spec.embed, tagNamespace, [...seen, ctor]);
				for (const f of inner.fields) fields.push({ ...f, embeds: [{ key, ctor: spec.embed }, ...f.embeds] });
				continue;
			}
			const f = parseDirective(key, spec[0], spec[1], def.ctor.name);
			if (f !== undefined) fields.push(f);
		}
		for (let i = 0; i < fields.length; i++) {
			for (let j = i + 1; j < fields.length; j++) {
				const a = fields[i];
				const b = fields[j];
				if (a === undefined || b === undefined) continue;
				if (a.name === b.name && rangesOverlap(a.versions, b.versions)) {
					throw new SchemaConflictError(`${def.ctor.name}: field name '${a.name}' conflicts between ${a.key} and ${b.key}`);
				}
			}
		}
		return { ctor: def.ctor, fields };
	}
}

// ---------------------------------------------------------------------------
// Field lookup and access
// ---------------------------------------------------------------------------

/**
 * Finds the field serialized as `name` that is active for `version`.
 * Falls back to a unique match on the local part, then to the catch-all
 * or flattened map field.
 */
export function findField(info: TypeInfo, name: string, version: Version = Version.ZERO): FieldInfo | undefined {
	let any: FieldInfo | undefined;
	const local = localOf(name);
	const byLocal: FieldInfo[] = [];
	for (const f of info.fields) {
		if (!inVersion(f, version)) continue;
		if ((hasFlag(f, FieldFlags.Any) || hasFlag(f, FieldFlags.Flat)) && any === undefined) any = f;
		if (f.name === name) return f;
		if (localOf(f.name) === local) byLocal.push(f);
	}
	if (byLocal.length === 1) return byLocal[0];
	return any;
}

function owner(record: object, f: FieldInfo, create: boolean): object | undefined {
	let cur = record;
	for (const step of f.embeds) {
		let next: unknown = Reflect.get(cur, step.key);
		if (typeof next !== 'object' || next === null) {
			if (!create) return undefined;
			next = new step.ctor();
			Reflect.set(cur, step.key, next);
		}
		if (typeof next !== 'object' || next === null) return undefined;
		cur = next;
	}
	return cur;
}

export function getFieldValue(record: object, f: FieldInfo): unknown {
	const o = owner(record, f, false);
	return o === undefined ? undefined : Reflect.get(o, f.key);
}

export function setFieldValue(record: object, f: FieldInfo, value: unknown): void {
	const o = owner(record, f, true);
	if (o !== undefined) Reflect.set(o, f.key, value);
}

// ---------------------------------------------------------------------------
// Values
// ---------------------------------------------------------------------------

/** A fresh zero value for `type`. */
export function zeroValue(type: FieldType): unknown {
	if (isListType(type)) return [];
	if (isMapType(type)) return new Map<string, unknown>();
	if (isConstructorType(type)) return new type();
	switch (type) {
		case 'string':
			return '';
		case 'int':
		case 'float':
			return 0;
		case 'bool':
			return false;
		case 'bytes':
			return new Uint8Array(0);
	}
}

/**
 * Emptiness used to skip output: zero scalars, empty collections, values
 * that report `isZero()`, and records whose registered fields are all empty.
 */
export function isEmptyValue(value: unknown, cache?: TypeCache): boolean {
	if (value === undefined || value === null) return true;
	switch (typeof value) {
		case 'string':
			return value.length === 0;
		case 'number':
			return value === 0;
		case 'bigint':
			return value === 0n;
		case 'boolean':
			return !value;
	}
	if (typeof value !== 'object') return false;
	if (value instanceof Uint8Array) return value.length === 0;
	if (Array.isArray(value)) return value.length === 0;
	if (value instanceof Map) return value.size === 0;
	if (isZeroChecker(value)) return value.isZero();
	if (isTextMarshaler(value)) return value.marshalText() === '';
	const info = cache?.typeInfoOf(value);
	if (info === undefined) return false;
	return info.fields.every((f) => isEmptyValue(getFieldValue(value, f), cache));
}
