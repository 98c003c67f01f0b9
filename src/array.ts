/**
 * xmpkit — RDF arrays
 *
 * Ordered (`rdf:Seq`), unordered (`rdf:Bag`) and alternative (`rdf:Alt`)
 * collections. On the wire every item is an `rdf:li` below a single
 * container element.
 */

import { MalformedArrayError, MarshalError, UnmarshalError } from './errors.ts';
import { xmlName } from './node.ts';
import type { Node } from './node.ts';
import type { ArrayType, XmpMarshaler, XmpUnmarshaler, ZeroChecker } from './typeinfo.ts';
import type { Encoder } from './marshal.ts';
import type { Decoder } from './unmarshal.ts';

export type { ArrayType } from './typeinfo.ts';

export const X_DEFAULT = 'x-default';

const CONTAINERS: ReadonlyMap<string, ArrayType> = new Map([
	['rdf:Seq', 'Seq'],
	['rdf:Bag', 'Bag'],
	['rdf:Alt', 'Alt'],
]);

// ---------------------------------------------------------------------------
// Wire helpers
// ---------------------------------------------------------------------------

/**
 * Writes `items` as a container of `rdf:li` nodes below `node`. Each item
 * goes through the encoder, so records become resource items.
 */
export function marshalArray(e: Encoder, node: Node, type: ArrayType, items: readonly unknown[]): void {
	if (items.length === 0) return;
	const container = e.ctx.pool.acquire(`rdf:${type}`);
	node.addNode(container);
	for (const item of items) {
		const li = container.appendNode(e.ctx.pool.acquire('rdf:li'));
		e.encodeElement(item, li);
	}
}

/** Whether `node` wraps a single `rdf:Seq`, `rdf:Bag` or `rdf:Alt` container. */
export function isArrayNode(node: Node): boolean {
	const [container] = node.nodes;
	return node.nodes.length === 1 && container !== undefined && CONTAINERS.has(container.fullName());
}

export interface ArrayItems {
	readonly type: ArrayType;
	readonly items: readonly Node[];
}

/**
 * Validates the container below `node` and returns its `rdf:li` items.
 * A node without children and value is an empty array.
 *
 * @throws {MalformedArrayError} for a wrong child count, container or item tag.
 */
export function arrayItems(node: Node): ArrayItems | undefined {
	if (node.nodes.length === 0 && node.value === '') return undefined;
	const [container] = node.nodes;
	if (node.nodes.length !== 1 || container === undefined) {
		throw new MalformedArrayError(`${node.fullName()} must have exactly one container child, found ${node.nodes.length}`);
	}
	const type = CONTAINERS.get(container.fullName());
	if (type === undefined) throw new MalformedArrayError(`${node.fullName()} has unknown container ${container.fullName()}`);
	for (const li of container.nodes) {
		if (li.fullName() !== 'rdf:li') throw new MalformedArrayError(`${container.fullName()} contains ${li.fullName()}, expected rdf:li`);
	}
	return { type, items: container.nodes };
}

// ---------------------------------------------------------------------------
// Scalar lists
// ---------------------------------------------------------------------------

/** Shared behaviour of the string and integer collections. */
abstract class ScalarList<T extends string | number> implements XmpMarshaler, XmpUnmarshaler, ZeroChecker {
	items: T[];

	constructor(items: readonly T[] = []) {
		this.items = [...items];
	}

	abstract arrayType(): ArrayType;

	/** Parses one wire value into an item. */
	abstract parseItem(text: string): T;

	/** Filler used when a path grows the list. */
	abstract zeroItem(): T;

	get length(): number {
		return this.items.length;
	}

	isZero(): boolean {
		return this.items.length === 0;
	}

	contains(v: T): boolean {
		return this.items.includes(v);
	}

	add(...values: T[]): void {
		this.items.push(...values);
	}

	/** Adds each value that is not already present. */
	addUnique(...values: T[]): void {
		for (const v of values) if (!this.contains(v)) this.items.push(v);
	}

	remove(v: T): void {
		this.items = this.items.filter((x) => x !== v);
	}

	marshalXmp(e: Encoder, node: Node): void {
		marshalArray(e, node, this.arrayType(), this.items);
	}

	unmarshalXmp(_d: Decoder, node: Node): void {
		const arr = arrayItems(node);
		this.items = arr === undefined ? [] : arr.items.map((li) => this.parseItem(li.value));
	}

	toString(): string {
		return this.items.join(', ');
	}
}

function parseInteger(text: string): number {
	const t = text.trim();
	if (!/^[+-]?\d+$/.test(t)) throw new UnmarshalError(`invalid integer '${text}'`);
	return Number.parseInt(t, 10);
}

/** Unordered strings (`rdf:Bag`). */
export class StringArray extends ScalarList<string> {
	arrayType(): ArrayType {
		return 'Bag';
	}

	parseItem(text: string): string {
		return text;
	}

	zeroItem(): string {
		return '';
	}
}

/** Ordered strings (`rdf:Seq`). */
export class StringList extends ScalarList<string> {
	arrayType(): ArrayType {
		return 'Seq';
	}

	parseItem(text: string): string {
		return text;
	}

	zeroItem(): string {
		return '';
	}
}

export class IntArray extends ScalarList<number> {
	arrayType(): ArrayType {
		return 'Bag';
	}

	parseItem(text: string): number {
		return parseInteger(text);
	}

	zeroItem(): number {
		return 0;
	}
}

export class IntList extends ScalarList<number> {
	arrayType(): ArrayType {
		return 'Seq';
	}

	parseItem(text: string): number {
		return parseInteger(text);
	}

	zeroItem(): number {
		return 0;
	}
}

export type ScalarListType = StringArray | StringList | IntArray | IntList;

export function isScalarList(v: unknown): v is ScalarListType {
	return v instanceof StringArray || v instanceof StringList || v instanceof IntArray || v instanceof IntList;
}

// ---------------------------------------------------------------------------
// Alternative strings
// ---------------------------------------------------------------------------

export interface AltItem {
	value: string;
	/** Language tag; empty for the `x-default` entry. */
	lang: string;
	isDefault: boolean;
}

function normLang(lang: string): string {
	return lang === X_DEFAULT ? '' : lang;
}

/**
 * Language alternatives. The default entry, when present, is always the
 * first item and the only one flagged `isDefault`.
 */
export class AltString implements XmpMarshaler, XmpUnmarshaler, ZeroChecker {
	items: AltItem[] = [];

	constructor(items: readonly AltItem[] = []) {
		this.items = items.map((i) => ({ ...i }));
		this.ensureDefault();
	}

	/** The first non-empty value as the only, untagged default. */
	static of(...values: string[]): AltString {
		const alt = new AltString();
		const v = values.find((x) => x !== '');
		if (v !== undefined) alt.addDefault('', v);
		return alt;
	}

	arrayType(): ArrayType {
		return 'Alt';
	}

	get length(): number {
		return this.items.length;
	}

	isZero(): boolean {
		return this.items.length === 0;
	}

	/**
	 * Keeps the first default flag, clears the others and moves the default
	 * entry to the front. Without any default, the first item becomes it.
	 */
	ensureDefault(): void {
		let idx = -1;
		this.items.forEach((item, i) => {
			if (!item.isDefault) return;
			if (idx === -1) idx = i;
			else item.isDefault = false;
		});
		const first = this.items[0];
		if (idx === -1) {
			if (first !== undefined) first.isDefault = true;
			return;
		}
		const def = this.items[idx];
		if (idx > 0 && first !== undefined && def !== undefined) {
			this.items[0] = def;
			this.items[idx] = first;
		}
	}

	default(): string {
		const first = this.items[0];
		return first !== undefined && first.isDefault ? first.value : '';
	}

	index(lang: string): number {
		const l = normLang(lang);
		if (l === '') return this.items[0]?.isDefault === true ? 0 : -1;
		return this.items.findIndex((i) => i.lang === l);
	}

	/** The value for `lang`; an empty tag or `x-default` reads the default. */
	get(lang = ''): string {
		const i = this.index(lang);
		return i === -1 ? '' : (this.items[i]?.value ?? '');
	}

	/** Makes `value` the default. It replaces an untagged default and any item with the same language. */
	addDefault(lang: string, value: string): void {
		const l = normLang(lang);
		this.items = this.items.filter((i) => i.lang !== '' && i.lang !== l);
		for (const i of this.items) i.isDefault = false;
		this.items.unshift({ value, lang: l, isDefault: true });
	}

	add(lang: string, value: string): void {
		const l = normLang(lang);
		if (l === '') {
			this.addDefault('', value);
			return;
		}
		this.items.push({ value, lang: l, isDefault: false });
		this.ensureDefault();
	}

	/** Adds unless an item with the same language and value exists. */
	addUnique(lang: string, value: string): void {
		const l = normLang(lang);
		if (this.items.some((i) => i.value === value && (i.lang === l || (l === '' && i.isDefault)))) return;
		this.add(l, value);
	}

	set(lang: string, value: string): void {
		const i = this.index(lang);
		const item = this.items[i];
		if (item !== undefined) item.value = value;
		else this.add(lang, value);
	}

	removeLang(lang: string): void {
		const i = this.index(lang);
		if (i === -1) return;
		this.items.splice(i, 1);
		this.ensureDefault();
	}

	toString(): string {
		return this.default();
	}

	/**
	 * The default item is written first as `x-default`; when it also has a
	 * language, a second item repeats its value under that language.
	 */
	marshalXmp(e: Encoder, node: Node): void {
		if (this.items.length === 0) return;
		const pool = e.ctx.pool;
		const container = node.addNode(pool.acquire('rdf:Alt'));
		const li = (lang: string, value: string): void => {
			const n = container.appendNode(pool.acquire('rdf:li'));
			n.addAttr({ name: xmlName('xml:lang'), value: lang });
			n.value = value;
		};
		for (const item of this.items) {
			if (item.isDefault || this.items.length === 1) {
				li(X_DEFAULT, item.value);
				if (item.lang === '') continue;
				li(item.lang, item.value);
			} else if (item.lang === '') {
				throw new MarshalError('language required for alternative array item');
			} else {
				li(item.lang, item.value);
			}
		}
	}

	/**
	 * Folds the wire duplication back: a default item adopts the language of
	 * the first other item with the same value, which is then dropped.
	 */
	unmarshalXmp(_d: Decoder, node: Node): void {
		const arr = arrayItems(node);
		const items: AltItem[] = (arr?.items ?? []).map((li) => {
			const lang = li.getAttr('xml:lang')?.value ?? '';
			const isDefault = lang === X_DEFAULT;
			return { value: li.value, lang: isDefault ? '' : lang, isDefault };
		});
		const def = items.find((i) => i.isDefault && i.lang === '');
		if (def !== undefined) {
			const dup = items.findIndex((i) => i !== def && !i.isDefault && i.lang !== '' && i.value === def.value);
			const match = items[dup];
			if (match !== undefined) {
				def.lang = match.lang;
				items.splice(dup, 1);
			}
		}
		this.items = items;
		this.ensureDefault();
	}
}
