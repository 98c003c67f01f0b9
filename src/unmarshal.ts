/**
 * xmpkit — Decoder
 *
 * Reads XMP text into a document. Content that matches a registered model
 * field is decoded into the model; everything else is kept as raw nodes and
 * attributes on the namespace's top-level node, so nothing is lost on
 * re-encoding.
 */

import { defaultContext } from './context.ts';
import type { XmpContext } from './context.ts';
import { UnknownNamespaceError, UnmarshalError } from './errors.ts';
import { Namespace, prefixOf } from './namespace.ts';
import { findNode, formatName, xmlName } from './node.ts';
import type { Node, Attr } from './node.ts';
import {
	FieldFlags,
	findField,
	getFieldValue,
	hasFlag,
	isConstructorType,
	isListType,
	isMapType,
	isScalarType,
	isTextUnmarshaler,
	isXmpAttrUnmarshaler,
	isXmpUnmarshaler,
	setFieldValue,
} from './typeinfo.ts';
import type { FieldInfo, FieldType, MapType, ScalarKind, TypeInfo } from './typeinfo.ts';
import { arrayItems } from './array.ts';
import { Version } from './version.ts';
import { readXml } from './xml/reader.ts';
import type { Document } from './document.ts';

export interface DecoderOptions {
	/** Match fields against this schema version. */
	readonly version?: Version;
}

/** Attributes that describe RDF structure rather than carry values. */
const STRUCTURAL_ATTRS = new Set(['rdf:parseType', 'rdf:type', 'rdf:about', 'xml:lang']);

// ---------------------------------------------------------------------------
// Scalars
// ---------------------------------------------------------------------------

const utf8 = new TextEncoder();

/** Parses wire text as `kind`. Empty text yields the zero value. */
export function parseScalar(text: string, kind: ScalarKind, name = 'value'): string | number | boolean | Uint8Array {
	const t = text.trim();
	switch (kind) {
		case 'string':
			return t;
		case 'bytes':
			return utf8.encode(t);
		case 'int':
			if (t === '') return 0;
			if (!/^[+-]?\d+$/.test(t)) throw new UnmarshalError(`invalid integer '${text}' for ${name}`);
			return Number.parseInt(t, 10);
		case 'float': {
			if (t === '') return 0;
			const n = Number(t);
			if (Number.isNaN(n)) throw new UnmarshalError(`invalid number '${text}' for ${name}`);
			return n;
		}
		case 'bool':
			switch (t) {
				case '':
				case '0':
				case 'f':
				case 'F':
				case 'false':
				case 'False':
				case 'FALSE':
					return false;
				case '1':
				case 't':
				case 'T':
				case 'true':
				case 'True':
				case 'TRUE':
					return true;
				default:
					throw new UnmarshalError(`invalid boolean '${text}' for ${name}`);
			}
	}
}

function isDeclaration(attr: Attr): boolean {
	return attr.name.space === 'xmlns' || (attr.name.space === '' && attr.name.local === 'xmlns');
}

// ---------------------------------------------------------------------------
// Decoder
// ---------------------------------------------------------------------------

export class Decoder {
	readonly ctx: XmpContext;
	readonly version: Version;
	private doc: Document | undefined;

	constructor(options: DecoderOptions = {}, ctx: XmpContext = defaultContext()) {
		this.ctx = ctx;
		this.version = options.version ?? Version.ZERO;
	}

	/**
	 * Decodes `xml` into `doc`. The root is `rdf:RDF`, optionally wrapped in
	 * a single `x:xmpmeta`; every child of `rdf:RDF` must be an
	 * `rdf:Description`. Models are synced from XMP afterwards.
	 */
	decode(xml: string, doc: Document): void {
		const root = readXml(xml, this.ctx.pool);
		this.doc = doc;
		try {
			this.collectNamespaces(doc, root);
			this.translate(root);
			let rdf = root;
			if (root.fullName() === 'x:xmpmeta') {
				doc.toolkit = root.getAttr('x:xmptk')?.value ?? '';
				const [only] = root.nodes;
				if (root.nodes.length !== 1 || only === undefined) throw new UnmarshalError('x:xmpmeta must contain exactly one element');
				rdf = only;
			}
			if (rdf.fullName() !== 'rdf:RDF') throw new UnmarshalError(`expected rdf:RDF, found ${rdf.fullName()}`);
			for (const desc of rdf.nodes) {
				if (desc.fullName() !== 'rdf:Description') throw new UnmarshalError(`expected rdf:Description, found ${desc.fullName()}`);
				for (const attr of desc.attrs) {
					if (isDeclaration(attr)) continue;
					const name = formatName(attr.name);
					if (name === 'rdf:about') {
						if (attr.value !== '') doc.about = attr.value;
						continue;
					}
					if (prefixOf(name) === 'rdf') continue;
					this.decodeAttribute(doc.nodes, attr);
				}
				for (const child of desc.nodes) this.decodeNode(doc.nodes, child);
			}
		} finally {
			this.ctx.pool.release(root);
			this.doc = undefined;
		}
		doc.syncFromXmp();
	}

	/** Decodes `src` into an existing record or capability value. */
	decodeElement(target: object, src: Node): void {
		this.unmarshalValue(target, undefined, src);
	}

	// -------------------------------------------------------------------------
	// Namespaces
	// -------------------------------------------------------------------------

	/**
	 * Registers every namespace declared in the tree with the document.
	 * Known URIs resolve to the registry's namespace under its standard
	 * prefix; unknown ones become external namespaces under the prefix the
	 * document used.
	 */
	private collectNamespaces(doc: Document, node: Node): void {
		for (const attr of node.attrs) {
			if (attr.name.space !== 'xmlns' || attr.value === '') continue;
			const known = this.ctx.registry.getNamespaceByUri(attr.value);
			if (known !== undefined) doc.addNamespace(known, false);
			else if (doc.findNsByUri(attr.value) === undefined) doc.addNamespace(new Namespace(attr.name.local, attr.value), true);
		}
		for (const child of node.nodes) this.collectNamespaces(doc, child);
	}

	/** Rewrites URI-qualified names to `prefix:local` wherever the URI is known. */
	private translate(node: Node): void {
		node.name = this.translateName(node.name);
		for (const attr of node.attrs) {
			if (!isDeclaration(attr)) attr.name = this.translateName(attr.name);
		}
		for (const child of node.nodes) this.translate(child);
	}

	private translateName(name: { space: string; local: string }): { space: string; local: string } {
		if (name.space === '') return name;
		const ns = this.doc?.findNsByUri(name.space) ?? this.ctx.registry.getNamespaceByUri(name.space);
		return ns === undefined ? name : xmlName(ns.expand(name.local));
	}

	// -------------------------------------------------------------------------
	// Top-level content
	// -------------------------------------------------------------------------

	/**
	 * Finds or creates the top-level node for the namespace of `name` in
	 * `list`, binding a fresh model when the namespace has a factory.
	 */
	lookupNode(list: Node[], name: string): Node {
		const prefix = prefixOf(name);
		const ns = this.doc?.findNs(prefix) ?? this.ctx.registry.getNamespace(prefix);
		if (ns === undefined || !name.includes(':')) throw new UnknownNamespaceError(name);
		const existing = findNode(list, ns);
		if (existing !== undefined) return existing;
		const node = this.ctx.pool.acquire(ns.name);
		node.model = ns.newModel();
		if (node.model !== undefined) this.doc?.addNamespace(ns, false);
		list.push(node);
		return node;
	}

	/** Decodes one property element into the model owning its namespace. */
	decodeNode(list: Node[], src: Node): void {
		if (src.name.space !== '') throw new UnknownNamespaceError(src.fullName());
		const name = src.fullName();
		const node = this.lookupNode(list, name);
		if (node.model !== undefined) {
			const info = this.ctx.types.getTypeInfo(node.model.constructor);
			const f = findField(info, name, this.version);
			if (f !== undefined) {
				this.unmarshalField(node.model, f, src);
				if (!hasFlag(f, FieldFlags.Omit)) return;
			}
		}
		if (src.isZero()) return;
		node.appendNode(this.ctx.pool.copy(src));
		this.ctx.log.debug(`storing unmodeled node ${name}`);
	}

	/** Decodes one property attribute into the model owning its namespace. */
	decodeAttribute(list: Node[], attr: Attr): void {
		if (attr.name.space !== '') throw new UnknownNamespaceError(formatName(attr.name));
		const name = attr.name.local;
		const node = this.lookupNode(list, name);
		if (node.model !== undefined) {
			const info = this.ctx.types.getTypeInfo(node.model.constructor);
			const f = findField(info, name, this.version);
			if (f !== undefined) {
				this.unmarshalAttr(node.model, f, attr);
				if (!hasFlag(f, FieldFlags.Omit)) return;
			}
		}
		if (attr.value === '') return;
		node.addAttr(attr);
		this.ctx.log.debug(`storing unmodeled attribute ${name}`);
	}

	// -------------------------------------------------------------------------
	// Typed values
	// -------------------------------------------------------------------------

	private unmarshalField(record: object, f: FieldInfo, src: Node): void {
		const name = src.fullName();
		if (isMapType(f.type) && hasFlag(f, FieldFlags.Flat) && name !== f.name) {
			const current = getFieldValue(record, f);
			const map = current instanceof Map ? current : new Map<string, unknown>();
			const key = prefixOf(name) === prefixOf(f.name) ? src.localName() : name;
			map.set(key, this.unmarshalValue(map.get(key), f.type.of, src));
			setFieldValue(record, f, map);
			return;
		}
		setFieldValue(record, f, this.unmarshalValue(getFieldValue(record, f), f.type, src));
	}

	/** Returns the decoded value; objects are updated in place and returned. */
	private unmarshalValue(current: unknown, type: FieldType | undefined, src: Node): unknown {
		let target = current;
		if (type !== undefined && isConstructorType(type) && (typeof target !== 'object' || target === null)) target = new type();

		if (isXmpUnmarshaler(target)) {
			target.unmarshalXmp(this, src);
			return target;
		}
		if (isTextUnmarshaler(target)) {
			target.unmarshalText(src.value);
			return target;
		}
		if (type !== undefined && isListType(type)) {
			const arr = arrayItems(src);
			const items = arr?.items ?? [];
			if (type.fixed !== undefined && items.length > type.fixed) {
				throw new UnmarshalError(`too many elements for ${src.fullName()}: ${items.length} > ${type.fixed}`);
			}
			return items.map((li) => this.unmarshalValue(undefined, type.of, li));
		}
		if (type !== undefined && isMapType(type)) return this.unmarshalMap(current, type, src);
		if (type !== undefined && isScalarType(type)) return parseScalar(src.value, type, src.fullName());
		if (typeof target === 'object' && target !== null) {
			const info = this.ctx.types.typeInfoOf(target);
			if (info !== undefined) {
				this.unmarshalRecord(target, info, src);
				return target;
			}
		}
		throw new UnmarshalError(`no method for unmarshalling ${src.fullName()}`);
	}

	private unmarshalMap(current: unknown, type: MapType, src: Node): Map<string, unknown> {
		const map = current instanceof Map ? current : new Map<string, unknown>();
		const out = new Map<string, unknown>();
		for (const [k, v] of map) if (typeof k === 'string') out.set(k, v);
		for (const child of src.nodes) {
			const key = child.prefix() === src.prefix() ? child.localName() : child.fullName();
			out.set(key, this.unmarshalValue(out.get(key), type.of, child));
		}
		return out;
	}

	/**
	 * Attributes first, then children. A nested `rdf:Description` is the
	 * long form of a resource and decodes into the same record.
	 */
	private unmarshalRecord(record: object, info: TypeInfo, src: Node): void {
		for (const attr of src.attrs) {
			if (isDeclaration(attr)) continue;
			const name = formatName(attr.name);
			const f = findField(info, name, this.version);
			if (f === undefined) {
				if (STRUCTURAL_ATTRS.has(name) || prefixOf(name) === 'rdf') continue;
				throw new UnmarshalError(`no field for attribute ${name} in ${info.ctor.name}`);
			}
			this.unmarshalAttr(record, f, attr);
		}
		for (const child of src.nodes) {
			const name = child.fullName();
			if (name === 'rdf:Description') {
				this.unmarshalRecord(record, info, child);
				continue;
			}
			const f = findField(info, name, this.version);
			if (f === undefined) throw new UnmarshalError(`no field for ${name} in ${info.ctor.name}`);
			this.unmarshalField(record, f, child);
		}
	}

	private unmarshalAttr(record: object, f: FieldInfo, attr: Attr): void {
		let target = getFieldValue(record, f);
		if (isConstructorType(f.type) && (typeof target !== 'object' || target === null)) target = new f.type();

		if (hasFlag(f, FieldFlags.UnmarshalAttr) && isXmpAttrUnmarshaler(target)) {
			target.unmarshalXmpAttr(this, attr);
		} else if (hasFlag(f, FieldFlags.TextUnmarshal) && isTextUnmarshaler(target)) {
			target.unmarshalText(attr.value);
		} else if (isListType(f.type) && isScalarType(f.type.of)) {
			const list: unknown[] = Array.isArray(target) ? target : [];
			list.push(parseScalar(attr.value, f.type.of, f.name));
			target = list;
		} else if (isScalarType(f.type)) {
			target = parseScalar(attr.value, f.type, f.name);
		} else {
			throw new UnmarshalError(`no method for unmarshalling attribute ${f.name}`);
		}
		setFieldValue(record, f, target);
	}
}

/** Decodes `xml` into `doc`. */
export function unmarshal(xml: string, doc: Document, options: DecoderOptions = {}, ctx?: XmpContext): void {
	new Decoder(options, ctx ?? doc.ctx).decode(xml, doc);
}
