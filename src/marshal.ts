/**
 * xmpkit — Encoder
 *
 * Walks the typed models of a document and produces the RDF node tree, one
 * `rdf:Description` per namespace, then writes it as an XMP packet.
 *
 * Per value the encoder tries, in order: the value's own `marshalXmp`,
 * `marshalText`, generic array handling, scalar formatting and finally the
 * registered record schema.
 */

import { defaultContext } from './context.ts';
import type { XmpContext } from './context.ts';
import { MarshalError, UnknownNamespaceError } from './errors.ts';
import { NS_RDF, NS_XML, NS_X, prefixOf } from './namespace.ts';
import type { Namespace } from './namespace.ts';
import { findNode, xmlName } from './node.ts';
import type { Node, Attr } from './node.ts';
import { FieldFlags, getFieldValue, hasFlag, inVersion, isEmptyValue, isListType, isMapType, isTextMarshaler, isXmpAttrMarshaler, isXmpMarshaler } from './typeinfo.ts';
import type { ArrayType, FieldInfo, TypeInfo } from './typeinfo.ts';
import { marshalArray } from './array.ts';
import { Version } from './version.ts';
import { BoundedOutput, escapeAttr, serializeAttr, serializeNode } from './xml/writer.ts';
import type { Document } from './document.ts';

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

export const PACKET_ID = 'W5M0MpCehiHzreSzNTczkc9d';
export const PACKET_HEADER = `<?xpacket begin="" id="${PACKET_ID}"?>\n`;
export const PACKET_FOOTER = '\n<?xpacket end="w"?>';

export const RESOURCE_ATTR: Attr = { name: xmlName('rdf:parseType'), value: 'Resource' };

export interface EncoderOptions {
	/** Byte limit for the whole output; 0 is unlimited. */
	readonly maxSize?: number;
	/** Wrap the output in xpacket processing instructions. */
	readonly packet?: boolean;
	/** Pad a packet with whitespace up to `maxSize`. */
	readonly padding?: boolean;
	/** Pretty-print with this indentation unit. */
	readonly indent?: string;
	/** Emit only fields whose version window contains this version. */
	readonly version?: Version;
}

// ---------------------------------------------------------------------------
// Scalars
// ---------------------------------------------------------------------------

const utf8 = new TextDecoder();

/** Formats a scalar, or returns `undefined` when `value` is not one. */
export function formatScalar(value: unknown): string | undefined {
	switch (typeof value) {
		case 'string':
			return value;
		case 'number':
			return Number.isFinite(value) ? String(value) : undefined;
		case 'bigint':
			return value.toString();
		case 'boolean':
			return value ? 'true' : 'false';
	}
	if (value instanceof Uint8Array) return utf8.decode(value);
	return undefined;
}

// ---------------------------------------------------------------------------
// Encoder
// ---------------------------------------------------------------------------

export class Encoder {
	readonly ctx: XmpContext;
	readonly version: Version;
	private readonly options: EncoderOptions;
	private doc: Document | undefined;

	constructor(options: EncoderOptions = {}, ctx: XmpContext = defaultContext()) {
		this.options = options;
		this.ctx = ctx;
		this.version = options.version ?? Version.ZERO;
	}

	/** Serializes `doc`. Models are synced to XMP first. */
	encode(doc: Document): string {
		doc.syncToXmp();
		this.doc = doc;
		const root = this.ctx.pool.acquire('rdf:RDF');
		try {
			this.build(doc, root);
			return this.write(doc, root);
		} finally {
			this.ctx.pool.release(root);
			this.doc = undefined;
		}
	}

	/** Marshals `value` into `node` without a field context; for custom marshalers. */
	encodeElement(value: unknown, node: Node): void {
		this.marshalValue(value, undefined, node, false);
	}

	// -------------------------------------------------------------------------
	// Tree building
	// -------------------------------------------------------------------------

	private build(doc: Document, root: Node): void {
		for (const n of doc.nodes) {
			if (n.model !== undefined) this.marshalValue(n.model, undefined, root, true);
			if (n.nodes.length === 0 && n.attrs.length === 0) continue;
			const ns = doc.findNs(n.prefix());
			if (ns === undefined) throw new UnknownNamespaceError(n.fullName());
			const wrapper = this.wrapperFor(root, ns);
			for (const child of n.nodes) wrapper.appendNode(this.ctx.pool.copy(child));
			for (const attr of n.attrs) wrapper.addAttr(attr);
		}

		let first = true;
		for (const wrapper of [...root.nodes]) {
			if (wrapper.nodes.length === 0 && wrapper.attrs.length === 0) {
				this.ctx.pool.release(wrapper);
				continue;
			}
			const decls = this.namespacesOf(doc, wrapper).map((ns) => ns.declaration());
			if (first) decls.push({ name: xmlName('rdf:about'), value: doc.about });
			first = false;
			wrapper.attrs = [...decls, ...wrapper.attrs];
			wrapper.name = xmlName('rdf:Description');
		}
		root.attrs = [NS_RDF.declaration()];
	}

	private wrapperFor(root: Node, ns: Namespace): Node {
		return findNode(root.nodes, ns) ?? root.addNode(this.ctx.pool.acquire(ns.name));
	}

	private wrapperForName(root: Node, name: string): Node {
		const prefix = prefixOf(name);
		const ns = this.doc?.findNs(prefix) ?? this.ctx.registry.getNamespace(prefix);
		if (ns === undefined) throw new UnknownNamespaceError(name);
		return this.wrapperFor(root, ns);
	}

	/** Namespaces used anywhere below `node`, in first-use order. */
	private namespacesOf(doc: Document, node: Node): Namespace[] {
		const prefixes = new Set<string>();
		const walk = (n: Node): void => {
			prefixes.add(n.prefix());
			for (const a of n.attrs) if (a.name.space !== 'xmlns' && a.name.local !== 'xmlns') prefixes.add(prefixOf(a.name.local));
			for (const c of n.nodes) walk(c);
		};
		walk(node);
		const out: Namespace[] = [];
		for (const p of prefixes) {
			const ns = doc.findNs(p);
			if (ns === undefined || ns.uri === NS_RDF.uri || ns.uri === NS_XML.uri) continue;
			if (!out.some((v) => v.uri === ns.uri)) out.push(ns);
		}
		return out;
	}

	// -------------------------------------------------------------------------
	// Values
	// -------------------------------------------------------------------------

	marshalValue(value: unknown, finfo: FieldInfo | undefined, node: Node, withWrapper: boolean): void {
		if (finfo !== undefined && !hasFlag(finfo, FieldFlags.Empty) && isEmptyValue(value, this.ctx.types)) return;
		if (value === undefined || value === null) return;

		if (isXmpMarshaler(value)) {
			value.marshalXmp(this, node);
			return;
		}
		if (isTextMarshaler(value)) {
			node.value = value.marshalText();
			return;
		}
		if (Array.isArray(value)) {
			const type = finfo !== undefined && isListType(finfo.type) ? finfo.type : undefined;
			const arrayType: ArrayType = type?.array ?? 'Seq';
			marshalArray(this, node, arrayType, value);
			return;
		}
		if (value instanceof Map) {
			this.marshalMap(value, finfo, node, withWrapper);
			return;
		}
		const scalar = formatScalar(value);
		if (scalar !== undefined) {
			node.value = scalar;
			return;
		}
		if (typeof value === 'object') {
			const info = this.ctx.types.typeInfoOf(value);
			if (info !== undefined) {
				this.marshalRecord(value, info, node, withWrapper);
				return;
			}
		}
		throw new MarshalError(`no method for marshalling ${describe(value)}`);
	}

	private marshalRecord(value: object, info: TypeInfo, node: Node, withWrapper: boolean): void {
		const active = info.fields.filter((f) => !hasFlag(f, FieldFlags.Omit) && inVersion(f, this.version));

		for (const f of active) {
			if (!hasFlag(f, FieldFlags.Attr)) continue;
			const fv = getFieldValue(value, f);
			if (!hasFlag(f, FieldFlags.Empty) && isEmptyValue(fv, this.ctx.types)) continue;
			const attr = this.marshalAttr(fv, f);
			if (attr === undefined) continue;
			const dest = withWrapper ? this.wrapperForName(node, f.name) : node;
			dest.addAttr(attr);
		}

		let haveField = false;
		for (const f of active) {
			if (hasFlag(f, FieldFlags.Attr)) continue;
			const fv = getFieldValue(value, f);
			if (!hasFlag(f, FieldFlags.Empty) && isEmptyValue(fv, this.ctx.types)) continue;
			if (hasFlag(f, FieldFlags.Flat)) {
				if (fv instanceof Map) this.marshalMap(fv, f, node, withWrapper);
				haveField = true;
				continue;
			}
			const dest = withWrapper ? this.wrapperForName(node, f.name) : node;
			const child = this.ctx.pool.acquire(f.name);
			try {
				this.marshalValue(fv, f, child, false);
			} catch (err) {
				this.ctx.pool.release(child);
				throw err;
			}
			dest.addNode(child);
			haveField = true;
		}

		if (haveField && !withWrapper && node.fullName() !== 'rdf:Description') node.addAttr(RESOURCE_ATTR);
	}

	/**
	 * Map entries become children named after their key; keys without a
	 * prefix take the prefix of the field. Flat maps write their entries
	 * straight into the parent.
	 */
	private marshalMap(map: Map<unknown, unknown>, finfo: FieldInfo | undefined, node: Node, withWrapper: boolean): void {
		const flat = finfo !== undefined && hasFlag(finfo, FieldFlags.Flat);
		const prefix = finfo !== undefined ? prefixOf(finfo.name) : node.prefix();
		for (const [key, v] of map) {
			if (typeof key !== 'string') throw new MarshalError('only string-keyed maps are supported');
			const name = key.includes(':') ? key : `${prefix}:${key}`;
			const dest = flat && withWrapper ? this.wrapperForName(node, name) : node;
			const child = this.ctx.pool.acquire(name);
			this.marshalValue(v, undefined, child, false);
			dest.addNode(child);
		}
		if (!flat && map.size > 0 && node.fullName() !== 'rdf:Description') node.addAttr(RESOURCE_ATTR);
	}

	private marshalAttr(value: unknown, f: FieldInfo): Attr | undefined {
		const name = xmlName(f.name);
		if (isXmpAttrMarshaler(value)) return value.marshalXmpAttr(this, name);
		if (isTextMarshaler(value)) return { name, value: value.marshalText() };
		const scalar = formatScalar(value);
		if (scalar !== undefined) return { name, value: scalar };
		if (isMapType(f.type) || isListType(f.type)) throw new MarshalError(`attribute ${f.name} cannot hold a collection`);
		throw new MarshalError(`no method for marshalling attribute ${f.name}`);
	}

	// -------------------------------------------------------------------------
	// Output
	// -------------------------------------------------------------------------

	private write(doc: Document, root: Node): string {
		const { maxSize = 0, packet = true, padding = false, indent = '' } = this.options;
		const out = new BoundedOutput(maxSize);
		if (packet) out.write(PACKET_HEADER);
		const toolkit = doc.toolkit || this.ctx.options.toolkit;
		out.write(`<x:xmpmeta ${serializeAttr(NS_X.declaration())} x:xmptk="${escapeAttr(toolkit)}">`);
		if (indent.length > 0) out.write(`\n${indent}`);
		out.write(serializeNode(root, { indent }, indent.length > 0 ? 1 : 0));
		if (indent.length > 0) out.write('\n');
		out.write('</x:xmpmeta>');
		if (packet) {
			if (padding && maxSize > 0) {
				const pad = maxSize - out.written - PACKET_FOOTER.length;
				const chars: string[] = [];
				for (let i = 0; i < pad; i++) chars.push(i % 80 === 0 ? '\n' : ' ');
				out.write(chars.join(''));
			}
			out.write(PACKET_FOOTER);
		}
		return out.toString();
	}
}

function describe(value: unknown): string {
	if (typeof value === 'object' && value !== null) return `type ${value.constructor.name}`;
	return typeof value;
}

/** Encodes `doc` as an XMP packet. */
export function marshal(doc: Document, options: EncoderOptions = {}, ctx?: XmpContext): string {
	return new Encoder(options, ctx ?? doc.ctx).encode(doc);
}

/** Like `marshal`, pretty-printed. */
export function marshalIndent(doc: Document, indent = '  ', options: EncoderOptions = {}, ctx?: XmpContext): string {
	return new Encoder({ ...options, indent }, ctx ?? doc.ctx).encode(doc);
}
