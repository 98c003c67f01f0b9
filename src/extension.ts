/**
 * xmpkit — Extension containers
 *
 * Raw nested content that belongs to other schemas: an `Extension` holds a
 * list of top-level nodes (with or without bound models) exactly like a
 * document does, so nested descriptions such as `xmpMM:Pantry` entries keep
 * their own typed models.
 */

import { XmpError } from './errors.ts';
import { prefixOf } from './namespace.ts';
import type { Node, Attr } from './node.ts';
import type { ArrayType, XmpMarshaler, XmpUnmarshaler, ZeroChecker } from './typeinfo.ts';
import { RESOURCE_ATTR } from './marshal.ts';
import type { Encoder } from './marshal.ts';
import { arrayItems } from './array.ts';
import type { Decoder } from './unmarshal.ts';

function isDeclaration(attr: Attr): boolean {
	return attr.name.space === 'xmlns' || attr.name.local === 'xmlns';
}

// ---------------------------------------------------------------------------
// Extension
// ---------------------------------------------------------------------------

export class Extension implements XmpMarshaler, XmpUnmarshaler, ZeroChecker {
	/** Element name for named extensions; empty for anonymous descriptions. */
	name: string;
	/** One node per namespace, like `Document.nodes`. */
	nodes: Node[] = [];

	constructor(name = '') {
		this.name = name;
	}

	isZero(): boolean {
		return this.nodes.every((n) => n.isZero());
	}

	/** The node for `prefix`, matched by name or by bound model. */
	findNode(prefix: string): Node | undefined {
		return this.nodes.find((n) => n.name.local === prefix || (n.model?.can(prefix) ?? false));
	}

	marshalXmp(e: Encoder, node: Node): void {
		const pool = e.ctx.pool;
		for (const n of this.nodes) {
			if (n.model !== undefined) e.encodeElement(n.model, node);
			for (const child of n.nodes) node.appendNode(pool.copy(child));
			for (const attr of n.attrs) node.addAttr(attr);
		}
	}

	/**
	 * Decodes the content of a description. Properties go through the
	 * decoder so registered models are bound; content the decoder rejects is
	 * kept as a raw copy.
	 */
	unmarshalXmp(d: Decoder, src: Node): void {
		for (const attr of src.attrs) {
			if (isDeclaration(attr) || prefixOf(attr.name.local) === 'rdf') continue;
			try {
				d.decodeAttribute(this.nodes, attr);
			} catch (err) {
				if (!(err instanceof XmpError)) throw err;
				d.ctx.log.debug(`keeping ${attr.name.local} as raw extension content: ${err.message}`);
				this.rawNode(d, prefixOf(attr.name.local)).addAttr({ name: { ...attr.name }, value: attr.value });
			}
		}
		for (const child of src.nodes) {
			if (child.fullName() === 'rdf:Description') {
				this.unmarshalXmp(d, child);
				continue;
			}
			try {
				d.decodeNode(this.nodes, child);
			} catch (err) {
				if (!(err instanceof XmpError)) throw err;
				d.ctx.log.debug(`keeping ${child.fullName()} as raw extension content: ${err.message}`);
				this.rawNode(d, child.prefix()).appendNode(d.ctx.pool.copy(child));
			}
		}
	}

	private rawNode(d: Decoder, prefix: string): Node {
		const existing = this.nodes.find((n) => n.name.local === prefix && n.model === undefined);
		if (existing !== undefined) return existing;
		const node = d.ctx.pool.acquire(prefix);
		this.nodes.push(node);
		return node;
	}
}

// ---------------------------------------------------------------------------
// Arrays of extensions
// ---------------------------------------------------------------------------

/**
 * A bag of anonymous descriptions:
 *
 *     <xmpMM:Pantry><rdf:Bag><rdf:li><rdf:Description …/></rdf:li></rdf:Bag></xmpMM:Pantry>
 */
export class ExtensionArray implements XmpMarshaler, XmpUnmarshaler, ZeroChecker {
	items: Extension[] = [];

	arrayType(): ArrayType {
		return 'Bag';
	}

	get length(): number {
		return this.items.length;
	}

	isZero(): boolean {
		return this.items.length === 0;
	}

	add(ext: Extension): void {
		this.items.push(ext);
	}

	marshalXmp(e: Encoder, node: Node): void {
		if (this.items.length === 0) return;
		const pool = e.ctx.pool;
		const bag = node.addNode(pool.acquire('rdf:Bag'));
		for (const ext of this.items) {
			const li = bag.appendNode(pool.acquire('rdf:li'));
			const desc = li.appendNode(pool.acquire('rdf:Description'));
			ext.marshalXmp(e, desc);
		}
	}

	unmarshalXmp(d: Decoder, node: Node): void {
		const arr = arrayItems(node);
		this.items = (arr?.items ?? []).map((li) => {
			const ext = new Extension();
			ext.unmarshalXmp(d, li);
			return ext;
		});
	}
}

/**
 * Extensions written as resources named after each entry:
 *
 *     <iXML:extension><PRIVATE rdf:parseType="Resource">…</PRIVATE></iXML:extension>
 *
 * Each entry decodes like a description, so registered schemas inside it
 * get typed models. Paths address an entry by name:
 * `xmp:extension/PRIVATE/dc:format`.
 */
export class NamedExtensionArray implements XmpMarshaler, XmpUnmarshaler, ZeroChecker {
	items: Extension[] = [];

	get length(): number {
		return this.items.length;
	}

	isZero(): boolean {
		return this.items.length === 0;
	}

	find(name: string): Extension | undefined {
		return this.items.find((x) => x.name === name);
	}

	/** The entry called `name`, created when missing. */
	ensure(name: string): Extension {
		const existing = this.find(name);
		if (existing !== undefined) return existing;
		const ext = new Extension(name);
		this.items.push(ext);
		return ext;
	}

	/** Drops the entry called `name`. */
	remove(name: string): void {
		this.items = this.items.filter((x) => x.name !== name);
	}

	marshalXmp(e: Encoder, node: Node): void {
		for (const ext of this.items) {
			if (ext.isZero()) continue;
			const child = node.addNode(e.ctx.pool.acquire(ext.name));
			child.addAttr(RESOURCE_ATTR);
			ext.marshalXmp(e, child);
		}
	}

	unmarshalXmp(d: Decoder, node: Node): void {
		this.items = node.nodes.map((child) => {
			const ext = new Extension(child.fullName());
			ext.unmarshalXmp(d, child);
			return ext;
		});
	}
}
