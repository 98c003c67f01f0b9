/**
 * xmpkit — Generic node tree
 *
 * The intermediate representation between typed models and the wire form.
 * After decoding, names are stored qualified (`dc:title`) with an empty
 * `space`; a non-empty `space` holds a namespace URI that could not be
 * mapped to a prefix.
 */

import { NodeLoopError } from './errors.ts';
import { prefixOf, localOf } from './namespace.ts';
import type { Model, Namespace } from './namespace.ts';

// ---------------------------------------------------------------------------
// Names and attributes
// ---------------------------------------------------------------------------

export interface XmlName {
	space: string;
	local: string;
}

export interface Attr {
	name: XmlName;
	value: string;
}

export function xmlName(local: string, space = ''): XmlName {
	return { space, local };
}

/** `prefix:local` for translated names, `space:local` otherwise. */
export function formatName(name: XmlName): string {
	return name.space.length > 0 ? `${name.space}:${name.local}` : name.local;
}

function sameName(a: XmlName, b: XmlName): boolean {
	return a.space === b.space && a.local === b.local;
}

// ---------------------------------------------------------------------------
// Node
// ---------------------------------------------------------------------------

export class Node {
	name: XmlName = xmlName('');
	attrs: Attr[] = [];
	/** Bound typed model; only top-level nodes carry one. */
	model: Model | undefined = undefined;
	value = '';
	nodes: Node[] = [];
	parent: Node | undefined = undefined;

	/** Qualified name, e.g. `dc:title`. */
	fullName(): string {
		return formatName(this.name);
	}

	/** Local part without prefix. */
	localName(): string {
		return localOf(this.name.local);
	}

	/** The namespace prefix of this node's name. */
	prefix(): string {
		return prefixOf(this.name.local);
	}

	isZero(): boolean {
		return this.model === undefined && this.value === '' && this.attrs.length === 0 && this.nodes.length === 0;
	}

	private checkLoop(child: Node): void {
		for (let n: Node | undefined = this; n !== undefined; n = n.parent) {
			if (n === child) throw new NodeLoopError(child.fullName());
		}
	}

	private adopt(child: Node): void {
		this.checkLoop(child);
		if (child.parent !== undefined && child.parent !== this) child.parent.removeNode(child);
		child.parent = this;
	}

	/** Adds `child`, replacing an existing child with the same name. */
	addNode(child: Node): Node {
		this.adopt(child);
		const i = this.nodes.findIndex((v) => v === child || sameName(v.name, child.name));
		if (i === -1) {
			this.nodes.push(child);
		} else {
			const old = this.nodes[i];
			if (old !== undefined && old !== child) old.parent = undefined;
			this.nodes[i] = child;
		}
		return child;
	}

	/** Appends `child` unconditionally. */
	appendNode(child: Node): Node {
		this.adopt(child);
		if (!this.nodes.includes(child)) this.nodes.push(child);
		return child;
	}

	removeNode(child: Node): boolean {
		const i = this.nodes.indexOf(child);
		if (i === -1) return false;
		this.nodes.splice(i, 1);
		child.parent = undefined;
		return true;
	}

	/** Adds or replaces an attribute by name (last write wins). */
	addAttr(attr: Attr): void {
		const i = this.attrs.findIndex((a) => sameName(a.name, attr.name));
		if (i === -1) this.attrs.push({ name: { ...attr.name }, value: attr.value });
		else this.attrs[i] = { name: { ...attr.name }, value: attr.value };
	}

	/** Looks up an attribute by its qualified name. */
	getAttr(name: string): Attr | undefined {
		return this.attrs.find((a) => formatName(a.name) === name);
	}

	removeAttr(name: string): boolean {
		const i = this.attrs.findIndex((a) => formatName(a.name) === name);
		if (i === -1) return false;
		this.attrs.splice(i, 1);
		return true;
	}

	/** First child with the given qualified name. */
	child(name: string): Node | undefined {
		return this.nodes.find((n) => n.fullName() === name);
	}

	/** First child that is the wrapper for `ns`, by name or bound model. */
	findNode(ns: Namespace): Node | undefined {
		return findNode(this.nodes, ns);
	}
}

/** Finds the wrapper node for `ns` in a list of top-level nodes. */
export function findNode(list: readonly Node[], ns: Namespace): Node | undefined {
	return list.find((n) => n.name.local === ns.name || (n.model?.can(ns.name) ?? false));
}

// ---------------------------------------------------------------------------
// Pool
// ---------------------------------------------------------------------------

/**
 * Bounded free list of nodes. Released trees are reset and kept for reuse
 * until the pool is full; anything beyond that is left to the collector.
 */
export class NodePool {
	readonly capacity: number;
	private readonly free: Node[] = [];
	private readonly released = new WeakSet<Node>();

	constructor(capacity: number) {
		this.capacity = capacity;
	}

	get size(): number {
		return this.free.length;
	}

	acquire(name: XmlName | string = ''): Node {
		const node = this.free.pop() ?? new Node();
		this.released.delete(node);
		node.name = typeof name === 'string' ? xmlName(name) : { ...name };
		return node;
	}

	/** Releases `node` and its whole subtree. Releasing twice is harmless. */
	release(node: Node): void {
		if (this.released.has(node)) return;
		node.parent?.removeNode(node);
		const children = node.nodes;
		node.nodes = [];
		for (const child of children) {
			child.parent = undefined;
			this.release(child);
		}
		node.name = xmlName('');
		node.attrs = [];
		node.model = undefined;
		node.value = '';
		this.released.add(node);
		if (this.free.length < this.capacity) this.free.push(node);
	}

	/** Deep copy of `node`; the copy shares no mutable state with it. */
	copy(node: Node): Node {
		const out = this.acquire(node.name);
		out.attrs = node.attrs.map((a) => ({ name: { ...a.name }, value: a.value }));
		out.model = node.model;
		out.value = node.value;
		for (const child of node.nodes) out.appendNode(this.copy(child));
		return out;
	}
}
