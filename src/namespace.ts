/**
 * xmpkit — Namespaces and models
 *
 * A namespace pairs a short prefix with its canonical URI and, for schemas
 * the engine knows how to type, a factory for the bound model.
 */

import type { Attr } from './node.ts';
import type { Document } from './document.ts';

// ---------------------------------------------------------------------------
// Model contract
// ---------------------------------------------------------------------------

/**
 * Implemented by every typed schema record that can be bound to a top-level
 * node. Models must also be registered with `registerType`.
 */
export interface Model {
	/** Whether this model handles the namespace with the given prefix. */
	can(prefix: string): boolean;
	/** Every namespace the model emits. The first one is its home namespace. */
	namespaces(): readonly Namespace[];
	/** Populates derived state after the document was decoded. */
	syncFromXmp(doc: Document): void;
	/** Writes derived state back before the document is encoded. */
	syncToXmp(doc: Document): void;
	/** Reconciles this model with other models in the same document. */
	syncModel(doc: Document): void;
}

export type ModelFactory = (prefix: string) => Model;

// ---------------------------------------------------------------------------
// Namespace
// ---------------------------------------------------------------------------

export class Namespace {
	readonly name: string;
	readonly uri: string;
	readonly factory: ModelFactory | undefined;

	constructor(name: string, uri: string, factory?: ModelFactory) {
		this.name = name;
		this.uri = uri;
		this.factory = factory;
	}

	/** Qualifies a local name with this namespace's prefix. */
	expand(local: string): string {
		return `${this.name}:${local}`;
	}

	/** The `xmlns:prefix="uri"` declaration for this namespace. */
	declaration(): Attr {
		return { name: { space: 'xmlns', local: this.name }, value: this.uri };
	}

	newModel(): Model | undefined {
		return this.factory?.(this.name);
	}
}

/** Removes duplicates by URI, keeping first occurrence order. */
export function uniqueNamespaces(list: Iterable<Namespace>): Namespace[] {
	const seen = new Set<string>();
	const out: Namespace[] = [];
	for (const ns of list) {
		if (seen.has(ns.uri)) continue;
		seen.add(ns.uri);
		out.push(ns);
	}
	return out;
}

export function containsNamespace(list: readonly Namespace[], ns: Namespace): boolean {
	return list.some((v) => v.uri === ns.uri || v.name === ns.name);
}

// ---------------------------------------------------------------------------
// Groups
// ---------------------------------------------------------------------------

export const NAMESPACE_GROUPS = ['xmp', 'image', 'music', 'movie', 'sound', 'camera', 'vfx', 'rights'] as const;

export type NamespaceGroup = (typeof NAMESPACE_GROUPS)[number];

export function parseNamespaceGroup(text: string): NamespaceGroup | undefined {
	const lower = text.trim().toLowerCase();
	return NAMESPACE_GROUPS.find((g) => g === lower);
}

// ---------------------------------------------------------------------------
// Core namespaces
// ---------------------------------------------------------------------------

export const NS_X = new Namespace('x', 'adobe:ns:meta/');
export const NS_XML = new Namespace('xml', 'http://www.w3.org/XML/1998/namespace');
export const NS_RDF = new Namespace('rdf', 'http://www.w3.org/1999/02/22-rdf-syntax-ns#');

/** Splits `prefix:local`; a name without a colon has an empty prefix. */
export function splitName(name: string): [prefix: string, local: string] {
	const i = name.indexOf(':');
	return i === -1 ? ['', name] : [name.slice(0, i), name.slice(i + 1)];
}

/** The prefix part of `prefix:local`, or the whole string when there is no colon. */
export function prefixOf(name: string): string {
	const i = name.indexOf(':');
	return i === -1 ? name : name.slice(0, i);
}

/** The local part of `prefix:local`. */
export function localOf(name: string): string {
	return splitName(name)[1];
}
