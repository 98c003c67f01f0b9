/**
 * xmpkit — Namespace registry
 *
 * Append-only lookup tables from prefix and URI to namespace, plus group
 * membership used for namespace filtering.
 */

import { NS_RDF, NS_X, NS_XML } from './namespace.ts';
import type { Namespace, NamespaceGroup } from './namespace.ts';

export class Registry {
	private readonly byName = new Map<string, Namespace>();
	private readonly byUri = new Map<string, Namespace>();
	private readonly groups = new Map<NamespaceGroup, Namespace[]>();

	constructor() {
		for (const ns of [NS_X, NS_XML, NS_RDF]) this.register(ns);
	}

	/**
	 * Adds a namespace under both keys and to each of `groups`. Registering
	 * the same namespace again only adds group memberships.
	 */
	register(ns: Namespace, ...groups: NamespaceGroup[]): void {
		this.byName.set(ns.name, ns);
		this.byUri.set(ns.uri, ns);
		for (const g of groups) {
			const list = this.groups.get(g) ?? [];
			if (!list.includes(ns)) list.push(ns);
			this.groups.set(g, list);
		}
	}

	getNamespace(prefix: string): Namespace | undefined {
		return this.byName.get(prefix);
	}

	getNamespaceByUri(uri: string): Namespace | undefined {
		return this.byUri.get(uri);
	}

	getPrefix(uri: string): string | undefined {
		return this.byUri.get(uri)?.name;
	}

	/** Renders `uri`+`local` as `prefix:local` where the URI is known. */
	short(uri: string, local: string): string {
		const prefix = this.getPrefix(uri);
		return prefix === undefined ? local : `${prefix}:${local}`;
	}

	groupNamespaces(group: NamespaceGroup): readonly Namespace[] {
		return this.groups.get(group) ?? [];
	}

	groupsOf(ns: Namespace): NamespaceGroup[] {
		const out: NamespaceGroup[] = [];
		for (const [g, list] of this.groups) if (list.some((v) => v.uri === ns.uri)) out.push(g);
		return out;
	}

	namespaces(): Namespace[] {
		return [...this.byName.values()];
	}
}
