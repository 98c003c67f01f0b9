/**
 * xmpkit — Namespace filters
 *
 * A filter is written as a comma-separated list of namespace prefixes or
 * group names. A leading `-` excludes, a leading `+` (or a space, as left
 * behind by URL decoding) or nothing includes:
 *
 *     dc,+image,-xmpMM
 */

import { defaultContext } from './context.ts';
import type { XmpContext } from './context.ts';
import { UnknownNamespaceError } from './errors.ts';
import { Namespace, parseNamespaceGroup } from './namespace.ts';
import type { Document } from './document.ts';

type Resolver = (name: string) => readonly Namespace[];

function resolver(ctx: XmpContext, strict: boolean): Resolver {
	return (name) => {
		const group = parseNamespaceGroup(name);
		if (group !== undefined) return ctx.registry.groupNamespaces(group);
		const ns = ctx.registry.getNamespace(name);
		if (ns !== undefined) return [ns];
		if (strict) throw new UnknownNamespaceError(name);
		return [new Namespace(name, '')];
	};
}

export class Filter {
	readonly include: Namespace[];
	readonly exclude: Namespace[];

	constructor(include: Namespace[] = [], exclude: Namespace[] = []) {
		this.include = include;
		this.exclude = exclude;
	}

	/** Parses a filter. Names that resolve to nothing are kept as bare prefixes. */
	static parse(text: string, ctx: XmpContext = defaultContext()): Filter {
		return Filter.build(text, resolver(ctx, false));
	}

	/**
	 * Like `parse`, but every name must be a group or a registered namespace.
	 *
	 * @throws {UnknownNamespaceError}
	 */
	static parseStrict(text: string, ctx: XmpContext = defaultContext()): Filter {
		return Filter.build(text, resolver(ctx, true));
	}

	private static build(text: string, resolve: Resolver): Filter {
		const f = new Filter();
		for (const token of text.split(',')) {
			if (token === '') continue;
			const sign = token[0];
			if (sign === '-') f.exclude.push(...resolve(token.slice(1)));
			else if (sign === '+' || sign === ' ') f.include.push(...resolve(token.slice(1)));
			else f.include.push(...resolve(token));
		}
		return f;
	}

	/**
	 * Keeps only included namespaces (when any are listed), then removes the
	 * excluded ones. Returns whether anything was removed.
	 */
	apply(doc: Document): boolean {
		let removed = false;
		if (this.include.length > 0) removed = doc.filterNamespaces(this.include) || removed;
		if (this.exclude.length > 0) removed = doc.removeNamespaces(this.exclude) || removed;
		return removed;
	}

	toString(): string {
		return [...this.include.map((ns) => `+${ns.name}`), ...this.exclude.map((ns) => `-${ns.name}`)].join(',');
	}
}
