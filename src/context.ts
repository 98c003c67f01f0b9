/**
 * xmpkit — Engine context
 *
 * Everything that is shared between documents lives here: the namespace
 * registry, the node pool, the type cache and the logger. Documents,
 * encoders and decoders take a context and default to the process-wide one.
 */

import { resolveOptions } from './config.ts';
import type { XmpOptions } from './config.ts';
import { ConsoleLogger } from './log.ts';
import { NodePool } from './node.ts';
import { Registry } from './registry.ts';
import { TypeCache } from './typeinfo.ts';
import type { Namespace, NamespaceGroup } from './namespace.ts';

export class XmpContext {
	readonly options: XmpOptions;
	readonly registry: Registry;
	readonly pool: NodePool;
	readonly types: TypeCache;
	readonly log: ConsoleLogger;

	constructor(options: Partial<XmpOptions> = {}, env: NodeJS.ProcessEnv = process.env) {
		const rejected: string[] = [];
		this.options = resolveOptions(options, env, (value) => rejected.push(value));
		this.log = new ConsoleLogger(this.options.logLevel);
		for (const value of rejected) this.log.warn(`ignoring invalid log level '${value}'`);
		this.registry = new Registry();
		this.pool = new NodePool(this.options.poolCapacity);
		this.types = new TypeCache();
	}
}

let shared: XmpContext | undefined;

/** The process-wide context, created on first use. */
export function defaultContext(): XmpContext {
	shared ??= new XmpContext();
	return shared;
}

/**
 * Builds an isolated context. Namespaces registered on the default context
 * are copied so schema models keep resolving.
 */
export function createContext(options: Partial<XmpOptions> = {}): XmpContext {
	const ctx = new XmpContext(options);
	const base = defaultContext().registry;
	for (const ns of base.namespaces()) ctx.registry.register(ns, ...base.groupsOf(ns));
	return ctx;
}

/** Registers `ns` with the process-wide registry. */
export function register(ns: Namespace, ...groups: NamespaceGroup[]): void {
	defaultContext().registry.register(ns, ...groups);
}
