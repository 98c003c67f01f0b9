/**
 * xmpkit — Document
 *
 * A document owns one top-level node per namespace. Nodes of schema-backed
 * namespaces carry a bound model; everything else is raw content that
 * survives a decode/encode cycle untouched.
 *
 * Paths resolve against the model first and fall back to raw nodes when the
 * schema does not describe them.
 */

import { defaultContext } from './context.ts';
import type { XmpContext } from './context.ts';
import { InvalidPathSegmentError, PathNotFoundError, UnknownNamespaceError, UnsupportedFlagsError, XmpError, errorMessage, isParseError } from './errors.ts';
import { SyncFlags, effectiveFlags, has } from './flags.ts';
import { Namespace, containsNamespace } from './namespace.ts';
import type { Model } from './namespace.ts';
import { findNode } from './node.ts';
import type { Node } from './node.ts';
import { normalizePaths } from './path.ts';
import type { Path, PathValue } from './path.ts';
import { getModelPath, listModelPaths, setModelPath } from './modelpath.ts';
import { getNodePath, listNodePaths, setNodePath } from './nodepath.ts';
import type { ConverterFunc, SyncDesc } from './sync.ts';

const UPDATE = SyncFlags.Replace | SyncFlags.Delete | SyncFlags.Append | SyncFlags.Unique;

/** Where a path resolves: a model, the raw node holding unmodeled content, or both. */
interface PathTarget {
	readonly model: Model | undefined;
	readonly node: Node | undefined;
}

function validate(path: Path): void {
	if (!path.isXmpPath()) throw new InvalidPathSegmentError(path.toString(), 'missing namespace prefix');
	path.segments();
}

export class Document {
	readonly ctx: XmpContext;
	/** Name and version of the tool that wrote the document. */
	toolkit: string;
	/** The `rdf:about` resource identifier. */
	about = '';
	nodes: Node[] = [];
	private dirty = false;
	// uri → namespace
	private readonly known = new Map<string, Namespace>();
	private readonly external = new Map<string, Namespace>();

	constructor(ctx: XmpContext = defaultContext()) {
		this.ctx = ctx;
		this.toolkit = ctx.options.toolkit;
	}

	setDirty(): void {
		this.dirty = true;
	}

	isDirty(): boolean {
		return this.dirty;
	}

	/** Releases every node back to the pool. The document is empty afterwards. */
	close(): void {
		for (const node of this.nodes) this.ctx.pool.release(node);
		this.nodes = [];
	}

	// -------------------------------------------------------------------------
	// Namespaces
	// -------------------------------------------------------------------------

	/** Known and external namespaces used by this document. */
	namespaces(): Namespace[] {
		return [...this.known.values(), ...this.external.values()];
	}

	/** Tracks `ns` as schema-backed, or as `external` when no model describes it. */
	addNamespace(ns: Namespace, external: boolean): void {
		if (external) this.external.set(ns.uri, ns);
		else this.known.set(ns.uri, ns);
	}

	isExternal(ns: Namespace): boolean {
		return this.external.has(ns.uri);
	}

	/** Resolves a prefix through the document's own maps, then the registry. */
	findNs(prefix: string): Namespace | undefined {
		for (const ns of this.known.values()) if (ns.name === prefix) return ns;
		for (const ns of this.external.values()) if (ns.name === prefix) return ns;
		return this.ctx.registry.getNamespace(prefix);
	}

	findNsByUri(uri: string): Namespace | undefined {
		return this.known.get(uri) ?? this.external.get(uri);
	}

	/**
	 * Detaches the top-level node of `ns` and forgets the namespace.
	 * Returns whether anything was removed.
	 */
	removeNamespace(ns: Namespace): boolean {
		const i = this.nodes.findIndex((n) => n.name.local === ns.name);
		const node = this.nodes[i];
		if (node === undefined) return false;
		this.nodes.splice(i, 1);
		this.known.delete(ns.uri);
		this.external.delete(ns.uri);
		this.ctx.pool.release(node);
		this.setDirty();
		return true;
	}

	removeNamespaces(list: readonly Namespace[]): boolean {
		let removed = false;
		for (const ns of list) removed = this.removeNamespace(ns) || removed;
		return removed;
	}

	/** Removes every top-level namespace not in `keep`. */
	filterNamespaces(keep: readonly Namespace[]): boolean {
		const present: Namespace[] = [];
		for (const node of this.nodes) {
			const ns = this.findNs(node.name.local);
			if (ns !== undefined) present.push(ns);
		}
		let removed = false;
		for (const ns of present) if (!containsNamespace(keep, ns)) removed = this.removeNamespace(ns) || removed;
		return removed;
	}

	// -------------------------------------------------------------------------
	// Models
	// -------------------------------------------------------------------------

	findNode(ns: Namespace): Node | undefined {
		return findNode(this.nodes, ns);
	}

	findModel(ns: Namespace): Model | undefined {
		for (const node of this.nodes) if (node.model?.can(ns.name) === true) return node.model;
		return undefined;
	}

	/** Returns the model for `ns`, creating it through the namespace factory. */
	makeModel(ns: Namespace): Model {
		const existing = this.findModel(ns);
		if (existing !== undefined) return existing;
		const model = ns.newModel();
		if (model === undefined) throw new XmpError(`xmp: cannot create '${ns.name}' model`);
		this.addModel(model);
		return model;
	}

	/** Binds `model` to the node of its home namespace. */
	addModel(model: Model): Node {
		const [home] = model.namespaces();
		if (home === undefined) throw new XmpError(`xmp: model ${model.constructor.name} must declare at least one namespace`);
		for (const ns of model.namespaces()) this.addNamespace(ns, false);
		let node = this.findNode(home);
		if (node === undefined) {
			node = this.ctx.pool.acquire(home.name);
			this.nodes.push(node);
		}
		node.model = model;
		this.setDirty();
		return node;
	}

	/** Cross-model reconciliation. Not run implicitly. */
	syncModels(): void {
		for (const node of this.nodes) node.model?.syncModel(this);
	}

	/** Runs after every decode. */
	syncFromXmp(): void {
		for (const node of this.nodes) node.model?.syncFromXmp(this);
	}

	/** Runs before every encode and listing, only when the document changed. */
	syncToXmp(): void {
		if (!this.dirty) return;
		for (const node of this.nodes) node.model?.syncToXmp(this);
		this.dirty = false;
	}

	private createNode(ns: Namespace): Node {
		if (ns.factory !== undefined) {
			this.makeModel(ns);
			const node = this.findNode(ns);
			if (node !== undefined) return node;
		}
		const node = this.ctx.pool.acquire(ns.name);
		this.nodes.push(node);
		this.setDirty();
		return node;
	}

	// -------------------------------------------------------------------------
	// Paths
	// -------------------------------------------------------------------------

	private read(target: PathTarget, path: Path): string {
		if (target.model !== undefined) {
			try {
				return getModelPath(target.model, path, this.ctx);
			} catch (err) {
				if (!(err instanceof PathNotFoundError) || target.node === undefined) throw err;
			}
		}
		if (target.node === undefined) return '';
		try {
			return getNodePath(target.node, path);
		} catch (err) {
			if (err instanceof PathNotFoundError) return '';
			throw err;
		}
	}

	private write(target: PathTarget, path: Path, value: string, flags: number): void {
		if (target.model !== undefined) {
			try {
				setModelPath(target.model, path, value, flags, this.ctx);
				return;
			} catch (err) {
				if (!(err instanceof PathNotFoundError) || target.node === undefined) throw err;
			}
		}
		if (target.node !== undefined) setNodePath(this.ctx.pool, target.node, path, value, flags);
	}

	/**
	 * Reads the value at `path`.
	 *
	 * @throws {UnknownNamespaceError} for an unknown prefix.
	 * @throws {XmpError} when the document has no content at `path`.
	 */
	getPath(path: Path): string {
		validate(path);
		const prefix = path.namespacePrefix();
		const ns = this.findNs(prefix);
		if (ns === undefined) throw new UnknownNamespaceError(prefix);
		const node = this.findNode(ns);
		if (node === undefined) throw new XmpError(`xmp: no content for namespace '${ns.name}' at '${path}'`);
		if (path.len() === 0) return node.value;
		if (node.model !== undefined) {
			try {
				return getModelPath(node.model, path, this.ctx);
			} catch (err) {
				if (!(err instanceof PathNotFoundError)) throw err;
			}
		}
		try {
			return getNodePath(node, path);
		} catch (err) {
			if (err instanceof PathNotFoundError) throw new XmpError(`xmp: path '${path}' not found`);
			throw err;
		}
	}

	/**
	 * Writes one value under its flags (0 means `Default`). A prefix the
	 * document does not know is registered as external when the value names
	 * its URI. With `NoFail`, failures other than parse errors are ignored.
	 */
	setPath(desc: PathValue): void {
		const flags = effectiveFlags(desc.flags);
		try {
			this.applyPath(desc.path, desc.value, flags, desc.namespace);
		} catch (err) {
			if (!has(flags, SyncFlags.NoFail) || isParseError(err) || !(err instanceof XmpError)) throw err;
			this.ctx.log.debug(`ignoring failed update of '${desc.path}': ${errorMessage(err)}`);
		}
	}

	private applyPath(path: Path, value: string, flags: number, uri: string | undefined): void {
		validate(path);
		const prefix = path.namespacePrefix();
		let ns = this.findNs(prefix);
		if (ns === undefined && uri !== undefined && uri !== '') {
			ns = new Namespace(prefix, uri);
			this.addNamespace(ns, true);
		}
		if (ns === undefined) throw new UnknownNamespaceError(prefix);
		if (value === '' && !has(flags, SyncFlags.Delete)) throw new UnsupportedFlagsError(`delete flag required for empty '${path}'`, flags);

		let node = this.findNode(ns);
		if (path.len() === 0) {
			if (value === '') this.removeNamespace(ns);
			else if (node === undefined && !has(flags, SyncFlags.Create)) throw new UnsupportedFlagsError(`create flag required to make '${path}'`, flags);
			else if (node === undefined) this.createNode(ns);
			return;
		}
		if (node === undefined) {
			if (value === '') return;
			if (!has(flags, SyncFlags.Create)) throw new UnsupportedFlagsError(`create flag required to make model for '${path}'`, flags);
			node = this.createNode(ns);
		}

		const target: PathTarget = { model: node.model, node };
		const current = this.read(target, path);
		if (current === value) return;
		if (current === '' && !has(flags, SyncFlags.Create)) throw new UnsupportedFlagsError(`create flag required to make new value at '${path}'`, flags);
		if (current !== '' && (flags & UPDATE) === 0) throw new UnsupportedFlagsError(`update flag required to change existing value at '${path}'`, flags);
		this.write(target, path, value, flags);
		this.setDirty();
	}

	/** Every value in the document, models and raw content, sorted by path. */
	listPaths(): PathValue[] {
		this.syncToXmp();
		const out: PathValue[] = [];
		for (const node of this.nodes) {
			if (node.model !== undefined) out.push(...listModelPaths(node.model, this.ctx));
			const uri = this.findNs(node.name.local)?.uri;
			for (const pv of listNodePaths(node)) out.push(uri === undefined ? pv : { ...pv, namespace: uri });
		}
		return normalizePaths(out);
	}

	// -------------------------------------------------------------------------
	// Sync and merge
	// -------------------------------------------------------------------------

	/**
	 * Copies the value at `source` to `dest` when `flags` permit it. Missing
	 * namespaces, a missing source and transitions the flags do not allow
	 * are skipped. When `model` is given it is the only destination
	 * considered.
	 */
	sync(source: Path, dest: Path, flags = 0, model?: Model, convert?: ConverterFunc): void {
		const f = effectiveFlags(flags);
		try {
			this.syncPath(source, dest, f, model, convert);
		} catch (err) {
			if (!has(f, SyncFlags.NoFail) || isParseError(err) || !(err instanceof XmpError)) throw err;
			this.ctx.log.debug(`ignoring failed sync '${source}' → '${dest}': ${errorMessage(err)}`);
		}
	}

	private syncPath(source: Path, dest: Path, flags: number, model: Model | undefined, convert: ConverterFunc | undefined): void {
		if (!source.isXmpPath() || !dest.isXmpPath()) return;
		validate(source);
		validate(dest);
		const skip = (reason: string): void => this.ctx.log.debug(`sync '${source}' → '${dest}' skipped: ${reason}`);

		const sNs = this.findNs(source.namespacePrefix());
		const dNs = this.findNs(dest.namespacePrefix());
		if (sNs === undefined || dNs === undefined) return skip('unknown namespace');
		const sNode = this.findNode(sNs);
		if (sNode === undefined) return skip('no source');

		let dTarget: PathTarget;
		if (model !== undefined) {
			if (!model.can(dNs.name)) return skip('model does not match destination');
			dTarget = { model, node: this.nodes.find((n) => n.model === model) };
		} else {
			let dNode = this.findNode(dNs);
			if (dNode === undefined) {
				if (!has(flags, SyncFlags.Create)) return skip('no destination');
				dNode = this.createNode(dNs);
			}
			dTarget = { model: dNode.model, node: dNode };
		}

		const sValue = this.read({ model: sNode.model, node: sNode }, source);
		const dValue = this.read(dTarget, dest);
		if (sValue === dValue) return;
		if (sValue === '' && !has(flags, SyncFlags.Delete)) return skip('empty source');
		if (dValue === '' && !has(flags, SyncFlags.Create)) return skip('create not permitted');
		if (dValue !== '' && (flags & UPDATE) === 0) return skip('update not permitted');

		this.write(dTarget, dest, convert === undefined ? sValue : convert(sValue), flags);
		this.setDirty();
	}

	/** Runs every description in order; the first error aborts. */
	syncMulti(list: readonly SyncDesc[], model?: Model): void {
		for (const desc of list) this.sync(desc.source, desc.dest, desc.flags, model, desc.convert);
	}

	/**
	 * Imports every namespace of `other` and replays its path list under
	 * `flags`. Paths whose update the flags do not permit are skipped.
	 */
	merge(other: Document, flags: number): void {
		for (const ns of other.namespaces()) {
			if (this.findNsByUri(ns.uri) === undefined) this.addNamespace(ns, other.isExternal(ns));
		}
		for (const pv of other.listPaths()) {
			try {
				this.setPath({ path: pv.path, value: pv.value, namespace: pv.namespace, flags });
			} catch (err) {
				if (!(err instanceof UnsupportedFlagsError)) throw err;
				this.ctx.log.debug(`merge skipped '${pv.path}': ${err.message}`);
			}
		}
	}
}
