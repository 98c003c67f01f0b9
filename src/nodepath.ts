/**
 * xmpkit — Paths over raw nodes
 *
 * Content no model describes is still addressable. The walk mirrors the
 * model walker: named children, attributes on the last step, and array
 * containers selected by index or language.
 */

import { PathNotFoundError, UnsupportedFlagsError } from './errors.ts';
import { SyncFlags, has } from './flags.ts';
import { localOf, prefixOf } from './namespace.ts';
import { xmlName } from './node.ts';
import type { Node, NodePool } from './node.ts';
import { Path, expandName, parseSegment } from './path.ts';
import type { PathValue, SegmentQualifier } from './path.ts';
import { X_DEFAULT, arrayItems, isArrayNode } from './array.ts';

function isStructural(name: string): boolean {
	return prefixOf(name) === 'rdf' || name === 'xml:lang' || name === 'xmlns' || name.startsWith('xmlns:');
}

/** A resource written as `<p:x><rdf:Description>…</rdf:Description></p:x>` reads like its description. */
function content(node: Node): Node {
	const [only] = node.nodes;
	return node.nodes.length === 1 && only !== undefined && only.fullName() === 'rdf:Description' ? only : node;
}

function langOf(li: Node): string {
	const lang = li.getAttr('xml:lang')?.value ?? '';
	return lang === X_DEFAULT ? '' : lang;
}

function findLang(items: readonly Node[], lang: string): Node | undefined {
	const l = lang === X_DEFAULT ? '' : lang;
	return items.find((li) => langOf(li) === l);
}

/** Picks the item a qualifier addresses; plain nodes only answer to no qualifier or `[0]`. */
function select(child: Node, q: SegmentQualifier): Node | undefined {
	if (!isArrayNode(child)) {
		if (q.kind === 'none' || (q.kind === 'index' && q.index === 0)) return content(child);
		return undefined;
	}
	const items = arrayItems(child)?.items ?? [];
	let li: Node | undefined;
	switch (q.kind) {
		case 'none':
			li = items[0];
			break;
		case 'index':
			li = items[q.index === -1 ? items.length - 1 : q.index];
			break;
		case 'lang':
			li = findLang(items, q.lang);
			break;
	}
	return li === undefined ? undefined : content(li);
}

// ---------------------------------------------------------------------------
// Get
// ---------------------------------------------------------------------------

/**
 * Reads `path` below the top-level `node`. Missing items of an existing
 * array read as empty.
 *
 * @throws {PathNotFoundError} when a named child or attribute does not exist.
 */
export function getNodePath(node: Node, path: Path): string {
	let cur = node;
	let p = path;
	while (p.len() > 0) {
		const [text, rest] = p.popFront();
		const seg = parseSegment(text);
		const name = expandName(p.namespacePrefix(), seg.name);
		const child = cur.child(name);
		if (child === undefined) {
			const attr = rest.len() === 0 ? cur.getAttr(name) : undefined;
			if (attr === undefined) throw new PathNotFoundError(path.toString());
			return attr.value;
		}
		const item = select(child, seg.qualifier);
		if (item === undefined) return '';
		cur = item;
		p = rest;
	}
	return cur.value;
}

// ---------------------------------------------------------------------------
// Set
// ---------------------------------------------------------------------------

function containerFor(q: SegmentQualifier): string {
	return q.kind === 'lang' ? 'rdf:Alt' : 'rdf:Seq';
}

function newItem(pool: NodePool, container: Node, q: SegmentQualifier): Node {
	const li = container.appendNode(pool.acquire('rdf:li'));
	if (q.kind === 'lang') li.addAttr({ name: xmlName('xml:lang'), value: q.lang === '' ? X_DEFAULT : q.lang });
	return li;
}

/** Finds or, when allowed, creates the item a qualifier addresses inside an array child. */
function selectOrCreate(pool: NodePool, child: Node, q: SegmentQualifier, flags: number, path: Path): Node {
	if (q.kind === 'none') return content(child);
	if (!isArrayNode(child)) {
		if (child.nodes.length > 0 || child.value !== '') {
			if (q.kind === 'index' && q.index === 0) return content(child);
			throw new UnsupportedFlagsError(`'${path}' addresses an item of a non-array node`, flags);
		}
		child.appendNode(pool.acquire(containerFor(q)));
	}
	const [container] = child.nodes;
	if (container === undefined) throw new PathNotFoundError(path.toString());
	if (q.kind === 'lang') {
		const found = findLang(container.nodes, q.lang);
		if (found !== undefined) return content(found);
		if (!has(flags, SyncFlags.Create) && !has(flags, SyncFlags.Append)) throw new UnsupportedFlagsError(`create flag required to add '${path}'`, flags);
		return newItem(pool, container, q);
	}
	const i = q.index === -1 ? container.nodes.length : q.index;
	const found = container.nodes[i];
	if (found !== undefined) return content(found);
	if (!has(flags, SyncFlags.Create) && !has(flags, SyncFlags.Append)) throw new UnsupportedFlagsError(`create flag required to grow '${path}'`, flags);
	let li = newItem(pool, container, q);
	while (container.nodes.length <= i) li = newItem(pool, container, q);
	return li;
}

/** Writes the final step: an attribute, a plain child or an array item. */
function setLeaf(pool: NodePool, cur: Node, name: string, q: SegmentQualifier, value: string, flags: number, path: Path): void {
	const attr = q.kind === 'none' ? cur.getAttr(name) : undefined;
	if (attr !== undefined) {
		if (value === '') cur.removeAttr(name);
		else cur.addAttr({ name: attr.name, value });
		return;
	}
	let child = cur.child(name);
	if (value === '') {
		if (child === undefined) return;
		if (q.kind === 'none' || !isArrayNode(child)) {
			pool.release(child);
			return;
		}
		const item = select(child, q);
		if (item === undefined) return;
		const li = item.fullName() === 'rdf:Description' ? item.parent : item;
		if (li !== undefined) pool.release(li);
		return;
	}
	child ??= cur.appendNode(pool.acquire(name));
	if (q.kind !== 'none') {
		selectOrCreate(pool, child, q, flags, path).value = value;
		return;
	}
	if (!isArrayNode(child)) {
		child.value = value;
		return;
	}
	const [container] = child.nodes;
	if (container === undefined) return;
	const none: SegmentQualifier = { kind: 'none' };
	if (has(flags, SyncFlags.Unique)) {
		if (!container.nodes.some((li) => li.value === value)) newItem(pool, container, none).value = value;
	} else if (has(flags, SyncFlags.Append)) {
		newItem(pool, container, none).value = value;
	} else if (has(flags, SyncFlags.Replace)) {
		for (const li of [...container.nodes]) pool.release(li);
		newItem(pool, container, none).value = value;
	} else {
		throw new UnsupportedFlagsError(`update flag required to change '${path}'`, flags);
	}
}

/**
 * Writes `value` at `path` below `node`, creating intermediate children.
 * An empty value removes the addressed attribute, child or array item.
 */
export function setNodePath(pool: NodePool, node: Node, path: Path, value: string, flags: number): void {
	let cur = node;
	let p = path;
	if (p.len() === 0) {
		cur.value = value;
		return;
	}
	for (;;) {
		const [text, rest] = p.popFront();
		const seg = parseSegment(text);
		const name = expandName(p.namespacePrefix(), seg.name);
		if (rest.len() === 0) {
			setLeaf(pool, cur, name, seg.qualifier, value, flags, path);
			return;
		}
		let child = cur.child(name);
		if (child === undefined) {
			if (value === '') return;
			if (!has(flags, SyncFlags.Create)) throw new UnsupportedFlagsError(`create flag required to make '${path}'`, flags);
			child = cur.appendNode(pool.acquire(name));
		}
		cur = selectOrCreate(pool, child, seg.qualifier, flags, path);
		p = rest;
	}
}

// ---------------------------------------------------------------------------
// List
// ---------------------------------------------------------------------------

/**
 * Every non-empty value below the top-level `node`. Names in the node's own
 * namespace are listed without prefix.
 */
export function listNodePaths(node: Node): PathValue[] {
	const prefix = node.name.local;
	const out: PathValue[] = [];
	const segment = (name: string): string => (prefixOf(name) === prefix && name.includes(':') ? localOf(name) : name);
	const push = (fields: string[], value: string): void => {
		if (value !== '') out.push({ path: Path.from(prefix, fields), value });
	};
	const walk = (cur: Node, fields: string[]): void => {
		for (const attr of cur.attrs) {
			const name = attr.name.local;
			if (attr.name.space !== '' || isStructural(name)) continue;
			push([...fields, segment(name)], attr.value);
		}
		for (const child of cur.nodes) {
			const name = segment(child.fullName());
			if (isArrayNode(child)) {
				const arr = arrayItems(child);
				(arr?.items ?? []).forEach((li, i) => {
					const q = arr?.type === 'Alt' ? `[${langOf(li) || X_DEFAULT}]` : `[${i}]`;
					const item = content(li);
					if (item.nodes.length > 0 || item !== li) walk(item, [...fields, name + q]);
					else push([...fields, name + q], li.value);
				});
			} else if (child.nodes.length > 0 || child.attrs.some((a) => !isStructural(a.name.local))) {
				walk(content(child), [...fields, name]);
			} else {
				push([...fields, name], child.value);
			}
		}
	};
	walk(node, []);
	return out;
}
