/**
 * xmpkit — XML writer
 *
 * Turns a `Node` tree back into XML text, and bounds the total output size
 * for packet encoding.
 */

import { Buffer } from 'node:buffer';
import { SizeLimitExceededError } from '../errors.ts';
import { formatName } from '../node.ts';
import type { Node, Attr } from '../node.ts';

// ---------------------------------------------------------------------------
// Escaping helpers
// ---------------------------------------------------------------------------

/** Escape characters that are special in XML text content. */
export function escapeText(s: string): string {
	return s.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;');
}

/** Escape characters that are special inside a double-quoted attribute value. */
export function escapeAttr(s: string): string {
	return s
		.replace(/&/g, '&amp;')
		.replace(/</g, '&lt;')
		.replace(/"/g, '&quot;')
		.replace(/\t/g, '&#x9;')
		.replace(/\n/g, '&#xA;')
		.replace(/\r/g, '&#xD;');
}

export function serializeAttr(a: Attr): string {
	return `${formatName(a.name)}="${escapeAttr(a.value)}"`;
}

// ---------------------------------------------------------------------------
// Elements
// ---------------------------------------------------------------------------

export interface WriteOptions {
	/** Indentation unit; empty writes everything on one line. */
	readonly indent?: string;
}

function writeNode(node: Node, indent: string, depth: number, out: string[]): void {
	const tag = node.fullName();
	out.push(`<${tag}`);
	for (const a of node.attrs) out.push(` ${serializeAttr(a)}`);
	if (node.value === '' && node.nodes.length === 0) {
		out.push('/>');
		return;
	}
	out.push('>');
	out.push(escapeText(node.value));
	for (const child of node.nodes) {
		if (indent.length > 0) out.push(`\n${indent.repeat(depth + 1)}`);
		writeNode(child, indent, depth + 1, out);
	}
	if (indent.length > 0 && node.nodes.length > 0) out.push(`\n${indent.repeat(depth)}`);
	out.push(`</${tag}>`);
}

/**
 * Serializes `node` and its subtree. Bound models are not visited; the
 * encoder has already expanded them into child nodes.
 */
export function serializeNode(node: Node, options: WriteOptions = {}, depth = 0): string {
	const out: string[] = [];
	writeNode(node, options.indent ?? '', depth, out);
	return out.join('');
}

// ---------------------------------------------------------------------------
// Size-limited output
// ---------------------------------------------------------------------------

/**
 * Collects output while counting UTF-8 bytes. With a non-zero `limit`, a
 * write that does not fit is cut at the limit and raises
 * `SizeLimitExceededError` carrying what was written.
 */
export class BoundedOutput {
	readonly limit: number;
	private readonly parts: string[] = [];
	private count = 0;

	constructor(limit = 0) {
		this.limit = limit;
	}

	get written(): number {
		return this.count;
	}

	write(s: string): void {
		const n = Buffer.byteLength(s, 'utf8');
		if (this.limit > 0 && this.count + n > this.limit) {
			const room = this.limit - this.count;
			this.parts.push(Buffer.from(s, 'utf8').subarray(0, room).toString('utf8'));
			this.count = this.limit;
			throw new SizeLimitExceededError(this.limit, this.toString());
		}
		this.parts.push(s);
		this.count += n;
	}

	toString(): string {
		return this.parts.join('');
	}
}
