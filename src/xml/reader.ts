/**
 * xmpkit — XML reader
 *
 * Recursive-descent reader that builds a `Node` tree straight from XMP text.
 *
 * • Element and attribute names are namespace-resolved: a bound prefix yields
 *   `{ space: uri, local }`, an unbound one keeps `prefix:local` as the local
 *   name with an empty space.
 * • Namespace declarations stay in the attribute list as
 *   `{ space: 'xmlns', local: prefix }` so callers can collect them.
 * • Comments, processing instructions (xpacket markers included) and the
 *   DOCTYPE are skipped; text and CDATA of an element are joined and trimmed.
 * • Unknown entity references are kept verbatim. Structural damage such as a
 *   mismatched end tag or a truncated document is an `XmlParseError`.
 */

import { XmlParseError } from '../errors.ts';
import { NS_XML } from '../namespace.ts';
import type { Node, NodePool, Attr } from '../node.ts';
import { isWhitespace, isNameStart, isNameChar } from './chars.ts';

const PREDEFINED_ENTITIES: Readonly<Record<string, string>> = {
	amp: '&',
	lt: '<',
	gt: '>',
	apos: "'",
	quot: '"',
};

interface RawName {
	prefix: string | null;
	local: string;
}

class XmlReader {
	private readonly src: string;
	private readonly pool: NodePool;
	private pos = 0;

	/** Prefix → URI scopes; `''` is the default namespace. */
	private readonly scopes: Array<Map<string, string>> = [new Map([['xml', NS_XML.uri]])];

	constructor(src: string, pool: NodePool) {
		this.src = src;
		this.pool = pool;
	}

	read(): Node {
		if (this.src.charCodeAt(0) === 0xfeff) this.pos = 1;
		this.skipMisc();
		if (this.startsWith('<!DOCTYPE')) {
			this.skipDoctype();
			this.skipMisc();
		}
		if (this.current() !== '<') throw this.error('No root element found');
		const root = this.readElement();
		this.skipMisc();
		if (this.pos < this.src.length) {
			this.pool.release(root);
			throw this.error('Unexpected content after root element');
		}
		return root;
	}

	// -------------------------------------------------------------------------
	// Prolog / misc
	// -------------------------------------------------------------------------

	private skipMisc(): void {
		for (;;) {
			this.skipWhitespace();
			if (this.startsWith('<!--')) this.skipPast('-->');
			else if (this.startsWith('<?')) this.skipPast('?>');
			else return;
		}
	}

	private skipDoctype(): void {
		let depth = 0;
		while (this.pos < this.src.length) {
			const c = this.current();
			this.pos++;
			if (c === '[') depth++;
			else if (c === ']') depth--;
			else if (c === '>' && depth <= 0) return;
		}
		throw this.error('Unterminated DOCTYPE');
	}

	private skipPast(end: string): void {
		const i = this.src.indexOf(end, this.pos);
		if (i === -1) throw this.error(`Expected ${JSON.stringify(end)}`);
		this.pos = i + end.length;
	}

	// -------------------------------------------------------------------------
	// Elements
	// -------------------------------------------------------------------------

	private readElement(): Node {
		this.expect('<');
		const qname = this.readQName();

		const raw: Array<{ name: RawName; value: string }> = [];
		const decls = new Map<string, string>();
		for (;;) {
			this.skipWhitespace();
			if (this.pos >= this.src.length) throw this.error('Unterminated start tag');
			if (this.current() === '>' || this.startsWith('/>')) break;
			const name = this.readQName();
			this.skipWhitespace();
			this.expect('=');
			this.skipWhitespace();
			const value = this.readQuoted();
			if (name.prefix === null && name.local === 'xmlns') decls.set('', value);
			else if (name.prefix === 'xmlns') decls.set(name.local, value);
			raw.push({ name, value });
		}

		this.scopes.push(decls);
		const node = this.pool.acquire(this.resolve(qname, true));
		node.attrs = raw.map((a): Attr => {
			if (a.name.prefix === null && a.name.local === 'xmlns') return { name: { space: '', local: 'xmlns' }, value: a.value };
			if (a.name.prefix === 'xmlns') return { name: { space: 'xmlns', local: a.name.local }, value: a.value };
			return { name: this.resolve(a.name, false), value: a.value };
		});

		if (this.startsWith('/>')) {
			this.pos += 2;
		} else {
			this.pos++;
			try {
				this.readContent(node, qname);
			} catch (err) {
				this.pool.release(node);
				throw err;
			}
		}
		this.scopes.pop();
		return node;
	}

	private readContent(node: Node, open: RawName): void {
		const text: string[] = [];
		for (;;) {
			if (this.pos >= this.src.length) throw this.error(`Missing end tag for ${formatRaw(open)}`);
			if (this.startsWith('</')) {
				this.pos += 2;
				const close = this.readQName();
				this.skipWhitespace();
				this.expect('>');
				if (close.prefix !== open.prefix || close.local !== open.local) {
					throw this.error(`Mismatched end tag ${formatRaw(close)}, expected ${formatRaw(open)}`);
				}
				node.value = text.join('').trim();
				return;
			}
			if (this.startsWith('<![CDATA[')) {
				this.pos += 9;
				const end = this.src.indexOf(']]>', this.pos);
				if (end === -1) throw this.error('Unterminated CDATA section');
				text.push(this.src.slice(this.pos, end));
				this.pos = end + 3;
			} else if (this.startsWith('<!--')) {
				this.skipPast('-->');
			} else if (this.startsWith('<?')) {
				this.skipPast('?>');
			} else if (this.current() === '<') {
				node.appendNode(this.readElement());
			} else {
				text.push(this.readText());
			}
		}
	}

	private readText(): string {
		const parts: string[] = [];
		while (this.pos < this.src.length && this.current() !== '<') {
			if (this.current() === '&') {
				parts.push(this.readEntity());
				continue;
			}
			let next = this.src.indexOf('<', this.pos);
			const amp = this.src.indexOf('&', this.pos);
			if (next === -1) next = this.src.length;
			if (amp !== -1 && amp < next) next = amp;
			parts.push(this.src.slice(this.pos, next));
			this.pos = next;
		}
		return parts.join('');
	}

	private readQuoted(): string {
		const q = this.current();
		if (q !== '"' && q !== "'") throw this.error('Expected quoted attribute value');
		this.pos++;
		const parts: string[] = [];
		for (;;) {
			if (this.pos >= this.src.length) throw this.error('Unterminated attribute value');
			const c = this.current();
			if (c === q) break;
			if (c === '&') {
				parts.push(this.readEntity());
			} else {
				parts.push(c);
				this.pos++;
			}
		}
		this.pos++;
		return parts.join('');
	}

	private readEntity(): string {
		this.pos++;
		if (this.current() === '#') {
			this.pos++;
			const hex = this.current() === 'x' || this.current() === 'X';
			if (hex) this.pos++;
			const start = this.pos;
			const digits = hex ? /[0-9a-fA-F]/ : /[0-9]/;
			while (this.pos < this.src.length && digits.test(this.current())) this.pos++;
			const code = parseInt(this.src.slice(start, this.pos), hex ? 16 : 10);
			if (this.current() === ';') this.pos++;
			if (!Number.isFinite(code) || code === 0 || code > 0x10ffff || (code >= 0xd800 && code <= 0xdfff)) return '\ufffd';
			return String.fromCodePoint(code);
		}
		const start = this.pos;
		while (this.pos < this.src.length && isNameChar(this.src.charCodeAt(this.pos))) this.pos++;
		const name = this.src.slice(start, this.pos);
		if (this.current() === ';') this.pos++;
		if (name.length === 0) return '&';
		return PREDEFINED_ENTITIES[name] ?? `&${name};`;
	}

	// -------------------------------------------------------------------------
	// Names
	// -------------------------------------------------------------------------

	private readQName(): RawName {
		const start = this.pos;
		if (!isNameStart(this.src.charCodeAt(this.pos))) {
			throw this.error(`Expected XML name, got ${JSON.stringify(this.current())}`);
		}
		while (this.pos < this.src.length && isNameChar(this.src.charCodeAt(this.pos))) this.pos++;
		const name = this.src.slice(start, this.pos);
		const colon = name.indexOf(':');
		return colon === -1 ? { prefix: null, local: name } : { prefix: name.slice(0, colon), local: name.slice(colon + 1) };
	}

	private resolve(name: RawName, isElement: boolean): { space: string; local: string } {
		const key = name.prefix ?? (isElement ? '' : null);
		if (key !== null) {
			for (let i = this.scopes.length - 1; i >= 0; i--) {
				const uri = this.scopes[i]?.get(key);
				if (uri !== undefined && uri.length > 0) return { space: uri, local: name.local };
				if (uri !== undefined) break;
			}
		}
		return { space: '', local: formatRaw(name) };
	}

	// -------------------------------------------------------------------------
	// Cursor helpers
	// -------------------------------------------------------------------------

	private current(): string {
		return this.src[this.pos] ?? '';
	}

	private startsWith(str: string): boolean {
		return this.src.startsWith(str, this.pos);
	}

	private expect(str: string): void {
		if (!this.startsWith(str)) {
			throw this.error(`Expected ${JSON.stringify(str)}, got ${JSON.stringify(this.src.slice(this.pos, this.pos + str.length))}`);
		}
		this.pos += str.length;
	}

	private skipWhitespace(): void {
		while (this.pos < this.src.length && isWhitespace(this.src.charCodeAt(this.pos))) this.pos++;
	}

	private error(message: string): XmlParseError {
		let line = 1;
		let col = 1;
		for (let i = 0; i < this.pos && i < this.src.length; i++) {
			if (this.src.charCodeAt(i) === 0x0a) {
				line++;
				col = 1;
			} else {
				col++;
			}
		}
		return new XmlParseError(message, this.pos, line, col);
	}
}

function formatRaw(name: RawName): string {
	return name.prefix === null ? name.local : `${name.prefix}:${name.local}`;
}

/**
 * Reads `xml` into a node tree whose nodes come from `pool`.
 *
 * @throws {XmlParseError} when the text is not well-formed enough to build a tree.
 */
export function readXml(xml: string, pool: NodePool): Node {
	return new XmlReader(xml, pool).read();
}
