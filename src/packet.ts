/**
 * xmpkit — Packet scanning
 *
 * XMP embedded in media files sits between `<?xpacket begin …?>` and
 * `<?xpacket end="w"?>` markers. Scanning finds those spans in raw bytes;
 * only spans whose header carries the packet id are returned.
 */

import { Buffer } from 'node:buffer';
import type { XmpContext } from './context.ts';
import { XmpError } from './errors.ts';
import { Document } from './document.ts';
import { PACKET_ID } from './marshal.ts';
import { unmarshal } from './unmarshal.ts';

const PACKET_START = Buffer.from('<?xpacket begin');
const PACKET_END = Buffer.from('<?xpacket end');
// `="w"?>` or `="r"?>`
const END_SUFFIX = 6;
const MAGIC = Buffer.from(PACKET_ID);
// the id has to appear within the header
const HEADER_WINDOW = 51;

/** Every packet span in `bytes`, in file order. */
export function scanPackets(bytes: Uint8Array): Uint8Array[] {
	const data = Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength);
	const out: Uint8Array[] = [];
	let pos = 0;
	for (;;) {
		const start = data.indexOf(PACKET_START, pos);
		if (start === -1) break;
		const end = data.indexOf(PACKET_END, start);
		if (end === -1) break;
		const last = end + PACKET_END.length + END_SUFFIX;
		if (last > data.length) break;
		const span = data.subarray(start, last);
		if (span.subarray(0, HEADER_WINDOW).indexOf(MAGIC) !== -1) out.push(Uint8Array.from(span));
		pos = last;
	}
	return out;
}

/**
 * Decodes the first packet found in `bytes`.
 *
 * @throws {XmpError} when `bytes` holds no packet.
 */
export function scan(bytes: Uint8Array, doc: Document = new Document()): Document {
	const [first] = scanPackets(bytes);
	if (first === undefined) throw new XmpError('xmp: no packet found');
	unmarshal(new TextDecoder().decode(first), doc);
	return doc;
}

/** Decodes a complete XMP document into a new `Document`. */
export function read(text: string, ctx?: XmpContext): Document {
	const doc = new Document(ctx);
	unmarshal(text, doc);
	return doc;
}
