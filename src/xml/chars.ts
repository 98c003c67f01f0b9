/**
 * xmpkit — XML character classes
 *
 * Code-point predicates for the XML 1.0 name productions. `:` is treated as
 * a name character so qualified names lex as one token.
 */

// Inclusive [start, end] pairs of XML 1.0 §2.3 NameStartChar above ASCII.
const NAME_START_RANGES: readonly (readonly [number, number])[] = [
	[0xc0, 0xd6],
	[0xd8, 0xf6],
	[0xf8, 0x2ff],
	[0x370, 0x37d],
	[0x37f, 0x1fff],
	[0x200c, 0x200d],
	[0x2070, 0x218f],
	[0x2c00, 0x2fef],
	[0x3001, 0xd7ff],
	[0xf900, 0xfdcf],
	[0xfdf0, 0xfffd],
	[0x10000, 0xeffff],
];

const NAME_EXTRA_RANGES: readonly (readonly [number, number])[] = [
	[0x300, 0x36f],
	[0x203f, 0x2040],
];

function inRanges(code: number, ranges: readonly (readonly [number, number])[]): boolean {
	return ranges.some(([lo, hi]) => code >= lo && code <= hi);
}

export function isWhitespace(code: number): boolean {
	return code === 0x20 || code === 0x09 || code === 0x0a || code === 0x0d;
}

export function isNameStart(code: number): boolean {
	if (code < 0x80) return (code >= 0x41 && code <= 0x5a) || (code >= 0x61 && code <= 0x7a) || code === 0x3a || code === 0x5f;
	return inRanges(code, NAME_START_RANGES);
}

export function isNameChar(code: number): boolean {
	if (isNameStart(code)) return true;
	if (code < 0x80) return (code >= 0x30 && code <= 0x39) || code === 0x2d || code === 0x2e;
	return code === 0xb7 || inRanges(code, NAME_EXTRA_RANGES);
}
