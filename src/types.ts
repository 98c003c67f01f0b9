/**
 * xmpkit — Text value types
 *
 * Scalars with an XMP-specific text form. They convert through
 * `marshalText`/`unmarshalText`, so they work as elements and attributes.
 */

import { UnmarshalError } from './errors.ts';
import type { TextMarshaler, TextUnmarshaler, ZeroChecker } from './typeinfo.ts';

/**
 * Boolean written as `True`/`False`. Reading also accepts the lower-case
 * and numeric spellings found in the wild.
 */
export class XmpBool implements TextMarshaler, TextUnmarshaler, ZeroChecker {
	value: boolean;

	constructor(value = false) {
		this.value = value;
	}

	isZero(): boolean {
		return !this.value;
	}

	marshalText(): string {
		return this.value ? 'True' : 'False';
	}

	unmarshalText(text: string): void {
		switch (text.trim().toLowerCase()) {
			case 'true':
			case 't':
			case '1':
				this.value = true;
				return;
			case 'false':
			case 'f':
			case '0':
			case '':
				this.value = false;
				return;
			default:
				throw new UnmarshalError(`invalid boolean '${text}'`);
		}
	}
}

/**
 * An XMP date. Keeps the precision it was read with, so `2024` stays a
 * year and `2024-05-01T10:00:00Z` stays a full timestamp.
 *
 * Reading accepts the layouts other writers use (EXIF, EXR, MXF, ID3,
 * camera sidecars) and stores them as ISO 8601.
 */
export class XmpDate implements TextMarshaler, TextUnmarshaler, ZeroChecker {
	private text = '';

	constructor(value?: Date | string) {
		if (value instanceof Date) this.text = formatDate(value);
		else if (value !== undefined) this.unmarshalText(value);
	}

	isZero(): boolean {
		return this.text === '';
	}

	/** The date as a `Date`, or `undefined` when empty. */
	toDate(): Date | undefined {
		return this.text === '' ? undefined : new Date(this.text);
	}

	marshalText(): string {
		return this.text;
	}

	unmarshalText(text: string): void {
		this.text = parseDate(text);
	}

	toString(): string {
		return this.text;
	}
}

// ---------------------------------------------------------------------------
// Date layouts
// ---------------------------------------------------------------------------

const ZONE = '(?<tz>Z|[+-]\\d{1,2}(?::\\d{2})?|[+-]\\d{3,5})';

const DATE_LAYOUTS: readonly RegExp[] = [
	// XMP, RFC 3339, EXIF, EXR
	new RegExp(`^(?<year>\\d{4})-(?<month>\\d{2})-(?<day>\\d{2})[T ](?<hour>\\d{2}):(?<minute>\\d{2})(?::(?<second>\\d{2})(?:\\.(?<frac>\\d+))?)?${ZONE}?$`),
	// MXF, ID3
	/^(?<year>\d{4}):(?<month>\d{2}):(?<day>\d{2})(?: (?<hour>\d{2}):(?<minute>\d{2}):(?<second>\d{2})(?:\.(?<frac>\d+))?)?$/,
	// ARRI CSV
	new RegExp(`^(?<year>\\d{4}|\\d{2})/(?<month>\\d{2})/(?<day>\\d{2})T(?<hour>\\d{2}):(?<minute>\\d{2}):(?<second>\\d{2})${ZONE}$`),
	// ARRI QuickTime and MXF
	new RegExp(`^(?<year>\\d{4})(?<month>\\d{2})(?<day>\\d{2})T(?<hour>\\d{2})h(?<minute>\\d{2})m(?<second>\\d{2})s?${ZONE}$`),
	/^(?<year>\d{4})(?:-(?<month>\d{2})(?:-(?<day>\d{2}))?)?$/,
	// IPTC and Getty times
	new RegExp(`^(?<hour>\\d{2}):?(?<minute>\\d{2}):?(?<second>\\d{2})${ZONE}?$`),
];

/** Values some writers use for "no date". */
const ZERO_DATES: readonly string[] = ['--', '00/00/00T00:00:00+00:00'];

/** `+1`, `+1:00`, `+0100` and `+00200` all become `+01:00`. */
function repairZone(tz: string): string {
	if (tz === 'Z') return tz;
	const sign = tz.slice(0, 1);
	const body = tz.slice(1);
	let h: string;
	let m: string;
	if (body.includes(':')) [h = '', m = ''] = body.split(':');
	else if (body.length <= 2) [h, m] = [body, '00'];
	else [h, m] = [body.slice(0, -2), body.slice(-2)];
	return `${sign}${h.slice(-2).padStart(2, '0')}:${m}`;
}

function inRange(v: string | undefined, min: number, max: number): boolean {
	if (v === undefined) return true;
	const n = Number(v);
	return n >= min && n <= max;
}

/**
 * Normalizes a date in any accepted layout to ISO 8601. A zero day or month
 * ends the value at the part before it. Times without a date get `0000-01-01`.
 *
 * @throws {UnmarshalError} when no layout matches or a part is out of range.
 */
export function parseDate(text: string): string {
	const t = text.trim();
	if (t === '' || ZERO_DATES.includes(t)) return '';
	for (const layout of DATE_LAYOUTS) {
		const m = layout.exec(t);
		if (m === null) continue;
		const g: Partial<Record<string, string>> = m.groups ?? {};
		if (!inRange(g.month, 0, 12) || !inRange(g.day, 0, 31) || !inRange(g.hour, 0, 23) || !inRange(g.minute, 0, 59) || !inRange(g.second, 0, 60)) break;

		let year = g.year ?? '0000';
		if (year.length === 2) year = `${Number(year) >= 69 ? 19 : 20}${year}`;
		let out = year;
		const month = g.month !== undefined && g.month !== '00' ? g.month : undefined;
		const day = month !== undefined && g.day !== undefined && g.day !== '00' ? g.day : undefined;
		if (month !== undefined) out += `-${month}`;
		if (day !== undefined) {
			const d = new Date(Date.UTC(Number(year), Number(month) - 1, Number(day)));
			if (d.getUTCDate() !== Number(day)) break;
			out += `-${day}`;
		}
		if (g.hour !== undefined && g.minute !== undefined && (day !== undefined || g.year === undefined)) {
			if (g.year === undefined) out += '-01-01';
			out += `T${g.hour}:${g.minute}`;
			if (g.second !== undefined) out += `:${g.second}`;
			if (g.frac !== undefined) out += `.${g.frac}`;
			if (g.tz !== undefined) out += repairZone(g.tz);
		}
		return out;
	}
	throw new UnmarshalError(`invalid date '${text}'`);
}

/** ISO 8601 in UTC with second precision. */
export function formatDate(d: Date): string {
	return d.toISOString().replace(/\.\d{3}Z$/, 'Z');
}

/** A URI value. Only emptiness is checked; the text is kept as written. */
export class Uri implements TextMarshaler, TextUnmarshaler, ZeroChecker {
	value: string;

	constructor(value = '') {
		this.value = value;
	}

	isZero(): boolean {
		return this.value === '';
	}

	marshalText(): string {
		return this.value;
	}

	unmarshalText(text: string): void {
		this.value = text.trim();
	}

	toString(): string {
		return this.value;
	}
}
