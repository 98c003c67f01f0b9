/**
 * xmpkit — Schema versions
 *
 * Fields may be limited to a window of schema versions. A zero version is
 * "unversioned": as a bound it is open, as a subject it matches every window.
 */

export class Version {
	readonly major: number;
	readonly minor: number;
	readonly patch: number;

	constructor(major = 0, minor = 0, patch = 0) {
		this.major = major;
		this.minor = minor;
		this.patch = patch;
	}

	static readonly ZERO = new Version();

	/**
	 * Parses `1`, `1.2` or `1.2.3`, optionally prefixed with `v`.
	 * Returns `undefined` for anything else.
	 */
	static parse(text: string): Version | undefined {
		const m = /^v?(\d+)(?:\.(\d+))?(?:\.(\d+))?$/.exec(text.trim());
		if (m === null) return undefined;
		return new Version(Number(m[1]), Number(m[2] ?? 0), Number(m[3] ?? 0));
	}

	isZero(): boolean {
		return this.major === 0 && this.minor === 0 && this.patch === 0;
	}

	compare(other: Version): number {
		return this.major - other.major || this.minor - other.minor || this.patch - other.patch;
	}

	/** Inclusive window test; zero bounds are open. */
	between(min: Version, max: Version): boolean {
		if (this.isZero()) return true;
		if (!min.isZero() && this.compare(min) < 0) return false;
		if (!max.isZero() && this.compare(max) > 0) return false;
		return true;
	}

	toString(): string {
		return `${this.major}.${this.minor}.${this.patch}`;
	}
}

/** An inclusive version window. */
export interface VersionRange {
	readonly min: Version;
	readonly max: Version;
}

export const ANY_VERSION: VersionRange = { min: Version.ZERO, max: Version.ZERO };

/** Two windows overlap when neither lies entirely past the other. */
export function rangesOverlap(a: VersionRange, b: VersionRange): boolean {
	if (!a.max.isZero() && !b.min.isZero() && a.max.compare(b.min) < 0) return false;
	if (!b.max.isZero() && !a.min.isZero() && b.max.compare(a.min) < 0) return false;
	return true;
}

/**
 * Parses a version directive: `v1.0` (exact), `v1.0+` (minimum),
 * `v1.0-` (maximum) or `v1.0<1.2` (range).
 */
export function parseVersionDirective(directive: string): VersionRange | undefined {
	const body = directive.startsWith('v') ? directive.slice(1) : directive;
	const lt = body.indexOf('<');
	if (lt !== -1) {
		const min = Version.parse(body.slice(0, lt));
		const max = Version.parse(body.slice(lt + 1));
		return min && max ? { min, max } : undefined;
	}
	if (body.endsWith('+')) {
		const min = Version.parse(body.slice(0, -1));
		return min ? { min, max: Version.ZERO } : undefined;
	}
	if (body.endsWith('-')) {
		const max = Version.parse(body.slice(0, -1));
		return max ? { min: Version.ZERO, max } : undefined;
	}
	const exact = Version.parse(body);
	return exact ? { min: exact, max: exact } : undefined;
}
