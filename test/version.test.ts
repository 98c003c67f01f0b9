/**
 * Tests for schema versions and version directives.
 */

import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { Version, parseVersionDirective, rangesOverlap } from '../src/version.ts';

describe('Version', () => {
	it('parses one to three components', () => {
		assert.equal(Version.parse('1')?.toString(), '1.0.0');
		assert.equal(Version.parse('1.2')?.toString(), '1.2.0');
		assert.equal(Version.parse('v1.2.3')?.toString(), '1.2.3');
		assert.equal(Version.parse('1.x'), undefined);
	});

	it('compares', () => {
		const a = new Version(1, 2);
		assert.ok(a.compare(new Version(1, 3)) < 0);
		assert.ok(a.compare(new Version(1, 1, 9)) > 0);
		assert.equal(a.compare(new Version(1, 2, 0)), 0);
	});

	it('between treats zero as open', () => {
		const v = new Version(1, 5);
		assert.equal(v.between(new Version(1), new Version(2)), true);
		assert.equal(v.between(new Version(1, 6), Version.ZERO), false);
		assert.equal(v.between(Version.ZERO, new Version(1, 4)), false);
		assert.equal(v.between(Version.ZERO, Version.ZERO), true);
		assert.equal(Version.ZERO.between(new Version(9), new Version(10)), true);
	});
});

describe('parseVersionDirective', () => {
	it('exact, min, max and range', () => {
		assert.deepEqual(parseVersionDirective('v1.0'), { min: new Version(1), max: new Version(1) });
		assert.deepEqual(parseVersionDirective('v1.0+'), { min: new Version(1), max: Version.ZERO });
		assert.deepEqual(parseVersionDirective('v2-'), { min: Version.ZERO, max: new Version(2) });
		assert.deepEqual(parseVersionDirective('v1.0<1.2'), { min: new Version(1), max: new Version(1, 2) });
	});

	it('rejects garbage', () => {
		assert.equal(parseVersionDirective('vnext'), undefined);
		assert.equal(parseVersionDirective('v1<x'), undefined);
	});

	it('rangesOverlap', () => {
		const old = { min: Version.ZERO, max: new Version(1) };
		const cur = { min: new Version(2), max: Version.ZERO };
		assert.equal(rangesOverlap(old, cur), false);
		assert.equal(rangesOverlap(old, { min: new Version(1), max: new Version(3) }), true);
	});
});
