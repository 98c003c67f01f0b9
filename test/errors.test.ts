/**
 * Tests for the error taxonomy.
 */

import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import {
	InvalidFlagError,
	InvalidPathSegmentError,
	NodeLoopError,
	PathNotFoundError,
	SizeLimitExceededError,
	UnknownNamespaceError,
	UnsupportedFlagsError,
	XmlParseError,
	XmpError,
	errorMessage,
	isParseError,
} from '../src/errors.ts';

describe('errors — classes', () => {
	it('subclasses are XmpErrors with their own name', () => {
		const err = new UnknownNamespaceError('foo');
		assert.ok(err instanceof XmpError);
		assert.ok(err instanceof Error);
		assert.equal(err.name, 'UnknownNamespaceError');
		assert.equal(err.namespace, 'foo');
		assert.equal(err.message, "xmp: unknown namespace 'foo'");
	});

	it('PathNotFoundError message names the path', () => {
		assert.equal(new PathNotFoundError('dc:nothing').message, "xmp: path 'dc:nothing' not found");
	});

	it('XmlParseError carries its position', () => {
		const err = new XmlParseError('Unexpected', 12, 2, 5);
		assert.equal(err.message, 'Unexpected (line 2, col 5)');
		assert.equal(err.position, 12);
		assert.equal(err.line, 2);
		assert.equal(err.column, 5);
	});

	it('SizeLimitExceededError keeps the partial output', () => {
		const err = new SizeLimitExceededError(10, '<x:xmpmeta');
		assert.equal(err.limit, 10);
		assert.equal(err.partial, '<x:xmpmeta');
	});

	it('UnsupportedFlagsError keeps the flags', () => {
		const err = new UnsupportedFlagsError('create flag required', 2);
		assert.equal(err.flags, 2);
		assert.equal(err.message, 'xmp: create flag required');
	});

	it('NodeLoopError is not an XmpError', () => {
		const err = new NodeLoopError('dc:title');
		assert.ok(!(err instanceof XmpError));
		assert.equal(err.message, "xmp: node loop detected at 'dc:title'");
	});
});

describe('errors — helpers', () => {
	it('isParseError', () => {
		assert.equal(isParseError(new InvalidPathSegmentError('a[', 'unbalanced brackets')), true);
		assert.equal(isParseError(new InvalidFlagError('bogus')), true);
		assert.equal(isParseError(new XmlParseError('x', 0, 1, 1)), true);
		assert.equal(isParseError(new UnsupportedFlagsError('x', 0)), false);
		assert.equal(isParseError(new Error('x')), false);
	});

	it('errorMessage', () => {
		assert.equal(errorMessage(new Error('boom')), 'boom');
		assert.equal(errorMessage('plain'), 'plain');
		assert.equal(errorMessage(42), '42');
	});
});
