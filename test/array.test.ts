/**
 * Tests for RDF arrays: scalar lists and language alternatives.
 */

import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { AltString, IntList, StringArray, StringList, arrayItems, isArrayNode } from '../src/array.ts';
import type { AltItem } from '../src/array.ts';
import { defaultContext } from '../src/context.ts';
import { MalformedArrayError, MarshalError, UnmarshalError } from '../src/errors.ts';
import { Encoder } from '../src/marshal.ts';
import { Decoder } from '../src/unmarshal.ts';

const ctx = defaultContext();
const enc = new Encoder({}, ctx);
const dec = new Decoder({}, ctx);

function langs(alt: AltString): string[] {
	return alt.items.map((i) => `${i.lang}${i.isDefault ? '*' : ''}=${i.value}`);
}

describe('AltString — default invariant', () => {
	it('keeps the first default and moves it to the front', () => {
		const alt = new AltString([
			{ value: 'a', lang: 'de', isDefault: false },
			{ value: 'b', lang: 'en', isDefault: true },
			{ value: 'c', lang: 'fr', isDefault: true },
		]);
		assert.deepEqual(langs(alt), ['en*=b', 'de=a', 'fr=c']);
	});

	it('promotes the first item when none is default', () => {
		const alt = new AltString([{ value: 'a', lang: 'de', isDefault: false }]);
		assert.deepEqual(langs(alt), ['de*=a']);
	});

	it('holds after every mutation', () => {
		const alt = new AltString();
		alt.add('fr', 'bonjour');
		alt.add('de', 'hallo');
		alt.addDefault('en', 'hello');
		alt.removeLang('en');
		alt.add('', 'untagged');
		alt.removeLang('fr');
		assert.equal(alt.items.filter((i) => i.isDefault).length, 1);
		assert.equal(alt.items[0]?.isDefault, true);
		assert.deepEqual(langs(alt), ['*=untagged', 'de=hallo']);
	});
});

describe('AltString — access', () => {
	const make = (): AltString =>
		new AltString([
			{ value: 'german', lang: 'de', isDefault: false },
			{ value: 'english', lang: 'en', isDefault: true },
		]);

	it('get by language', () => {
		const alt = make();
		assert.equal(alt.get(), 'english');
		assert.equal(alt.get('x-default'), 'english');
		assert.equal(alt.get('en'), 'english');
		assert.equal(alt.get('de'), 'german');
		assert.equal(alt.get('fr'), '');
		assert.equal(alt.toString(), 'english');
	});

	it('removing the default promotes the next item', () => {
		const alt = make();
		alt.removeLang('en');
		assert.deepEqual(langs(alt), ['de*=german']);
	});

	it('removing another language keeps the default', () => {
		const alt = make();
		alt.removeLang('de');
		assert.deepEqual(langs(alt), ['en*=english']);
	});

	it('set and addUnique', () => {
		const alt = make();
		alt.set('de', 'deutsch');
		alt.set('it', 'inglese');
		alt.addUnique('en', 'english');
		assert.deepEqual(langs(alt), ['en*=english', 'de=deutsch', 'it=inglese']);
	});

	it('of() builds a single default', () => {
		assert.deepEqual(langs(AltString.of('', 'x')), ['*=x']);
		assert.deepEqual(langs(AltString.of('a', 'b')), ['*=a']);
	});

	it('a new untagged default replaces the old one', () => {
		const alt = AltString.of('Hello');
		alt.add('de', 'Hallo');
		alt.add('', 'World');
		assert.deepEqual(langs(alt), ['*=World', 'de=Hallo']);
		alt.addDefault('de', 'Welt');
		assert.deepEqual(langs(alt), ['de*=Welt']);
	});
});

describe('AltString — wire form', () => {
	it('duplicates a tagged default and folds it back', () => {
		const items: AltItem[] = [
			{ value: 'Hello', lang: 'en', isDefault: true },
			{ value: 'Hallo', lang: 'de', isDefault: false },
		];
		const alt = new AltString(items);
		const node = ctx.pool.acquire('dc:title');
		alt.marshalXmp(enc, node);

		const arr = arrayItems(node);
		assert.equal(arr?.type, 'Alt');
		assert.deepEqual(
			arr?.items.map((li) => `${li.getAttr('xml:lang')?.value}=${li.value}`),
			['x-default=Hello', 'en=Hello', 'de=Hallo'],
		);

		const back = new AltString();
		back.unmarshalXmp(dec, node);
		assert.deepEqual(back.items, items);
		ctx.pool.release(node);
	});

	it('an untagged default is written once', () => {
		const alt = AltString.of('only');
		const node = ctx.pool.acquire('dc:rights');
		alt.marshalXmp(enc, node);
		assert.equal(arrayItems(node)?.items.length, 1);
		ctx.pool.release(node);
	});

	it('non-default items need a language', () => {
		const alt = new AltString();
		alt.items = [
			{ value: 'a', lang: 'en', isDefault: true },
			{ value: 'b', lang: '', isDefault: false },
		];
		assert.throws(() => alt.marshalXmp(enc, ctx.pool.acquire('dc:title')), MarshalError);
	});
});

describe('scalar lists', () => {
	it('StringArray operations', () => {
		const a = new StringArray(['a', 'b']);
		a.addUnique('b', 'c');
		assert.deepEqual(a.items, ['a', 'b', 'c']);
		a.remove('a');
		assert.equal(a.contains('a'), false);
		assert.equal(a.toString(), 'b, c');
		assert.equal(a.arrayType(), 'Bag');
	});

	it('StringList round trip', () => {
		const list = new StringList(['one', 'two']);
		const node = ctx.pool.acquire('dc:creator');
		list.marshalXmp(enc, node);
		assert.equal(node.nodes[0]?.fullName(), 'rdf:Seq');
		const back = new StringList();
		back.unmarshalXmp(dec, node);
		assert.deepEqual(back.items, ['one', 'two']);
		ctx.pool.release(node);
	});

	it('IntList parses integers', () => {
		const list = new IntList();
		assert.equal(list.parseItem(' 12 '), 12);
		assert.throws(() => list.parseItem('1.5'), UnmarshalError);
		assert.equal(list.zeroItem(), 0);
	});
});

describe('arrayItems', () => {
	it('empty node is an empty array', () => {
		assert.equal(arrayItems(ctx.pool.acquire('dc:type')), undefined);
	});

	it('rejects malformed containers', () => {
		const twoChildren = ctx.pool.acquire('dc:type');
		twoChildren.appendNode(ctx.pool.acquire('rdf:Bag'));
		twoChildren.appendNode(ctx.pool.acquire('rdf:Bag'));
		assert.throws(() => arrayItems(twoChildren), MalformedArrayError);

		const unknown = ctx.pool.acquire('dc:type');
		unknown.appendNode(ctx.pool.acquire('rdf:List'));
		assert.throws(() => arrayItems(unknown), MalformedArrayError);

		const badItem = ctx.pool.acquire('dc:type');
		badItem.appendNode(ctx.pool.acquire('rdf:Bag')).appendNode(ctx.pool.acquire('rdf:item'));
		assert.throws(() => arrayItems(badItem), MalformedArrayError);
	});

	it('isArrayNode', () => {
		const n = ctx.pool.acquire('dc:type');
		assert.equal(isArrayNode(n), false);
		n.appendNode(ctx.pool.acquire('rdf:Seq'));
		assert.equal(isArrayNode(n), true);
	});
});
