/**
 * Tests for encoding and decoding whole documents.
 */

import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { createContext } from '../src/context.ts';
import { Document } from '../src/document.ts';
import { SizeLimitExceededError, UnknownNamespaceError, UnmarshalError, XmlParseError } from '../src/errors.ts';
import { PACKET_FOOTER, PACKET_HEADER, marshal, marshalIndent } from '../src/marshal.ts';
import { Namespace } from '../src/namespace.ts';
import type { Model } from '../src/namespace.ts';
import { read } from '../src/packet.ts';
import { Path } from '../src/path.ts';
import { listOf, mapOf, registerType } from '../src/typeinfo.ts';
import { Version } from '../src/version.ts';
import * as dc from '../src/models/dc.ts';
import * as xmp from '../src/models/xmp-base.ts';

const RDF = 'http://www.w3.org/1999/02/22-rdf-syntax-ns#';
const DC = 'http://purl.org/dc/elements/1.1/';

const SAMPLE = [
	'<x:xmpmeta xmlns:x="adobe:ns:meta/" x:xmptk="Test Writer">',
	`<rdf:RDF xmlns:rdf="${RDF}">`,
	`<rdf:Description rdf:about="urn:test:doc" xmlns:dc="${DC}" xmlns:my="urn:test:my/">`,
	'<dc:format>image/png</dc:format>',
	'<dc:title><rdf:Alt>',
	'<rdf:li xml:lang="x-default">Hello</rdf:li>',
	'<rdf:li xml:lang="en">Hello</rdf:li>',
	'<rdf:li xml:lang="de">Hallo</rdf:li>',
	'</rdf:Alt></dc:title>',
	'<my:rating>3</my:rating>',
	'</rdf:Description>',
	'</rdf:RDF>',
	'</x:xmpmeta>',
].join('\n');

const NS_CAT = new Namespace('cat', 'urn:test:catalog/', () => new Catalog());

class Catalog implements Model {
	tags = new Map<string, string>();
	props = new Map<string, string>();
	corners: number[] = [];
	legacy = '';
	modern = '';

	can(prefix: string): boolean {
		return prefix === NS_CAT.name;
	}

	namespaces(): readonly Namespace[] {
		return [NS_CAT];
	}

	syncFromXmp(_doc: Document): void {}

	syncToXmp(_doc: Document): void {}

	syncModel(_doc: Document): void {}
}

registerType(Catalog, {
	tags: ['cat:tags', mapOf('string')],
	props: ['cat:props,flat', mapOf('string')],
	corners: ['cat:corners', listOf('int', { fixed: 2 })],
	legacy: ['cat:legacy,v1.0-', 'string'],
	modern: ['cat:modern,v2+', 'string'],
});

function catalogDoc(fill: (c: Catalog) => void): Document {
	const ctx = createContext();
	ctx.registry.register(NS_CAT);
	const doc = new Document(ctx);
	const m = doc.makeModel(NS_CAT);
	assert.ok(m instanceof Catalog);
	fill(m);
	return doc;
}

function pdfDoc(): Document {
	const doc = new Document();
	dc.makeModel(doc).format = 'application/pdf';
	return doc;
}

function paths(doc: Document): string[] {
	return doc.listPaths().map((v) => `${v.path.toString()}=${v.value}`);
}

describe('codec — encode', () => {
	it('writes one description per namespace', () => {
		assert.equal(
			marshal(pdfDoc(), { packet: false }),
			'<x:xmpmeta xmlns:x="adobe:ns:meta/" x:xmptk="TS XMP SDK 1.0">' +
				`<rdf:RDF xmlns:rdf="${RDF}">` +
				`<rdf:Description xmlns:dc="${DC}" rdf:about="">` +
				'<dc:format>application/pdf</dc:format>' +
				'</rdf:Description></rdf:RDF></x:xmpmeta>',
		);
	});

	it('wraps a packet by default', () => {
		const out = marshal(pdfDoc());
		assert.ok(out.startsWith(PACKET_HEADER));
		assert.ok(out.endsWith(PACKET_FOOTER));
	});

	it('indents', () => {
		assert.equal(
			marshalIndent(pdfDoc(), '  ', { packet: false }),
			[
				'<x:xmpmeta xmlns:x="adobe:ns:meta/" x:xmptk="TS XMP SDK 1.0">',
				`  <rdf:RDF xmlns:rdf="${RDF}">`,
				`    <rdf:Description xmlns:dc="${DC}" rdf:about="">`,
				'      <dc:format>application/pdf</dc:format>',
				'    </rdf:Description>',
				'  </rdf:RDF>',
				'</x:xmpmeta>',
			].join('\n'),
		);
	});

	it('pads a packet to the size limit', () => {
		const out = marshal(pdfDoc(), { maxSize: 4096, padding: true });
		assert.equal(out.length, 4096);
		assert.ok(out.endsWith(PACKET_FOOTER));
	});

	it('fails past the size limit', () => {
		assert.throws(
			() => marshal(pdfDoc(), { maxSize: 50 }),
			(err: unknown) => err instanceof SizeLimitExceededError && err.limit === 50 && err.partial === PACKET_HEADER.slice(0, 50),
		);
	});
});

describe('codec — decode', () => {
	it('fills models and keeps unmodeled content', () => {
		const doc = read(SAMPLE);
		assert.equal(doc.about, 'urn:test:doc');
		assert.equal(doc.toolkit, 'Test Writer');
		const m = dc.findModel(doc);
		assert.equal(m?.format, 'image/png');
		assert.deepEqual(m?.title.items, [
			{ value: 'Hello', lang: 'en', isDefault: true },
			{ value: 'Hallo', lang: 'de', isDefault: false },
		]);
		assert.equal(doc.getPath(Path.parse('my:rating')), '3');
		const my = doc.findNs('my');
		assert.equal(my?.uri, 'urn:test:my/');
		assert.equal(my !== undefined && doc.isExternal(my), true);
	});

	it('lists decoded values', () => {
		assert.deepEqual(paths(read(SAMPLE)), ['dc:format=image/png', 'dc:title[de]=Hallo', 'dc:title[en]=Hello', 'my:rating=3']);
	});

	it('survives a round trip', () => {
		const doc = read(SAMPLE);
		const again = read(marshal(doc));
		assert.deepEqual(paths(again), paths(doc));
		assert.equal(again.about, 'urn:test:doc');
		assert.equal(again.toolkit, 'Test Writer');
	});

	it('decodes properties written as attributes', () => {
		const doc = read(
			`<rdf:RDF xmlns:rdf="${RDF}"><rdf:Description rdf:about="" xmlns:xmp="http://ns.adobe.com/xap/1.0/" xmp:Rating="4" xmp:Label="red"/></rdf:RDF>`,
		);
		assert.equal(xmp.findModel(doc)?.rating, 4);
		assert.equal(xmp.findModel(doc)?.label, 'red');
	});

	it('rejects undeclared prefixes', () => {
		assert.throws(
			() => read(`<rdf:RDF xmlns:rdf="${RDF}"><rdf:Description><bogus:thing>1</bogus:thing></rdf:Description></rdf:RDF>`),
			UnknownNamespaceError,
		);
	});

	it('rejects broken XML', () => {
		assert.throws(() => read(`<rdf:RDF xmlns:rdf="${RDF}"><rdf:Description></rdf:RDF>`), XmlParseError);
	});
});

describe('codec — maps, fixed lists and versions', () => {
	const doc = (): Document =>
		catalogDoc((c) => {
			c.tags.set('color', 'red');
			c.props.set('size', 'L');
			c.corners = [3, 7];
		});

	it('writes keyed maps as resources and flat maps in place', () => {
		const out = marshal(doc(), { packet: false });
		assert.ok(out.includes('<cat:tags rdf:parseType="Resource"><cat:color>red</cat:color></cat:tags>'));
		assert.ok(out.includes('<cat:size>L</cat:size>'));
		assert.ok(!out.includes('cat:props'));
	});

	it('reads maps and lists back', () => {
		const src = doc();
		const back = read(marshal(src), src.ctx);
		const m = back.findModel(NS_CAT);
		assert.ok(m instanceof Catalog);
		assert.deepEqual([...m.tags], [['color', 'red']]);
		assert.deepEqual([...m.props], [['size', 'L']]);
		assert.deepEqual(m.corners, [3, 7]);
		assert.deepEqual(paths(back), ['cat:corners[0]=3', 'cat:corners[1]=7', 'cat:size=L', 'cat:tags/color=red']);
	});

	it('rejects more items than a fixed-size list holds', () => {
		const src = doc();
		const text = marshal(src, { packet: false }).replace('<rdf:li>7</rdf:li>', '<rdf:li>7</rdf:li><rdf:li>9</rdf:li>');
		assert.throws(() => read(text, src.ctx), UnmarshalError);
	});

	it('writes only the fields of the requested version', () => {
		const src = catalogDoc((c) => {
			c.legacy = 'old';
			c.modern = 'new';
		});
		assert.equal(
			marshal(src, { packet: false, version: new Version(1) }),
			'<x:xmpmeta xmlns:x="adobe:ns:meta/" x:xmptk="TS XMP SDK 1.0">' +
				`<rdf:RDF xmlns:rdf="${RDF}">` +
				'<rdf:Description xmlns:cat="urn:test:catalog/" rdf:about="">' +
				'<cat:legacy>old</cat:legacy>' +
				'</rdf:Description></rdf:RDF></x:xmpmeta>',
		);
		const v2 = marshal(src, { packet: false, version: new Version(2, 1) });
		assert.ok(v2.includes('<cat:modern>new</cat:modern>'));
		assert.ok(!v2.includes('cat:legacy'));
		const all = marshal(src, { packet: false });
		assert.ok(all.includes('<cat:legacy>old</cat:legacy><cat:modern>new</cat:modern>'));
	});
});
