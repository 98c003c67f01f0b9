/**
 * Tests for the bundled schemas.
 */

import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { Document } from '../src/document.ts';
import { UnmarshalError } from '../src/errors.ts';
import { SyncFlags } from '../src/flags.ts';
import { marshal } from '../src/marshal.ts';
import { read } from '../src/packet.ts';
import { Path } from '../src/path.ts';
import { Uri, XmpDate } from '../src/types.ts';
import * as dc from '../src/models/dc.ts';
import * as xmp from '../src/models/xmp-base.ts';
import * as xmpMM from '../src/models/xmp-mm.ts';

function savedEvent(): xmpMM.ResourceEvent {
	const ev = new xmpMM.ResourceEvent();
	ev.action = 'saved';
	ev.when = new XmpDate('2024-01-02T03:04:05Z');
	return ev;
}

describe('models — xmpMM', () => {
	it('lists nested structures with their own prefixes', () => {
		const doc = new Document();
		const mm = xmpMM.makeModel(doc);
		mm.documentId = 'xmp.did:1';
		mm.addHistory(savedEvent());
		assert.equal(mm.lastEvent()?.action, 'saved');
		assert.deepEqual(
			doc.listPaths().map((v) => `${v.path.toString()}=${v.value}`),
			['xmpMM:DocumentID=xmp.did:1', 'xmpMM:History[0]/stEvt:action=saved', 'xmpMM:History[0]/stEvt:when=2024-01-02T03:04:05Z'],
		);
	});

	it('round-trips references and events', () => {
		const doc = new Document();
		const mm = xmpMM.makeModel(doc);
		mm.derivedFrom.documentId = 'xmp.did:0';
		mm.derivedFrom.alternatePaths.add('/a', '/b');
		mm.addHistory(savedEvent());
		const ref = new xmpMM.ResourceRef();
		ref.filePath = new Uri('file:///tmp/x.psd');
		mm.ingredients.push(ref);

		const back = xmpMM.findModel(read(marshal(doc)));
		assert.equal(back?.derivedFrom.documentId, 'xmp.did:0');
		assert.deepEqual(back?.derivedFrom.alternatePaths.items, ['/a', '/b']);
		assert.equal(back?.history.length, 1);
		assert.equal(back?.history[0]?.action, 'saved');
		assert.equal(back?.history[0]?.when.toString(), '2024-01-02T03:04:05Z');
		assert.equal(back?.ingredients[0]?.filePath.value, 'file:///tmp/x.psd');
	});

	it('round-trips pantry entries with their models', () => {
		const ingredient = new Document();
		dc.makeModel(ingredient).format = 'pdf';
		const doc = new Document();
		xmpMM.makeModel(doc).addPantry(ingredient);

		const back = read(marshal(doc));
		assert.equal(back.getPath(Path.parse('xmpMM:Pantry[0]/dc:format')), 'pdf');
		const entry = xmpMM.findModel(back)?.pantry.items[0];
		assert.ok(entry?.findNode('dc')?.model instanceof dc.DublinCore);
	});
});

describe('models — xmp', () => {
	it('prefixer tags identifiers', () => {
		assert.equal(xmp.prefixer('uuid')('1234'), 'uuid:1234');
	});

	it('named extensions route paths by entry name', () => {
		const doc = new Document();
		const path = Path.parse('xmp:extension/PRIVATE/dc:format');
		doc.setPath({ path, value: 'pdf' });
		assert.equal(doc.getPath(path), 'pdf');
		assert.equal(doc.getPath(Path.parse('xmp:extension/OTHER/dc:format')), '');
		assert.deepEqual(
			doc.listPaths().map((v) => `${v.path.toString()}=${v.value}`),
			['xmp:extension/PRIVATE/dc:format=pdf'],
		);

		const back = read(marshal(doc));
		assert.equal(back.getPath(path), 'pdf');
		assert.equal(xmp.findModel(back)?.extensions.find('PRIVATE')?.name, 'PRIVATE');
	});

	it('named extensions survive a merge and drop out when emptied', () => {
		const src = new Document();
		const path = Path.parse('xmp:extension/PRIVATE/dc:format');
		src.setPath({ path, value: 'pdf' });
		const dst = new Document();
		dst.merge(src, SyncFlags.Merge);
		assert.equal(dst.getPath(path), 'pdf');

		assert.throws(() => dst.setPath({ path: Path.parse('xmp:extension/PRIVATE'), value: 'x' }), UnmarshalError);
		dst.setPath({ path, value: '', flags: SyncFlags.Delete });
		assert.equal(xmp.findModel(dst)?.extensions.length, 0);
	});

	it('dates validate their text', () => {
		assert.equal(new XmpDate(new Date(Date.UTC(2024, 0, 2, 3, 4, 5))).toString(), '2024-01-02T03:04:05Z');
		assert.equal(new XmpDate('2024-05').toString(), '2024-05');
		assert.throws(() => new XmpDate('2024-13-45'), UnmarshalError);
		assert.throws(() => new XmpDate('yesterday'), UnmarshalError);
		assert.throws(() => new XmpDate('2024-02-30'), UnmarshalError);
	});

	it('dates accept the layouts other writers use', () => {
		const norm = (text: string): string => new XmpDate(text).toString();
		assert.equal(norm('2016-11-25T14:13:40+0100'), '2016-11-25T14:13:40+01:00');
		assert.equal(norm('2016-11-25 14:13:40'), '2016-11-25T14:13:40');
		assert.equal(norm('2011-02-15T10:15:14+1:00'), '2011-02-15T10:15:14+01:00');
		assert.equal(norm('2011-02-15T10:15:14+1'), '2011-02-15T10:15:14+01:00');
		assert.equal(norm('2017-09-15T20:17:41+00200'), '2017-09-15T20:17:41+02:00');
		assert.equal(norm('2016:11:25'), '2016-11-25');
		assert.equal(norm('2016:11:25 14:13:40.250'), '2016-11-25T14:13:40.250');
		assert.equal(norm('2016-11-25T14:13Z'), '2016-11-25T14:13Z');
		assert.equal(norm('06/01/02T15:04:05-07:00'), '2006-01-02T15:04:05-07:00');
		assert.equal(norm('20060102T15h04m05s-07:00'), '2006-01-02T15:04:05-07:00');
		assert.equal(norm('2006-01-00T00:00:00Z'), '2006-01');
		assert.equal(norm('15:04:05-07:00'), '0000-01-01T15:04:05-07:00');
		assert.equal(norm('150405-0700'), '0000-01-01T15:04:05-07:00');
		assert.equal(new XmpDate('00/00/00T00:00:00+00:00').isZero(), true);
	});

	it('a document with a non-ISO date still decodes', () => {
		const doc = read(
			'<x:xmpmeta xmlns:x="adobe:ns:meta/"><rdf:RDF xmlns:rdf="http://www.w3.org/1999/02/22-rdf-syntax-ns#">' +
				'<rdf:Description rdf:about="" xmlns:xmp="http://ns.adobe.com/xap/1.0/">' +
				'<xmp:CreateDate>2016-11-25T14:13:40+0100</xmp:CreateDate>' +
				'<xmp:ModifyDate>2016:11:25</xmp:ModifyDate>' +
				'</rdf:Description></rdf:RDF></x:xmpmeta>',
		);
		const m = xmp.findModel(doc);
		assert.equal(m?.createDate.toString(), '2016-11-25T14:13:40+01:00');
		assert.equal(m?.modifyDate.toString(), '2016-11-25');
	});
});
