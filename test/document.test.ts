/**
 * Tests for documents: namespaces, models and path access.
 */

import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { createContext } from '../src/context.ts';
import { Document } from '../src/document.ts';
import { InvalidPathSegmentError, UnknownNamespaceError, UnsupportedFlagsError, XmpError } from '../src/errors.ts';
import { SyncFlags } from '../src/flags.ts';
import { marshal } from '../src/marshal.ts';
import { setModelPath } from '../src/modelpath.ts';
import { Namespace } from '../src/namespace.ts';
import type { Model } from '../src/namespace.ts';
import { Path } from '../src/path.ts';
import { listOf, mapOf, registerType } from '../src/typeinfo.ts';
import * as dc from '../src/models/dc.ts';
import * as xmp from '../src/models/xmp-base.ts';
import * as xmpMM from '../src/models/xmp-mm.ts';

function set(doc: Document, path: string, value: string, flags = 0): void {
	doc.setPath({ path: Path.parse(path), value, flags });
}

function get(doc: Document, path: string): string {
	return doc.getPath(Path.parse(path));
}

const NS_SHEET = new Namespace('tst', 'urn:test:sheet/', () => new Sheet());

class Sheet implements Model {
	tags = new Map<string, string>();
	props = new Map<string, string>();
	corners: number[] = [];

	can(prefix: string): boolean {
		return prefix === NS_SHEET.name;
	}

	namespaces(): readonly Namespace[] {
		return [NS_SHEET];
	}

	syncFromXmp(_doc: Document): void {}

	syncToXmp(_doc: Document): void {}

	syncModel(_doc: Document): void {}
}

registerType(Sheet, {
	tags: ['tst:tags', mapOf('string')],
	props: ['tst:props,flat', mapOf('string')],
	corners: ['tst:corners', listOf('int', { fixed: 2 })],
});

function sheetDoc(): Document {
	const ctx = createContext();
	ctx.registry.register(NS_SHEET);
	return new Document(ctx);
}

describe('document — models', () => {
	it('makeModel creates once and binds the home namespace', () => {
		const doc = new Document();
		const m = dc.makeModel(doc);
		assert.equal(dc.makeModel(doc), m);
		assert.equal(doc.nodes.length, 1);
		assert.equal(doc.nodes[0]?.model, m);
		assert.equal(doc.isDirty(), true);
	});

	it('a multi-namespace model answers for each of them', () => {
		const doc = new Document();
		const mm = xmpMM.makeModel(doc);
		assert.equal(doc.findModel(xmpMM.NS_XMP_MM), mm);
		assert.deepEqual(
			doc.namespaces().map((ns) => ns.name),
			['xmpMM', 'stRef', 'stEvt'],
		);
	});

	it('removeNamespace and close', () => {
		const doc = new Document();
		dc.makeModel(doc);
		xmp.makeModel(doc);
		assert.equal(doc.removeNamespace(dc.NS_DC), true);
		assert.equal(doc.removeNamespace(dc.NS_DC), false);
		assert.equal(dc.findModel(doc), undefined);
		doc.close();
		assert.equal(doc.nodes.length, 0);
	});
});

describe('document — language alternatives', () => {
	const make = (): Document => {
		const doc = new Document();
		set(doc, 'dc:title[en]', 'english');
		set(doc, 'dc:title[de]', 'german');
		return doc;
	};

	it('reads by language and index', () => {
		const doc = make();
		assert.equal(get(doc, 'dc:title'), 'english');
		assert.equal(get(doc, 'dc:title[]'), 'english');
		assert.equal(get(doc, 'dc:title[0]'), 'english');
		assert.equal(get(doc, 'dc:title[x-default]'), 'english');
		assert.equal(get(doc, 'dc:title[de]'), 'german');
		assert.equal(get(doc, 'dc:title[fr]'), '');
		assert.equal(dc.findModel(doc)?.title.get('de'), 'german');
	});

	it('Append without a language replaces the default', () => {
		const doc = new Document();
		set(doc, 'dc:title', 'Hello', SyncFlags.Create);
		set(doc, 'dc:title', 'World', SyncFlags.Append);
		set(doc, 'dc:title[de]', 'Hallo', SyncFlags.Create | SyncFlags.Append);
		assert.deepEqual(dc.findModel(doc)?.title.items, [
			{ value: 'World', lang: '', isDefault: true },
			{ value: 'Hallo', lang: 'de', isDefault: false },
		]);
		assert.ok(marshal(doc, { packet: false }).includes('<rdf:li xml:lang="x-default">World</rdf:li><rdf:li xml:lang="de">Hallo</rdf:li>'));
	});

	it('Replace without a language resets the array', () => {
		const doc = make();
		set(doc, 'dc:title', 'plain', SyncFlags.Replace);
		assert.deepEqual(dc.findModel(doc)?.title.items, [{ value: 'plain', lang: '', isDefault: true }]);
	});

	it('deleting a language keeps the others', () => {
		const doc = make();
		set(doc, 'dc:title[en]', '', SyncFlags.Delete);
		assert.equal(get(doc, 'dc:title'), 'german');
	});
});

describe('document — lists', () => {
	it('appends unique values and addresses items', () => {
		const doc = new Document();
		set(doc, 'dc:type', 'one');
		set(doc, 'dc:type', 'two');
		set(doc, 'dc:type', 'one');
		assert.equal(get(doc, 'dc:type'), 'one');
		assert.equal(get(doc, 'dc:type[1]'), 'two');
		assert.equal(get(doc, 'dc:type[-1]'), 'two');
		assert.equal(get(doc, 'dc:type[3]'), '');
		set(doc, 'dc:type', '');
		assert.deepEqual(dc.findModel(doc)?.type.items, []);
	});

	it('grows with zero fillers and deletes by index', () => {
		const doc = new Document();
		set(doc, 'dc:type', 'one');
		set(doc, 'dc:type[3]', 'four', SyncFlags.Create);
		assert.deepEqual(dc.findModel(doc)?.type.items, ['one', '', '', 'four']);
		set(doc, 'dc:type[0]', '');
		assert.deepEqual(dc.findModel(doc)?.type.items, ['', '', 'four']);
	});

	it('Create grows an empty list to the index', () => {
		const doc = new Document();
		set(doc, 'dc:type[3]', 'four', SyncFlags.Create);
		assert.deepEqual(dc.findModel(doc)?.type.items, ['', '', '', 'four']);
		set(doc, 'dc:type[7]', '', SyncFlags.Delete);
		assert.deepEqual(dc.findModel(doc)?.type.items, ['', '', '', 'four']);
	});

	it('Unique beats Append beats Replace', () => {
		const doc = new Document();
		const m = dc.makeModel(doc);
		const path = Path.parse('dc:subject');
		set(doc, 'dc:subject', 'a');
		set(doc, 'dc:subject', 'b', SyncFlags.Append);
		assert.deepEqual(m.subject.items, ['a', 'b']);
		setModelPath(m, path, 'a', SyncFlags.Append);
		assert.deepEqual(m.subject.items, ['a', 'b', 'a']);
		setModelPath(m, path, 'b', SyncFlags.Unique | SyncFlags.Append);
		assert.deepEqual(m.subject.items, ['a', 'b', 'a']);
		setModelPath(m, path, 'c', SyncFlags.Unique | SyncFlags.Append);
		assert.deepEqual(m.subject.items, ['a', 'b', 'a', 'c']);
		setModelPath(m, path, 'd', SyncFlags.Append | SyncFlags.Replace);
		assert.deepEqual(m.subject.items, ['a', 'b', 'a', 'c', 'd']);
		setModelPath(m, path, 'e', SyncFlags.Replace);
		assert.deepEqual(m.subject.items, ['e']);
	});

	it('a fixed-size list does not grow past its length', () => {
		const doc = sheetDoc();
		set(doc, 'tst:corners[1]', '7');
		assert.equal(get(doc, 'tst:corners[1]'), '7');
		assert.throws(() => set(doc, 'tst:corners[2]', '9'), UnsupportedFlagsError);
		const sheet = doc.findModel(NS_SHEET);
		assert.ok(sheet instanceof Sheet);
		assert.deepEqual(sheet.corners, [0, 7]);
	});

	it('nested records resolve fields by local name', () => {
		const doc = new Document();
		set(doc, 'xmpMM:Ingredients[0]/alternatePaths', '/tmp/a.psd');
		set(doc, 'xmpMM:Ingredients[0]/stRef:documentID', 'doc-1');
		assert.equal(get(doc, 'xmpMM:Ingredients[0]/alternatePaths'), '/tmp/a.psd');
		assert.equal(get(doc, 'xmpMM:Ingredients[1]/alternatePaths'), '');
		assert.equal(xmpMM.findModel(doc)?.ingredients[0]?.documentId, 'doc-1');
	});
});

describe('document — maps', () => {
	it('a keyed map takes the key from the next segment', () => {
		const doc = sheetDoc();
		set(doc, 'tst:tags/color', 'red');
		assert.equal(get(doc, 'tst:tags/color'), 'red');
		assert.equal(get(doc, 'tst:tags/shape'), '');
		const sheet = doc.findModel(NS_SHEET);
		assert.ok(sheet instanceof Sheet);
		assert.deepEqual([...sheet.tags], [['color', 'red']]);
	});

	it('a flat map takes the key from the field segment', () => {
		const doc = sheetDoc();
		set(doc, 'tst:size', 'L');
		assert.equal(get(doc, 'tst:size'), 'L');
		const sheet = doc.findModel(NS_SHEET);
		assert.ok(sheet instanceof Sheet);
		assert.deepEqual([...sheet.props], [['size', 'L']]);
		set(doc, 'tst:size', '', SyncFlags.Delete);
		assert.equal(sheet.props.size, 0);
	});

	it('lists both kinds of entries', () => {
		const doc = sheetDoc();
		set(doc, 'tst:tags/color', 'red');
		set(doc, 'tst:size', 'L');
		assert.deepEqual(
			doc.listPaths().map((v) => `${v.path.toString()}=${v.value}`),
			['tst:size=L', 'tst:tags/color=red'],
		);
	});
});

describe('document — flags', () => {
	it('zero flags behave like Default', () => {
		const a = new Document();
		const b = new Document();
		set(a, 'dc:format', 'pdf', 0);
		set(b, 'dc:format', 'pdf', SyncFlags.Default);
		assert.equal(get(a, 'dc:format'), get(b, 'dc:format'));
	});

	it('creating needs Create', () => {
		const doc = new Document();
		assert.throws(() => set(doc, 'dc:format', 'pdf', SyncFlags.Replace), UnsupportedFlagsError);
		assert.equal(doc.nodes.length, 0);
	});

	it('changing needs an update flag', () => {
		const doc = new Document();
		set(doc, 'dc:format', 'pdf');
		assert.throws(() => set(doc, 'dc:format', 'png', SyncFlags.Create), UnsupportedFlagsError);
		set(doc, 'dc:format', 'pdf', SyncFlags.Create);
		assert.equal(get(doc, 'dc:format'), 'pdf');
	});

	it('clearing needs Delete', () => {
		const doc = new Document();
		set(doc, 'dc:format', 'pdf');
		assert.throws(() => set(doc, 'dc:format', '', SyncFlags.Create | SyncFlags.Replace), UnsupportedFlagsError);
		set(doc, 'dc:format', '', SyncFlags.Delete);
		assert.equal(get(doc, 'dc:format'), '');
	});

	it('NoFail turns failures into no-ops', () => {
		const doc = new Document();
		set(doc, 'dc:format', 'pdf', SyncFlags.Replace | SyncFlags.NoFail);
		assert.equal(doc.nodes.length, 0);

		set(doc, 'xmp:Rating', '5');
		set(doc, 'xmp:Rating', 'five', SyncFlags.Replace | SyncFlags.NoFail);
		assert.equal(get(doc, 'xmp:Rating'), '5');
		assert.equal(xmp.findModel(doc)?.rating, 5);
	});

	it('NoFail never hides a bad path', () => {
		const doc = new Document();
		assert.throws(
			() => doc.setPath({ path: new Path('dc:title[-3]'), value: 'x', flags: SyncFlags.Create | SyncFlags.NoFail }),
			InvalidPathSegmentError,
		);
	});

	it('an empty namespace path with Delete removes the model', () => {
		const doc = new Document();
		set(doc, 'dc:format', 'pdf');
		set(doc, 'dc:', '');
		assert.equal(dc.findModel(doc), undefined);
		assert.equal(doc.nodes.length, 0);
	});
});

describe('document — raw content', () => {
	it('unknown prefixes need a namespace URI', () => {
		const doc = new Document();
		assert.throws(() => set(doc, 'foo:bar', 'x'), UnknownNamespaceError);
		doc.setPath({ path: Path.parse('foo:bar'), value: 'x', namespace: 'urn:test:foo' });
		assert.equal(get(doc, 'foo:bar'), 'x');
		const ns = doc.findNs('foo');
		assert.equal(ns?.uri, 'urn:test:foo');
		assert.equal(ns !== undefined && doc.isExternal(ns), true);
		assert.deepEqual(doc.listPaths(), [{ path: new Path('foo:bar'), value: 'x', namespace: 'urn:test:foo' }]);
	});

	it('fields a model does not describe fall back to raw nodes', () => {
		const doc = new Document();
		set(doc, 'dc:format', 'pdf');
		set(doc, 'dc:extra', 'kept');
		assert.equal(get(doc, 'dc:extra'), 'kept');
		assert.equal(doc.nodes[0]?.child('dc:extra')?.value, 'kept');
		assert.equal(dc.findModel(doc)?.format, 'pdf');
	});

	it('reports missing content', () => {
		const doc = new Document();
		assert.throws(() => get(doc, 'zz:a'), (err: unknown) => err instanceof UnknownNamespaceError && err.message === "xmp: unknown namespace 'zz'");
		assert.throws(() => get(doc, 'dc:title'), (err: unknown) => err instanceof XmpError && err.message === "xmp: no content for namespace 'dc' at 'dc:title'");
		doc.setPath({ path: Path.parse('foo:bar'), value: 'x', namespace: 'urn:test:foo' });
		assert.throws(() => get(doc, 'foo:missing'), (err: unknown) => err instanceof XmpError && err.message === "xmp: path 'foo:missing' not found");
	});
});

describe('document — listPaths', () => {
	it('lists model values sorted with qualifiers', () => {
		const doc = new Document();
		set(doc, 'dc:title[en]', 'english');
		set(doc, 'dc:subject', 'b');
		set(doc, 'dc:subject', 'a');
		set(doc, 'dc:format', 'pdf');
		assert.deepEqual(
			doc.listPaths().map((v) => `${v.path.toString()}=${v.value}`),
			['dc:format=pdf', 'dc:subject[0]=b', 'dc:subject[1]=a', 'dc:title[en]=english'],
		);
	});
});
