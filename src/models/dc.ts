/**
 * xmpkit — Dublin Core
 *
 * The `dc:` schema. Importing this module registers the namespace.
 */

import { register } from '../context.ts';
import { XmpError } from '../errors.ts';
import { Namespace } from '../namespace.ts';
import type { Model } from '../namespace.ts';
import { registerType } from '../typeinfo.ts';
import { AltString, StringArray, StringList } from '../array.ts';
import type { Document } from '../document.ts';

export const NS_DC = new Namespace('dc', 'http://purl.org/dc/elements/1.1/', () => new DublinCore());

export class DublinCore implements Model {
	contributor = new StringArray();
	coverage = '';
	creator = new StringList();
	description = new AltString();
	format = '';
	identifier = '';
	language = new StringArray();
	publisher = new StringArray();
	relation = new StringArray();
	rights = new AltString();
	source = '';
	subject = new StringArray();
	title = new AltString();
	type = new StringArray();

	can(prefix: string): boolean {
		return prefix === NS_DC.name;
	}

	namespaces(): readonly Namespace[] {
		return [NS_DC];
	}

	syncFromXmp(_doc: Document): void {}

	syncToXmp(_doc: Document): void {}

	syncModel(_doc: Document): void {}
}

registerType(DublinCore, {
	contributor: ['dc:contributor', StringArray],
	coverage: ['dc:coverage', 'string'],
	creator: ['dc:creator', StringList],
	description: ['dc:description', AltString],
	format: ['dc:format', 'string'],
	identifier: ['dc:identifier', 'string'],
	language: ['dc:language', StringArray],
	publisher: ['dc:publisher', StringArray],
	relation: ['dc:relation', StringArray],
	rights: ['dc:rights', AltString],
	source: ['dc:source', 'string'],
	subject: ['dc:subject', StringArray],
	title: ['dc:title', AltString],
	type: ['dc:type', StringArray],
});

register(NS_DC, 'xmp');

export function findModel(doc: Document): DublinCore | undefined {
	const m = doc.findModel(NS_DC);
	return m instanceof DublinCore ? m : undefined;
}

export function makeModel(doc: Document): DublinCore {
	const m = doc.makeModel(NS_DC);
	if (!(m instanceof DublinCore)) throw new XmpError(`xmp: dc is bound to ${m.constructor.name}`);
	return m;
}
