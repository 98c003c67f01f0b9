/**
 * xmpkit — XMP basic schema
 *
 * The `xmp:` schema. After decoding, identifiers found in other schemas are
 * collected into `xmp:Identifier`.
 */

import { register } from '../context.ts';
import { XmpError } from '../errors.ts';
import { SyncFlags } from '../flags.ts';
import { Namespace } from '../namespace.ts';
import type { Model } from '../namespace.ts';
import { Path } from '../path.ts';
import { registerType } from '../typeinfo.ts';
import { StringArray } from '../array.ts';
import { NamedExtensionArray } from '../extension.ts';
import { Uri, XmpDate } from '../types.ts';
import type { Document } from '../document.ts';
import type { ConverterFunc, SyncDesc } from '../sync.ts';

export const NS_XMP = new Namespace('xmp', 'http://ns.adobe.com/xap/1.0/', () => new XmpBase());

/** Prepends `scheme:` so identifiers of different origin stay distinguishable. */
export function prefixer(scheme: string): ConverterFunc {
	return (value) => `${scheme}:${value}`;
}

const identifierSync: readonly SyncDesc[] = [
	{ source: new Path('dc:identifier'), dest: new Path('xmp:Identifier'), flags: SyncFlags.Merge },
	{ source: new Path('xmpMM:OriginalDocumentID'), dest: new Path('xmp:Identifier'), flags: SyncFlags.Merge, convert: prefixer('uuid:orig') },
];

export class XmpBase implements Model {
	advisory = new StringArray();
	baseUrl = new Uri();
	createDate = new XmpDate();
	creatorTool = '';
	identifier = new StringArray();
	label = '';
	metadataDate = new XmpDate();
	modifyDate = new XmpDate();
	nickname = '';
	rating = 0;
	extensions = new NamedExtensionArray();

	can(prefix: string): boolean {
		return prefix === NS_XMP.name;
	}

	namespaces(): readonly Namespace[] {
		return [NS_XMP];
	}

	syncFromXmp(doc: Document): void {
		doc.syncMulti(identifierSync, this);
	}

	syncToXmp(_doc: Document): void {}

	syncModel(_doc: Document): void {}
}

registerType(XmpBase, {
	advisory: ['xmp:Advisory', StringArray],
	baseUrl: ['xmp:BaseURL', Uri],
	createDate: ['xmp:CreateDate', XmpDate],
	creatorTool: ['xmp:CreatorTool', 'string'],
	identifier: ['xmp:Identifier', StringArray],
	label: ['xmp:Label', 'string'],
	metadataDate: ['xmp:MetadataDate', XmpDate],
	modifyDate: ['xmp:ModifyDate', XmpDate],
	nickname: ['xmp:Nickname', 'string'],
	rating: ['xmp:Rating', 'int'],
	extensions: ['xmp:extension', NamedExtensionArray],
});

register(NS_XMP, 'xmp');

export function findModel(doc: Document): XmpBase | undefined {
	const m = doc.findModel(NS_XMP);
	return m instanceof XmpBase ? m : undefined;
}

export function makeModel(doc: Document): XmpBase {
	const m = doc.makeModel(NS_XMP);
	if (!(m instanceof XmpBase)) throw new XmpError(`xmp: xmp is bound to ${m.constructor.name}`);
	return m;
}
