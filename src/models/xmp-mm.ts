/**
 * xmpkit — XMP media management
 *
 * The `xmpMM:` schema with its `stRef:` (resource reference) and `stEvt:`
 * (resource event) structures. `Pantry` keeps complete descriptions of
 * ingredient documents, each with its own typed models.
 */

import { register } from '../context.ts';
import { XmpError } from '../errors.ts';
import { SyncFlags } from '../flags.ts';
import { Namespace } from '../namespace.ts';
import type { Model } from '../namespace.ts';
import { listOf, registerType } from '../typeinfo.ts';
import { StringList } from '../array.ts';
import { Extension, ExtensionArray } from '../extension.ts';
import { Uri, XmpDate } from '../types.ts';
import { Document } from '../document.ts';

export const NS_XMP_MM = new Namespace('xmpMM', 'http://ns.adobe.com/xap/1.0/mm/', () => new XmpMM());
export const NS_ST_REF = new Namespace('stRef', 'http://ns.adobe.com/xap/1.0/sType/ResourceRef#');
export const NS_ST_EVT = new Namespace('stEvt', 'http://ns.adobe.com/xap/1.0/sType/ResourceEvent#');

// ---------------------------------------------------------------------------
// Structures
// ---------------------------------------------------------------------------

/** Points at another document or a part of it. */
export class ResourceRef {
	alternatePaths = new StringList();
	documentId = '';
	filePath = new Uri();
	instanceId = '';
	lastModifyDate = new XmpDate();
	manager = '';
	originalDocumentId = '';
	renditionClass = '';
	versionId = '';
}

registerType(ResourceRef, {
	alternatePaths: ['stRef:alternatePaths', StringList],
	documentId: ['stRef:documentID,attr', 'string'],
	filePath: ['stRef:filePath,attr', Uri],
	instanceId: ['stRef:instanceID,attr', 'string'],
	lastModifyDate: ['stRef:lastModifyDate,attr', XmpDate],
	manager: ['stRef:manager,attr', 'string'],
	originalDocumentId: ['stRef:originalDocumentID,attr', 'string'],
	renditionClass: ['stRef:renditionClass,attr', 'string'],
	versionId: ['stRef:versionID,attr', 'string'],
});

export type ActionType = 'converted' | 'copied' | 'created' | 'cropped' | 'edited' | 'filtered' | 'formatted' | 'version_updated' | 'printed' | 'published' | 'managed' | 'produced' | 'resized' | 'saved' | '';

/** One entry of the processing history. */
export class ResourceEvent {
	action: ActionType = '';
	changed = '';
	instanceId = '';
	parameters = '';
	softwareAgent = '';
	when = new XmpDate();
}

registerType(ResourceEvent, {
	action: ['stEvt:action,attr', 'string'],
	changed: ['stEvt:changed,attr', 'string'],
	instanceId: ['stEvt:instanceID,attr', 'string'],
	parameters: ['stEvt:parameters,attr', 'string'],
	softwareAgent: ['stEvt:softwareAgent,attr', 'string'],
	when: ['stEvt:when,attr', XmpDate],
});

// ---------------------------------------------------------------------------
// Model
// ---------------------------------------------------------------------------

export class XmpMM implements Model {
	derivedFrom = new ResourceRef();
	documentId = '';
	history: ResourceEvent[] = [];
	ingredients: ResourceRef[] = [];
	instanceId = '';
	manager = '';
	originalDocumentId = '';
	pantry = new ExtensionArray();
	renditionClass = '';
	versionId = '';

	can(prefix: string): boolean {
		return prefix === NS_XMP_MM.name;
	}

	namespaces(): readonly Namespace[] {
		return [NS_XMP_MM, NS_ST_REF, NS_ST_EVT];
	}

	syncFromXmp(_doc: Document): void {}

	syncToXmp(_doc: Document): void {}

	syncModel(_doc: Document): void {}

	addHistory(event: ResourceEvent): void {
		this.history.push(event);
	}

	lastEvent(): ResourceEvent | undefined {
		return this.history[this.history.length - 1];
	}

	/**
	 * Stores a copy of every value in `doc` as a new pantry entry. The copy
	 * shares no nodes with `doc`.
	 */
	addPantry(doc: Document): void {
		const copy = new Document(doc.ctx);
		copy.merge(doc, SyncFlags.Merge);
		const ext = new Extension();
		ext.nodes = copy.nodes;
		copy.nodes = [];
		this.pantry.add(ext);
	}
}

registerType(XmpMM, {
	derivedFrom: ['xmpMM:DerivedFrom', ResourceRef],
	documentId: ['xmpMM:DocumentID', 'string'],
	history: ['xmpMM:History', listOf(ResourceEvent, { array: 'Seq' })],
	ingredients: ['xmpMM:Ingredients', listOf(ResourceRef, { array: 'Bag' })],
	instanceId: ['xmpMM:InstanceID', 'string'],
	manager: ['xmpMM:Manager', 'string'],
	originalDocumentId: ['xmpMM:OriginalDocumentID', 'string'],
	pantry: ['xmpMM:Pantry', ExtensionArray],
	renditionClass: ['xmpMM:RenditionClass', 'string'],
	versionId: ['xmpMM:VersionID', 'string'],
});

register(NS_XMP_MM, 'xmp');
register(NS_ST_REF);
register(NS_ST_EVT);

export function findModel(doc: Document): XmpMM | undefined {
	const m = doc.findModel(NS_XMP_MM);
	return m instanceof XmpMM ? m : undefined;
}

export function makeModel(doc: Document): XmpMM {
	const m = doc.makeModel(NS_XMP_MM);
	if (!(m instanceof XmpMM)) throw new XmpError(`xmp: xmpMM is bound to ${m.constructor.name}`);
	return m;
}
