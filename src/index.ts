/**
 * xmpkit
 *
 * Reads, edits and writes XMP metadata. Typed schema models are bound to a
 * `Document` per namespace; anything no model describes is kept as raw
 * nodes and written back unchanged.
 *
 * Quick start
 * ───────────
 * ```ts
 * import { Document, Path, read, marshalIndent, models } from 'xmpkit';
 *
 * const doc = read(xml);
 * doc.setPath({ path: Path.parse('dc:title[en]'), value: 'A title' });
 * const dc = models.dc.findModel(doc);
 * console.log(marshalIndent(doc));
 * ```
 */

// Engine
export { Document } from './document.ts';
export { XmpContext, createContext, defaultContext, register } from './context.ts';
export { DEFAULT_OPTIONS, LOG_LEVEL_ENV, resolveOptions } from './config.ts';
export type { LogLevel, XmpOptions } from './config.ts';
export { ConsoleLogger } from './log.ts';
export type { Logger } from './log.ts';
export { Registry } from './registry.ts';
export { Version } from './version.ts';

// Errors
export {
	XmpError,
	XmlParseError,
	UnknownNamespaceError,
	PathNotFoundError,
	MalformedArrayError,
	InvalidPathSegmentError,
	UnsupportedFlagsError,
	InvalidFlagError,
	SizeLimitExceededError,
	SchemaConflictError,
	MarshalError,
	UnmarshalError,
	NodeLoopError,
	isParseError,
} from './errors.ts';

// Namespaces and nodes
export { Namespace, NAMESPACE_GROUPS, NS_RDF, NS_X, NS_XML, parseNamespaceGroup } from './namespace.ts';
export type { Model, ModelFactory, NamespaceGroup } from './namespace.ts';
export { Node, NodePool } from './node.ts';
export type { Attr, XmlName } from './node.ts';

// Schemas and values
export { registerType, listOf, mapOf } from './typeinfo.ts';
export type { ArrayType, FieldSpec, FieldSpecs, FieldType, ScalarKind } from './typeinfo.ts';
export { AltString, IntArray, IntList, StringArray, StringList, X_DEFAULT } from './array.ts';
export type { AltItem } from './array.ts';
export { Extension, ExtensionArray, NamedExtensionArray } from './extension.ts';
export { Uri, XmpBool, XmpDate } from './types.ts';

// Paths and sync
export { Path, normalizePaths } from './path.ts';
export type { PathValue } from './path.ts';
export { SyncFlags, formatSyncFlags, parseSyncFlags } from './flags.ts';
export { getModelPath, listModelPaths, setModelPath } from './modelpath.ts';
export { diffPaths } from './sync.ts';
export type { ConverterFunc, SyncDesc } from './sync.ts';
export { Filter } from './filter.ts';

// Codec
export { Encoder, marshal, marshalIndent } from './marshal.ts';
export type { EncoderOptions } from './marshal.ts';
export { Decoder, unmarshal } from './unmarshal.ts';
export type { DecoderOptions } from './unmarshal.ts';
export { read, scan, scanPackets } from './packet.ts';

// Sample schemas
export * as models from './models/index.ts';
