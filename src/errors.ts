/**
 * xmpkit — Error types
 *
 * Every failure the engine reports is an `XmpError`. Callers that want to
 * branch on a specific condition use `instanceof` against the subclasses.
 */

/** Common base of all engine errors. */
export class XmpError extends Error {
	constructor(message: string) {
		super(message);
		this.name = 'XmpError';
	}
}

/**
 * Thrown when the XML input cannot be turned into a node tree.
 */
export class XmlParseError extends XmpError {
	/** Offset in the source string where the problem was detected. */
	readonly position: number;
	/** 1-based line number. */
	readonly line: number;
	/** 1-based column number. */
	readonly column: number;

	constructor(message: string, position: number, line: number, column: number) {
		super(`${message} (line ${line}, col ${column})`);
		this.name = 'XmlParseError';
		this.position = position;
		this.line = line;
		this.column = column;
	}
}

/** A qualified name maps to no namespace known to the document or registry. */
export class UnknownNamespaceError extends XmpError {
	readonly namespace: string;

	constructor(namespace: string) {
		super(`xmp: unknown namespace '${namespace}'`);
		this.name = 'UnknownNamespaceError';
		this.namespace = namespace;
	}
}

/**
 * Internal sentinel raised by the model path walker when a path leaves the
 * modelled schema. The document façade catches it and retries against raw
 * nodes; anything escaping to callers is rethrown as a plain `XmpError`.
 */
export class PathNotFoundError extends XmpError {
	readonly path: string;

	constructor(path: string) {
		super(`xmp: path '${path}' not found`);
		this.name = 'PathNotFoundError';
		this.path = path;
	}
}

/** A wire array node has the wrong number of children or an unknown container tag. */
export class MalformedArrayError extends XmpError {
	constructor(message: string) {
		super(`xmp: malformed array: ${message}`);
		this.name = 'MalformedArrayError';
	}
}

/** A path segment carries an unusable qualifier. */
export class InvalidPathSegmentError extends XmpError {
	readonly segment: string;

	constructor(segment: string, reason: string) {
		super(`xmp: invalid path segment '${segment}': ${reason}`);
		this.name = 'InvalidPathSegmentError';
		this.segment = segment;
	}
}

/** The sync flags of a mutation do not permit the requested transition. */
export class UnsupportedFlagsError extends XmpError {
	readonly flags: number;

	constructor(reason: string, flags: number) {
		super(`xmp: ${reason}`);
		this.name = 'UnsupportedFlagsError';
		this.flags = flags;
	}
}

/** A sync flag token could not be parsed. */
export class InvalidFlagError extends XmpError {
	readonly token: string;

	constructor(token: string) {
		super(`xmp: invalid sync flag '${token}'`);
		this.name = 'InvalidFlagError';
		this.token = token;
	}
}

/** Encoding wrote past the configured byte limit. */
export class SizeLimitExceededError extends XmpError {
	readonly limit: number;
	/** Everything that fit into the limit before the write was cut off. */
	readonly partial: string;

	constructor(limit: number, partial: string) {
		super('xmp: document exceeds size limit');
		this.name = 'SizeLimitExceededError';
		this.limit = limit;
		this.partial = partial;
	}
}

/** A registered type's field table is inconsistent. */
export class SchemaConflictError extends XmpError {
	constructor(message: string) {
		super(`xmp: ${message}`);
		this.name = 'SchemaConflictError';
	}
}

/** A value could not be converted to nodes. */
export class MarshalError extends XmpError {
	constructor(message: string) {
		super(`xmp: ${message}`);
		this.name = 'MarshalError';
	}
}

/** Nodes could not be converted to a value. */
export class UnmarshalError extends XmpError {
	constructor(message: string) {
		super(`xmp: ${message}`);
		this.name = 'UnmarshalError';
	}
}

/**
 * A node was inserted below itself. This is a caller bug, not a data
 * problem, and is never caught by the engine.
 */
export class NodeLoopError extends Error {
	constructor(name: string) {
		super(`xmp: node loop detected at '${name}'`);
		this.name = 'NodeLoopError';
	}
}

/** Parse failures are never swallowed by `SyncFlags.NoFail`. */
export function isParseError(err: unknown): boolean {
	return err instanceof InvalidPathSegmentError || err instanceof InvalidFlagError || err instanceof XmlParseError;
}

/** Wraps non-Error throwables so messages are always available. */
export function errorMessage(err: unknown): string {
	return err instanceof Error ? err.message : String(err);
}
