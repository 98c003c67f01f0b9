/**
 * xmpkit — Engine options
 *
 * Options are plain objects merged over `DEFAULT_OPTIONS`. The log level may
 * also come from the `XMP_LOG_LEVEL` environment variable when the caller
 * does not set one explicitly.
 */

// ---------------------------------------------------------------------------
// Log levels
// ---------------------------------------------------------------------------

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

/** Numeric rank used to gate output; higher is quieter. */
export function logLevelRank(level: LogLevel): number {
	return LOG_LEVELS.indexOf(level);
}

export function isLogLevel(value: string): value is LogLevel {
	return LOG_LEVELS.some((l) => l === value);
}

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

export interface XmpOptions {
	/** Agent string written into `x:xmptk` on encode. */
	readonly toolkit: string;
	readonly logLevel: LogLevel;
	/** Maximum number of released nodes kept for reuse. */
	readonly poolCapacity: number;
}

export const DEFAULT_OPTIONS: XmpOptions = {
	toolkit: 'TS XMP SDK 1.0',
	logLevel: 'warn',
	poolCapacity: 5000,
};

/** Environment variable consulted for the log level. */
export const LOG_LEVEL_ENV = 'XMP_LOG_LEVEL';

/**
 * Resolves the effective options. Explicit values win over the environment,
 * which wins over the defaults. An unusable environment value is reported
 * through `invalid` and otherwise ignored.
 */
export function resolveOptions(options: Partial<XmpOptions> = {}, env: NodeJS.ProcessEnv = process.env, invalid?: (value: string) => void): XmpOptions {
	let logLevel = options.logLevel;
	if (logLevel === undefined) {
		const fromEnv = env[LOG_LEVEL_ENV]?.trim().toLowerCase();
		if (fromEnv !== undefined && fromEnv.length > 0) {
			if (isLogLevel(fromEnv)) logLevel = fromEnv;
			else invalid?.(fromEnv);
		}
	}
	return {
		...DEFAULT_OPTIONS,
		...options,
		logLevel: logLevel ?? DEFAULT_OPTIONS.logLevel,
	};
}
