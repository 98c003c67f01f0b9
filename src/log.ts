/**
 * xmpkit — Diagnostics
 *
 * A small leveled logger writing to stderr.
 */

import chalk from 'chalk';
import { logLevelRank } from './config.ts';
import type { LogLevel } from './config.ts';

export interface Logger {
	debug(msg: string): void;
	info(msg: string): void;
	warn(msg: string): void;
	error(msg: string): void;
}

type Sink = (line: string) => void;

export class ConsoleLogger implements Logger {
	level: LogLevel;
	private readonly sink: Sink;

	constructor(level: LogLevel, sink: Sink = (line) => console.error(line)) {
		this.level = level;
		this.sink = sink;
	}

	private enabled(level: LogLevel): boolean {
		return logLevelRank(level) >= logLevelRank(this.level);
	}

	debug(msg: string): void {
		if (this.enabled('debug')) this.sink(chalk.gray('xmp debug: ') + msg);
	}

	info(msg: string): void {
		if (this.enabled('info')) this.sink(chalk.cyan('xmp info: ') + msg);
	}

	warn(msg: string): void {
		if (this.enabled('warn')) this.sink(chalk.yellow('xmp warn: ') + msg);
	}

	error(msg: string): void {
		if (this.enabled('error')) this.sink(chalk.red('xmp error: ') + msg);
	}
}
