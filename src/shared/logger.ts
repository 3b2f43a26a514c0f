/**
 * Structured logger
 *
 * TTY: coloured, human readable line + JSON extras
 * non-TTY (Docker/CI): JSON Lines
 *
 * All output goes to stderr so that stdout stays free for CLI results.
 */

import { requestContext } from './request-context.js';

export enum LogLevel {
	DEBUG = 0,
	INFO = 1,
	WARN = 2,
	ERROR = 3,
}

export interface LoggerOptions {
	level?: LogLevel;
	prefix?: string;
}

const LEVEL_NAMES: Record<LogLevel, string> = {
	[LogLevel.DEBUG]: 'DEBUG',
	[LogLevel.INFO]: 'INFO',
	[LogLevel.WARN]: 'WARN',
	[LogLevel.ERROR]: 'ERROR',
};

const LEVEL_COLORS: Record<LogLevel, number> = {
	[LogLevel.DEBUG]: 90,  // grey
	[LogLevel.INFO]:  36,  // cyan
	[LogLevel.WARN]:  33,  // yellow
	[LogLevel.ERROR]: 31,  // red
};

const isTTY = process.stderr.isTTY === true;

function colorize(text: string, colorCode: number): string {
	return `\x1b[${colorCode}m${text}\x1b[0m`;
}

export class Logger {
	private level: LogLevel;
	private prefix: string;

	constructor(options: LoggerOptions = {}) {
		this.level = options.level ?? LogLevel.INFO;
		this.prefix = options.prefix ?? '';
	}

	/** Child logger with a nested prefix */
	withPrefix(prefix: string): Logger {
		return new Logger({
			level: this.level,
			prefix: this.prefix ? `${this.prefix}:${prefix}` : prefix,
		});
	}

	setLevel(level: LogLevel): void {
		this.level = level;
	}

	isLevelEnabled(level: LogLevel): boolean {
		return level >= this.level;
	}

	private log(level: LogLevel, message: string, data?: Record<string, unknown>): void {
		if (level < this.level) return;

		const ts = new Date().toISOString();
		const levelName = LEVEL_NAMES[level];
		const requestId = requestContext.getStore()?.requestId;
		const fields: Record<string, unknown> = {
			...(requestId ? { requestId } : {}),
			...data,
		};

		if (isTTY) {
			const prefix = this.prefix ? `[${this.prefix}] ` : '';
			const colored = colorize(levelName.padEnd(5), LEVEL_COLORS[level]);
			const extra = Object.keys(fields).length > 0
				? ' ' + JSON.stringify(fields)
				: '';
			process.stderr.write(`${ts} ${colored} ${prefix}${message}${extra}\n`);
		} else {
			const entry: Record<string, unknown> = {
				ts,
				level: levelName,
				...(this.prefix ? { module: this.prefix } : {}),
				msg: message,
				...fields,
			};
			process.stderr.write(JSON.stringify(entry) + '\n');
		}
	}

	debug(message: string, data?: Record<string, unknown>): void {
		this.log(LogLevel.DEBUG, message, data);
	}

	info(message: string, data?: Record<string, unknown>): void {
		this.log(LogLevel.INFO, message, data);
	}

	warn(message: string, data?: Record<string, unknown>): void {
		this.log(LogLevel.WARN, message, data);
	}

	error(message: string, data?: Record<string, unknown>): void {
		this.log(LogLevel.ERROR, message, data);
	}
}

/** Parse a level name (case-insensitive); unknown names map to INFO */
export function parseLogLevel(value: string | undefined): LogLevel {
	switch (value?.toUpperCase()) {
		case 'DEBUG': return LogLevel.DEBUG;
		case 'INFO':  return LogLevel.INFO;
		case 'WARN':  return LogLevel.WARN;
		case 'ERROR': return LogLevel.ERROR;
		default:      return LogLevel.INFO;
	}
}

export function getLogLevelFromEnv(): LogLevel {
	return parseLogLevel(process.env.LOG_LEVEL);
}

/** Default logger, level taken from LOG_LEVEL */
export function createDefaultLogger(prefix?: string): Logger {
	return new Logger({
		level: getLogLevelFromEnv(),
		prefix,
	});
}

/** Error → loggable string */
export function errorMessage(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}
