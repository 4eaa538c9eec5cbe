/**
 * Structured Logging Module
 *
 * Provides structured logging for handler diagnostics using JSON Lines (.jsonl)
 * files plus optional console output.
 */

import * as fs from 'fs';
import * as path from 'path';
import chalk from 'chalk';

/**
 * Log levels
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'fatal';

const LEVELS: LogLevel[] = ['debug', 'info', 'warn', 'error', 'fatal'];

/**
 * Base log entry structure
 */
interface BaseLogEntry {
	timestamp: string;
	level: LogLevel;
	type: string;
}

/**
 * Load-order diagnostic entry
 */
export interface LoadOrderLog extends BaseLogEntry {
	type: 'load_order';
	level: 'warn';
	message: string;
	path: string;
	object_type: string;
	file?: string;
}

/**
 * General log entry
 */
export interface GeneralLog extends BaseLogEntry {
	type: 'general';
	message: string;
	context?: Record<string, unknown>;
}

/**
 * Union type for all log entries
 */
export type LogEntry = LoadOrderLog | GeneralLog;

/**
 * Logger configuration
 */
export interface LoggerConfig {
	/** Directory for log files; null disables file output (default: null) */
	logDir?: string | null;
	/** Enable console output (default: true) */
	console?: boolean;
	/** Minimum log level for console output (default: warn) */
	consoleLevel?: LogLevel;
}

const LEVEL_COLORS: Record<LogLevel, (text: string) => string> = {
	debug: chalk.gray,
	info: chalk.cyan,
	warn: chalk.yellow,
	error: chalk.red,
	fatal: chalk.bgRed.white,
};

/**
 * Structured logger for handler diagnostics
 */
export class Logger {
	private logDir: string | null;
	private consoleEnabled: boolean;
	private consoleLevel: LogLevel;

	constructor(config: LoggerConfig = {}) {
		this.logDir = config.logDir ?? null;
		this.consoleEnabled = config.console ?? true;
		this.consoleLevel = config.consoleLevel ?? 'warn';

		this.ensureLogDirectory();
	}

	/**
	 * Ensure log directory exists
	 */
	private ensureLogDirectory(): void {
		if (this.logDir && !fs.existsSync(this.logDir)) {
			fs.mkdirSync(this.logDir, { recursive: true });
		}
	}

	/**
	 * Write log entry to file
	 */
	private writeLogEntry(logType: string, entry: LogEntry): void {
		if (!this.logDir) {
			return;
		}

		const logFile = path.join(this.logDir, `${logType}.jsonl`);
		const logLine = JSON.stringify(entry) + '\n';

		try {
			fs.appendFileSync(logFile, logLine, 'utf8');
		} catch (error) {
			// Fall back to console if file write fails
			console.error('[LOGGER ERROR] Failed to write log:', error);
			console.error('[ORIGINAL LOG]', logLine);
		}
	}

	/**
	 * Output to console if enabled and at or above the threshold
	 */
	private outputToConsole(entry: LogEntry): void {
		if (!this.consoleEnabled) {
			return;
		}

		if (LEVELS.indexOf(entry.level) < LEVELS.indexOf(this.consoleLevel)) {
			return;
		}

		const prefix = LEVEL_COLORS[entry.level](`[${entry.level.toUpperCase()}]`);
		const context = entry.type === 'general' && entry.context
			? ` ${chalk.dim(JSON.stringify(entry.context))}`
			: '';
		const line = `${prefix} ${entry.message}${context}`;

		switch (entry.level) {
			case 'error':
			case 'fatal':
				console.error(line);
				break;
			case 'warn':
				console.warn(line);
				break;
			default:
				console.log(line);
		}
	}

	/**
	 * Log one line of a load-order diagnostic
	 */
	logLoadOrder(
		message: string,
		details: { path: string; objectType: string; file?: string }
	): void {
		const entry: LoadOrderLog = {
			timestamp: new Date().toISOString(),
			level: 'warn',
			type: 'load_order',
			message,
			path: details.path,
			object_type: details.objectType,
			file: details.file,
		};

		this.writeLogEntry('load-order', entry);
		this.outputToConsole(entry);
	}

	/**
	 * Log a general message
	 */
	log(level: LogLevel, message: string, context?: Record<string, unknown>): void {
		const entry: GeneralLog = {
			timestamp: new Date().toISOString(),
			level,
			type: 'general',
			message,
			context,
		};

		this.writeLogEntry('general', entry);
		this.outputToConsole(entry);
	}

	/**
	 * Convenience methods for different log levels
	 */
	debug(message: string, context?: Record<string, unknown>): void {
		this.log('debug', message, context);
	}

	info(message: string, context?: Record<string, unknown>): void {
		this.log('info', message, context);
	}

	warn(message: string, context?: Record<string, unknown>): void {
		this.log('warn', message, context);
	}

	error(message: string, context?: Record<string, unknown>): void {
		this.log('error', message, context);
	}

	fatal(message: string, context?: Record<string, unknown>): void {
		this.log('fatal', message, context);
	}
}

/**
 * Default logger instance
 */
export const logger = new Logger();
