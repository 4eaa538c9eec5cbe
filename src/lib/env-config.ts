/**
 * Configuration Management
 *
 * Processor configuration read from environment variables (and an optional
 * .env file), validated with zod.
 */

import { config as loadEnv } from 'dotenv';
import { z } from 'zod';
import { ok, err, unwrapOrElse, type Result } from './result-types.js';
import { ConfigError } from './errors/HandlerErrors.js';
import { Logger, type LogLevel } from './logger.js';

// ============================================================================
// Configuration Schema
// ============================================================================

const booleanString = z
	.enum(['true', 'false', '1', '0', 'yes', 'no'])
	.transform(value => value === 'true' || value === '1' || value === 'yes');

const EnvSchema = z.object({
	DOCGEN_LOAD_ORDER_ERRORS: booleanString.default('true'),
	DOCGEN_LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'fatal']).default('warn'),
	DOCGEN_LOG_DIR: z.string().min(1).optional(),
	DOCGEN_LOG_CONSOLE: booleanString.default('true'),
});

/**
 * Settings consumed by the statement processor and its logger
 */
export interface ProcessorConfig {
	/** Emit diagnostics for references to objects not parsed yet */
	loadOrderErrors: boolean;

	logLevel: LogLevel;

	/** Directory for JSON Lines logs; undefined disables file logging */
	logDir?: string;

	logToConsole: boolean;
}

export const DEFAULT_PROCESSOR_CONFIG: ProcessorConfig = {
	loadOrderErrors: true,
	logLevel: 'warn',
	logToConsole: true,
};

// ============================================================================
// Loading
// ============================================================================

/**
 * Build a processor configuration from environment variables
 *
 * @param env - Variables to read (default: process.env)
 * @returns Result with the configuration or a ConfigError listing every bad variable
 */
export function loadProcessorConfig(
	env: Record<string, string | undefined> = process.env
): Result<ProcessorConfig, ConfigError> {
	const parsed = EnvSchema.safeParse(env);

	if (!parsed.success) {
		const issues = parsed.error.issues.map(
			issue => `${issue.path.join('.')}: ${issue.message}`
		);
		return err(new ConfigError(`Invalid configuration: ${issues.join('; ')}`, issues));
	}

	return ok({
		loadOrderErrors: parsed.data.DOCGEN_LOAD_ORDER_ERRORS,
		logLevel: parsed.data.DOCGEN_LOG_LEVEL,
		logDir: parsed.data.DOCGEN_LOG_DIR,
		logToConsole: parsed.data.DOCGEN_LOG_CONSOLE,
	});
}

/**
 * Processor configuration from the environment, or the defaults when it is invalid
 *
 * @param onError - Told about the rejected environment before the defaults are used
 */
export function resolveProcessorConfig(
	env: Record<string, string | undefined> = process.env,
	onError?: (error: ConfigError) => void
): ProcessorConfig {
	return unwrapOrElse(loadProcessorConfig(env), error => {
		onError?.(error);
		return DEFAULT_PROCESSOR_CONFIG;
	});
}

/**
 * Build a logger from a processor configuration
 */
export function createLogger(config: ProcessorConfig): Logger {
	return new Logger({
		logDir: config.logDir ?? null,
		console: config.logToConsole,
		consoleLevel: config.logLevel,
	});
}

// ============================================================================
// Configuration Manager
// ============================================================================

/**
 * Configuration Manager
 *
 * Loads the optional .env file and exposes the validated processor configuration.
 */
export class ConfigurationManager {
	constructor(private envPath?: string) {}

	/**
	 * Load environment variables from .env file
	 *
	 * @returns Result indicating success or failure
	 */
	loadEnv(): Result<void, ConfigError> {
		try {
			// A missing .env file is not an error
			loadEnv({ path: this.envPath });
			return ok(undefined);
		} catch (error) {
			return err(
				new ConfigError(
					`Failed to load .env file: ${error instanceof Error ? error.message : 'Unknown error'}`
				)
			);
		}
	}

	/**
	 * Load .env, then read and validate the processor configuration
	 */
	getProcessorConfig(): Result<ProcessorConfig, ConfigError> {
		return this.loadEnv().andThen(() => loadProcessorConfig(process.env));
	}
}
