import winston from 'winston';
import chalk from 'chalk';
import boxen from 'boxen';
import fs from 'fs';
import path from 'path';
import { env } from '../env.js';

// ===== 1. Foundation Layer: Winston Configuration =====

const logLevels = {
	error: 0, // Highest priority
	warn: 1,
	info: 2,
	http: 3,
	verbose: 4,
	debug: 5,
	silly: 6, // Lowest priority
};

export type LogLevel = keyof typeof logLevels;

const isLogLevel = (level: string): level is LogLevel => Object.keys(logLevels).includes(level);

// ===== 2. Security Layer: Data Redaction =====

const SENSITIVE_KEYS = ['apiKey', 'password', 'secret', 'token', 'auth', 'key', 'credential'];
const MASK_REGEX = new RegExp(
	`(${SENSITIVE_KEYS.join('|')})(["']?\\s*[:=]\\s*)(["'])?.*?\\3(?=[\\s,}]|$)`,
	'gi'
);

export const redactSensitiveData = (message: string): string => {
	const shouldRedact = env.REDACT_SECRETS !== false;
	if (!shouldRedact) return message;

	return message.replace(
		MASK_REGEX,
		(_match, key: string, separator: string, quote: string | undefined) => {
			const quoteMark = quote || '';
			return `${key}${separator}${quoteMark}***REDACTED***${quoteMark}`;
		}
	);
};

// ===== 3. Visual Formatting Layer =====

type ChalkColor =
	| 'red'
	| 'green'
	| 'yellow'
	| 'blue'
	| 'magenta'
	| 'cyan'
	| 'white'
	| 'gray'
	| 'redBright'
	| 'greenBright'
	| 'yellowBright'
	| 'blueBright'
	| 'magentaBright'
	| 'cyanBright'
	| 'whiteBright';

const levelColorMap: Record<string, (text: string) => string> = {
	error: chalk.red,
	warn: chalk.yellow,
	info: chalk.blue,
	http: chalk.cyan,
	verbose: chalk.magenta,
	debug: chalk.gray,
	silly: chalk.gray.dim,
};

const CHALK_COLORS: readonly string[] = [
	'red',
	'green',
	'yellow',
	'blue',
	'magenta',
	'cyan',
	'white',
	'gray',
	'redBright',
	'greenBright',
	'yellowBright',
	'blueBright',
	'magentaBright',
	'cyanBright',
	'whiteBright',
] satisfies ChalkColor[];

const isChalkColor = (value: unknown): value is ChalkColor =>
	typeof value === 'string' && CHALK_COLORS.includes(value);

// Create custom format for masking
const maskFormat = winston.format(info => {
	if (typeof info.message === 'string') {
		info.message = redactSensitiveData(info.message);
	}
	return info;
});

// Console formatting
const consoleFormat = winston.format.printf(({ level, message, timestamp, color }) => {
	const colorize = levelColorMap[level] || chalk.white;
	let formattedMessage = String(message);

	// Apply custom color if specified
	if (isChalkColor(color)) {
		formattedMessage = chalk[color](formattedMessage);
	}

	return `${chalk.dim(String(timestamp))} ${colorize(level.toUpperCase())}: ${formattedMessage}`;
});

// File formatting (no colors), metadata appended as JSON
const fileFormat = winston.format.printf(({ level, message, timestamp, color: _color, ...meta }) => {
	const metaText = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
	return `${String(timestamp)} [${level.toUpperCase()}]: ${String(message)}${metaText}`;
});

// ===== 4. Configuration Layer =====

const getDefaultLogLevel = (): LogLevel => {
	const envLevel = env.NBCONDA_LOG_LEVEL?.toLowerCase();
	if (envLevel && isLogLevel(envLevel)) {
		return envLevel;
	}
	return 'info'; // Safe default
};

// ===== 5. Logger Options Interface =====

export interface LoggerOptions {
	level?: string;
	silent?: boolean;
	file?: string;
	/**
	 * Additional file that receives error-level entries only, alongside the
	 * console or main file transport. Defaults to NBCONDA_ERROR_LOG.
	 */
	errorFile?: string;
}

export type LogMeta = Record<string, unknown>;

// ===== 6. Core Logger Class =====

export class Logger {
	private logger: winston.Logger;
	private isSilent: boolean = false;
	private errorFile: string | undefined;

	constructor(options: LoggerOptions = {}) {
		const requested = options.level?.toLowerCase();
		const level = requested && isLogLevel(requested) ? requested : getDefaultLogLevel();
		this.isSilent = options.silent || false;
		this.errorFile = options.errorFile ?? (env.NBCONDA_ERROR_LOG || undefined);

		this.logger = winston.createLogger({
			levels: logLevels,
			level: level,
			format: winston.format.combine(
				winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
				maskFormat()
			),
			transports: this.createTransports(options.file),
			silent: this.isSilent,
		});

		winston.addColors({
			error: 'red',
			warn: 'yellow',
			info: 'blue',
			http: 'cyan',
			verbose: 'magenta',
			debug: 'gray',
			silly: 'gray',
		});
	}

	private createFileTransport(filePath: string, level?: LogLevel): winston.transport {
		fs.mkdirSync(path.dirname(filePath), { recursive: true });
		return new winston.transports.File({
			filename: filePath,
			...(level ? { level } : {}),
			format: winston.format.combine(
				winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
				maskFormat(),
				fileFormat
			),
		});
	}

	private createConsoleTransport(): winston.transport {
		return new winston.transports.Console({
			format: winston.format.combine(
				winston.format.timestamp({ format: 'HH:mm:ss' }),
				maskFormat(),
				consoleFormat
			),
			stderrLevels: Object.keys(logLevels), // Keep stdout for assistant output
		});
	}

	private createTransports(filePath?: string): winston.transport[] {
		const transports: winston.transport[] = [
			filePath ? this.createFileTransport(filePath) : this.createConsoleTransport(),
		];

		if (this.errorFile) {
			transports.push(this.createFileTransport(this.errorFile, 'error'));
		}

		return transports;
	}

	// ===== Core Logging Methods =====

	error(message: string, meta?: LogMeta, color?: ChalkColor): void {
		this.logger.error(message, { ...meta, color });
	}

	warn(message: string, meta?: LogMeta, color?: ChalkColor): void {
		this.logger.warn(message, { ...meta, color });
	}

	info(message: string, meta?: LogMeta, color?: ChalkColor): void {
		this.logger.info(message, { ...meta, color });
	}

	debug(message: string, meta?: LogMeta, color?: ChalkColor): void {
		this.logger.debug(message, { ...meta, color });
	}

	// ===== Specialized Display Features =====

	toolCall(toolName: string, args: unknown): void {
		if (this.isSilent) return;

		const argsString = typeof args === 'string' ? args : JSON.stringify(args, null, 2);

		console.log(
			boxen(
				`${chalk.cyan('Tool')}: ${chalk.yellow(toolName)}\n` +
					`${chalk.dim('Parameters')}:\n${chalk.white(argsString)}`,
				{
					padding: 1,
					borderColor: 'magenta',
					title: 'Tool Prediction',
					titleAlignment: 'center',
				}
			)
		);
	}

	toolResult(toolName: string, result: string, failed = false): void {
		if (this.isSilent) return;

		console.log(
			boxen(
				`${chalk.cyan('Tool')}: ${chalk.yellow(toolName)}\n` +
					(failed ? chalk.red(result) : chalk.green(result)),
				{
					padding: 1,
					borderColor: failed ? 'red' : 'green',
					title: failed ? 'Tool Error' : 'Tool Result',
					titleAlignment: 'center',
				}
			)
		);
	}

	// ===== Runtime Configuration Management =====

	setLevel(level: string): void {
		const normalized = level.toLowerCase();
		if (isLogLevel(normalized)) {
			this.logger.level = normalized;
		} else {
			this.error(`Invalid log level: ${level}. Valid levels: ${Object.keys(logLevels).join(', ')}`);
		}
	}

	getLevel(): string {
		return this.logger.level;
	}
}

// ===== Singleton Pattern =====

export const logger = new Logger();

export type { ChalkColor };

export const createLogger = (options: LoggerOptions = {}): Logger => {
	return new Logger(options);
};

