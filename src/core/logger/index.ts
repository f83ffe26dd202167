export {
	Logger,
	logger,
	createLogger,
	redactSensitiveData,
} from './logger.js';
export type { LoggerOptions, LogLevel, LogMeta, ChalkColor } from './logger.js';
