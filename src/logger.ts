import type { Logger } from 'winston';
import * as winston from 'winston';

export type { Logger };

export interface LoggingOptions {
	level?: string;
	file?: string;
	silent?: boolean;
}

const consoleFormat = winston.format.printf(({ level, message, scope }) => {
	const prefix = typeof scope === 'string' ? `${scope}: ` : '';
	return `[${level}] ${prefix}${String(message)}`;
});

const fileFormat = winston.format.printf(({ level, message, scope, timestamp }) => {
	const where = typeof scope === 'string' ? `[${scope}]` : '';
	return `[${String(timestamp)}][${level}]${where} ${String(message)}`;
});

const root = winston.createLogger({
	level: 'info',
	format: winston.format.errors({ stack: true }),
	transports: [new winston.transports.Console({ format: consoleFormat })],
});

/**
 * Configures the process-wide sink. Called once by the entry point; library
 * code only ever asks for scoped loggers.
 */
export function configureLogging(options: LoggingOptions = {}): Logger {
	const transports: winston.transport[] = [
		new winston.transports.Console({ format: consoleFormat }),
	];
	if (options.file) {
		transports.push(new winston.transports.File({
			filename: options.file,
			format: winston.format.combine(winston.format.timestamp(), fileFormat),
		}));
	}
	root.configure({
		level: options.level ?? 'info',
		silent: options.silent ?? false,
		format: winston.format.errors({ stack: true }),
		transports,
	});
	return root;
}

export function getLogger(scope: string): Logger {
	return root.child({ scope });
}
