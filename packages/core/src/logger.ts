import type { ILogger, LogLevel } from './types'

const LEVEL_ORDER: Record<LogLevel, number> = {
	debug: 10,
	info: 20,
	warn: 30,
	error: 40,
}

/** A logger implementation that outputs to the console, dropping messages below `level`. */
export class ConsoleLogger implements ILogger {
	constructor(private readonly level: LogLevel = 'debug') {}

	debug(message: string, meta?: Record<string, unknown>): void {
		if (this.enabled('debug')) console.debug(`[DEBUG] ${message}`, meta || '')
	}

	info(message: string, meta?: Record<string, unknown>): void {
		if (this.enabled('info')) console.info(`[INFO] ${message}`, meta || '')
	}

	warn(message: string, meta?: Record<string, unknown>): void {
		if (this.enabled('warn')) console.warn(`[WARN] ${message}`, meta || '')
	}

	error(message: string, meta?: Record<string, unknown>): void {
		if (this.enabled('error')) console.error(`[ERROR] ${message}`, meta || '')
	}

	private enabled(level: LogLevel): boolean {
		return LEVEL_ORDER[level] >= LEVEL_ORDER[this.level]
	}
}

/** A logger implementation that does nothing (no-op). */
export class NullLogger implements ILogger {
	debug(_message: string, _meta?: Record<string, unknown>): void {}
	info(_message: string, _meta?: Record<string, unknown>): void {}
	warn(_message: string, _meta?: Record<string, unknown>): void {}
	error(_message: string, _meta?: Record<string, unknown>): void {}
}
