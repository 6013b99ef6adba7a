/**
 * Line-oriented console logger
 * `[time] LEVEL message {context}`; a child logger merges its context into
 * every line it writes.
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogContext = Record<string, unknown>;

export interface Logger {
	debug(message: string, context?: LogContext): void;
	info(message: string, context?: LogContext): void;
	warn(message: string, context?: LogContext): void;
	error(message: string, err?: unknown, context?: LogContext): void;
	child(context: LogContext): Logger;
}

const LEVEL_RANK: Record<LogLevel, number> = {
	debug: 0,
	info: 1,
	warn: 2,
	error: 3,
};

const CONSOLE_WRITERS: Record<LogLevel, (line: string) => void> = {
	debug: (line) => console.log(line),
	info: (line) => console.log(line),
	warn: (line) => console.warn(line),
	error: (line) => console.error(line),
};

const isLogLevel = (value: string | undefined): value is LogLevel =>
	value !== undefined && value in LEVEL_RANK;

let threshold: LogLevel = isLogLevel(process.env.LOG_LEVEL) ? process.env.LOG_LEVEL : "info";

export function setLogLevel(level: LogLevel): void {
	threshold = level;
}

const describeError = (err: unknown): unknown =>
	err instanceof Error ? { name: err.name, message: err.message, stack: err.stack } : err;

export function formatLine(
	level: LogLevel,
	message: string,
	context: LogContext,
	at: Date = new Date()
): string {
	const head = `[${at.toISOString()}] ${level.toUpperCase().padEnd(5)} ${message}`;
	return Object.keys(context).length > 0 ? `${head} ${JSON.stringify(context)}` : head;
}

export function createLogger(baseContext: LogContext = {}): Logger {
	const write = (level: LogLevel, message: string, context?: LogContext) => {
		if (LEVEL_RANK[level] < LEVEL_RANK[threshold]) return;
		CONSOLE_WRITERS[level](formatLine(level, message, { ...baseContext, ...context }));
	};

	return {
		debug: (message, context) => write("debug", message, context),
		info: (message, context) => write("info", message, context),
		warn: (message, context) => write("warn", message, context),
		error: (message, err, context) =>
			write(
				"error",
				message,
				err === undefined || err === null ? context : { ...context, error: describeError(err) }
			),
		child: (context) => createLogger({ ...baseContext, ...context }),
	};
}

export const logger = createLogger();

export default logger;
