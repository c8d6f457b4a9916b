import { type LoggerOptions } from "@bitblocks/types";
import loglevel from "loglevel";
import prefix from "loglevel-plugin-prefix";

export interface ILogger {
	trace(...args: unknown[]): void;
	debug(...args: unknown[]): void;
	info(...args: unknown[]): void;
	warn(...args: unknown[]): void;
	error(...args: unknown[]): void;
}

prefix.reg(loglevel);

/**
 * Logger is a class that provides a logger for the application.
 * It provides methods to log messages at different levels.
 */
export class Logger implements ILogger {
	private log: loglevel.Logger;

	/**
	 * Constructor for Logger
	 * @param context - The context of the logger
	 * @param config - The configuration for the logger
	 */
	constructor(context: string, config?: LoggerOptions) {
		this.log = loglevel.getLogger(context);
		this.log.setLevel(config?.level ?? "info");
		prefix.apply(this.log, {
			template: config?.template ?? "%n",
		});
	}

	get level(): number {
		return this.log.getLevel();
	}

	trace(...args: unknown[]): void {
		this.log.trace(...args);
	}

	debug(...args: unknown[]): void {
		this.log.debug(...args);
	}

	info(...args: unknown[]): void {
		this.log.info(...args);
	}

	warn(...args: unknown[]): void {
		this.log.warn(...args);
	}

	error(...args: unknown[]): void {
		this.log.error(...args);
	}
}
