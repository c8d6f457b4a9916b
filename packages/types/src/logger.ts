export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "silent";

export interface LoggerOptions {
	/**
	 * The minimum level that is printed, defaults to "info"
	 */
	level?: LogLevel;
	/**
	 * The prefix template handed to loglevel-plugin-prefix, defaults to "%n"
	 */
	template?: string;
}
