import { Logger } from "@bitblocks/logger";
import { type BitArrayConfig } from "@bitblocks/types";
import { validateBitArrayConfig } from "@bitblocks/validation";
import * as dotenv from "dotenv";
import fs from "node:fs";

const log = new Logger("bitblocks::config");

function parseNumber(value: string | undefined): number | undefined {
	if (value === undefined || value.trim() === "") return undefined;
	return Number(value);
}

/**
 * Load the configuration of a bit array.
 * @param configPath - The path to a JSON configuration file.
 * @returns The validated configuration, or undefined when neither a file nor an environment variable is given.
 */
export function loadConfig(configPath?: string | undefined): BitArrayConfig | undefined {
	if (configPath) {
		let raw: unknown;
		try {
			raw = JSON.parse(fs.readFileSync(configPath, "utf8"));
		} catch (error) {
			log.error(`Failed to load config from ${configPath}:`, error);
			throw error;
		}
		return validateBitArrayConfig(raw);
	}

	dotenv.config();

	const hasEnvConfig = ["BIT_ARRAY_SIZE", "BIT_ARRAY_BLOCK_WIDTH", "LOG_LEVEL"].some(
		(key) => process.env[key] !== undefined
	);

	if (!hasEnvConfig) {
		return undefined;
	}

	return validateBitArrayConfig({
		size: parseNumber(process.env.BIT_ARRAY_SIZE),
		block_width: parseNumber(process.env.BIT_ARRAY_BLOCK_WIDTH),
		log_config: process.env.LOG_LEVEL ? { level: process.env.LOG_LEVEL } : undefined,
	});
}
