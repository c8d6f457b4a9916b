import { type BitArrayConfig } from "@bitblocks/types";
import { BitArrayValidationError } from "@bitblocks/validation";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { createBitArray, loadConfig } from "../src/index.js";

describe("loadConfig", () => {
	let tempDir: string;
	let tempConfigPath: string;

	beforeEach(() => {
		// Clear any existing env vars that might interfere with tests
		delete process.env.BIT_ARRAY_SIZE;
		delete process.env.BIT_ARRAY_BLOCK_WIDTH;
		delete process.env.LOG_LEVEL;
		tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "bit-array-config-"));
		tempConfigPath = path.join(tempDir, "config.json");
	});

	afterEach(() => {
		fs.rmSync(tempDir, { recursive: true, force: true });
		delete process.env.BIT_ARRAY_SIZE;
		delete process.env.BIT_ARRAY_BLOCK_WIDTH;
		delete process.env.LOG_LEVEL;
	});

	it("should load config from JSON file when configPath is provided", () => {
		const testConfig: BitArrayConfig = {
			size: 24,
			block_width: 8,
			log_config: { level: "silent" },
		};

		fs.writeFileSync(tempConfigPath, JSON.stringify(testConfig));
		expect(loadConfig(tempConfigPath)).toEqual(testConfig);
	});

	it("should throw error when JSON file is invalid", () => {
		fs.writeFileSync(tempConfigPath, "invalid json content");
		expect(() => loadConfig(tempConfigPath)).toThrow(SyntaxError);
	});

	it("should throw error when config file does not exist", () => {
		expect(() => loadConfig(path.join(tempDir, "non-existent.json"))).toThrow();
	});

	it("should reject a block width that is not a power of two", () => {
		fs.writeFileSync(tempConfigPath, JSON.stringify({ size: 24, block_width: 12 }));
		expect(() => loadConfig(tempConfigPath)).toThrow(BitArrayValidationError);
	});

	it("should load config from environment variables when no configPath is provided", () => {
		process.env.BIT_ARRAY_SIZE = "40";
		process.env.BIT_ARRAY_BLOCK_WIDTH = "16";
		process.env.LOG_LEVEL = "warn";

		expect(loadConfig()).toEqual({
			size: 40,
			block_width: 16,
			log_config: { level: "warn" },
		});
	});

	it("should leave missing environment variables undefined", () => {
		process.env.BIT_ARRAY_SIZE = "12";

		expect(loadConfig()).toEqual({
			size: 12,
			block_width: undefined,
			log_config: undefined,
		});
	});

	it("should treat blank environment variables as missing", () => {
		process.env.BIT_ARRAY_SIZE = "";
		process.env.BIT_ARRAY_BLOCK_WIDTH = "  ";

		const config = loadConfig();
		expect(config).toEqual({});
		expect(config?.size).toBeUndefined();
		expect(config?.block_width).toBeUndefined();

		const bits = createBitArray(config);
		expect(bits.size()).toBe(16);
		expect(bits.bitsPerBlock).toBe(32);
	});

	it("should reject a size that is not a number", () => {
		process.env.BIT_ARRAY_SIZE = "many";
		expect(() => loadConfig()).toThrow("Size must be a number");
	});

	it("should return undefined when no environment variables are set", () => {
		expect(loadConfig()).toBeUndefined();
	});
});

describe("createBitArray", () => {
	it("uses the defaults without a config", () => {
		const bits = createBitArray();
		expect(bits.size()).toBe(16);
		expect(bits.bitsPerBlock).toBe(32);
	});

	it("applies the config", () => {
		const bits = createBitArray({ size: 24, block_width: 8, log_config: { level: "silent" } });
		expect(bits.size()).toBe(24);
		expect(bits.bitsPerBlock).toBe(8);
		expect(bits.blockCount).toBe(3);
	});
});
