import { type BitArrayConfig, type BlockWidth, type LoggerOptions } from "@bitblocks/types";
import { z } from "zod";

export const BitArraySizeSchema = z
	.number({ invalid_type_error: "Size must be a number" })
	.int("Size must be an integer")
	.nonnegative("Size must not be negative")
	.max(Number.MAX_SAFE_INTEGER, "Size must be a safe integer");

export const BlockWidthSchema: z.ZodType<BlockWidth> = z.union([z.literal(8), z.literal(16), z.literal(32)], {
	errorMap: () => ({ message: "Block width must be one of 8, 16 or 32" }),
});

export const LoggerOptionsSchema: z.ZodType<LoggerOptions> = z.object({
	level: z.enum(["trace", "debug", "info", "warn", "error", "silent"]).optional(),
	template: z.string().optional(),
});

export const BitArrayConfigSchema: z.ZodType<BitArrayConfig> = z.object({
	size: BitArraySizeSchema.optional(),
	block_width: BlockWidthSchema.optional(),
	log_config: LoggerOptionsSchema.optional(),
});
