import { type BitArrayConfig } from "@bitblocks/types";

import { BitArrayValidationError } from "./errors.js";
import { BitArrayConfigSchema, BitArraySizeSchema } from "./schemas/bit-array.js";

export * from "./errors.js";
export * from "./schemas/bit-array.js";

/**
 * Validates the requested number of bits of a bit array.
 * @param size - The requested number of bits.
 * @returns The validated size.
 * @throws BitArrayValidationError if the size is not a non-negative safe integer.
 */
export function validateBitArraySize(size: unknown): number {
	const result = BitArraySizeSchema.safeParse(size);
	if (!result.success) {
		throw new BitArrayValidationError(result.error);
	}
	return result.data;
}

/**
 * Validates a bit array configuration coming from an untyped source.
 * @param config - The raw configuration.
 * @returns The validated configuration.
 */
export function validateBitArrayConfig(config: unknown): BitArrayConfig {
	const result = BitArrayConfigSchema.safeParse(config);
	if (!result.success) {
		throw new BitArrayValidationError(result.error);
	}
	return result.data;
}
