import { type BitArrayConfig } from "@bitblocks/types";

import { BitArray } from "./bit-array.js";

export * from "./bit-array.js";
export { blockBitmask, indexToBlock } from "./block.js";
export * from "./config.js";
export * from "./errors.js";
export { BitIterator } from "./iterator.js";
export { ReverseBitIterator } from "./reverse-iterator.js";

/**
 * Creates a bit array from a configuration, falling back to the defaults for missing fields.
 * @param config - The configuration, usually from loadConfig.
 * @returns The new bit array.
 */
export function createBitArray(config?: BitArrayConfig): BitArray {
	return new BitArray(config?.size, { blockWidth: config?.block_width, log_config: config?.log_config });
}
