import { type LoggerOptions } from "./logger.js";

/**
 * Width in bits of a storage block. Only power-of-two widths that map onto a typed array are allowed.
 */
export type BlockWidth = 8 | 16 | 32;

/**
 * The typed array that backs the blocks of a bit array.
 */
export type BlockStorage = Uint8Array | Uint16Array | Uint32Array;

export interface BlockPosition {
	blockIndex: number;
	mask: number;
}

export interface BitArrayOptions {
	blockWidth?: BlockWidth;
	log_config?: LoggerOptions;
}

// snake_casing to match the JSON config
export interface BitArrayConfig {
	size?: number;
	block_width?: BlockWidth;
	log_config?: LoggerOptions;
}

/**
 * A read-only cursor over the bits of a bit array.
 */
export interface IBitCursor {
	/**
	 * The index of the block the cursor points into.
	 */
	readonly blockIndex: number;
	/**
	 * The bit offset inside the block, 0 being the most significant bit.
	 */
	readonly offset: number;
	/**
	 * Whether the bit under the cursor is set.
	 */
	readonly value: boolean;
	/**
	 * Moves the cursor one step in its direction of travel.
	 * @returns The cursor itself.
	 */
	increment(): this;
	/**
	 * Moves the cursor one step against its direction of travel.
	 * @returns The cursor itself.
	 */
	decrement(): this;
	/**
	 * Returns true if both cursors point at the same bit of the same storage.
	 * @param other - The cursor to compare with.
	 */
	equals(other: IBitCursor): boolean;
	/**
	 * Returns an independent copy of the cursor.
	 */
	clone(): IBitCursor;
}

/**
 * A cursor that can also write the bit it points at.
 */
export interface IMutableBitCursor extends IBitCursor {
	/**
	 * Sets or clears the bit under the cursor.
	 * @param value - The new value of the bit.
	 */
	assign(value: boolean): void;
	clone(): IMutableBitCursor;
}

export interface IBitArray extends Iterable<boolean> {
	/**
	 * The number of bits stored in a block.
	 */
	readonly bitsPerBlock: number;
	/**
	 * The number of allocated blocks.
	 */
	readonly blockCount: number;
	/**
	 * Returns the number of addressable bits.
	 */
	size(): number;
	/**
	 * Returns true if the index is within the logical bounds of the array.
	 * @param index - The index of the bit.
	 */
	accessible(index: number): boolean;
	/**
	 * Sets the bit at the given index. The index is not checked.
	 * @param index - The index of the bit to set.
	 */
	set(index: number): void;
	/**
	 * Clears the bit at the given index. The index is not checked.
	 * @param index - The index of the bit to clear.
	 */
	clear(index: number): void;
	/**
	 * Returns the bit at the given index, throwing if the index is out of range.
	 * @param index - The index of the bit to get.
	 */
	at(index: number): boolean;
	/**
	 * Returns the bit at the given index without checking the index.
	 * @param index - The index of the bit to get.
	 */
	uncheckedGet(index: number): boolean;
	/**
	 * Alias of uncheckedGet.
	 * @param index - The index of the bit to get.
	 */
	get(index: number): boolean;
	/**
	 * Sets every addressable bit.
	 */
	setAll(): void;
	/**
	 * Clears every addressable bit.
	 */
	clearAll(): void;
	begin(): IMutableBitCursor;
	end(): IMutableBitCursor;
	cbegin(): IBitCursor;
	cend(): IBitCursor;
	rbegin(): IMutableBitCursor;
	rend(): IMutableBitCursor;
	crbegin(): IBitCursor;
	crend(): IBitCursor;
	/**
	 * Yields the bits from the last to the first.
	 */
	reversed(): IterableIterator<boolean>;
	/**
	 * Returns the bits as a string of 0s and 1s, in index order.
	 */
	toString(): string;
}
