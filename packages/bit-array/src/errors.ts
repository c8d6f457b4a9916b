/**
 * Thrown by the checked accessor when the index is outside the logical bounds of the array
 */
export class BitIndexOutOfRangeError extends RangeError {
	readonly index: number;

	/**
	 * @param index - The index that was accessed
	 * @param message - The message of the error
	 */
	constructor(index: number, message: string = "index out of range") {
		super(message);
		this.index = index;
		this.name = "BitIndexOutOfRangeError";
	}
}

/**
 * Thrown when the block buffer of a bit array cannot be allocated
 */
export class BlockAllocationError extends Error {
	/**
	 * @param blocks - The number of blocks requested
	 * @param cause - The error raised by the allocation
	 */
	constructor(blocks: number, cause: unknown) {
		super(`Failed to allocate ${blocks} blocks`, { cause });
		this.name = "BlockAllocationError";
	}
}
