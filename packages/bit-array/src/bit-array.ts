import { Logger } from "@bitblocks/logger";
import {
	type BitArrayOptions,
	type BlockStorage,
	type BlockWidth,
	type IBitArray,
	type IBitCursor,
} from "@bitblocks/types";
import { validateBitArraySize } from "@bitblocks/validation";

import { allocateBlocks, blocksFor, indexToBlock, readBit, writeBit } from "./block.js";
import { BitIndexOutOfRangeError, BlockAllocationError } from "./errors.js";
import { BitIterator } from "./iterator.js";
import { ReverseBitIterator } from "./reverse-iterator.js";

export const DEFAULT_SIZE = 16;
export const DEFAULT_BLOCK_WIDTH: BlockWidth = 32;

let nextId = 0;

/**
 * BitArray is a fixed size array of bits packed into blocks of 8, 16 or 32 bits.
 * 64 bit blocks are not supported: block masks are computed with 32 bit number operators.
 * Bits are numbered from the most significant bit of the first block onwards,
 * so bit 0 is the top bit of block 0.
 *
 * Only `at` checks its index. `set`, `clear`, `get` and `uncheckedGet` leave the index to the caller;
 * indices between the size and the end of the last block reach the unused tail of that block.
 */
export class BitArray implements IBitArray {
	readonly id: number;
	readonly blockWidth: BlockWidth;
	readonly bitsPerBlock: number;

	private readonly blocks: BlockStorage;
	private readonly bits: number;
	private readonly log: Logger;

	/**
	 * Constructor for the BitArray class. All bits start cleared.
	 * @param size - The number of bits in the array.
	 * @param options - The block width and logger configuration. Every array logs under its own
	 * context `bitblocks::bit-array::<id>`, so its level does not change the level of other arrays.
	 */
	constructor(size: number = DEFAULT_SIZE, options?: BitArrayOptions) {
		this.id = nextId++;
		this.log = new Logger(`bitblocks::bit-array::${this.id}`, options?.log_config);
		this.bits = validateBitArraySize(size);
		this.blockWidth = options?.blockWidth ?? DEFAULT_BLOCK_WIDTH;
		this.bitsPerBlock = this.blockWidth;
		this.blocks = this.allocate();
		this.log.debug(`allocated ${this.blocks.length} blocks of ${this.blockWidth} bits for ${this.bits} bits`);
	}

	/**
	 * The number of allocated blocks.
	 */
	get blockCount(): number {
		return this.blocks.length;
	}

	/**
	 * Returns the number of addressable bits.
	 * @returns The size given at construction.
	 */
	size(): number {
		return this.bits;
	}

	/**
	 * Checks if a bit being accessed is within bounds.
	 * @param index - The index of the bit.
	 * @returns True if the index is an integer in [0, size).
	 */
	accessible(index: number): boolean {
		return Number.isInteger(index) && index >= 0 && index < this.bits;
	}

	/**
	 * Sets the bit at the given index. The index is not checked.
	 * @param index - The index of the bit to set.
	 */
	set(index: number): void {
		const { blockIndex, mask } = indexToBlock(index, this.bitsPerBlock);
		writeBit(this.blocks, blockIndex, mask, true);
	}

	/**
	 * Clears the bit at the given index. The index is not checked.
	 * @param index - The index of the bit to clear.
	 */
	clear(index: number): void {
		const { blockIndex, mask } = indexToBlock(index, this.bitsPerBlock);
		writeBit(this.blocks, blockIndex, mask, false);
	}

	/**
	 * Returns the bit at the given index.
	 * @param index - The index of the bit.
	 * @returns The value of the bit.
	 * @throws BitIndexOutOfRangeError if the index is not accessible.
	 */
	at(index: number): boolean {
		if (!this.accessible(index)) {
			this.log.debug(`index ${index} is out of range for ${this.bits} bits`);
			throw new BitIndexOutOfRangeError(index);
		}
		return this.uncheckedGet(index);
	}

	/**
	 * Returns the bit at the given index without checking the index.
	 * @param index - The index of the bit.
	 * @returns The value of the bit, false outside the allocated blocks.
	 */
	uncheckedGet(index: number): boolean {
		const { blockIndex, mask } = indexToBlock(index, this.bitsPerBlock);
		return readBit(this.blocks, blockIndex, mask);
	}

	/**
	 * Alias of uncheckedGet.
	 * @param index - The index of the bit.
	 * @returns The value of the bit.
	 */
	get(index: number): boolean {
		return this.uncheckedGet(index);
	}

	/**
	 * Sets every addressable bit.
	 */
	setAll(): void {
		this.fill(true);
	}

	/**
	 * Clears every addressable bit.
	 */
	clearAll(): void {
		this.fill(false);
	}

	/**
	 * @returns An iterator pointing to the first bit.
	 */
	begin(): BitIterator {
		return new BitIterator(this.blocks, 0, 0);
	}

	/**
	 * @returns An iterator one past the last bit, which may sit in the middle of the last block.
	 */
	end(): BitIterator {
		return new BitIterator(this.blocks, Math.floor(this.bits / this.bitsPerBlock), this.bits % this.bitsPerBlock);
	}

	/**
	 * @returns A read-only iterator pointing to the first bit.
	 */
	cbegin(): IBitCursor {
		return this.begin();
	}

	/**
	 * @returns A read-only iterator one past the last bit.
	 */
	cend(): IBitCursor {
		return this.end();
	}

	/**
	 * @returns A reverse iterator pointing to the last bit.
	 */
	rbegin(): ReverseBitIterator {
		return new ReverseBitIterator(
			this.blocks,
			Math.floor(this.bits / this.bitsPerBlock),
			(this.bits % this.bitsPerBlock) - 1
		);
	}

	/**
	 * @returns An iterator one before the first bit.
	 */
	rend(): ReverseBitIterator {
		return new ReverseBitIterator(this.blocks, 0, -1);
	}

	/**
	 * @returns A read-only reverse iterator pointing to the last bit.
	 */
	crbegin(): IBitCursor {
		return this.rbegin();
	}

	/**
	 * @returns A read-only reverse iterator one before the first bit.
	 */
	crend(): IBitCursor {
		return this.rend();
	}

	/**
	 * Yields the bits from the first to the last.
	 */
	*[Symbol.iterator](): IterableIterator<boolean> {
		const end = this.end();
		for (const it = this.begin(); !it.equals(end); it.increment()) {
			yield it.value;
		}
	}

	/**
	 * Yields the bits from the last to the first.
	 */
	*reversed(): IterableIterator<boolean> {
		const rend = this.rend();
		for (const it = this.rbegin(); !it.equals(rend); it.increment()) {
			yield it.value;
		}
	}

	/**
	 * Converts the BitArray to a string.
	 * @returns The bits as 0s and 1s, in index order.
	 */
	toString(): string {
		return Array.from(this, (bit) => (bit ? "1" : "0")).join("");
	}

	private allocate(): BlockStorage {
		try {
			return allocateBlocks(this.bits, this.blockWidth);
		} catch (error) {
			this.log.error(`failed to allocate blocks for ${this.bits} bits:`, error);
			throw new BlockAllocationError(blocksFor(this.bits, this.blockWidth), error);
		}
	}

	// whole blocks are filled at once, the last partial block bit by bit so its tail is kept
	private fill(value: boolean): void {
		const full = Math.floor(this.bits / this.bitsPerBlock);
		this.blocks.fill(value ? 2 ** this.bitsPerBlock - 1 : 0, 0, full);
		for (let i = full * this.bitsPerBlock; i < this.bits; i++) {
			const { blockIndex, mask } = indexToBlock(i, this.bitsPerBlock);
			writeBit(this.blocks, blockIndex, mask, value);
		}
		this.log.debug(`${value ? "set" : "cleared"} all ${this.bits} bits`);
	}
}
