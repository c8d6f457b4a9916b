import { type BlockPosition, type BlockStorage, type BlockWidth } from "@bitblocks/types";

/**
 * Returns the number of blocks needed to hold the given number of bits.
 */
export function blocksFor(bits: number, width: BlockWidth): number {
	// effectively a ceiling
	return Math.floor(bits / width) + (bits % width === 0 ? 0 : 1);
}

/**
 * Allocates a zeroed block buffer able to hold the given number of bits.
 * @param bits - The number of bits to hold.
 * @param width - The width of a block in bits.
 * @returns The typed array matching the block width.
 */
export function allocateBlocks(bits: number, width: BlockWidth): BlockStorage {
	const count = blocksFor(bits, width);
	switch (width) {
		case 8:
			return new Uint8Array(count);
		case 16:
			return new Uint16Array(count);
		case 32:
			return new Uint32Array(count);
	}
}

/**
 * Returns the mask of the bit at the given offset of a block.
 * Offset 0 is the most significant bit of the block.
 * @param offset - The offset of the bit, in [0, bitsPerBlock).
 * @param bitsPerBlock - The width of a block in bits.
 */
export function blockBitmask(offset: number, bitsPerBlock: number): number {
	// >>> 0 keeps the 32 bit mask unsigned
	return (1 << (bitsPerBlock - (offset & (bitsPerBlock - 1)) - 1)) >>> 0;
}

/**
 * Maps a logical bit index onto its block and the mask selecting it.
 * @param index - The logical bit index.
 * @param bitsPerBlock - The width of a block in bits.
 */
export function indexToBlock(index: number, bitsPerBlock: number): BlockPosition {
	return {
		blockIndex: Math.floor(index / bitsPerBlock),
		mask: blockBitmask(index % bitsPerBlock, bitsPerBlock),
	};
}

/**
 * Reads one bit of a block. Positions outside the buffer read as cleared.
 */
export function readBit(blocks: BlockStorage, blockIndex: number, mask: number): boolean {
	if (blockIndex < 0 || blockIndex >= blocks.length) return false;
	return (blocks[blockIndex] & mask) !== 0;
}

/**
 * Writes one bit of a block. Positions outside the buffer are left alone.
 */
export function writeBit(blocks: BlockStorage, blockIndex: number, mask: number, value: boolean): void {
	if (blockIndex < 0 || blockIndex >= blocks.length) return;
	if (value) blocks[blockIndex] |= mask;
	else blocks[blockIndex] &= ~mask;
}
