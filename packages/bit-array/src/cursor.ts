import { type BlockStorage, type IBitCursor, type IMutableBitCursor } from "@bitblocks/types";

import { blockBitmask, readBit, writeBit } from "./block.js";

export type CursorDirection = "forward" | "reverse";

/**
 * A (block, offset) pair over the blocks owned by a bit array.
 * The cursor never owns the blocks and is only meaningful while the array is alive.
 */
export abstract class BlockCursor implements IMutableBitCursor {
	abstract readonly direction: CursorDirection;

	protected readonly blocks: BlockStorage;
	protected readonly bitsPerBlock: number;
	protected _blockIndex: number;
	protected _offset: number;

	/**
	 * @param blocks - The blocks of the bit array
	 * @param blockIndex - The block the cursor points into
	 * @param offset - The bit offset inside the block
	 */
	constructor(blocks: BlockStorage, blockIndex: number, offset: number) {
		this.blocks = blocks;
		this.bitsPerBlock = blocks.BYTES_PER_ELEMENT * 8;
		this._blockIndex = blockIndex;
		this._offset = offset;
	}

	get blockIndex(): number {
		return this._blockIndex;
	}

	get offset(): number {
		return this._offset;
	}

	get value(): boolean {
		return readBit(this.blocks, this._blockIndex, blockBitmask(this._offset, this.bitsPerBlock));
	}

	assign(value: boolean): void {
		writeBit(this.blocks, this._blockIndex, blockBitmask(this._offset, this.bitsPerBlock), value);
	}

	equals(other: IBitCursor): boolean {
		return (
			other instanceof BlockCursor &&
			other.direction === this.direction &&
			other.blocks === this.blocks &&
			other._blockIndex === this._blockIndex &&
			other._offset === this._offset
		);
	}

	abstract increment(): this;
	abstract decrement(): this;
	abstract clone(): IMutableBitCursor;

	// crossing into the next block restarts at its most significant bit
	protected stepForward(): void {
		if (this._offset + 1 < this.bitsPerBlock) {
			this._offset++;
		} else {
			this._offset = 0;
			this._blockIndex++;
		}
	}

	protected stepBackward(): void {
		if (this._offset === 0) {
			this._offset = this.bitsPerBlock - 1;
			this._blockIndex--;
		} else {
			this._offset--;
		}
	}
}
