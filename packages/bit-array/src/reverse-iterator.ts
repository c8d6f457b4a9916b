import { type BlockStorage } from "@bitblocks/types";

import { BlockCursor } from "./cursor.js";

/**
 * Bidirectional iterator walking the bits from the last to the first.
 */
export class ReverseBitIterator extends BlockCursor {
	readonly direction = "reverse";

	/**
	 * @param blocks - The blocks of the bit array
	 * @param blockIndex - The block the iterator points into
	 * @param offset - The bit offset inside the block. A negative offset stands for
	 * "one before the first bit of this block" and is moved to the last bit of the previous block.
	 */
	constructor(blocks: BlockStorage, blockIndex: number, offset: number) {
		super(blocks, blockIndex, offset);
		if (offset < 0) {
			this._offset = this.bitsPerBlock - 1;
			this._blockIndex--;
		}
	}

	increment(): this {
		this.stepBackward();
		return this;
	}

	decrement(): this {
		this.stepForward();
		return this;
	}

	clone(): ReverseBitIterator {
		return new ReverseBitIterator(this.blocks, this._blockIndex, this._offset);
	}
}
