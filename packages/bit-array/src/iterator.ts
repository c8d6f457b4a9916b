import { BlockCursor } from "./cursor.js";

/**
 * Bidirectional iterator walking the bits from the first to the last.
 */
export class BitIterator extends BlockCursor {
	readonly direction = "forward";

	increment(): this {
		this.stepForward();
		return this;
	}

	decrement(): this {
		this.stepBackward();
		return this;
	}

	clone(): BitIterator {
		return new BitIterator(this.blocks, this._blockIndex, this._offset);
	}
}
