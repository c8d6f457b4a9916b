import { type ZodError } from "zod";

/**
 * A custom error class for bit array option and config validation errors
 */
export class BitArrayValidationError extends Error {
	zodError: ZodError;

	/**
	 * @param zodError - The zod error
	 */
	constructor(zodError: ZodError) {
		super(zodError.message);
		this.zodError = zodError;
		this.name = "BitArrayValidationError";
	}
}
