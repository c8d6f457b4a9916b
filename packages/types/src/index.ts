export type * from "./bit-array.js";
export type * from "./logger.js";
