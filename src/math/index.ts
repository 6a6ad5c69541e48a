/**
 * Fixed-point helpers. Every helper states its rounding direction in its name.
 */
export * from "./fixed";
export * from "./shares";
export * from "./exp";
