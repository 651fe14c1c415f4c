/**
 * Logging goes to the console unless a caller injects something else.
 */
export type Logger = Pick<Console, "info" | "warn" | "error">;

export const defaultLogger: Logger = console;
