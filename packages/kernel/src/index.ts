/**
 * # Tessera Kernel
 *
 * Ambient services for the Tessera engine: the pino-backed `Logger` and the
 * AsyncLocalStorage `Context` it reads engine fields from.
 *
 * @module tessera-kernel
 */

export * from "./context";
export * from "./logger";
