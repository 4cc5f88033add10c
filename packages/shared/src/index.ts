/**
 * # Tessera Shared
 *
 * Platform-independent pieces shared across all Tessera packages.
 * Currently the error hierarchy and its type guards.
 *
 * ```typescript
 * import { isTypeMismatchError } from 'tessera-shared';
 * ```
 *
 * @module tessera-shared
 */

export * from "./errors";
