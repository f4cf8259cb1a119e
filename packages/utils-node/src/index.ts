/**
 * Node.js-specific utilities for @git-stamp/utils
 *
 * This package provides Node.js implementations that are explicitly
 * registered with, or passed to, the platform-neutral packages.
 *
 * @example
 * ```ts
 * import { setCompression } from "@git-stamp/utils/compression";
 * import { createNodeCompression } from "@git-stamp/utils-node/compression";
 *
 * // Explicitly opt-in to Node.js zlib
 * setCompression(createNodeCompression());
 * ```
 *
 * @packageDocumentation
 */

export * from "./compression/index.js";
export * from "./files/index.js";
