/**
 * policy-wasm — Internal types
 *
 * Mutable state shared by the engine, its ABI strategy and its evaluation
 * contexts. These types are NOT exported from the package.
 */

import type { AbiVersion } from './types.js';
import type { Address } from './guest/address.js';
import type { GuestMemory } from './guest/memory-io.js';
import type { PolicyExports } from './guest/exports.js';
import type { EntrypointTable } from './engine/entrypoints.js';
import type { PolicyErrorCode } from './errors.js';

/** WASM page size in bytes (64 KB). */
export const WASM_PAGE_SIZE = 65_536;

/** Mutable internal state for one engine instance. */
export interface InternalEngineState {
  readonly abiVersion: AbiVersion;
  readonly memory: WebAssembly.Memory;
  readonly exports: PolicyExports;
  readonly guest: GuestMemory;
  readonly entrypoints: EntrypointTable;
  /** Current dataset document, or null before the first `setData`. */
  dataAddress: Address | null;
  /** Set when a context is open; the engine refuses other work meanwhile. */
  contextOpen: boolean;
  /** Code of the trap that made the guest state unreliable, if any. */
  poisonedBy: PolicyErrorCode | null;
}

/** Convert bytes to WASM page count (each page = 64 KB). */
export function bytesToPages(bytes: number): number {
  return Math.ceil(bytes / WASM_PAGE_SIZE);
}
