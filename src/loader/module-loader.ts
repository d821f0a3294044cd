/**
 * policy-wasm — Module loading
 *
 * Rejects bytes that cannot be a WASM module before handing them to the
 * backend, and loads precompiled artifacts where the backend supports them.
 */

import type { CompiledModule, Result, WasmBackend } from '../types.js';
import type { PolicyError } from '../errors.js';
import { invalidModule } from '../errors.js';

const WASM_MAGIC = [0x00, 0x61, 0x73, 0x6d] as const;

/** Magic plus the 4-byte version field. */
const HEADER_SIZE = 8;

/** Reason the bytes cannot be a module, or undefined if the header looks right. */
function checkHeader(bytes: Uint8Array): string | undefined {
  if (bytes.length === 0) {
    return 'module bytes are empty';
  }
  if (bytes.length < HEADER_SIZE) {
    return `WASM module too small: ${String(bytes.length)} bytes (minimum ${String(HEADER_SIZE)})`;
  }
  if (!WASM_MAGIC.every((byte, i) => bytes[i] === byte)) {
    return 'bytes do not start with the \\0asm magic number';
  }
  return undefined;
}

/** Check the module header, then compile with the backend. */
export async function loadModule(
  backend: WasmBackend,
  bytes: Uint8Array,
): Promise<Result<CompiledModule, PolicyError>> {
  const rejected = checkHeader(bytes);
  if (rejected !== undefined) {
    return { ok: false, error: invalidModule(rejected) };
  }

  try {
    return { ok: true, value: await backend.compile(bytes) };
  } catch (err: unknown) {
    const message = err instanceof Error ? err.message : String(err);
    return { ok: false, error: invalidModule(`compilation failed on backend '${backend.name}': ${message}`) };
  }
}

/**
 * Load an ahead-of-time compiled artifact.
 *
 * Returns undefined when the backend cannot load precompiled artifacts, so
 * the caller can fall back to the raw module.
 */
export async function loadPrecompiledModule(
  backend: WasmBackend,
  bytes: Uint8Array,
): Promise<Result<CompiledModule, PolicyError> | undefined> {
  if (backend.deserialize === undefined) {
    return undefined;
  }

  try {
    return { ok: true, value: await backend.deserialize(bytes) };
  } catch (err: unknown) {
    const message = err instanceof Error ? err.message : String(err);
    return {
      ok: false,
      error: invalidModule(`precompiled module rejected by backend '${backend.name}': ${message}`),
    };
  }
}
