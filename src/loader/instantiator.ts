/**
 * policy-wasm — Module instantiation.
 *
 * Instantiates a compiled policy module, wiring up the host imports and the
 * host-allocated linear memory.
 */

import type { CompiledModule, GuestImports, GuestInstance, Result, ResultErr } from '../types.js';
import type { PolicyError } from '../errors.js';
import {
  GuestAbortSignal,
  HostFunctionFault,
  guestAbort,
  hostFunctionError,
  instantiationFailed,
} from '../errors.js';
import type { HostHandlers } from '../host/host-imports.js';
import { buildHostImports } from '../host/host-imports.js';

/**
 * Build the WebAssembly import object.
 *
 * Host functions and memory are both placed under the `"env"` namespace.
 */
export function buildImportObject(
  memory: WebAssembly.Memory,
  handlers: HostHandlers,
): GuestImports {
  return {
    env: {
      memory,
      ...buildHostImports(memory, handlers),
    },
  };
}

/**
 * Instantiate a compiled module against the given memory and handlers.
 */
export async function instantiate(
  module: CompiledModule,
  memory: WebAssembly.Memory,
  handlers: HostHandlers,
): Promise<Result<GuestInstance, PolicyError>> {
  try {
    const instance = await module.instantiate(buildImportObject(memory, handlers));
    return { ok: true, value: instance };
  } catch (err: unknown) {
    return classifyInstantiationError(err);
  }
}

/**
 * Classify an instantiation error into the appropriate PolicyError.
 *
 * - Abort from a start function → GUEST_ABORT
 * - Host handler failures → HOST_FUNCTION_ERROR
 * - Missing/incompatible imports → INSTANTIATION_FAILED naming the imports
 * - Other errors → generic INSTANTIATION_FAILED
 */
export function classifyInstantiationError(err: unknown): ResultErr<PolicyError> {
  if (err instanceof GuestAbortSignal) {
    return { ok: false, error: guestAbort(err.guestMessage) };
  }

  if (err instanceof HostFunctionFault) {
    return { ok: false, error: hostFunctionError(err.functionName, err.detail) };
  }

  const message = err instanceof Error ? err.message : 'Unknown instantiation error';

  if (message.includes('import')) {
    return {
      ok: false,
      error: instantiationFailed(`missing or incompatible imports: ${message}`),
    };
  }

  return { ok: false, error: instantiationFailed(message) };
}
