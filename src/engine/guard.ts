/**
 * policy-wasm — Guest call guard
 *
 * Runs guest-facing work and converts whatever it throws into a typed
 * PolicyError. A trap leaves the guest in an unknown state, so the engine
 * is marked poisoned and refuses all further work.
 */

import type { PolicyError } from '../errors.js';
import {
  GuestAbortSignal,
  HostFunctionFault,
  PolicyFault,
  errorCategory,
  formatPolicyError,
  guestAbort,
  hostFunctionError,
  instancePoisoned,
  wasmTrap,
} from '../errors.js';
import type { InternalEngineState } from '../internal-types.js';
import { engineLog } from '../logger.js';
import type { Result } from '../types.js';

/** Map a thrown value to the error it represents. */
export function classifyFault(err: unknown): PolicyError {
  if (err instanceof PolicyFault) {
    return err.error;
  }
  if (err instanceof GuestAbortSignal) {
    return guestAbort(err.guestMessage);
  }
  if (err instanceof HostFunctionFault) {
    return hostFunctionError(err.functionName, err.detail);
  }
  const message = err instanceof Error ? err.message : String(err);
  const trapKind = err instanceof WebAssembly.RuntimeError ? 'runtime_error' : 'host_exception';
  return wasmTrap(trapKind, message);
}

/**
 * Run `op` against the guest.
 *
 * @returns Ok with the value, or the classified error. Trap-category errors
 *   poison the engine.
 */
export function runGuarded<T>(state: InternalEngineState, op: () => T): Result<T, PolicyError> {
  if (state.poisonedBy !== null) {
    return { ok: false, error: instancePoisoned(state.poisonedBy) };
  }

  try {
    return { ok: true, value: op() };
  } catch (err: unknown) {
    const error = classifyFault(err);
    if (errorCategory(error) === 'trap') {
      state.poisonedBy = error.code;
      engineLog('engine poisoned: %s', formatPolicyError(error));
    }
    return { ok: false, error };
  }
}
