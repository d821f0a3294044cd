/**
 * policy-wasm — Evaluation context
 *
 * A session bound to one marshaled input. Lifecycle:
 *
 *   created ──evaluate──▶ evaluating ──destroy / teardown──▶ destroyed
 *
 * `destroy()` is the fallible, explicit release. `teardown()` is the same
 * release run on the engine's behalf when a scoped context ends; there a
 * failure is fatal unless the scope is already unwinding from an error.
 */

import type { ZodType } from 'zod';
import type { PolicyError } from '../errors.js';
import { ContextTeardownError, contextDestroyed, formatPolicyError, unknownEntrypoint } from '../errors.js';
import type { InternalEngineState } from '../internal-types.js';
import { contextLog } from '../logger.js';
import { decodeWith } from '../marshal/json-codec.js';
import type { ContextStatus, EvaluationContext, Result } from '../types.js';
import type { AbiStrategy, ContextHandle } from './abi-strategy.js';
import { normalizeEntrypoint } from './entrypoints.js';
import { runGuarded } from './guard.js';

/** A context plus the teardown hook the engine drives. */
export interface ManagedContext extends EvaluationContext {
  /**
   * Release the context if it is still live.
   *
   * @param unwinding - True when called while another error propagates;
   *   release failures are then logged and suppressed. Otherwise they
   *   throw `ContextTeardownError`.
   */
  teardown(unwinding: boolean): void;
}

export function createEvaluationContext(
  state: InternalEngineState,
  strategy: AbiStrategy,
  handle: ContextHandle,
): ManagedContext {
  let status: ContextStatus = 'created';

  function release(): Result<void, PolicyError> {
    status = 'destroyed';
    state.contextOpen = false;
    return runGuarded(state, () => {
      strategy.releaseContext(handle);
    });
  }

  function evaluate(entrypoint: string): Result<unknown, PolicyError>;
  function evaluate<T>(entrypoint: string, schema: ZodType<T>): Result<T, PolicyError>;
  function evaluate<T>(entrypoint: string, schema?: ZodType<T>): Result<unknown, PolicyError> {
    if (status === 'destroyed') {
      return { ok: false, error: contextDestroyed() };
    }

    const path = normalizeEntrypoint(entrypoint);
    const entrypointId = state.entrypoints.resolve(path);
    if (entrypointId === undefined) {
      return { ok: false, error: unknownEntrypoint(path) };
    }

    status = 'evaluating';
    const decision = runGuarded(state, () => strategy.evaluateInContext(handle, entrypointId, path));
    if (!decision.ok) {
      return decision;
    }
    return decodeWith(decision.value, schema, `result of '${path}'`);
  }

  return {
    get status(): ContextStatus {
      return status;
    },

    evaluate,

    destroy(): Result<void, PolicyError> {
      if (status === 'destroyed') {
        return { ok: false, error: contextDestroyed() };
      }
      return release();
    },

    teardown(unwinding: boolean): void {
      if (status === 'destroyed') {
        return;
      }
      const released = release();
      if (released.ok) {
        return;
      }
      if (unwinding) {
        contextLog('release failed while unwinding, suppressed: %s', formatPolicyError(released.error));
        return;
      }
      throw new ContextTeardownError(released.error);
    },
  };
}
