/**
 * policy-wasm — Evaluation engine
 *
 * Owns one instantiated policy module: its exports, its entrypoint table,
 * its current dataset and the ABI strategy chosen at initialization.
 *
 * Every public operation returns a Result. Configuration errors are checked
 * before the guest is touched; guest-facing work runs under the guard.
 */

import type { ZodType } from 'zod';
import type { PolicyError } from '../errors.js';
import {
  contextBusy,
  formatPolicyError,
  instancePoisoned,
  noData,
  unknownEntrypoint,
} from '../errors.js';
import type { InternalEngineState } from '../internal-types.js';
import { WASM_PAGE_SIZE } from '../internal-types.js';
import { engineLog } from '../logger.js';
import { Address } from '../guest/address.js';
import { bindPolicyExports, readAbiVersion } from '../guest/exports.js';
import { createGuestMemory } from '../guest/memory-io.js';
import { decodeWith, encodeJson, readJsonDocument } from '../marshal/json-codec.js';
import type { PolicyBinding } from '../policy/binding.js';
import type {
  AbiVersion,
  EngineStatus,
  EvaluationContext,
  GuestInstance,
  MemoryUsage,
  PolicyEngine,
  Result,
} from '../types.js';
import type { AbiStrategy } from './abi-strategy.js';
import { createContextStrategy } from './abi-v1.js';
import { createSingleCallStrategy } from './abi-v2.js';
import type { ManagedContext } from './context.js';
import { createEvaluationContext } from './context.js';
import { normalizeEntrypoint, parseEntrypointDocument } from './entrypoints.js';
import { classifyFault, runGuarded } from './guard.js';

// ---------------------------------------------------------------------------
// Initialization
// ---------------------------------------------------------------------------

function selectStrategy(state: InternalEngineState): AbiStrategy {
  const { singleCall } = state.exports;
  return singleCall !== null
    ? createSingleCallStrategy(state, singleCall)
    : createContextStrategy(state);
}

/**
 * Bind an instantiated module, read its entrypoint table and pick the
 * evaluation strategy for its ABI version.
 */
export function initializeEngine(
  instance: GuestInstance,
  memory: WebAssembly.Memory,
): Result<PolicyEngine, PolicyError> {
  const abiVersion = readAbiVersion(instance);
  const bound = bindPolicyExports(instance, abiVersion);
  if (!bound.ok) {
    return bound;
  }
  const exports = bound.value;
  const guest = createGuestMemory(memory, exports, exports.singleCall !== null ? 'rewind' : 'explicit');

  let document: unknown;
  try {
    document = readJsonDocument(guest, exports.jsonDump, Address.of(exports.entrypoints()), 'entrypoints');
  } catch (err: unknown) {
    return { ok: false, error: classifyFault(err) };
  }
  const table = parseEntrypointDocument(document);
  if (!table.ok) {
    return table;
  }

  const state: InternalEngineState = {
    abiVersion,
    memory,
    exports,
    guest,
    entrypoints: table.value,
    dataAddress: null,
    contextOpen: false,
    poisonedBy: null,
  };

  let strategy: AbiStrategy;
  try {
    strategy = selectStrategy(state);
  } catch (err: unknown) {
    return { ok: false, error: classifyFault(err) };
  }

  engineLog(
    'engine ready: abi %d.%d, %s strategy, %d entrypoints',
    abiVersion.major,
    abiVersion.minor,
    strategy.name,
    table.value.size,
  );
  return { ok: true, value: createPolicyEngine(state, strategy) };
}

// ---------------------------------------------------------------------------
// Engine
// ---------------------------------------------------------------------------

export function createPolicyEngine(state: InternalEngineState, strategy: AbiStrategy): PolicyEngine {
  /** Errors that forbid any engine-level work, checked before everything else. */
  function checkReady(): PolicyError | undefined {
    if (state.poisonedBy !== null) {
      return instancePoisoned(state.poisonedBy);
    }
    if (state.contextOpen) {
      return contextBusy();
    }
    return undefined;
  }

  function openContext(input: unknown): Result<ManagedContext, PolicyError> {
    const blocked = checkReady();
    if (blocked !== undefined) {
      return { ok: false, error: blocked };
    }
    if (state.dataAddress === null) {
      return { ok: false, error: noData() };
    }
    const encoded = encodeJson(input, 'input');
    if (!encoded.ok) {
      return encoded;
    }

    const handle = runGuarded(state, () => strategy.openContext(encoded.value));
    if (!handle.ok) {
      return handle;
    }
    state.contextOpen = true;
    return { ok: true, value: createEvaluationContext(state, strategy, handle.value) };
  }

  function evaluate(entrypoint: string, input: unknown): Result<unknown, PolicyError>;
  function evaluate<T>(entrypoint: string, input: unknown, schema: ZodType<T>): Result<T, PolicyError>;
  function evaluate<T>(
    entrypoint: string,
    input: unknown,
    schema?: ZodType<T>,
  ): Result<unknown, PolicyError> {
    const blocked = checkReady();
    if (blocked !== undefined) {
      return { ok: false, error: blocked };
    }

    const path = normalizeEntrypoint(entrypoint);
    const entrypointId = state.entrypoints.resolve(path);
    if (entrypointId === undefined) {
      return { ok: false, error: unknownEntrypoint(path) };
    }
    if (state.dataAddress === null) {
      return { ok: false, error: noData() };
    }
    const encoded = encodeJson(input, 'input');
    if (!encoded.ok) {
      return encoded;
    }

    const decision = runGuarded(state, () => strategy.evaluateOnce(entrypointId, path, encoded.value));
    if (!decision.ok) {
      return decision;
    }
    return decodeWith(decision.value, schema, `result of '${path}'`);
  }

  return {
    get abiVersion(): AbiVersion {
      return state.abiVersion;
    },

    get status(): EngineStatus {
      return state.poisonedBy === null ? 'ready' : 'poisoned';
    },

    entrypoints(): IterableIterator<string> {
      return state.entrypoints.names();
    },

    setData(data: unknown): Result<void, PolicyError> {
      const blocked = checkReady();
      if (blocked !== undefined) {
        return { ok: false, error: blocked };
      }
      const encoded = encodeJson(data, 'data');
      if (!encoded.ok) {
        return encoded;
      }
      const installed = runGuarded(state, () => {
        strategy.installData(encoded.value);
      });
      if (installed.ok) {
        engineLog('dataset replaced (%d bytes)', encoded.value.length);
      } else {
        engineLog('dataset replacement failed: %s', formatPolicyError(installed.error));
      }
      return installed;
    },

    evaluate,

    evalContext(input: unknown): Result<EvaluationContext, PolicyError> {
      return openContext(input);
    },

    withContext<R>(input: unknown, fn: (context: EvaluationContext) => R): Result<R, PolicyError> {
      const opened = openContext(input);
      if (!opened.ok) {
        return opened;
      }
      const context = opened.value;

      let value: R;
      try {
        value = fn(context);
      } catch (err: unknown) {
        context.teardown(true);
        throw err;
      }
      context.teardown(false);
      return { ok: true, value };
    },

    decide<I, O>(policy: PolicyBinding<I, O>, input: I): Result<O, PolicyError> {
      const checked = decodeWith(input, policy.input, `input of '${policy.path}'`);
      if (!checked.ok) {
        return checked;
      }
      return evaluate(policy.path, checked.value, policy.output);
    },

    memoryUsage(): MemoryUsage {
      const bytes = state.memory.buffer.byteLength;
      return { bytes, pages: bytes / WASM_PAGE_SIZE };
    },
  };
}
