/**
 * policy-wasm — Context strategy (ABI minor version 0 and 1)
 *
 * Every allocation is returned with `opa_free`. A single evaluation opens
 * a context, evaluates once and releases it.
 */

import type { InternalEngineState } from '../internal-types.js';
import { contextLog } from '../logger.js';
import { writeJsonDocument } from '../marshal/json-codec.js';
import type { AbiStrategy, ContextHandle } from './abi-strategy.js';
import { evaluateContextRecord, openContextRecord } from './abi-strategy.js';

export function createContextStrategy(state: InternalEngineState): AbiStrategy {
  const { exports, guest } = state;

  function releaseContext(handle: ContextHandle): void {
    guest.free(handle.input);
    guest.free(handle.context);
  }

  return {
    name: 'context',

    installData(json: Uint8Array): void {
      const previous = state.dataAddress;
      if (previous !== null) {
        state.dataAddress = null;
        guest.free(previous);
      }
      state.dataAddress = writeJsonDocument(guest, exports.jsonParse, json, 'data');
    },

    evaluateOnce(entrypointId: number, entrypoint: string, input: Uint8Array): unknown {
      const handle = openContextRecord(state, input);
      let decision: unknown;
      try {
        decision = evaluateContextRecord(state, handle, entrypointId, entrypoint);
      } catch (err: unknown) {
        try {
          releaseContext(handle);
        } catch (releaseErr: unknown) {
          const message = releaseErr instanceof Error ? releaseErr.message : String(releaseErr);
          contextLog('release failed while unwinding, suppressed: %s', message);
        }
        throw err;
      }
      releaseContext(handle);
      return decision;
    },

    openContext(input: Uint8Array): ContextHandle {
      return openContextRecord(state, input);
    },

    evaluateInContext(handle: ContextHandle, entrypointId: number, entrypoint: string): unknown {
      return evaluateContextRecord(state, handle, entrypointId, entrypoint);
    },

    releaseContext,
  };
}
