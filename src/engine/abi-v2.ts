/**
 * policy-wasm — Single-call strategy (ABI minor version 2 and later)
 *
 * Nothing is freed individually. Two heap-pointer checkpoints partition the
 * guest heap:
 *
 *   [ module statics | dataset | input + evaluation scratch ... ]
 *                    ^ dataCheckpoint
 *                              ^ inputCheckpoint
 *
 * Replacing the dataset rewinds to `dataCheckpoint`; finishing an
 * evaluation rewinds to `inputCheckpoint`.
 */

import { PolicyFault, marshalingError } from '../errors.js';
import type { InternalEngineState } from '../internal-types.js';
import { Address } from '../guest/address.js';
import type { SingleCallExports } from '../guest/exports.js';
import { writeToMemory } from '../guest/memory-io.js';
import { decodeJson, writeJsonDocument } from '../marshal/json-codec.js';
import type { AbiStrategy, ContextHandle } from './abi-strategy.js';
import {
  evaluateContextRecord,
  openContextRecord,
  pickDecision,
  requireData,
} from './abi-strategy.js';

/** `opa_eval` output format: JSON text. */
const JSON_FORMAT = 0;

/** Reserved first argument of `opa_eval`. */
const RESERVED = 0;

export function createSingleCallStrategy(
  state: InternalEngineState,
  singleCall: SingleCallExports,
): AbiStrategy {
  const { exports, guest, memory } = state;

  const dataCheckpoint = Address.of(singleCall.heapPtrGet());
  let inputCheckpoint = dataCheckpoint;

  function rewind(to: Address): void {
    singleCall.heapPtrSet(to.offset);
  }

  return {
    name: 'single-call',

    installData(json: Uint8Array): void {
      rewind(dataCheckpoint);
      state.dataAddress = null;
      inputCheckpoint = dataCheckpoint;
      state.dataAddress = writeJsonDocument(guest, exports.jsonParse, json, 'data');
      inputCheckpoint = Address.of(singleCall.heapPtrGet());
    },

    evaluateOnce(entrypointId: number, entrypoint: string, input: Uint8Array): unknown {
      const data = requireData(state);
      const inputAddress = inputCheckpoint;
      writeToMemory(memory, inputAddress, input);
      const heapPtr = inputAddress.advance(input.length);

      try {
        const resultAddress = Address.of(
          singleCall.eval(
            RESERVED,
            entrypointId,
            data.offset,
            inputAddress.offset,
            input.length,
            heapPtr.offset,
            JSON_FORMAT,
          ),
        );
        const subject = `result of '${entrypoint}'`;
        const text = guest.readNullTerminated(resultAddress);
        if (text === undefined) {
          throw new PolicyFault(
            marshalingError(subject, `no terminated JSON text at ${resultAddress.toString()}`),
          );
        }
        const results = decodeJson(text, subject);
        if (!results.ok) {
          throw new PolicyFault(results.error);
        }
        return pickDecision(results.value, entrypoint);
      } finally {
        rewind(inputCheckpoint);
      }
    },

    openContext(input: Uint8Array): ContextHandle {
      rewind(inputCheckpoint);
      return openContextRecord(state, input);
    },

    evaluateInContext(handle: ContextHandle, entrypointId: number, entrypoint: string): unknown {
      const mark = Address.of(singleCall.heapPtrGet());
      try {
        return evaluateContextRecord(state, handle, entrypointId, entrypoint);
      } finally {
        rewind(mark);
      }
    },

    releaseContext(): void {
      rewind(inputCheckpoint);
    },
  };
}
