/**
 * policy-wasm — ABI strategy
 *
 * The evaluation algorithm differs between ABI minor versions: before 1.2
 * every guest allocation is freed explicitly and evaluation goes through a
 * context record; from 1.2 a single `opa_eval` call does the work and memory
 * is reclaimed by rewinding the heap pointer. One strategy is chosen when
 * the engine is initialized.
 */

import { z } from 'zod';
import { PolicyFault, marshalingError, noData, noResults } from '../errors.js';
import type { InternalEngineState } from '../internal-types.js';
import { Address } from '../guest/address.js';
import { readJsonDocument, writeJsonDocument } from '../marshal/json-codec.js';

// ---------------------------------------------------------------------------
// Interface
// ---------------------------------------------------------------------------

/** Guest records owned by one open evaluation context. */
export interface ContextHandle {
  readonly input: Address;
  readonly context: Address;
}

/** One evaluation algorithm. All methods throw; the engine guard converts. */
export interface AbiStrategy {
  readonly name: 'context' | 'single-call';
  /** Replace the dataset with the encoded JSON document. */
  installData(json: Uint8Array): void;
  /** Evaluate one entrypoint against an encoded input. */
  evaluateOnce(entrypointId: number, entrypoint: string, input: Uint8Array): unknown;
  /** Marshal the input and build a context record bound to the dataset. */
  openContext(input: Uint8Array): ContextHandle;
  evaluateInContext(handle: ContextHandle, entrypointId: number, entrypoint: string): unknown;
  /** Release everything `openContext` allocated. */
  releaseContext(handle: ContextHandle): void;
}

// ---------------------------------------------------------------------------
// Shared Steps
// ---------------------------------------------------------------------------

const resultSetSchema = z.array(z.object({ result: z.unknown() }));

/** The dataset address, or a NO_DATA fault. */
export function requireData(state: InternalEngineState): Address {
  if (state.dataAddress === null) {
    throw new PolicyFault(noData());
  }
  return state.dataAddress;
}

/**
 * Extract the decision from a decoded result set. The guest returns an
 * array of `{ result }` records; the last one wins.
 */
export function pickDecision(results: unknown, entrypoint: string): unknown {
  const parsed = resultSetSchema.safeParse(results);
  if (!parsed.success) {
    throw new PolicyFault(
      marshalingError(`result of '${entrypoint}'`, 'expected an array of { result } records'),
    );
  }
  const last = parsed.data.at(-1);
  if (last === undefined) {
    throw new PolicyFault(noResults(entrypoint));
  }
  return last.result;
}

/**
 * Write the input document and bind it, with the dataset, to a fresh
 * context record. Call order matters to the guest: input, then data.
 */
export function openContextRecord(state: InternalEngineState, input: Uint8Array): ContextHandle {
  const { exports, guest } = state;
  const data = requireData(state);
  const inputAddress = writeJsonDocument(guest, exports.jsonParse, input, 'input');
  const context = Address.of(exports.evalCtxNew());
  exports.evalCtxSetInput(context.offset, inputAddress.offset);
  exports.evalCtxSetData(context.offset, data.offset);
  return { input: inputAddress, context };
}

/** Evaluate an entrypoint on a context record and read its decision. */
export function evaluateContextRecord(
  state: InternalEngineState,
  handle: ContextHandle,
  entrypointId: number,
  entrypoint: string,
): unknown {
  const { exports, guest } = state;
  exports.evalCtxSetEntrypoint(handle.context.offset, entrypointId);
  exports.evalCtx(handle.context.offset);

  const resultAddress = Address.of(exports.evalCtxGetResult(handle.context.offset));
  let results: unknown;
  try {
    results = readJsonDocument(guest, exports.jsonDump, resultAddress, `result of '${entrypoint}'`);
  } finally {
    guest.free(resultAddress);
  }
  return pickDecision(results, entrypoint);
}
