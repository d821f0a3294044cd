/**
 * policy-wasm — Guest export binding
 *
 * Resolves the functions and globals the runtime calls on an instantiated
 * policy module, failing with MISSING_EXPORT when one is absent.
 */

import type { AbiVersion, GuestInstance, Result } from '../types.js';
import type { PolicyError } from '../errors.js';
import { missingExport } from '../errors.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** A guest function taking and returning i32 values (returns 0 for void). */
export type GuestFunction = (...args: number[]) => number;

/** Exports used for heap-pointer evaluation (ABI minor version 2 and later). */
export interface SingleCallExports {
  /** `opa_eval(reserved, entrypoint, data, input, inputLen, heapPtr, format)` */
  readonly eval: GuestFunction;
  readonly heapPtrGet: GuestFunction;
  readonly heapPtrSet: GuestFunction;
}

/** Every export the runtime calls, keyed by role. */
export interface PolicyExports {
  readonly entrypoints: GuestFunction;
  readonly jsonDump: GuestFunction;
  readonly jsonParse: GuestFunction;
  readonly malloc: GuestFunction;
  readonly free: GuestFunction;
  readonly evalCtxNew: GuestFunction;
  readonly evalCtxSetInput: GuestFunction;
  readonly evalCtxSetData: GuestFunction;
  readonly evalCtxSetEntrypoint: GuestFunction;
  readonly evalCtxGetResult: GuestFunction;
  /** `eval(ctx)` */
  readonly evalCtx: GuestFunction;
  /** Present when the module's ABI supports single-call evaluation. */
  readonly singleCall: SingleCallExports | null;
}

/** Minor ABI version from which `opa_eval` and the heap pointer exports exist. */
export const SINGLE_CALL_MIN_MINOR_VERSION = 2;

const ABI_MAJOR_GLOBAL = 'opa_wasm_abi_version';
const ABI_MINOR_GLOBAL = 'opa_wasm_abi_minor_version';

// ---------------------------------------------------------------------------
// Globals
// ---------------------------------------------------------------------------

function readGlobal(instance: GuestInstance, name: string): number | undefined {
  const value = instance.exports[name];
  if (value instanceof WebAssembly.Global) {
    return Number(value.value);
  }
  return undefined;
}

/**
 * Read the ABI version from the module's exported globals.
 * A missing major version defaults to 1, a missing minor version to 0.
 */
export function readAbiVersion(instance: GuestInstance): AbiVersion {
  return {
    major: readGlobal(instance, ABI_MAJOR_GLOBAL) ?? 1,
    minor: readGlobal(instance, ABI_MINOR_GLOBAL) ?? 0,
  };
}

// ---------------------------------------------------------------------------
// Functions
// ---------------------------------------------------------------------------

/** Wrap an exported function so its i32 result is read as an unsigned offset. */
function lookupFunction(instance: GuestInstance, name: string): GuestFunction | undefined {
  const value = instance.exports[name];
  if (typeof value !== 'function') {
    return undefined;
  }
  return (...args: number[]): number => Number(value(...args)) >>> 0;
}

/**
 * Bind all exports needed for the given ABI version.
 *
 * The single-call exports are only required, and only bound, when the
 * minor version supports them.
 */
export function bindPolicyExports(
  instance: GuestInstance,
  version: AbiVersion,
): Result<PolicyExports, PolicyError> {
  const fns = new Map<string, GuestFunction>();

  const required = [
    'entrypoints',
    'opa_json_dump',
    'opa_json_parse',
    'opa_malloc',
    'opa_free',
    'opa_eval_ctx_new',
    'opa_eval_ctx_set_input',
    'opa_eval_ctx_set_data',
    'opa_eval_ctx_set_entrypoint',
    'opa_eval_ctx_get_result',
    'eval',
  ];
  const singleCall = version.minor >= SINGLE_CALL_MIN_MINOR_VERSION;
  if (singleCall) {
    required.push('opa_eval', 'opa_heap_ptr_get', 'opa_heap_ptr_set');
  }

  for (const name of required) {
    const fn = lookupFunction(instance, name);
    if (fn === undefined) {
      return { ok: false, error: missingExport(name, 'function') };
    }
    fns.set(name, fn);
  }

  const get = (name: string): GuestFunction => {
    const fn = fns.get(name);
    if (fn === undefined) {
      throw new Error(`export '${name}' was not bound`);
    }
    return fn;
  };

  return {
    ok: true,
    value: {
      entrypoints: get('entrypoints'),
      jsonDump: get('opa_json_dump'),
      jsonParse: get('opa_json_parse'),
      malloc: get('opa_malloc'),
      free: get('opa_free'),
      evalCtxNew: get('opa_eval_ctx_new'),
      evalCtxSetInput: get('opa_eval_ctx_set_input'),
      evalCtxSetData: get('opa_eval_ctx_set_data'),
      evalCtxSetEntrypoint: get('opa_eval_ctx_set_entrypoint'),
      evalCtxGetResult: get('opa_eval_ctx_get_result'),
      evalCtx: get('eval'),
      singleCall: singleCall
        ? {
            eval: get('opa_eval'),
            heapPtrGet: get('opa_heap_ptr_get'),
            heapPtrSet: get('opa_heap_ptr_set'),
          }
        : null,
    },
  };
}
