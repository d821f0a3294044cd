/**
 * policy-wasm — Host imports
 *
 * The functions a policy module calls back into: `opa_abort`, `opa_println`
 * and the `opa_builtin0`…`opa_builtin4` dispatchers. Builtins are not
 * executed by this runtime; each dispatcher answers with the null address,
 * which the module treats as an undefined value.
 */

import type { AbortHandler, PrintlnHandler } from '../types.js';
import { GuestAbortSignal, HostFunctionFault } from '../errors.js';
import { Address } from '../guest/address.js';
import { readNullTerminatedString } from '../guest/memory-io.js';

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

/** Returned by every builtin dispatcher: the guest's "undefined". */
export const BUILTIN_UNDEFINED = 0;

/** Maximum arity of the builtin dispatchers. */
export const MAX_BUILTIN_ARITY = 4;

/** Message passed to the abort handler when a guest string cannot be read. */
export const INVALID_STRING_MESSAGE = 'invalid string in memory';

/** Names of every function import the runtime provides under `env`. */
export const HOST_FUNCTION_NAMES: readonly string[] = [
  'opa_abort',
  'opa_println',
  ...Array.from({ length: MAX_BUILTIN_ARITY + 1 }, (_, arity) => `opa_builtin${String(arity)}`),
];

// ---------------------------------------------------------------------------
// Default Handlers
// ---------------------------------------------------------------------------

/** Default abort handler: fail the running evaluation. */
export function defaultAbortHandler(message: string): void {
  throw new GuestAbortSignal(message);
}

/** Default println handler: write the line to stderr. */
export function defaultPrintlnHandler(line: string): void {
  process.stderr.write(`${line}\n`);
}

// ---------------------------------------------------------------------------
// Handler Wrapping
// ---------------------------------------------------------------------------

/**
 * Wrap a caller-supplied handler so that anything it throws, other than an
 * abort signal, surfaces as a HOST_FUNCTION_ERROR for the running call.
 */
export function wrapHandler(
  functionName: string,
  handler: (message: string) => void,
): (message: string) => void {
  return (message: string): void => {
    try {
      handler(message);
    } catch (err: unknown) {
      if (err instanceof GuestAbortSignal || err instanceof HostFunctionFault) {
        throw err;
      }
      const detail = err instanceof Error ? err.message : String(err);
      throw new HostFunctionFault(functionName, detail);
    }
  };
}

// ---------------------------------------------------------------------------
// Import Object
// ---------------------------------------------------------------------------

/** Handlers the host imports dispatch to. */
export interface HostHandlers {
  readonly onAbort: AbortHandler;
  readonly onPrintln: PrintlnHandler;
}

/**
 * Build the function imports placed under the `env` namespace.
 *
 * @param memory - The linear memory the module imports; strings are read from it.
 */
export function buildHostImports(
  memory: WebAssembly.Memory,
  handlers: HostHandlers,
): Record<string, (...args: number[]) => number | undefined> {
  const onAbort = wrapHandler('opa_abort', handlers.onAbort);
  const onPrintln = wrapHandler('opa_println', handlers.onPrintln);

  const imports: Record<string, (...args: number[]) => number | undefined> = {
    opa_abort: (addr = 0): undefined => {
      onAbort(readNullTerminatedString(memory, Address.of(addr)) ?? INVALID_STRING_MESSAGE);
      return undefined;
    },
    opa_println: (addr = 0): undefined => {
      const line = readNullTerminatedString(memory, Address.of(addr));
      if (line === undefined) {
        onAbort(INVALID_STRING_MESSAGE);
      } else {
        onPrintln(line);
      }
      return undefined;
    },
  };

  for (let arity = 0; arity <= MAX_BUILTIN_ARITY; arity++) {
    imports[`opa_builtin${String(arity)}`] = (): number => BUILTIN_UNDEFINED;
  }

  return imports;
}
