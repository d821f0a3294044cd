/**
 * policy-wasm — Error types
 *
 * Discriminated union of all error types the runtime can produce,
 * plus factory functions for constructing each variant.
 */

// ---------------------------------------------------------------------------
// Error Codes
// ---------------------------------------------------------------------------

/** All possible error codes produced by the runtime. */
export type PolicyErrorCode =
  | 'INVALID_MODULE'
  | 'MISSING_EXPORT'
  | 'INSTANTIATION_FAILED'
  | 'INVALID_BUNDLE'
  | 'INVALID_MANIFEST'
  | 'INVALID_DATA'
  | 'NO_DATA'
  | 'UNKNOWN_ENTRYPOINT'
  | 'CONTEXT_BUSY'
  | 'CONTEXT_DESTROYED'
  | 'MARSHALING_ERROR'
  | 'NO_RESULTS'
  | 'MEMORY_EXCEEDED'
  | 'GUEST_ABORT'
  | 'WASM_TRAP'
  | 'HOST_FUNCTION_ERROR'
  | 'INSTANCE_POISONED';

// ---------------------------------------------------------------------------
// Error Union
// ---------------------------------------------------------------------------

/** Discriminated union of all runtime errors. */
export type PolicyError =
  | {
      readonly code: 'INVALID_MODULE';
      readonly reason: string;
    }
  | {
      readonly code: 'MISSING_EXPORT';
      readonly exportName: string;
      readonly expected: 'function' | 'global';
    }
  | {
      readonly code: 'INSTANTIATION_FAILED';
      readonly reason: string;
    }
  | {
      readonly code: 'INVALID_BUNDLE';
      readonly reason: string;
    }
  | {
      readonly code: 'INVALID_MANIFEST';
      readonly reason: string;
    }
  | {
      readonly code: 'INVALID_DATA';
      readonly reason: string;
    }
  | {
      readonly code: 'NO_DATA';
    }
  | {
      readonly code: 'UNKNOWN_ENTRYPOINT';
      readonly entrypoint: string;
    }
  | {
      readonly code: 'CONTEXT_BUSY';
    }
  | {
      readonly code: 'CONTEXT_DESTROYED';
    }
  | {
      readonly code: 'MARSHALING_ERROR';
      readonly subject: string;
      readonly message: string;
    }
  | {
      readonly code: 'NO_RESULTS';
      readonly entrypoint: string;
    }
  | {
      readonly code: 'MEMORY_EXCEEDED';
      readonly requestedBytes: number;
      readonly message: string;
    }
  | {
      readonly code: 'GUEST_ABORT';
      readonly message: string;
    }
  | {
      readonly code: 'WASM_TRAP';
      readonly trapKind: string;
      readonly message: string;
    }
  | {
      readonly code: 'HOST_FUNCTION_ERROR';
      readonly functionName: string;
      readonly message: string;
    }
  | {
      readonly code: 'INSTANCE_POISONED';
      readonly cause: PolicyErrorCode;
    };

/** Coarse grouping of error codes, used to decide how a caller should react. */
export type PolicyErrorCategory =
  | 'build'
  | 'bundle'
  | 'configuration'
  | 'marshaling'
  | 'resource'
  | 'trap';

// ---------------------------------------------------------------------------
// Error Constructors
// ---------------------------------------------------------------------------

/** Create an INVALID_MODULE error. */
export function invalidModule(reason: string): PolicyError {
  return { code: 'INVALID_MODULE', reason } as const;
}

/** Create a MISSING_EXPORT error. */
export function missingExport(exportName: string, expected: 'function' | 'global'): PolicyError {
  return { code: 'MISSING_EXPORT', exportName, expected } as const;
}

/** Create an INSTANTIATION_FAILED error. */
export function instantiationFailed(reason: string): PolicyError {
  return { code: 'INSTANTIATION_FAILED', reason } as const;
}

/** Create an INVALID_BUNDLE error. */
export function invalidBundle(reason: string): PolicyError {
  return { code: 'INVALID_BUNDLE', reason } as const;
}

/** Create an INVALID_MANIFEST error. */
export function invalidManifest(reason: string): PolicyError {
  return { code: 'INVALID_MANIFEST', reason } as const;
}

/** Create an INVALID_DATA error. */
export function invalidData(reason: string): PolicyError {
  return { code: 'INVALID_DATA', reason } as const;
}

/** Create a NO_DATA error. */
export function noData(): PolicyError {
  return { code: 'NO_DATA' } as const;
}

/** Create an UNKNOWN_ENTRYPOINT error. */
export function unknownEntrypoint(entrypoint: string): PolicyError {
  return { code: 'UNKNOWN_ENTRYPOINT', entrypoint } as const;
}

/** Create a CONTEXT_BUSY error. */
export function contextBusy(): PolicyError {
  return { code: 'CONTEXT_BUSY' } as const;
}

/** Create a CONTEXT_DESTROYED error. */
export function contextDestroyed(): PolicyError {
  return { code: 'CONTEXT_DESTROYED' } as const;
}

/** Create a MARSHALING_ERROR error. */
export function marshalingError(subject: string, message: string): PolicyError {
  return { code: 'MARSHALING_ERROR', subject, message } as const;
}

/** Create a NO_RESULTS error. */
export function noResults(entrypoint: string): PolicyError {
  return { code: 'NO_RESULTS', entrypoint } as const;
}

/** Create a MEMORY_EXCEEDED error. */
export function memoryExceeded(requestedBytes: number, message: string): PolicyError {
  return { code: 'MEMORY_EXCEEDED', requestedBytes, message } as const;
}

/** Create a GUEST_ABORT error. */
export function guestAbort(message: string): PolicyError {
  return { code: 'GUEST_ABORT', message } as const;
}

/** Create a WASM_TRAP error. */
export function wasmTrap(trapKind: string, message: string): PolicyError {
  return { code: 'WASM_TRAP', trapKind, message } as const;
}

/** Create a HOST_FUNCTION_ERROR error. */
export function hostFunctionError(functionName: string, message: string): PolicyError {
  return { code: 'HOST_FUNCTION_ERROR', functionName, message } as const;
}

/** Create an INSTANCE_POISONED error. */
export function instancePoisoned(cause: PolicyErrorCode): PolicyError {
  return { code: 'INSTANCE_POISONED', cause } as const;
}

// ---------------------------------------------------------------------------
// Classification & Formatting
// ---------------------------------------------------------------------------

/** Map an error to its category. */
export function errorCategory(error: PolicyError): PolicyErrorCategory {
  switch (error.code) {
    case 'INVALID_MODULE':
    case 'MISSING_EXPORT':
    case 'INSTANTIATION_FAILED':
      return 'build';
    case 'INVALID_BUNDLE':
    case 'INVALID_MANIFEST':
    case 'INVALID_DATA':
      return 'bundle';
    case 'NO_DATA':
    case 'UNKNOWN_ENTRYPOINT':
    case 'CONTEXT_BUSY':
    case 'CONTEXT_DESTROYED':
      return 'configuration';
    case 'MARSHALING_ERROR':
    case 'NO_RESULTS':
      return 'marshaling';
    case 'MEMORY_EXCEEDED':
      return 'resource';
    case 'GUEST_ABORT':
    case 'WASM_TRAP':
    case 'HOST_FUNCTION_ERROR':
    case 'INSTANCE_POISONED':
      return 'trap';
  }
}

/** Render an error as a single human-readable line. */
export function formatPolicyError(error: PolicyError): string {
  switch (error.code) {
    case 'INVALID_MODULE':
      return `invalid module: ${error.reason}`;
    case 'MISSING_EXPORT':
      return `module does not export ${error.expected} '${error.exportName}'`;
    case 'INSTANTIATION_FAILED':
      return `instantiation failed: ${error.reason}`;
    case 'INVALID_BUNDLE':
      return `invalid bundle: ${error.reason}`;
    case 'INVALID_MANIFEST':
      return `invalid manifest: ${error.reason}`;
    case 'INVALID_DATA':
      return `invalid data file: ${error.reason}`;
    case 'NO_DATA':
      return 'no data provided, all decisions will return undefined';
    case 'UNKNOWN_ENTRYPOINT':
      return `invalid entrypoint '${error.entrypoint}'`;
    case 'CONTEXT_BUSY':
      return 'an evaluation context is already open on this engine';
    case 'CONTEXT_DESTROYED':
      return 'the evaluation context has been destroyed';
    case 'MARSHALING_ERROR':
      return `failed to marshal ${error.subject}: ${error.message}`;
    case 'NO_RESULTS':
      return `the query for '${error.entrypoint}' produced no results`;
    case 'MEMORY_EXCEEDED':
      return `memory exceeded while reserving ${String(error.requestedBytes)} bytes: ${error.message}`;
    case 'GUEST_ABORT':
      return `policy module aborted: ${error.message}`;
    case 'WASM_TRAP':
      return `policy module trapped (${error.trapKind}): ${error.message}`;
    case 'HOST_FUNCTION_ERROR':
      return `host function '${error.functionName}' failed: ${error.message}`;
    case 'INSTANCE_POISONED':
      return `engine is unusable after a previous ${error.cause} failure; rebuild it`;
  }
}

// ---------------------------------------------------------------------------
// Signals
// ---------------------------------------------------------------------------

/**
 * Internal signal carrying a typed error out of guest-facing code.
 * Caught by the engine guard and converted into a failed Result.
 */
export class PolicyFault extends Error {
  readonly error: PolicyError;

  constructor(error: PolicyError) {
    super(formatPolicyError(error));
    this.name = 'PolicyFault';
    this.error = error;
  }
}

/** Thrown by the default abort handler when the guest calls `opa_abort`. */
export class GuestAbortSignal extends Error {
  readonly guestMessage: string;

  constructor(guestMessage: string) {
    super(`policy module abort was called: ${guestMessage}`);
    this.name = 'GuestAbortSignal';
    this.guestMessage = guestMessage;
  }
}

/** Thrown when a caller-supplied host handler fails while the guest is running. */
export class HostFunctionFault extends Error {
  readonly functionName: string;
  readonly detail: string;

  constructor(functionName: string, detail: string) {
    super(`Host function '${functionName}' failed: ${detail}`);
    this.name = 'HostFunctionFault';
    this.functionName = functionName;
    this.detail = detail;
  }
}

/**
 * Fatal signal raised when an evaluation context cannot be released during
 * implicit teardown. The engine's guest memory is in an unknown state.
 */
export class ContextTeardownError extends Error {
  readonly error: PolicyError;

  constructor(error: PolicyError) {
    super(`failed to release evaluation context: ${formatPolicyError(error)}`);
    this.name = 'ContextTeardownError';
    this.error = error;
  }
}
