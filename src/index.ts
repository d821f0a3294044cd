/**
 * policy-wasm — In-process evaluation of compiled policy WASM modules.
 *
 * @packageDocumentation
 */

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type {
  Result,
  ResultOk,
  ResultErr,
  AbortHandler,
  PrintlnHandler,
  ImportKind,
  ModuleImportDescriptor,
  GuestImports,
  GuestInstance,
  CompiledModule,
  WasmBackend,
  RuntimeConfig,
  AbiVersion,
  MemoryUsage,
  EngineStatus,
  ContextStatus,
  EvaluationContext,
  PolicyEngine,
  PolicyError,
  PolicyErrorCode,
  PolicyErrorCategory,
} from './types.js';

export { DEFAULT_INITIAL_MEMORY_PAGES } from './types.js';

// ---------------------------------------------------------------------------
// Errors
// ---------------------------------------------------------------------------

export {
  errorCategory,
  formatPolicyError,
  ContextTeardownError,
  GuestAbortSignal,
} from './errors.js';

// ---------------------------------------------------------------------------
// Runtime
// ---------------------------------------------------------------------------

export type { RuntimeBuilder } from './runtime/builder.js';
export { createRuntimeBuilder } from './runtime/builder.js';
export { createWebAssemblyBackend, wrapWebAssemblyModule } from './runtime/backend.js';

// ---------------------------------------------------------------------------
// Bundles
// ---------------------------------------------------------------------------

export type { Bundle, WasmPolicy } from './bundle/bundle.js';
export { readBundle, readBundleFile, withPrecompiledModule } from './bundle/bundle.js';
export type { Manifest, ManifestWasm } from './bundle/manifest.js';

// ---------------------------------------------------------------------------
// Policy Bindings
// ---------------------------------------------------------------------------

export type { PolicyBinding, PolicyDefinition } from './policy/binding.js';
export { definePolicy } from './policy/binding.js';
