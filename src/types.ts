/**
 * policy-wasm — Core type definitions
 *
 * Public types for evaluating compiled policy modules: runtime configuration,
 * the pluggable WASM backend, the evaluation engine and evaluation contexts.
 */

import type { ZodType } from 'zod';
import type { PolicyBinding } from './policy/binding.js';
import type { PolicyError } from './errors.js';

// ---------------------------------------------------------------------------
// Result Type
// ---------------------------------------------------------------------------

/** Success branch of a Result. */
export interface ResultOk<T> {
  readonly ok: true;
  readonly value: T;
}

/** Failure branch of a Result. */
export interface ResultErr<E> {
  readonly ok: false;
  readonly error: E;
}

/** Discriminated union for fallible operations. */
export type Result<T, E> = ResultOk<T> | ResultErr<E>;

// ---------------------------------------------------------------------------
// Host Handlers
// ---------------------------------------------------------------------------

/** Invoked with the guest's message when the module calls `opa_abort`. */
export type AbortHandler = (message: string) => void;

/** Invoked with each line the module prints through `opa_println`. */
export type PrintlnHandler = (line: string) => void;

// ---------------------------------------------------------------------------
// WASM Backend
// ---------------------------------------------------------------------------

/** Kind of a module import, as reported by `WebAssembly.Module.imports`. */
export type ImportKind = 'function' | 'global' | 'memory' | 'table';

/** A single import declared by a compiled module. */
export interface ModuleImportDescriptor {
  readonly module: string;
  readonly name: string;
  readonly kind: ImportKind;
}

/** Import object handed to a module at instantiation. */
export type GuestImports = Record<string, Record<string, WebAssembly.ImportValue>>;

/** The part of an instantiated module the runtime talks to. */
export interface GuestInstance {
  readonly exports: Readonly<Record<string, unknown>>;
}

/** A module that has been compiled by a backend and can be instantiated. */
export interface CompiledModule {
  /** Imports the module declares. */
  readonly imports: readonly ModuleImportDescriptor[];
  instantiate(imports: GuestImports): Promise<GuestInstance>;
}

/**
 * Execution engine that compiles and instantiates policy modules.
 *
 * The default backend uses the platform `WebAssembly` object. Backends able
 * to load ahead-of-time compiled artifacts implement `deserialize`.
 */
export interface WasmBackend {
  readonly name: string;
  compile(bytes: Uint8Array): Promise<CompiledModule>;
  deserialize?(bytes: Uint8Array): Promise<CompiledModule>;
}

// ---------------------------------------------------------------------------
// Runtime Configuration
// ---------------------------------------------------------------------------

/** Pages allocated for the linear memory before instantiation (64 KiB each). */
export const DEFAULT_INITIAL_MEMORY_PAGES = 2;

/** Configuration for building an engine. */
export interface RuntimeConfig {
  /** Called when the module aborts. Default: throw, failing the evaluation. */
  readonly onAbort: AbortHandler;
  /** Called for every `println` from the module. Default: write to stderr. */
  readonly onPrintln: PrintlnHandler;
  /** Upper bound on linear memory growth in pages. Default: unbounded. */
  readonly maxMemoryPages: number | undefined;
  /** Execution engine. Default: a fresh platform `WebAssembly` backend. */
  readonly backend: WasmBackend;
}

// ---------------------------------------------------------------------------
// Engine
// ---------------------------------------------------------------------------

/** ABI version reported by the module's exported globals. */
export interface AbiVersion {
  readonly major: number;
  readonly minor: number;
}

/** Linear memory size of an engine. */
export interface MemoryUsage {
  readonly bytes: number;
  readonly pages: number;
}

/** Lifecycle state of an engine. */
export type EngineStatus = 'ready' | 'poisoned';

/** Lifecycle state of an evaluation context. */
export type ContextStatus = 'created' | 'evaluating' | 'destroyed';

/**
 * An evaluation session bound to one input value. Evaluates any number of
 * entrypoints against the same marshaled input.
 */
export interface EvaluationContext {
  readonly status: ContextStatus;
  evaluate(entrypoint: string): Result<unknown, PolicyError>;
  evaluate<T>(entrypoint: string, schema: ZodType<T>): Result<T, PolicyError>;
  /** Release the guest-side input and context. The context is unusable afterwards. */
  destroy(): Result<void, PolicyError>;
}

/** An instantiated policy module ready to evaluate decisions. */
export interface PolicyEngine {
  readonly abiVersion: AbiVersion;
  readonly status: EngineStatus;

  /** Entrypoint names, `/`-separated. Each call starts a fresh iteration. */
  entrypoints(): IterableIterator<string>;

  /** Replace the contextual data document. The whole dataset is sent every time. */
  setData(data: unknown): Result<void, PolicyError>;

  evaluate(entrypoint: string, input: unknown): Result<unknown, PolicyError>;
  evaluate<T>(
    entrypoint: string,
    input: unknown,
    schema: ZodType<T>,
  ): Result<T, PolicyError>;

  /** Open a context for `input`. Only one context may be open at a time. */
  evalContext(input: unknown): Result<EvaluationContext, PolicyError>;

  /**
   * Open a context, run `fn` with it and release it afterwards.
   *
   * If `fn` returns normally and the release fails, a `ContextTeardownError`
   * is thrown. If `fn` throws, release failures are suppressed and the
   * original error propagates.
   */
  withContext<R>(
    input: unknown,
    fn: (context: EvaluationContext) => R,
  ): Result<R, PolicyError>;

  /** Evaluate a typed policy binding. */
  decide<I, O>(policy: PolicyBinding<I, O>, input: I): Result<O, PolicyError>;

  memoryUsage(): MemoryUsage;
}

// ---------------------------------------------------------------------------
// Re-export PolicyError from errors module (type-only)
// ---------------------------------------------------------------------------

export type { PolicyError, PolicyErrorCode, PolicyErrorCategory } from './errors.js';
