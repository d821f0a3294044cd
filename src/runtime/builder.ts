/**
 * policy-wasm — Runtime builder
 *
 * Compiles a policy module, validates its imports, allocates its linear
 * memory, instantiates it and hands it to the engine.
 *
 * Builders are immutable: every setter returns a new builder.
 */

import type { PolicyError } from '../errors.js';
import { instantiationFailed, invalidBundle, invalidModule } from '../errors.js';
import type { Bundle } from '../bundle/bundle.js';
import { initializeEngine } from '../engine/engine.js';
import { defaultAbortHandler, defaultPrintlnHandler } from '../host/host-imports.js';
import { validateModuleImports } from '../loader/import-validation.js';
import { instantiate } from '../loader/instantiator.js';
import { loadModule, loadPrecompiledModule } from '../loader/module-loader.js';
import { runtimeLog } from '../logger.js';
import type {
  AbortHandler,
  CompiledModule,
  PolicyEngine,
  PrintlnHandler,
  Result,
  RuntimeConfig,
  WasmBackend,
} from '../types.js';
import { DEFAULT_INITIAL_MEMORY_PAGES } from '../types.js';
import { createWebAssemblyBackend } from './backend.js';

// ---------------------------------------------------------------------------
// Builder
// ---------------------------------------------------------------------------

export interface RuntimeBuilder {
  readonly config: RuntimeConfig;
  onAbort(handler: AbortHandler): RuntimeBuilder;
  onPrintln(handler: PrintlnHandler): RuntimeBuilder;
  /** Bound memory growth. `undefined` removes the bound. */
  maxMemoryPages(pages: number | undefined): RuntimeBuilder;
  withBackend(backend: WasmBackend): RuntimeBuilder;
  /** Build an engine from raw WASM bytes. */
  build(bytes: Uint8Array): Promise<Result<PolicyEngine, PolicyError>>;
  /**
   * Build an engine from the first WASM module of a bundle, or from its
   * precompiled artifact when the backend can load one.
   */
  buildFromBundle(bundle: Bundle): Promise<Result<PolicyEngine, PolicyError>>;
}

function resolveConfig(overrides: Partial<RuntimeConfig>): RuntimeConfig {
  return Object.freeze({
    onAbort: overrides.onAbort ?? defaultAbortHandler,
    onPrintln: overrides.onPrintln ?? defaultPrintlnHandler,
    maxMemoryPages: overrides.maxMemoryPages,
    backend: overrides.backend ?? createWebAssemblyBackend(),
  });
}

function createMemory(config: RuntimeConfig): Result<WebAssembly.Memory, PolicyError> {
  const descriptor: WebAssembly.MemoryDescriptor =
    config.maxMemoryPages === undefined
      ? { initial: DEFAULT_INITIAL_MEMORY_PAGES }
      : { initial: DEFAULT_INITIAL_MEMORY_PAGES, maximum: config.maxMemoryPages };
  try {
    return { ok: true, value: new WebAssembly.Memory(descriptor) };
  } catch (err: unknown) {
    const message = err instanceof Error ? err.message : String(err);
    return { ok: false, error: instantiationFailed(`cannot allocate linear memory: ${message}`) };
  }
}

async function buildFromModule(
  config: RuntimeConfig,
  module: CompiledModule,
): Promise<Result<PolicyEngine, PolicyError>> {
  const report = validateModuleImports(module.imports);
  if (!report.ok) {
    return report;
  }
  if (!report.value.importsMemory) {
    return {
      ok: false,
      error: invalidModule("module does not import 'env.memory'; policy modules use host-allocated memory"),
    };
  }
  runtimeLog('module imports %s', report.value.hostFunctions.join(', ') || 'no host functions');

  const memory = createMemory(config);
  if (!memory.ok) {
    return memory;
  }

  const instance = await instantiate(module, memory.value, config);
  if (!instance.ok) {
    return instance;
  }

  const engine = initializeEngine(instance.value, memory.value);
  if (engine.ok) {
    const { major, minor } = engine.value.abiVersion;
    runtimeLog('built engine on %s backend (abi %d.%d)', config.backend.name, major, minor);
  }
  return engine;
}

/** Create a builder. Unset options take their defaults. */
export function createRuntimeBuilder(overrides: Partial<RuntimeConfig> = {}): RuntimeBuilder {
  const config = resolveConfig(overrides);

  const derive = (changes: Partial<RuntimeConfig>): RuntimeBuilder =>
    createRuntimeBuilder({ ...config, ...changes });

  async function build(bytes: Uint8Array): Promise<Result<PolicyEngine, PolicyError>> {
    const module = await loadModule(config.backend, bytes);
    if (!module.ok) {
      return module;
    }
    return buildFromModule(config, module.value);
  }

  return {
    config,

    onAbort(handler: AbortHandler): RuntimeBuilder {
      return derive({ onAbort: handler });
    },

    onPrintln(handler: PrintlnHandler): RuntimeBuilder {
      return derive({ onPrintln: handler });
    },

    maxMemoryPages(pages: number | undefined): RuntimeBuilder {
      return derive({ maxMemoryPages: pages });
    },

    withBackend(backend: WasmBackend): RuntimeBuilder {
      return derive({ backend });
    },

    build,

    async buildFromBundle(bundle: Bundle): Promise<Result<PolicyEngine, PolicyError>> {
      if (bundle.precompiled !== undefined) {
        const precompiled = await loadPrecompiledModule(config.backend, bundle.precompiled);
        if (precompiled !== undefined) {
          if (!precompiled.ok) {
            return precompiled;
          }
          runtimeLog('building from the precompiled module');
          return buildFromModule(config, precompiled.value);
        }
        runtimeLog('backend %s cannot load precompiled modules, using the WASM module', config.backend.name);
      }

      const first = bundle.wasmPolicies[0];
      if (first === undefined) {
        return { ok: false, error: invalidBundle('the bundle must contain at least one WASM module') };
      }
      runtimeLog('building from bundle module for %s', first.entrypoint);
      return build(first.bytes);
    },
  };
}
