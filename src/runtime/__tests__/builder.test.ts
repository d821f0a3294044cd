import { describe, it, expect } from 'vitest';
import { createRuntimeBuilder } from '../builder.js';
import {
  MODULE_HEADER,
  buildFakeEngine,
  createFakeBackend,
  examplePolicies,
} from './fake-guest.js';
import {
  abortOnStartWasmModule,
  memoryImportWasmModule,
  minimalWasmModule,
  printlnOnStartWasmModule,
  undeclaredImportWasmModule,
} from '../../loader/__tests__/wasm-fixtures.js';
import { defaultAbortHandler, defaultPrintlnHandler } from '../../host/host-imports.js';
import type { Bundle } from '../../bundle/bundle.js';
import { withPrecompiledModule } from '../../bundle/bundle.js';

function bundleOf(modules: readonly Uint8Array[]): Bundle {
  return {
    manifest: undefined,
    data: undefined,
    regoPolicies: new Map(),
    wasmPolicies: modules.map((bytes, index) => ({ entrypoint: `example/p${String(index)}`, bytes })),
    precompiled: undefined,
  };
}

describe('createRuntimeBuilder', () => {
  it('fills in defaults', () => {
    const { config } = createRuntimeBuilder();
    expect(config.onAbort).toBe(defaultAbortHandler);
    expect(config.onPrintln).toBe(defaultPrintlnHandler);
    expect(config.maxMemoryPages).toBeUndefined();
    expect(config.backend.name).toBe('webassembly');
    expect(Object.isFrozen(config)).toBe(true);
  });

  it('returns a new builder from every setter', () => {
    const base = createRuntimeBuilder();
    const onPrintln = (): void => undefined;
    const derived = base.maxMemoryPages(8).onPrintln(onPrintln);

    expect(derived).not.toBe(base);
    expect(derived.config.maxMemoryPages).toBe(8);
    expect(derived.config.onPrintln).toBe(onPrintln);
    expect(base.config.maxMemoryPages).toBeUndefined();
    expect(base.config.onPrintln).toBe(defaultPrintlnHandler);
    expect(derived.maxMemoryPages(undefined).config.maxMemoryPages).toBeUndefined();
  });
});

describe('build', () => {
  it('rejects bytes without a module header', async () => {
    const result = await createRuntimeBuilder().build(new Uint8Array([1, 2, 3, 4, 5, 6, 7, 8]));
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe('INVALID_MODULE');
    }
  });

  it('rejects a module with undeclared imports', async () => {
    const result = await createRuntimeBuilder().build(undeclaredImportWasmModule());
    expect(result).toEqual({
      ok: false,
      error: {
        code: 'INVALID_MODULE',
        reason:
          "module imports undeclared function 'env.undeclared_fn'. " +
          'Only memory, opa_abort, opa_println and opa_builtin0-4 are provided.',
      },
    });
  });

  it('rejects an extra import on a custom backend', async () => {
    const backend = createFakeBackend({
      policies: examplePolicies,
      extraImports: [{ module: 'env', name: 'clock', kind: 'function' }],
    });
    const result = await createRuntimeBuilder().withBackend(backend).build(MODULE_HEADER);
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe('INVALID_MODULE');
    }
    expect(backend.guests).toHaveLength(0);
  });

  it('reports a memory bound below the initial size', async () => {
    const result = await createRuntimeBuilder().maxMemoryPages(1).build(memoryImportWasmModule());
    expect(result.ok).toBe(false);
    if (!result.ok && result.error.code === 'INSTANTIATION_FAILED') {
      expect(result.error.reason.startsWith('cannot allocate linear memory: ')).toBe(true);
    } else {
      expect.unreachable();
    }
  });

  it('reports a module that needs more memory than is provided', async () => {
    const result = await createRuntimeBuilder().build(memoryImportWasmModule(3));
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe('INSTANTIATION_FAILED');
    }
  });

  it('rejects a module that does not import memory', async () => {
    const result = await createRuntimeBuilder().build(minimalWasmModule());
    expect(result).toEqual({
      ok: false,
      error: {
        code: 'INVALID_MODULE',
        reason: "module does not import 'env.memory'; policy modules use host-allocated memory",
      },
    });
  });

  it('rejects a custom backend module that does not import memory', async () => {
    const backend = createFakeBackend({ policies: examplePolicies });
    const withoutMemory = {
      ...backend,
      compile: async (bytes: Uint8Array) => {
        const compiled = await backend.compile(bytes);
        return { ...compiled, imports: compiled.imports.filter((entry) => entry.name !== 'memory') };
      },
    };
    const result = await createRuntimeBuilder().withBackend(withoutMemory).build(MODULE_HEADER);
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe('INVALID_MODULE');
    }
    expect(backend.guests).toHaveLength(0);
  });

  it('reports the first missing export of a module without policy exports', async () => {
    const result = await createRuntimeBuilder().build(memoryImportWasmModule());
    expect(result).toEqual({
      ok: false,
      error: { code: 'MISSING_EXPORT', exportName: 'entrypoints', expected: 'function' },
    });
  });

  it('reports an abort from the start function', async () => {
    const result = await createRuntimeBuilder().build(abortOnStartWasmModule('bad start'));
    expect(result).toEqual({ ok: false, error: { code: 'GUEST_ABORT', message: 'bad start' } });
  });

  it('routes println from the start function to the handler', async () => {
    const lines: string[] = [];
    const result = await createRuntimeBuilder()
      .onPrintln((line) => lines.push(line))
      .build(printlnOnStartWasmModule('starting'));
    expect(lines).toEqual(['starting']);
    expect(result.ok).toBe(false);
  });

  it('reports a failing println handler during the start function', async () => {
    const result = await createRuntimeBuilder()
      .onPrintln(() => {
        throw new Error('sink closed');
      })
      .build(printlnOnStartWasmModule('starting'));
    expect(result).toEqual({
      ok: false,
      error: { code: 'HOST_FUNCTION_ERROR', functionName: 'opa_println', message: 'sink closed' },
    });
  });

  it('reports a malformed entrypoints document', async () => {
    const backend = createFakeBackend({ policies: examplePolicies, entrypointsDocument: ['example/allow'] });
    const result = await createRuntimeBuilder().withBackend(backend).build(MODULE_HEADER);
    expect(result).toEqual({
      ok: false,
      error: {
        code: 'MARSHALING_ERROR',
        subject: 'entrypoints',
        message: 'expected an object mapping policy paths to integer ids',
      },
    });
  });

  it('builds independent engines from one builder', async () => {
    const backend = createFakeBackend({ policies: examplePolicies });
    const builder = createRuntimeBuilder().withBackend(backend);
    const first = await builder.build(MODULE_HEADER);
    const second = await builder.build(MODULE_HEADER);
    expect(first.ok && second.ok).toBe(true);
    expect(backend.guests).toHaveLength(2);
    if (first.ok && second.ok) {
      first.value.setData({ users: {} });
      expect(first.value.evaluate('example/echo', 1)).toEqual({ ok: true, value: 1 });
      expect(second.value.evaluate('example/echo', 1)).toEqual({ ok: false, error: { code: 'NO_DATA' } });
    }
  });
});

describe('buildFromBundle', () => {
  it('requires at least one WASM module', async () => {
    const backend = createFakeBackend({ policies: examplePolicies });
    const result = await createRuntimeBuilder().withBackend(backend).buildFromBundle(bundleOf([]));
    expect(result).toEqual({
      ok: false,
      error: { code: 'INVALID_BUNDLE', reason: 'the bundle must contain at least one WASM module' },
    });
  });

  it('compiles the first listed module', async () => {
    const backend = createFakeBackend({ policies: examplePolicies });
    const first = new Uint8Array([...MODULE_HEADER, 1]);
    const second = new Uint8Array([...MODULE_HEADER, 2]);
    const result = await createRuntimeBuilder().withBackend(backend).buildFromBundle(bundleOf([first, second]));
    expect(result.ok).toBe(true);
    expect(backend.received).toEqual([{ via: 'compile', bytes: first }]);
  });

  it('loads the precompiled module when the backend supports it', async () => {
    const backend = createFakeBackend({ policies: examplePolicies, precompiled: true });
    const artifact = new Uint8Array([7, 7, 7]);
    const bundle = withPrecompiledModule(bundleOf([MODULE_HEADER]), artifact);
    const result = await createRuntimeBuilder().withBackend(backend).buildFromBundle(bundle);
    expect(result.ok).toBe(true);
    expect(backend.received).toEqual([{ via: 'deserialize', bytes: artifact }]);
  });

  it('falls back to the WASM module when the backend cannot deserialize', async () => {
    const backend = createFakeBackend({ policies: examplePolicies });
    const bundle = withPrecompiledModule(bundleOf([MODULE_HEADER]), new Uint8Array([7, 7, 7]));
    const result = await createRuntimeBuilder().withBackend(backend).buildFromBundle(bundle);
    expect(result.ok).toBe(true);
    expect(backend.received).toEqual([{ via: 'compile', bytes: MODULE_HEADER }]);
  });

  it('builds an engine that evaluates', async () => {
    const { engine } = await buildFakeEngine({ policies: examplePolicies });
    expect(engine.setData({ users: { test: {} } })).toEqual({ ok: true, value: undefined });
    expect(engine.evaluate('example/allow', { user_id: 'test' })).toEqual({ ok: true, value: true });
  });
});
