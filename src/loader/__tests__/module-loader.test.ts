import { describe, it, expect } from 'vitest';
import { loadModule, loadPrecompiledModule } from '../module-loader.js';
import { createWebAssemblyBackend } from '../../runtime/backend.js';
import { createFakeBackend } from '../../runtime/__tests__/fake-guest.js';
import {
  minimalWasmModule,
  memoryImportWasmModule,
  invalidWasmBytes,
  emptyBytes,
  corruptedWasmModule,
} from './wasm-fixtures.js';

const backend = createWebAssemblyBackend();

describe('loadModule', () => {
  it('loads a minimal valid WASM module', async () => {
    const result = await loadModule(backend, minimalWasmModule());
    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.value.imports).toEqual([]);
    }
  });

  it('reports the imports a module declares', async () => {
    const result = await loadModule(backend, memoryImportWasmModule());
    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.value.imports).toEqual([{ module: 'env', name: 'memory', kind: 'memory' }]);
    }
  });

  it('compiles bytes that are a view into a larger buffer', async () => {
    const padded = new Uint8Array(16);
    padded.set(minimalWasmModule(), 4);
    const result = await loadModule(backend, padded.subarray(4, 12));
    expect(result.ok).toBe(true);
  });

  it('returns INVALID_MODULE for empty bytes', async () => {
    const result = await loadModule(backend, emptyBytes());
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe('INVALID_MODULE');
      if (result.error.code === 'INVALID_MODULE') {
        expect(result.error.reason).toContain('empty');
      }
    }
  });

  it('returns INVALID_MODULE for bytes smaller than minimum size', async () => {
    const result = await loadModule(backend, new Uint8Array([0x00, 0x61, 0x73]));
    expect(result.ok).toBe(false);
    if (!result.ok && result.error.code === 'INVALID_MODULE') {
      expect(result.error.reason).toBe('WASM module too small: 3 bytes (minimum 8)');
    }
  });

  it('returns INVALID_MODULE for invalid magic bytes', async () => {
    const result = await loadModule(backend, invalidWasmBytes());
    expect(result.ok).toBe(false);
    if (!result.ok && result.error.code === 'INVALID_MODULE') {
      expect(result.error.reason).toContain('magic');
    }
  });

  it('returns INVALID_MODULE for corrupted WASM (valid magic, bad body)', async () => {
    const result = await loadModule(backend, corruptedWasmModule());
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe('INVALID_MODULE');
      if (result.error.code === 'INVALID_MODULE') {
        expect(result.error.reason).toContain('compilation failed');
      }
    }
  });

  it('checks the header before handing bytes to the backend', async () => {
    const fake = createFakeBackend({ policies: {} });
    await loadModule(fake, invalidWasmBytes());
    expect(fake.received).toEqual([]);
  });
});

describe('loadPrecompiledModule', () => {
  it('returns undefined when the backend cannot deserialize', async () => {
    const result = await loadPrecompiledModule(backend, new Uint8Array([1, 2, 3]));
    expect(result).toBeUndefined();
  });

  it('deserializes through the backend when it can', async () => {
    const fake = createFakeBackend({ policies: {}, precompiled: true });
    const artifact = new Uint8Array([9, 9, 9]);
    const result = await loadPrecompiledModule(fake, artifact);
    expect(result?.ok).toBe(true);
    expect(fake.received).toEqual([{ via: 'deserialize', bytes: artifact }]);
  });

  it('returns INVALID_MODULE when the backend rejects the artifact', async () => {
    const rejecting = {
      name: 'rejecting',
      compile: () => Promise.reject(new Error('unused')),
      deserialize: () => Promise.reject(new Error('artifact built for another engine')),
    };
    const result = await loadPrecompiledModule(rejecting, new Uint8Array([1]));
    expect(result).toEqual({
      ok: false,
      error: {
        code: 'INVALID_MODULE',
        reason: "precompiled module rejected by backend 'rejecting': artifact built for another engine",
      },
    });
  });
});
