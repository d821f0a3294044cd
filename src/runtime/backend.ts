/**
 * policy-wasm — Default execution backend
 *
 * Compiles and instantiates modules with the platform `WebAssembly` object.
 * It cannot load ahead-of-time compiled artifacts, so it has no `deserialize`.
 */

import type { CompiledModule, GuestImports, GuestInstance, WasmBackend } from '../types.js';

/** Describe a compiled `WebAssembly.Module` to the runtime. */
export function wrapWebAssemblyModule(module: WebAssembly.Module): CompiledModule {
  return {
    imports: WebAssembly.Module.imports(module).map((descriptor) => ({
      module: descriptor.module,
      name: descriptor.name,
      kind: descriptor.kind,
    })),
    async instantiate(imports: GuestImports): Promise<GuestInstance> {
      return WebAssembly.instantiate(module, imports);
    },
  };
}

/** Create a backend over the platform `WebAssembly` object. */
export function createWebAssemblyBackend(): WasmBackend {
  return {
    name: 'webassembly',

    async compile(bytes: Uint8Array): Promise<CompiledModule> {
      // Copy into a fresh ArrayBuffer: `bytes` may be a view over a shared or larger buffer.
      const buffer = new ArrayBuffer(bytes.byteLength);
      new Uint8Array(buffer).set(bytes);
      const module = await WebAssembly.compile(buffer);
      return wrapWebAssemblyModule(module);
    },
  };
}
