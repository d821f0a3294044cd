/**
 * policy-wasm — Policy bundles
 *
 * Reads the gzipped tarballs produced by the policy compiler. A bundle may
 * carry a manifest, a data document, Rego sources and compiled WASM
 * modules; only modules the manifest lists are exposed.
 */

import { readFile } from 'node:fs/promises';
import type { PassThrough } from 'node:stream';
import { gunzipSync } from 'node:zlib';
import tar from 'tar-stream';
import type { Headers } from 'tar-stream';
import type { PolicyError } from '../errors.js';
import { invalidBundle, invalidData } from '../errors.js';
import { bundleLog } from '../logger.js';
import type { Result } from '../types.js';
import type { Manifest } from './manifest.js';
import { parseManifest } from './manifest.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** A compiled policy module listed in the manifest. */
export interface WasmPolicy {
  readonly entrypoint: string;
  readonly bytes: Uint8Array;
}

export interface Bundle {
  readonly manifest: Manifest | undefined;
  /** Contents of `/data.json`; undefined when the bundle has none. */
  readonly data: unknown;
  /** Rego sources keyed by path within the bundle. */
  readonly regoPolicies: ReadonlyMap<string, string>;
  readonly wasmPolicies: readonly WasmPolicy[];
  /** Ahead-of-time compiled artifact for backends that can load one. */
  readonly precompiled: Uint8Array | undefined;
}

const MANIFEST_PATH = '/.manifest';
const DATA_PATH = '/data.json';

// ---------------------------------------------------------------------------
// Archive
// ---------------------------------------------------------------------------

/** Normalize an archive path to the `/`-rooted form the manifest uses. */
export function normalizeBundlePath(path: string): string {
  const trimmed = path.startsWith('./') ? path.slice(1) : path;
  return trimmed.startsWith('/') ? trimmed : `/${trimmed}`;
}

function hasExtension(path: string, extension: string): boolean {
  const dot = path.lastIndexOf('.');
  return dot >= 0 && path.slice(dot + 1).toLowerCase() === extension;
}

/** Collect the regular files of a tar archive, keyed by normalized path. */
function extractFiles(archive: Buffer): Promise<Map<string, Buffer>> {
  return new Promise((resolve, reject) => {
    const files = new Map<string, Buffer>();
    const extractor = tar.extract();

    extractor.on('entry', (header: Headers, stream: PassThrough, next: () => void) => {
      const chunks: Buffer[] = [];
      stream.on('data', (chunk: Buffer) => {
        chunks.push(chunk);
      });
      stream.on('end', () => {
        if (header.type === 'file') {
          files.set(normalizeBundlePath(header.name), Buffer.concat(chunks));
        } else {
          bundleLog('skipping %s entry %s', header.type ?? 'unknown', header.name);
        }
        next();
      });
    });
    extractor.on('finish', () => {
      resolve(files);
    });
    extractor.on('error', reject);

    extractor.end(archive);
  });
}

// ---------------------------------------------------------------------------
// Reading
// ---------------------------------------------------------------------------

/** Read a bundle from `.tar.gz` bytes. */
export async function readBundle(bytes: Uint8Array): Promise<Result<Bundle, PolicyError>> {
  let files: Map<string, Buffer>;
  try {
    files = await extractFiles(gunzipSync(bytes));
  } catch (err: unknown) {
    const message = err instanceof Error ? err.message : String(err);
    return { ok: false, error: invalidBundle(message) };
  }

  let manifest: Manifest | undefined;
  let data: unknown;
  const regoPolicies = new Map<string, string>();
  const wasmFiles = new Map<string, Uint8Array>();

  for (const [path, content] of files) {
    if (path === MANIFEST_PATH) {
      const parsed = parseManifest(content.toString('utf8'));
      if (!parsed.ok) {
        return parsed;
      }
      manifest = parsed.value;
    } else if (path === DATA_PATH) {
      try {
        data = JSON.parse(content.toString('utf8'));
      } catch (err: unknown) {
        const message = err instanceof Error ? err.message : String(err);
        return { ok: false, error: invalidData(message) };
      }
    } else if (hasExtension(path, 'rego')) {
      regoPolicies.set(path, content.toString('utf8'));
    } else if (hasExtension(path, 'wasm')) {
      wasmFiles.set(path, new Uint8Array(content));
    } else {
      bundleLog('ignoring %s', path);
    }
  }

  const wasmPolicies: WasmPolicy[] = [];
  for (const listed of manifest?.wasm ?? []) {
    const module = wasmFiles.get(normalizeBundlePath(listed.module));
    if (module === undefined) {
      bundleLog('manifest lists %s for %s but the bundle has no such file', listed.module, listed.entrypoint);
      continue;
    }
    wasmPolicies.push({ entrypoint: listed.entrypoint, bytes: module });
  }

  return {
    ok: true,
    value: Object.freeze({
      manifest,
      data,
      regoPolicies,
      wasmPolicies,
      precompiled: undefined,
    }),
  };
}

/** Read a bundle from a `.tar.gz` file. */
export async function readBundleFile(path: string): Promise<Result<Bundle, PolicyError>> {
  let bytes: Buffer;
  try {
    bytes = await readFile(path);
  } catch (err: unknown) {
    const message = err instanceof Error ? err.message : String(err);
    return { ok: false, error: invalidBundle(message) };
  }
  return readBundle(bytes);
}

/** A copy of `bundle` carrying an ahead-of-time compiled module. */
export function withPrecompiledModule(bundle: Bundle, precompiled: Uint8Array): Bundle {
  return Object.freeze({ ...bundle, precompiled });
}
