/**
 * policy-wasm — Bundle manifest
 *
 * The `/.manifest` document of a policy bundle. Every field is optional in
 * the file and defaults to empty.
 */

import { z } from 'zod';
import type { PolicyError } from '../errors.js';
import { invalidManifest } from '../errors.js';
import type { Result } from '../types.js';

export const manifestWasmSchema = z.object({
  entrypoint: z.string().default(''),
  module: z.string().default(''),
});

export const manifestSchema = z.object({
  revision: z.string().default(''),
  roots: z.array(z.string()).default([]),
  wasm: z.array(manifestWasmSchema).default([]),
});

export type ManifestWasm = z.infer<typeof manifestWasmSchema>;
export type Manifest = z.infer<typeof manifestSchema>;

/** Parse and validate the manifest's JSON text. */
export function parseManifest(text: string): Result<Manifest, PolicyError> {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err: unknown) {
    const message = err instanceof Error ? err.message : String(err);
    return { ok: false, error: invalidManifest(message) };
  }

  const parsed = manifestSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue === undefined || issue.path.length === 0 ? '(root)' : issue.path.join('.');
    return {
      ok: false,
      error: invalidManifest(issue === undefined ? parsed.error.message : `${where}: ${issue.message}`),
    };
  }
  return { ok: true, value: parsed.data };
}
