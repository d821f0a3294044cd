/**
 * policy-wasm — Entrypoint table
 *
 * Maps `/`-separated policy paths to the integer ids the module evaluates.
 * Built once from the module's `entrypoints` export and never changed.
 */

import { z } from 'zod';
import type { PolicyError } from '../errors.js';
import { marshalingError } from '../errors.js';
import type { Result } from '../types.js';

const entrypointDocumentSchema = z.record(z.number().int().nonnegative());

/** Read-only view of the entrypoint table. */
export interface EntrypointTable {
  readonly size: number;
  /** Look up an entrypoint by `.`- or `/`-separated path. */
  resolve(path: string): number | undefined;
  /** Iterate the table's names from the start. */
  names(): IterableIterator<string>;
}

/** Normalize a `.`-separated policy path to the `/`-separated form. */
export function normalizeEntrypoint(path: string): string {
  return path.replaceAll('.', '/');
}

/** Build a table from name/id pairs. */
export function createEntrypointTable(entries: Iterable<readonly [string, number]>): EntrypointTable {
  const ids = new Map<string, number>();
  for (const [name, id] of entries) {
    ids.set(normalizeEntrypoint(name), id);
  }

  return {
    get size(): number {
      return ids.size;
    },
    resolve(path: string): number | undefined {
      return ids.get(normalizeEntrypoint(path));
    },
    names(): IterableIterator<string> {
      return ids.keys();
    },
  };
}

/**
 * Build a table from the decoded `entrypoints` document, an object of
 * path → id.
 */
export function parseEntrypointDocument(document: unknown): Result<EntrypointTable, PolicyError> {
  const parsed = entrypointDocumentSchema.safeParse(document);
  if (!parsed.success) {
    return {
      ok: false,
      error: marshalingError('entrypoints', 'expected an object mapping policy paths to integer ids'),
    };
  }
  return { ok: true, value: createEntrypointTable(Object.entries(parsed.data)) };
}
