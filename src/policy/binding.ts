/**
 * policy-wasm — Typed policy bindings
 *
 * A binding ties an entrypoint path to the shape of its input and its
 * decision, so callers write `engine.decide(allowRead, { user })` and get
 * a typed decision back.
 */

import type { ZodType } from 'zod';
import { normalizeEntrypoint } from '../engine/entrypoints.js';

/** An entrypoint with a typed input and decision. */
export interface PolicyBinding<I, O> {
  /** `/`-separated entrypoint path. */
  readonly path: string;
  /** Validates the input before evaluation. Absent: any input is sent as is. */
  readonly input: ZodType<I> | undefined;
  /** Decodes the decision. */
  readonly output: ZodType<O>;
}

export interface PolicyDefinition<I, O> {
  /** Entrypoint path, `.`- or `/`-separated. */
  readonly path: string;
  readonly input?: ZodType<I>;
  readonly output: ZodType<O>;
}

export function definePolicy<I = unknown, O = unknown>(
  definition: PolicyDefinition<I, O>,
): PolicyBinding<I, O> {
  return Object.freeze({
    path: normalizeEntrypoint(definition.path),
    input: definition.input,
    output: definition.output,
  });
}
