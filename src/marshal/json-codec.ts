/**
 * policy-wasm — JSON marshaling
 *
 * Moves values between the host and the guest's internal document
 * representation. Host values are encoded as UTF-8 JSON, copied into guest
 * memory and parsed by the guest; guest documents are dumped back to JSON
 * text and decoded on the host.
 */

import type { ZodType } from 'zod';
import type { PolicyError } from '../errors.js';
import { PolicyFault, marshalingError } from '../errors.js';
import type { Result } from '../types.js';
import { Address } from '../guest/address.js';
import type { GuestFunction } from '../guest/exports.js';
import type { GuestMemory } from '../guest/memory-io.js';

// ---------------------------------------------------------------------------
// JSON Encoding / Decoding
// ---------------------------------------------------------------------------

const encoder = new TextEncoder();
const decoder = new TextDecoder('utf-8', { fatal: true });

/**
 * Encode a value as UTF-8 JSON bytes.
 *
 * @param subject - Names the value in error messages (e.g. "input", "data").
 */
export function encodeJson(value: unknown, subject: string): Result<Uint8Array, PolicyError> {
  let json: string | undefined;
  try {
    json = JSON.stringify(value);
  } catch (err: unknown) {
    const message = err instanceof Error ? err.message : String(err);
    return { ok: false, error: marshalingError(subject, message) };
  }
  if (json === undefined) {
    return {
      ok: false,
      error: marshalingError(subject, `a value of type ${typeof value} has no JSON representation`),
    };
  }
  return { ok: true, value: encoder.encode(json) };
}

/** Decode UTF-8 JSON bytes back to a value. */
export function decodeJson(bytes: Uint8Array, subject: string): Result<unknown, PolicyError> {
  try {
    return { ok: true, value: JSON.parse(decoder.decode(bytes)) };
  } catch (err: unknown) {
    const message = err instanceof Error ? err.message : String(err);
    return { ok: false, error: marshalingError(subject, message) };
  }
}

/**
 * Check a decoded value against a schema. Without a schema the value passes
 * through unchanged.
 */
export function decodeWith<T>(
  value: unknown,
  schema: ZodType<T> | undefined,
  subject: string,
): Result<T | unknown, PolicyError> {
  if (schema === undefined) {
    return { ok: true, value };
  }
  const parsed = schema.safeParse(value);
  if (parsed.success) {
    return { ok: true, value: parsed.data };
  }
  const issue = parsed.error.issues[0];
  const where = issue === undefined || issue.path.length === 0 ? '(root)' : issue.path.join('.');
  const message = issue === undefined ? parsed.error.message : `${where}: ${issue.message}`;
  return { ok: false, error: marshalingError(subject, message) };
}

// ---------------------------------------------------------------------------
// Guest Documents
// ---------------------------------------------------------------------------

/**
 * Copy encoded JSON into guest memory and have the guest parse it.
 *
 * The text buffer is released right after parsing (a no-op under heap
 * rewinding, where the next rewind reclaims it).
 *
 * @returns Address of the parsed document.
 */
export function writeJsonDocument(
  guest: GuestMemory,
  jsonParse: GuestFunction,
  json: Uint8Array,
  subject: string,
): Address {
  const text = guest.writeBytes(json);
  const document = Address.of(jsonParse(text.offset, json.length));
  guest.free(text);
  if (document.isNull) {
    throw new PolicyFault(marshalingError(subject, 'the policy module rejected the JSON document'));
  }
  return document;
}

/**
 * Dump a guest document to JSON text and decode it on the host.
 * The dumped text is released after decoding.
 */
export function readJsonDocument(
  guest: GuestMemory,
  jsonDump: GuestFunction,
  document: Address,
  subject: string,
): unknown {
  const text = Address.of(jsonDump(document.offset));
  const bytes = guest.readNullTerminated(text);
  guest.free(text);
  if (bytes === undefined) {
    throw new PolicyFault(marshalingError(subject, `no terminated JSON text at ${text.toString()}`));
  }
  const decoded = decodeJson(bytes, subject);
  if (!decoded.ok) {
    throw new PolicyFault(decoded.error);
  }
  return decoded.value;
}
