/**
 * policy-wasm — Guest memory I/O
 *
 * Read, write and allocate in the module's linear memory. Views over
 * `memory.buffer` are re-created on every access because any guest call
 * may grow (and thereby detach) the buffer.
 */

import { PolicyFault, memoryExceeded } from '../errors.js';
import { bytesToPages } from '../internal-types.js';
import { Address } from './address.js';
import type { GuestFunction } from './exports.js';

// ---------------------------------------------------------------------------
// Raw Access
// ---------------------------------------------------------------------------

const strictDecoder = new TextDecoder('utf-8', { fatal: true });

/**
 * Read the bytes from `address` up to (not including) the next NUL byte.
 *
 * @returns A copy of the bytes, or undefined when the address is out of
 *   bounds or no terminator exists before the end of memory.
 */
export function readNullTerminated(
  memory: WebAssembly.Memory,
  address: Address,
): Uint8Array | undefined {
  const bytes = new Uint8Array(memory.buffer);
  if (address.offset >= bytes.length) {
    return undefined;
  }
  const end = bytes.indexOf(0, address.offset);
  if (end < 0) {
    return undefined;
  }
  return bytes.slice(address.offset, end);
}

/**
 * Read a NUL-terminated UTF-8 string.
 *
 * @returns The string, or undefined when the bytes are unterminated or not valid UTF-8.
 */
export function readNullTerminatedString(
  memory: WebAssembly.Memory,
  address: Address,
): string | undefined {
  const bytes = readNullTerminated(memory, address);
  if (bytes === undefined) {
    return undefined;
  }
  try {
    return strictDecoder.decode(bytes);
  } catch {
    return undefined;
  }
}

/**
 * Grow memory in whole pages until `endOffset` lies within it.
 * Throws a MEMORY_EXCEEDED fault when the memory's maximum forbids it.
 */
export function ensureCapacity(memory: WebAssembly.Memory, endOffset: number): void {
  const missing = endOffset - memory.buffer.byteLength;
  if (missing <= 0) {
    return;
  }
  try {
    memory.grow(bytesToPages(missing));
  } catch (err: unknown) {
    const message = err instanceof Error ? err.message : String(err);
    throw new PolicyFault(memoryExceeded(endOffset, message));
  }
}

/**
 * Write `data` at `address`, growing memory first if it would not fit.
 */
export function writeToMemory(
  memory: WebAssembly.Memory,
  address: Address,
  data: Uint8Array,
): void {
  ensureCapacity(memory, address.offset + data.length);
  new Uint8Array(memory.buffer).set(data, address.offset);
}

// ---------------------------------------------------------------------------
// Allocating Accessor
// ---------------------------------------------------------------------------

/**
 * How guest allocations are reclaimed:
 * - `explicit`: every allocation is returned with `opa_free`.
 * - `rewind`: allocations are reclaimed wholesale by resetting the heap pointer.
 */
export type AllocationDiscipline = 'explicit' | 'rewind';

/** A fresh guest allocation and a writable view over it. */
export interface Allocation {
  readonly address: Address;
  /** Valid until the next guest call that may grow memory. */
  readonly view: Uint8Array;
}

/** Allocator exports of the guest. */
export interface AllocatorExports {
  readonly malloc: GuestFunction;
  readonly free: GuestFunction;
}

/** Memory accessor bound to one instance and one allocation discipline. */
export interface GuestMemory {
  readonly memory: WebAssembly.Memory;
  readonly discipline: AllocationDiscipline;
  allocate(length: number): Allocation;
  /** Return an allocation to the guest. No-op under the `rewind` discipline. */
  free(address: Address): void;
  /** Allocate a buffer and copy `bytes` into it. */
  writeBytes(bytes: Uint8Array): Address;
  readNullTerminated(address: Address): Uint8Array | undefined;
  readNullTerminatedString(address: Address): string | undefined;
}

/**
 * Create a memory accessor. The discipline is fixed here, once, so callers
 * never branch on the ABI version to decide whether to free.
 */
export function createGuestMemory(
  memory: WebAssembly.Memory,
  allocator: AllocatorExports,
  discipline: AllocationDiscipline,
): GuestMemory {
  const release =
    discipline === 'explicit'
      ? (address: Address): void => {
          allocator.free(address.offset);
        }
      : (): void => undefined;

  function allocate(length: number): Allocation {
    const address = Address.of(allocator.malloc(length));
    const view = new Uint8Array(memory.buffer, address.offset, length);
    return { address, view };
  }

  return {
    memory,
    discipline,
    allocate,
    free: release,
    writeBytes(bytes: Uint8Array): Address {
      const { address, view } = allocate(bytes.length);
      view.set(bytes);
      return address;
    },
    readNullTerminated(address: Address): Uint8Array | undefined {
      return readNullTerminated(memory, address);
    },
    readNullTerminatedString(address: Address): string | undefined {
      return readNullTerminatedString(memory, address);
    },
  };
}
