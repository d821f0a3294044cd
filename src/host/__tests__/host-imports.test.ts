import { describe, it, expect, vi } from 'vitest';
import {
  BUILTIN_UNDEFINED,
  HOST_FUNCTION_NAMES,
  INVALID_STRING_MESSAGE,
  buildHostImports,
  defaultAbortHandler,
  defaultPrintlnHandler,
  wrapHandler,
} from '../host-imports.js';
import { GuestAbortSignal, HostFunctionFault } from '../../errors.js';

function memoryWith(text: string, offset: number): WebAssembly.Memory {
  const memory = new WebAssembly.Memory({ initial: 1 });
  new Uint8Array(memory.buffer).set(new TextEncoder().encode(`${text}\0`), offset);
  return memory;
}

function call(fn: ((...args: number[]) => number | undefined) | undefined, ...args: number[]): number | undefined {
  if (fn === undefined) {
    throw new Error('import missing');
  }
  return fn(...args);
}

describe('HOST_FUNCTION_NAMES', () => {
  it('lists abort, println and five builtin dispatchers', () => {
    expect(HOST_FUNCTION_NAMES).toEqual([
      'opa_abort',
      'opa_println',
      'opa_builtin0',
      'opa_builtin1',
      'opa_builtin2',
      'opa_builtin3',
      'opa_builtin4',
    ]);
  });
});

describe('default handlers', () => {
  it('abort throws a GuestAbortSignal carrying the message', () => {
    expect(() => {
      defaultAbortHandler('assertion failed');
    }).toThrow(new GuestAbortSignal('assertion failed'));
  });

  it('println writes the line to stderr', () => {
    const write = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
    try {
      defaultPrintlnHandler('trace: x = 1');
      expect(write).toHaveBeenCalledWith('trace: x = 1\n');
    } finally {
      write.mockRestore();
    }
  });
});

describe('wrapHandler', () => {
  it('wraps handler failures in HostFunctionFault', () => {
    const wrapped = wrapHandler('opa_println', () => {
      throw new Error('closed');
    });
    try {
      wrapped('x');
      expect.unreachable();
    } catch (err: unknown) {
      expect(err).toBeInstanceOf(HostFunctionFault);
      if (err instanceof HostFunctionFault) {
        expect(err.functionName).toBe('opa_println');
        expect(err.detail).toBe('closed');
      }
    }
  });

  it('lets abort signals through unchanged', () => {
    const signal = new GuestAbortSignal('stop');
    const wrapped = wrapHandler('opa_abort', () => {
      throw signal;
    });
    expect(() => {
      wrapped('x');
    }).toThrow(signal);
  });
});

describe('buildHostImports', () => {
  it('passes the abort message to the handler', () => {
    const onAbort = vi.fn();
    const imports = buildHostImports(memoryWith('division by zero', 32), {
      onAbort,
      onPrintln: vi.fn(),
    });
    expect(call(imports['opa_abort'], 32)).toBeUndefined();
    expect(onAbort).toHaveBeenCalledWith('division by zero');
  });

  it('substitutes a fixed message when the abort string is unreadable', () => {
    const memory = new WebAssembly.Memory({ initial: 1 });
    new Uint8Array(memory.buffer).set([0xc3, 0x28, 0x00], 32);
    const onAbort = vi.fn();
    const imports = buildHostImports(memory, { onAbort, onPrintln: vi.fn() });
    call(imports['opa_abort'], 32);
    expect(onAbort).toHaveBeenCalledWith(INVALID_STRING_MESSAGE);
  });

  it('passes println lines to the handler', () => {
    const onPrintln = vi.fn();
    const imports = buildHostImports(memoryWith('hello', 8), { onAbort: vi.fn(), onPrintln });
    call(imports['opa_println'], 8);
    expect(onPrintln).toHaveBeenCalledWith('hello');
  });

  it('aborts when a println string is unreadable', () => {
    const onAbort = vi.fn();
    const onPrintln = vi.fn();
    const imports = buildHostImports(new WebAssembly.Memory({ initial: 1 }), { onAbort, onPrintln });
    call(imports['opa_println'], 70_000);
    expect(onAbort).toHaveBeenCalledWith(INVALID_STRING_MESSAGE);
    expect(onPrintln).not.toHaveBeenCalled();
  });

  it('answers every builtin dispatcher with undefined', () => {
    const imports = buildHostImports(new WebAssembly.Memory({ initial: 1 }), {
      onAbort: vi.fn(),
      onPrintln: vi.fn(),
    });
    expect(call(imports['opa_builtin0'], 1, 0)).toBe(BUILTIN_UNDEFINED);
    expect(call(imports['opa_builtin4'], 3, 0, 10, 20, 30, 40)).toBe(BUILTIN_UNDEFINED);
  });

  it('turns a throwing println handler into a HostFunctionFault', () => {
    const imports = buildHostImports(memoryWith('x', 0), {
      onAbort: vi.fn(),
      onPrintln: () => {
        throw new Error('full');
      },
    });
    expect(() => call(imports['opa_println'], 0)).toThrow(HostFunctionFault);
  });
});
