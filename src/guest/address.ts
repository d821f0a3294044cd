/**
 * policy-wasm — Guest addresses
 *
 * An offset into the module's linear memory. Only the engine, its ABI
 * strategy and its contexts hold addresses; none leave the package.
 */

export class Address {
  /** Unsigned 32-bit offset. */
  readonly offset: number;

  private constructor(offset: number) {
    this.offset = offset;
  }

  /** Wrap a raw value returned by the guest, reinterpreting it as unsigned. */
  static of(raw: number): Address {
    return new Address(raw >>> 0);
  }

  get isNull(): boolean {
    return this.offset === 0;
  }

  /** Address `bytes` past this one. */
  advance(bytes: number): Address {
    return Address.of(this.offset + bytes);
  }

  toString(): string {
    return `0x${this.offset.toString(16)}`;
  }
}
