/**
 * The capability a leaf scalar type must provide. Only the canonical
 * fixed-width encoding is ever hashed; no arithmetic happens in the tree.
 *
 * `IField<bigint>` from @noble/curves satisfies this interface as-is.
 */
export interface ScalarField<F> {
  readonly ZERO: F;
  /** Width in bytes of every canonical encoding. */
  readonly BYTES: number;
  toBytes(value: F): Uint8Array;
  eql(left: F, right: F): boolean;
  /** True only for canonical (fully reduced) representatives. */
  isValid(value: F): boolean;
}
