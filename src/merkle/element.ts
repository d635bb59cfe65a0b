import type { ScalarField } from '../field/scalar-field.js';
import { hashBytes } from './hashing.js';
import type { Digest } from './merkle-types.js';
import { MerkleTreeError } from './merkle-types.js';

/**
 * Value stored at one leaf: an ordered, non-empty sequence of scalars.
 */
export class Element<F> {
  readonly values: readonly F[];

  constructor(
    readonly field: ScalarField<F>,
    values: readonly F[]
  ) {
    if (values.length === 0) {
      throw new MerkleTreeError('Element requires at least one scalar');
    }
    values.forEach((value, i) => {
      if (!field.isValid(value)) {
        throw new MerkleTreeError(`Element scalar ${i} is not a canonical field element: ${String(value)}`);
      }
    });
    this.values = Object.freeze([...values]);
  }

  /**
   * The canonical empty leaf: a single zero scalar.
   */
  static default<F>(field: ScalarField<F>): Element<F> {
    return new Element(field, [field.ZERO]);
  }

  /**
   * SHA-256 over each scalar's canonical encoding, in sequence order.
   */
  computeHash(): Digest {
    return hashBytes(this.values.map(value => this.field.toBytes(value)));
  }

  equals(other: Element<F>): boolean {
    if (other.values.length !== this.values.length) return false;
    return this.values.every((value, i) => this.field.eql(value, other.values[i]));
  }
}
