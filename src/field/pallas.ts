import { Field } from '@noble/curves/abstract/modular';
import type { IField } from '@noble/curves/abstract/modular';

/**
 * Modulus of the Pallas base field (equivalently the Vesta scalar field).
 */
export const PALLAS_MODULUS = 0x40000000000000000000000000000000224698fc094cf91b992d30ed00000001n;

/**
 * Pallas base field with 32-byte little-endian canonical encoding.
 */
export const pallasBase: IField<bigint> = Field(PALLAS_MODULUS, undefined, true);

/**
 * Reduce an arbitrary integer into the Pallas base field.
 */
export function toPallas(value: bigint | number): bigint {
  return pallasBase.create(BigInt(value));
}
