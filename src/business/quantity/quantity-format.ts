// SPDX-License-Identifier: Apache-2.0

/**
 * The notation a quantity was written in. Canonical output keeps the notation of the parsed literal.
 */
export enum QuantityFormat {
  /** e.g. 12Mi (12 * 2^20) */
  BINARY_SI = 'BinarySI',
  /** e.g. 12M (12 * 10^6) */
  DECIMAL_SI = 'DecimalSI',
  /** e.g. 12e6 */
  DECIMAL_EXPONENT = 'DecimalExponent',
}
