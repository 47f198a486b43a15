// SPDX-License-Identifier: Apache-2.0

import {QuantityParseError} from '../errors/quantity-parse-error.js';
import {QuantityFormat} from './quantity-format.js';
import {Comparators, type Comparison} from '../utils/comparators.js';

const QUANTITY_PATTERN = /^([+-]?)(\d+(?:\.\d*)?|\.\d+)(.*)$/;
const EXPONENT_PATTERN = /^[eE]([+-]?\d+)$/;

// values are stored as an exact count of nano units
const NANO_SCALE = 9;
const NANOS_PER_UNIT = 10n ** BigInt(NANO_SCALE);

const BINARY_SUFFIXES: ReadonlyMap<string, number> = new Map([
  ['Ki', 10],
  ['Mi', 20],
  ['Gi', 30],
  ['Ti', 40],
  ['Pi', 50],
  ['Ei', 60],
]);
const DECIMAL_SUFFIXES: ReadonlyMap<string, number> = new Map([
  ['n', -9],
  ['u', -6],
  ['m', -3],
  ['', 0],
  ['k', 3],
  ['M', 6],
  ['G', 9],
  ['T', 12],
  ['P', 15],
  ['E', 18],
]);

const BINARY_SUFFIX_BY_POWER: readonly string[] = ['', 'Ki', 'Mi', 'Gi', 'Ti', 'Pi', 'Ei'];
const DECIMAL_SUFFIX_BY_EXPONENT: ReadonlyMap<number, string> = new Map(
  [...DECIMAL_SUFFIXES].map(([suffix, exponent]) => [exponent, suffix]),
);
const MAX_DECIMAL_SI_EXPONENT = 18;
// largest |e| accepted in decimal exponent notation
const MAX_EXPONENT = 1000;
const BINARY_THRESHOLD = 1024n * NANOS_PER_UNIT;

interface ParsedSuffix {
  format: QuantityFormat;
  base2Exponent: number;
  base10Exponent: number;
}

/**
 * An exact, unit aware storage quantity such as `5Gi`, `500M` or `1e3`.
 *
 * The magnitude is kept as an integer number of nano units, so `1Gi` and `1024Mi` are equal while `1G` and `1Gi`
 * are not. Literals that carry more precision than nano units are rounded away from zero.
 */
export class Quantity {
  private constructor(
    private readonly nanos: bigint,
    public readonly format: QuantityFormat,
  ) {}

  /**
   * Parses a quantity literal.
   *
   * @param raw - the literal, e.g. `500Mi`
   * @throws QuantityParseError if the literal is empty, not numeric, has an unknown suffix or an exponent beyond
   * ±1000
   */
  public static parse(raw: string): Quantity {
    const match = QUANTITY_PATTERN.exec(raw);
    if (!match) {
      throw new QuantityParseError(QuantityParseError.FORMAT_WRONG(raw), raw);
    }

    const [, sign, number, suffix] = match;
    const parsedSuffix = Quantity.parseSuffix(raw, suffix);

    const [integerPart, fractionPart = ''] = number.split('.');
    const digits = BigInt(`${integerPart}${fractionPart}` || '0');
    const scaled = digits * 2n ** BigInt(parsedSuffix.base2Exponent);

    const shift = NANO_SCALE + parsedSuffix.base10Exponent - fractionPart.length;
    let nanos: bigint;
    if (shift >= 0) {
      nanos = scaled * 10n ** BigInt(shift);
    } else if (-shift > scaled.toString().length) {
      // the divisor exceeds the digits, any non zero value rounds to a single nano unit
      nanos = scaled === 0n ? 0n : 1n;
    } else {
      const divisor = 10n ** BigInt(-shift);
      nanos = scaled / divisor + (scaled % divisor === 0n ? 0n : 1n);
    }

    return new Quantity(sign === '-' ? -nanos : nanos, parsedSuffix.format);
  }

  public static compare(a: Quantity, b: Quantity): Comparison {
    return Comparators.bigint(a.nanos, b.nanos);
  }

  private static parseSuffix(raw: string, suffix: string): ParsedSuffix {
    const base2Exponent = BINARY_SUFFIXES.get(suffix);
    if (base2Exponent !== undefined) {
      return {format: QuantityFormat.BINARY_SI, base2Exponent, base10Exponent: 0};
    }

    const base10Exponent = DECIMAL_SUFFIXES.get(suffix);
    if (base10Exponent !== undefined) {
      return {format: QuantityFormat.DECIMAL_SI, base2Exponent: 0, base10Exponent};
    }

    const exponent = EXPONENT_PATTERN.exec(suffix);
    if (exponent) {
      const base10Exponent = Number.parseInt(exponent[1], 10);
      if (Math.abs(base10Exponent) <= MAX_EXPONENT) {
        return {format: QuantityFormat.DECIMAL_EXPONENT, base2Exponent: 0, base10Exponent};
      }
    }

    throw new QuantityParseError(QuantityParseError.SUFFIX_WRONG(raw, suffix), raw);
  }

  public compare(other: Quantity): Comparison {
    return Quantity.compare(this, other);
  }

  public equals(other: Quantity): boolean {
    return this.compare(other) === 0;
  }

  /**
   * Returns the canonical representation, e.g. `5120Mi` becomes `5Gi` and `1.5k` becomes `1500`.
   */
  public toString(): string {
    if (this.nanos === 0n) {
      return '0';
    }

    const magnitude = this.nanos < 0n ? -this.nanos : this.nanos;
    if (
      this.format === QuantityFormat.BINARY_SI &&
      magnitude >= BINARY_THRESHOLD &&
      this.nanos % NANOS_PER_UNIT === 0n
    ) {
      return this.toBinaryString();
    }

    return this.toDecimalString(this.format === QuantityFormat.DECIMAL_EXPONENT);
  }

  private toBinaryString(): string {
    let mantissa = this.nanos / NANOS_PER_UNIT;
    let power = 0;
    while (power < BINARY_SUFFIX_BY_POWER.length - 1 && mantissa % 1024n === 0n) {
      mantissa /= 1024n;
      power++;
    }
    return `${mantissa}${BINARY_SUFFIX_BY_POWER[power]}`;
  }

  private toDecimalString(exponentNotation: boolean): string {
    let mantissa = this.nanos;
    let exponent = -NANO_SCALE;
    while (mantissa % 1000n === 0n && (exponentNotation || exponent < MAX_DECIMAL_SI_EXPONENT)) {
      mantissa /= 1000n;
      exponent += 3;
    }

    if (exponentNotation) {
      return exponent === 0 ? `${mantissa}` : `${mantissa}e${exponent}`;
    }

    return `${mantissa}${DECIMAL_SUFFIX_BY_EXPONENT.get(exponent) ?? ''}`;
  }
}
