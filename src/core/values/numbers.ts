// src/core/values/numbers.ts
// Exact rationals and arbitrary-precision decimals

/**
 * Exact rational p/q in lowest terms with a positive denominator.
 */
export class Rational {
  readonly numerator: bigint;
  readonly denominator: bigint;

  constructor(numerator: bigint, denominator: bigint) {
    if (denominator === 0n) throw new RangeError("Rational with zero denominator");
    if (denominator < 0n) {
      numerator = -numerator;
      denominator = -denominator;
    }
    const g = gcd(numerator < 0n ? -numerator : numerator, denominator);
    this.numerator = numerator / g;
    this.denominator = denominator / g;
  }

  static of(numerator: bigint | number, denominator: bigint | number = 1n): Rational {
    return new Rational(BigInt(numerator), BigInt(denominator));
  }

  equals(other: Rational): boolean {
    return this.numerator === other.numerator && this.denominator === other.denominator;
  }

  toNumber(): number {
    return Number(this.numerator) / Number(this.denominator);
  }

  toString(): string {
    return `${this.numerator}/${this.denominator}`;
  }
}

/**
 * Decimal with an exact unscaled value: value = unscaled × 10^-scale.
 * Trailing zeros are significant, as for the engine's precision-tracked reals.
 * The scale is never negative: `1.5e3` is held as 1500 with scale 0.
 */
export class BigDecimal {
  readonly unscaled: bigint;
  readonly scale: number;

  constructor(unscaled: bigint, scale: number) {
    if (!Number.isInteger(scale)) throw new RangeError(`Invalid decimal scale: ${scale}`);
    if (scale < 0) {
      unscaled *= 10n ** BigInt(-scale);
      scale = 0;
    }
    this.unscaled = unscaled;
    this.scale = scale;
  }

  static parse(text: string): BigDecimal {
    const m = /^([+-]?)(\d*)(?:\.(\d*))?(?:[eE]([+-]?\d+))?$/.exec(text.trim());
    if (!m || (m[2] === "" && (m[3] ?? "") === "")) {
      throw new SyntaxError(`Invalid decimal: ${text}`);
    }
    const [, sign = "", whole = "", frac = "", exp = "0"] = m;
    const unscaled = BigInt(`${sign}${whole}${frac}` || "0");
    return new BigDecimal(unscaled, frac.length - Number(exp));
  }

  equals(other: BigDecimal): boolean {
    return this.unscaled === other.unscaled && this.scale === other.scale;
  }

  toNumber(): number {
    return Number(this.toString());
  }

  toString(): string {
    if (this.scale <= 0) return (this.unscaled * 10n ** BigInt(-this.scale)).toString();
    const negative = this.unscaled < 0n;
    const digits = (negative ? -this.unscaled : this.unscaled).toString().padStart(this.scale + 1, "0");
    const cut = digits.length - this.scale;
    return `${negative ? "-" : ""}${digits.slice(0, cut)}.${digits.slice(cut)}`;
  }
}

function gcd(a: bigint, b: bigint): bigint {
  while (b !== 0n) [a, b] = [b, a % b];
  return a === 0n ? 1n : a;
}
