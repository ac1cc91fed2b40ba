/**
 * Number rendering for validation messages, the params payload and the
 * scaled-limits commitment. Downstream tooling matches on this text, so
 * the output follows the classic float `repr` / `{:.Nf}` conventions:
 *
 * - shortest round-trip digits, integral values keeping a trailing `.0`
 * - scientific notation below 1e-4 and from 1e16 up (`1e-05`, `1.5e+16`)
 * - fixed-point rounding that breaks exact ties to even
 */

const MIN_FIXED_EXPONENT = -4;
const MAX_FIXED_EXPONENT = 16;

export function formatNumber(value: number): string {
  if (Number.isNaN(value)) return "nan";
  if (!Number.isFinite(value)) return value > 0 ? "inf" : "-inf";
  if (value === 0) return Object.is(value, -0) ? "-0.0" : "0.0";

  const [digits = "", exponentText = "0"] = value.toExponential().split("e");
  const exponent = Number(exponentText);

  if (exponent < MIN_FIXED_EXPONENT || exponent >= MAX_FIXED_EXPONENT) {
    const sign = exponent < 0 ? "-" : "+";
    return `${digits}e${sign}${String(Math.abs(exponent)).padStart(2, "0")}`;
  }

  return Number.isInteger(value) ? value.toFixed(1) : String(value);
}

/**
 * `value` with exactly `fractionDigits` decimals.
 *
 * Identical to `toFixed` except when the value sits exactly halfway
 * between two candidates, where the even one wins (`1.0625` → `1.062`).
 */
export function formatFixed(value: number, fractionDigits: number): string {
  const fixed = value.toFixed(fractionDigits);
  const twice = exactTwiceScaled(Math.abs(value), fractionDigits);
  if (twice === undefined || twice % 2n === 0n) {
    return fixed;
  }

  // twice = 2k + 1: the candidates are k and k + 1
  const lower = twice / 2n;
  const even = lower % 2n === 0n ? lower : lower + 1n;
  const text = even.toString().padStart(fractionDigits + 1, "0");
  const point = text.length - fractionDigits;
  const body = fractionDigits === 0 ? text : `${text.slice(0, point)}.${text.slice(point)}`;
  return value < 0 ? `-${body}` : body;
}

/**
 * `value * 2 * 10^digits` when that product is an exact integer,
 * otherwise undefined. Works on the exact binary value of the double.
 */
function exactTwiceScaled(value: number, digits: number): bigint | undefined {
  if (!Number.isFinite(value) || value === 0) return undefined;

  const view = new DataView(new ArrayBuffer(8));
  view.setFloat64(0, value);
  const bits = view.getBigUint64(0);
  const exponentField = Number((bits >> 52n) & 0x7ffn);
  const fraction = bits & ((1n << 52n) - 1n);

  const mantissa = exponentField === 0 ? fraction : fraction | (1n << 52n);
  const exponent = (exponentField === 0 ? 1 : exponentField) - 1075;

  const numerator = mantissa * 2n * 10n ** BigInt(digits);
  if (exponent >= 0) {
    return numerator << BigInt(exponent);
  }

  const denominator = 1n << BigInt(-exponent);
  return numerator % denominator === 0n ? numerator / denominator : undefined;
}
