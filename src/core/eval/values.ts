// src/core/eval/values.ts
// Runtime values held on the operand stack and in frames.

export type Val =
  | { tag: "Num"; n: number }
  | { tag: "Str"; s: string };

export function VNum(n: number): Val {
  return { tag: "Num", n };
}

export function VStr(s: string): Val {
  return { tag: "Str", s };
}

export function kindOf(v: Val): string {
  return v.tag === "Num" ? "number" : "string";
}

/**
 * Plain decimal text for a number: never an exponent, `inf`/`-inf` for
 * infinities.
 */
export function formatNumber(n: number): string {
  if (Number.isNaN(n)) return "NaN";
  if (n === Infinity) return "inf";
  if (n === -Infinity) return "-inf";

  const text = String(n);
  const e = text.indexOf("e");
  if (e < 0) return text;

  if (Number.isInteger(n)) return BigInt(n).toString();

  // Only tiny magnitudes reach here: shift the mantissa right.
  const sign = n < 0 ? "-" : "";
  const mantissa = text.slice(sign.length, e).replace(".", "");
  const exponent = Number(text.slice(e + 1));
  return `${sign}0.${"0".repeat(-exponent - 1)}${mantissa}`;
}

/**
 * The text `write` prints for a value: numbers in plain decimal, strings raw.
 */
export function formatValue(v: Val): string {
  return v.tag === "Num" ? formatNumber(v.n) : v.s;
}
