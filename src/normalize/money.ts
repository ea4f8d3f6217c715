// Currencies Meta reports without a fractional offset
const ZERO_DECIMAL_CURRENCIES = new Set([
  "CLP",
  "COP",
  "CRC",
  "HUF",
  "IDR",
  "ISK",
  "JPY",
  "KRW",
  "PYG",
  "TWD",
  "VND",
]);

const DECIMAL = /^(-?)(\d+)(?:\.(\d+))?$/;

export function currencyExponent(currency: string): number {
  return ZERO_DECIMAL_CURRENCIES.has(currency.toUpperCase()) ? 0 : 2;
}

/**
 * Convert a major-unit decimal string ("12.345") to integer minor units,
 * rounding half up on the digit after the currency exponent. Works on the
 * digits directly so no binary floating point is involved.
 */
export function decimalToMinor(value: string, exponent: number): number {
  const match = DECIMAL.exec(value.trim());
  if (!match) {
    throw new Error(`Not a decimal amount: ${value}`);
  }
  const [, sign, whole, fraction = ""] = match;
  const padded = fraction.padEnd(exponent + 1, "0");
  let minor = Number(whole) * 10 ** exponent + Number(padded.slice(0, exponent) || "0");
  if (Number(padded[exponent]) >= 5) {
    minor += 1;
  }
  return sign && minor !== 0 ? -minor : minor;
}

export function minorToDecimal(amountMinor: number, exponent: number): string {
  return (amountMinor / 10 ** exponent).toFixed(exponent);
}
