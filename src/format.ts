/**
 * Money string composition.
 *
 * Pure helpers shared by MoneyFormatter and formatMoney(). The order of
 * steps in composeMoney() is fixed: grouping, cents, symbol, sign, ISO code.
 * The sign follows the digits shown, so hidden cents never leave a lone `-0`.
 */
import { InvalidAmountError } from './errors.js';
import type { CurrencyRecord, ResolvedFormatOptions, SplitValue } from './types.js';

/**
 * Split an amount into sign, integer digits and two fractional digits.
 *
 * The fraction is rounded to two places; a fraction that rounds to 1.00
 * (e.g. 0.999) carries into the integer part. Integer digits never use
 * exponent notation. Throws InvalidAmountError for NaN and infinities.
 */
export function splitValue(value: number): SplitValue {
  if (!Number.isFinite(value)) {
    throw new InvalidAmountError(value);
  }

  const magnitude = Math.abs(value);
  const whole = Math.trunc(magnitude);
  const rounded = (magnitude - whole).toFixed(2);

  let integer = BigInt(whole);
  let fractional = rounded.slice(2);
  if (rounded === '1.00') {
    integer += 1n;
    fractional = '00';
  }

  const digits = integer.toString();
  return {
    negative: value < 0 && (digits !== '0' || fractional !== '00'),
    integer: digits,
    fractional,
  };
}

/**
 * Insert `separator` every three digits from the right.
 * "1234567" → "1,234,567"; strings of three digits or fewer come back unchanged.
 */
export function separateThousands(digits: string, separator: string): string {
  const remainder = digits.length % 3;
  const groups: string[] = [];

  if (remainder > 0) {
    groups.push(digits.slice(0, remainder));
  }
  for (let i = remainder; i < digits.length; i += 3) {
    groups.push(digits.slice(i, i + 3));
  }

  if (groups.length === 0) {
    return digits;
  }
  return groups.join(separator);
}

/** Put the currency symbol before or after the amount, optionally space-separated. */
export function addSymbol(
  amount: string,
  currency: CurrencyRecord,
  withSymbolSpace: boolean,
): string {
  const space = withSymbolSpace ? ' ' : '';
  if (currency.symbolFirst) {
    return `${currency.symbol}${space}${amount}`;
  }
  return `${amount}${space}${currency.symbol}`;
}

/** Build the display string for `value` from already-resolved options. */
export function composeMoney(
  value: number,
  currency: CurrencyRecord,
  options: ResolvedFormatOptions,
): string {
  const { negative, integer, fractional } = splitValue(value);

  let result = options.withThousandsSeparator
    ? separateThousands(integer, currency.thousandsSeparator)
    : integer;

  const showCents = options.withCents && currency.subunit !== null;
  if (showCents) {
    result = `${result}${currency.decimalMark}${fractional}`;
  }

  if (options.withSymbol) {
    result = addSymbol(result, currency, options.withSymbolSpace);
  }

  if (negative && (integer !== '0' || (showCents && fractional !== '00'))) {
    result = `-${result}`;
  }

  if (options.withCurrency) {
    result = `${result} ${currency.isoCode}`;
  }

  return result;
}
