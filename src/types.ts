/** Display attributes of one supported currency. */
export interface CurrencyRecord {
  /** ISO 4217 code, uppercase (e.g. USD). */
  isoCode: string;
  /** Human-readable name. */
  name: string;
  /** Display symbol (e.g. $, €, kr). */
  symbol: string;
  /** Fractional denomination name, or null when the currency shows no cents. */
  subunit: string | null;
  /** True if the symbol is written before the amount. */
  symbolFirst: boolean;
  /** Grouping string inserted every three integer digits. */
  thousandsSeparator: string;
  /** String between the integer and fractional digits. */
  decimalMark: string;
}

/** Caller-supplied display options. Every field falls back to DEFAULT_OPTIONS. */
export interface FormatOptions {
  /** Currency code, case-insensitive (default: usd). */
  currency?: string;
  /** Include the two fractional digits (default: true). */
  withCents?: boolean;
  /** Append the ISO code after a space (default: false). */
  withCurrency?: boolean;
  /** Include the currency symbol (default: true). */
  withSymbol?: boolean;
  /** Put a space between symbol and amount (default: false). */
  withSymbolSpace?: boolean;
  /** Group integer digits with the currency's separator (default: true). */
  withThousandsSeparator?: boolean;
}

/** Options after defaults have been applied. */
export type ResolvedFormatOptions = Required<FormatOptions>;

/** Amount broken into the pieces the formatter composes. */
export interface SplitValue {
  /** True if the amount is below zero after rounding to two places. */
  negative: boolean;
  /** Integer digits of the magnitude, no sign, no grouping. */
  integer: string;
  /** Exactly two fractional digits. */
  fractional: string;
}

/** Constructor options for MoneyFormatter. */
export interface MoneyFormatterConfig {
  /** Instance defaults layered over DEFAULT_OPTIONS. */
  defaults?: FormatOptions;
  /** Report amounts beyond Number.MAX_SAFE_INTEGER on stderr (default: false). */
  logWarnings?: boolean;
}

/** Currency row as stored in currencies.json (snake_case). */
export interface RawCurrencyRecord {
  iso_code: string;
  name: string;
  symbol: string;
  subunit: string | null;
  symbol_first: boolean;
  thousands_separator: string;
  decimal_mark: string;
}
