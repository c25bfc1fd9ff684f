/**
 * Bundled currency table.
 *
 * Loaded from currencies.json once, on first import, then frozen. Rows are
 * keyed by lowercase ISO code; lookups trim and lowercase their input.
 */
import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { ConfigurationError } from './errors.js';
import type { CurrencyRecord, RawCurrencyRecord } from './types.js';

const rawCurrencySchema = z
  .object({
    iso_code: z.string().regex(/^[A-Z]{3}$/),
    name: z.string().min(1),
    symbol: z.string().min(1),
    subunit: z.string().min(1).nullable(),
    symbol_first: z.boolean(),
    thousands_separator: z.string(),
    decimal_mark: z.string().min(1),
  })
  .strict();

const rawTableSchema = z.record(z.string().regex(/^[a-z]{3}$/), rawCurrencySchema);

function toCurrencyRecord(raw: RawCurrencyRecord): CurrencyRecord {
  return Object.freeze({
    isoCode: raw.iso_code,
    name: raw.name,
    symbol: raw.symbol,
    subunit: raw.subunit,
    symbolFirst: raw.symbol_first,
    thousandsSeparator: raw.thousands_separator,
    decimalMark: raw.decimal_mark,
  });
}

/** Validate a parsed currencies.json document and build the lookup map. */
export function buildCurrencyTable(document: unknown): ReadonlyMap<string, CurrencyRecord> {
  const result = rawTableSchema.safeParse(document);
  if (!result.success) {
    throw ConfigurationError.fromZodError(
      'INVALID_CURRENCY_TABLE',
      'Invalid currency table',
      result.error,
    );
  }

  const table = new Map<string, CurrencyRecord>();
  for (const [code, raw] of Object.entries(result.data)) {
    if (raw.iso_code.toLowerCase() !== code) {
      throw new ConfigurationError(
        'INVALID_CURRENCY_TABLE',
        `Currency key '${code}' does not match iso_code '${raw.iso_code}'`,
      );
    }
    table.set(code, toCurrencyRecord(raw));
  }
  return table;
}

function loadCurrencyTable(): ReadonlyMap<string, CurrencyRecord> {
  const text = readFileSync(new URL('./currencies.json', import.meta.url), 'utf8');
  return buildCurrencyTable(JSON.parse(text));
}

const CURRENCIES = loadCurrencyTable();

function normalizeCode(code: string): string {
  return code.trim().toLowerCase();
}

/** Look up a currency by code. Returns undefined for unsupported codes. */
export function findCurrency(code: string): CurrencyRecord | undefined {
  return CURRENCIES.get(normalizeCode(code));
}

/** Look up a currency by code, throwing ConfigurationError if it is not supported. */
export function getCurrency(code: string): CurrencyRecord {
  const currency = findCurrency(code);
  if (!currency) {
    throw new ConfigurationError('UNKNOWN_CURRENCY', `Unsupported currency '${code}'`);
  }
  return currency;
}

/** All supported currency codes, lowercase and sorted. */
export function currencyCodes(): string[] {
  return [...CURRENCIES.keys()].sort();
}
