/**
 * Display option defaults and validation.
 *
 * Options are checked once, at the call boundary, against a strict zod
 * schema: unknown keys and wrongly typed values raise ConfigurationError.
 */
import { z } from 'zod';
import { ConfigurationError } from './errors.js';
import type { FormatOptions, ResolvedFormatOptions } from './types.js';

export const DEFAULT_OPTIONS: Readonly<ResolvedFormatOptions> = Object.freeze({
  currency: 'usd',
  withCents: true,
  withCurrency: false,
  withSymbol: true,
  withSymbolSpace: false,
  withThousandsSeparator: true,
});

const formatOptionsSchema = z
  .object({
    currency: z.string().min(1).optional(),
    withCents: z.boolean().optional(),
    withCurrency: z.boolean().optional(),
    withSymbol: z.boolean().optional(),
    withSymbolSpace: z.boolean().optional(),
    withThousandsSeparator: z.boolean().optional(),
  })
  .strict();

const SNAKE_CASE_KEYS: Readonly<Record<string, keyof FormatOptions>> = Object.freeze({
  with_cents: 'withCents',
  with_currency: 'withCurrency',
  with_symbol: 'withSymbol',
  with_symbol_space: 'withSymbolSpace',
  with_thousands_separator: 'withThousandsSeparator',
});

function snakeCaseHints(input: unknown): string[] {
  if (typeof input !== 'object' || input === null) {
    return [];
  }
  return Object.keys(input)
    .filter((key) => Object.hasOwn(SNAKE_CASE_KEYS, key))
    .map((key) => `${key}: did you mean ${SNAKE_CASE_KEYS[key]}?`);
}

/**
 * Validate caller options. `undefined` and `null` mean "no options";
 * fields set to `undefined` are dropped so they keep their defaults.
 */
export function parseOptions(input: unknown): FormatOptions {
  if (input === undefined || input === null) {
    return {};
  }

  const result = formatOptionsSchema.safeParse(input);
  if (!result.success) {
    const error = ConfigurationError.fromZodError(
      'INVALID_OPTIONS',
      'Invalid format options',
      result.error,
    );
    const hints = snakeCaseHints(input);
    if (hints.length === 0) {
      throw error;
    }
    throw new ConfigurationError('INVALID_OPTIONS', 'Invalid format options', [
      ...error.issues,
      ...hints,
    ]);
  }

  const data = result.data;
  return {
    ...(data.currency !== undefined ? { currency: data.currency } : {}),
    ...(data.withCents !== undefined ? { withCents: data.withCents } : {}),
    ...(data.withCurrency !== undefined ? { withCurrency: data.withCurrency } : {}),
    ...(data.withSymbol !== undefined ? { withSymbol: data.withSymbol } : {}),
    ...(data.withSymbolSpace !== undefined ? { withSymbolSpace: data.withSymbolSpace } : {}),
    ...(data.withThousandsSeparator !== undefined
      ? { withThousandsSeparator: data.withThousandsSeparator }
      : {}),
  };
}

/**
 * Merge option layers over DEFAULT_OPTIONS, later layers winning key by key.
 * Every layer is validated first.
 */
export function resolveOptions(...layers: unknown[]): ResolvedFormatOptions {
  let resolved: ResolvedFormatOptions = { ...DEFAULT_OPTIONS };
  for (const layer of layers) {
    resolved = { ...resolved, ...parseOptions(layer) };
  }
  return resolved;
}
