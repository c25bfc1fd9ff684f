/**
 * MoneyFormatter — formatting with per-instance defaults.
 *
 * With `logWarnings` enabled, amounts beyond the safe integer range are
 * reported on stderr (prefix MONEY_WARN), throttled to one line per minute
 * per currency. formatMoney() uses a silent instance and has no side effects.
 */
import { getCurrency } from './currencies.js';
import { composeMoney } from './format.js';
import { resolveOptions } from './options.js';
import type { FormatOptions, MoneyFormatterConfig, ResolvedFormatOptions } from './types.js';

const WARN_INTERVAL_MS = 60_000;

export class MoneyFormatter {
  private readonly defaults: ResolvedFormatOptions;
  private readonly logWarnings: boolean;
  private warnThrottle: Map<string, number> = new Map();

  constructor(config: MoneyFormatterConfig = {}) {
    this.defaults = resolveOptions(config.defaults);
    // Unknown default currency throws here.
    getCurrency(this.defaults.currency);
    this.logWarnings = config.logWarnings ?? false;
  }

  /** Resolved instance defaults. */
  options(): ResolvedFormatOptions {
    return { ...this.defaults };
  }

  /**
   * Format `value` with the instance defaults overridden by `options`.
   * Throws ConfigurationError for bad options or an unsupported currency.
   */
  format(value: number, options?: FormatOptions): string {
    const resolved = resolveOptions(this.defaults, options);
    const currency = getCurrency(resolved.currency);
    const result = composeMoney(value, currency, resolved);

    if (Math.abs(value) > Number.MAX_SAFE_INTEGER) {
      this.warn(currency.isoCode, value, 'unsafe_integer');
    }

    return result;
  }

  private warn(currency: string, amount: number, reason: string): void {
    if (!this.logWarnings) return;

    const key = `${currency}:${reason}`;
    const now = Date.now();
    const last = this.warnThrottle.get(key);
    if (last !== undefined && now - last < WARN_INTERVAL_MS) return;
    this.warnThrottle.set(key, now);

    console.error(`MONEY_WARN reason=${reason} currency=${currency} amount=${amount}`);
  }
}

const defaultFormatter = new MoneyFormatter({ logWarnings: false });

/**
 * Format `value` as a money string.
 *
 *   formatMoney(10)                                       // "$10.00"
 *   formatMoney(10, { currency: 'eur' })                  // "€10.00"
 *   formatMoney(10, { withCents: false })                 // "$10"
 *   formatMoney(10, { withCurrency: true })               // "$10.00 USD"
 *   formatMoney(10, { withSymbol: false })                // "10.00"
 *   formatMoney(10, { withSymbolSpace: true })            // "$ 10.00"
 *   formatMoney(1000)                                     // "$1,000.00"
 *   formatMoney(1000, { withThousandsSeparator: false })  // "$1000.00"
 */
export function formatMoney(value: number, options?: FormatOptions): string {
  return defaultFormatter.format(value, options);
}
