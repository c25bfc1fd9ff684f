export { formatMoney, MoneyFormatter } from './formatter.js';
export { splitValue, separateThousands, addSymbol, composeMoney } from './format.js';
export { DEFAULT_OPTIONS, parseOptions, resolveOptions } from './options.js';
export { buildCurrencyTable, currencyCodes, findCurrency, getCurrency } from './currencies.js';
export { MoneyError, ConfigurationError, InvalidAmountError } from './errors.js';
export type {
  CurrencyRecord,
  FormatOptions,
  MoneyFormatterConfig,
  ResolvedFormatOptions,
  SplitValue,
} from './types.js';
