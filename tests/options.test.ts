import { describe, it, expect } from 'vitest';
import { DEFAULT_OPTIONS, parseOptions, resolveOptions } from '../src/options.js';
import { ConfigurationError } from '../src/errors.js';

describe('DEFAULT_OPTIONS', () => {
  it('matches the documented defaults', () => {
    expect(DEFAULT_OPTIONS).toEqual({
      currency: 'usd',
      withCents: true,
      withCurrency: false,
      withSymbol: true,
      withSymbolSpace: false,
      withThousandsSeparator: true,
    });
  });

  it('is frozen', () => {
    expect(Object.isFrozen(DEFAULT_OPTIONS)).toBe(true);
  });
});

describe('parseOptions', () => {
  it('undefined and null → empty options', () => {
    expect(parseOptions(undefined)).toEqual({});
    expect(parseOptions(null)).toEqual({});
  });

  it('drops undefined fields', () => {
    const parsed = parseOptions({ currency: 'eur', withCents: undefined });
    expect(parsed).toEqual({ currency: 'eur' });
    expect('withCents' in parsed).toBe(false);
  });

  it('non-object → INVALID_OPTIONS', () => {
    expect(() => parseOptions('eur')).toThrow(ConfigurationError);
    expect(() => parseOptions(['eur'])).toThrow('Invalid format options');
  });

  it('lists every issue', () => {
    try {
      parseOptions({ withSymbol: 1, withCurrency: 'no' });
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(ConfigurationError);
      expect(err).toMatchObject({
        code: 'INVALID_OPTIONS',
        issues: [
          'withCurrency: Expected boolean, received string',
          'withSymbol: Expected boolean, received number',
        ],
      });
    }
  });

  it('snake_case keys get a camelCase hint', () => {
    try {
      parseOptions({ with_cents: false });
      expect.unreachable();
    } catch (err) {
      expect(err).toMatchObject({
        code: 'INVALID_OPTIONS',
        issues: [
          "(root): Unrecognized key(s) in object: 'with_cents'",
          'with_cents: did you mean withCents?',
        ],
      });
    }
  });

  it('other unknown keys get no hint', () => {
    try {
      parseOptions({ colour: 'red' });
      expect.unreachable();
    } catch (err) {
      expect(err).toMatchObject({
        issues: ["(root): Unrecognized key(s) in object: 'colour'"],
      });
    }
  });
});

describe('resolveOptions', () => {
  it('no layers → defaults', () => {
    expect(resolveOptions()).toEqual(DEFAULT_OPTIONS);
  });

  it('overrides key by key', () => {
    expect(resolveOptions({ withCents: false })).toEqual({ ...DEFAULT_OPTIONS, withCents: false });
  });

  it('later layers win', () => {
    const resolved = resolveOptions(
      { currency: 'eur', withSymbolSpace: true },
      { currency: 'gbp' },
    );
    expect(resolved).toEqual({ ...DEFAULT_OPTIONS, currency: 'gbp', withSymbolSpace: true });
  });

  it('returns a fresh object', () => {
    const resolved = resolveOptions();
    expect(resolved).not.toBe(DEFAULT_OPTIONS);
    expect(Object.isFrozen(resolved)).toBe(false);
  });
});
