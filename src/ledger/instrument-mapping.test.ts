import { describe, it, expect } from 'vitest';
import {
  instrumentCurrency,
  lookupInstrument,
  mergeInstrumentMapping,
  parseInstrumentMapping,
  serializeInstrumentMapping,
  validateCoverage,
} from './instrument-mapping.js';

const CSV = [
  'Product,Ticker,Foreign,Currency',
  'ACME CORP,ACME,false,',
  'WIDGET INC,WDGT,true,',
  'GLOBEX,GBX,yes,gbp',
  'BLANK CO,,false,',
  ',IGNORED,false,',
].join('\n');

describe('parseInstrumentMapping', () => {
  const mapping = parseInstrumentMapping(CSV);

  it('reads entries keyed by product', () => {
    expect(mapping.size).toBe(4);
    expect(mapping.get('ACME CORP')).toEqual({ ticker: 'ACME', is_foreign_currency: false });
    expect(mapping.get('WIDGET INC')).toEqual({ ticker: 'WDGT', is_foreign_currency: true });
    expect(mapping.get('GLOBEX')).toEqual({ ticker: 'GBX', is_foreign_currency: true, currency: 'GBP' });
  });

  it('accepts the legacy USD flag column', () => {
    const legacy = parseInstrumentMapping('Product,Ticker,USD\nX CORP,XC,True\n');
    expect(legacy.get('X CORP')).toEqual({ ticker: 'XC', is_foreign_currency: true });
  });

  it('ignores entries with a blank ticker on lookup', () => {
    expect(lookupInstrument(mapping, 'ACME CORP')?.ticker).toBe('ACME');
    expect(lookupInstrument(mapping, 'BLANK CO')).toBeUndefined();
  });

  it('resolves quote currencies', () => {
    const entry = (key: string) => {
      const found = mapping.get(key);
      if (found === undefined) throw new Error(`missing ${key}`);
      return found;
    };
    expect(instrumentCurrency(entry('ACME CORP'), 'EUR', 'USD')).toBe('EUR');
    expect(instrumentCurrency(entry('WIDGET INC'), 'EUR', 'USD')).toBe('USD');
    expect(instrumentCurrency(entry('GLOBEX'), 'EUR', 'USD')).toBe('GBP');
  });

  it('reports uncovered keys', () => {
    expect(validateCoverage(mapping, ['ACME CORP', 'BLANK CO', 'MISSING'])).toEqual([
      { type: 'mapping_error', instrument_key: 'BLANK CO', message: 'mapping entry has no ticker' },
      { type: 'mapping_error', instrument_key: 'MISSING', message: 'no mapping entry' },
    ]);
  });

  it('merges newly discovered keys with blank tickers', () => {
    const { mapping: merged, added } = mergeInstrumentMapping(mapping, ['ACME CORP', 'NEW B', 'NEW A']);
    expect(added).toEqual(['NEW A', 'NEW B']);
    expect(merged.get('NEW A')).toEqual({ ticker: '', is_foreign_currency: false });
    expect(merged.get('ACME CORP')?.ticker).toBe('ACME');
    expect(mapping.has('NEW A')).toBe(false);
  });

  it('serializes sorted by product', () => {
    expect(serializeInstrumentMapping(mapping)).toBe(
      [
        'Product,Ticker,Foreign,Currency',
        'ACME CORP,ACME,false,',
        'BLANK CO,,false,',
        'GLOBEX,GBX,true,GBP',
        'WIDGET INC,WDGT,true,',
        '',
      ].join('\n'),
    );
    expect(parseInstrumentMapping(serializeInstrumentMapping(mapping))).toEqual(mapping);
  });
});
