import { describe, it, expect } from 'vitest';
import { parseInstrumentMapping } from '../ledger/instrument-mapping.js';
import { parseLedger } from '../ledger/parser.js';
import { CurrencyNormalizer } from '../market-data/currency.js';
import { type TransactionRecord, clockTime, collectTransactions } from './transactions.js';

const HEADER = 'Datum,Tijd,Valutadatum,Product,ISIN,Omschrijving,FX,Mutatie,,Saldo,,Order Id';

const LEDGER = parseLedger(
  [
    HEADER,
    '02-01-2024,10:00,,,,iDEAL storting,,EUR,"1.000,00",EUR,"1.000,00",',
    '03-01-2024,11:00,,ACME CORP,NL0000000001,"Koop 10 @ 50,00 EUR",,EUR,"-500,00",EUR,"500,00",ord-1',
    '03-01-2024,11:00,,ACME CORP,NL0000000001,Transactiekosten en/of kosten van derden,,EUR,"-2,00",EUR,"498,00",ord-1',
    '04-01-2024,15:30,,WIDGET INC,US0000000002,"Koop 5 @ 20,00 USD",,USD,"-100,00",USD,"-100,00",ord-2',
    '05-01-2024,9:05,,,,Terugstorting,,EUR,"-100,00",EUR,"398,00",',
    '06-01-2024,,,,,Overboeking van uw geldrekening,,EUR,"50,00",EUR,"448,00",',
    '08-01-2024,12:00,,ACME CORP,NL0000000001,"Verkoop 4 @ 55,00 EUR",,EUR,"220,00",EUR,"668,00",ord-3',
    '09-01-2024,10:00,,ACME CORP,NL0000000001,Koop 3 ACME,,EUR,"-150,00",EUR,"518,00",ord-4',
  ].join('\n'),
  { reporting_currency: 'EUR' },
);

const MAPPING = parseInstrumentMapping('Product,Ticker,Foreign\nACME CORP,ACME,false\nWIDGET INC,WDGT,true\n');

function normalizer(withRate: boolean): CurrencyNormalizer {
  const fx = new CurrencyNormalizer('EUR');
  if (withRate) {
    fx.load('USD', 'EUR', [{ date: '2024-01-02', value: '0.9' }]);
  }
  fx.seal();
  return fx;
}

function row(record: TransactionRecord): (string | null | undefined)[] {
  return [
    record.date,
    record.time,
    record.type,
    record.ticker,
    record.shares?.toFixed(),
    record.price?.toFixed(),
    record.amount?.toFixed(),
    record.cash_balance?.toFixed(),
  ];
}

describe('clockTime', () => {
  it('pads short times and defaults to midnight', () => {
    expect(clockTime('9:05')).toBe('09:05:00');
    expect(clockTime('15:30')).toBe('15:30:00');
    expect(clockTime('15:30:12')).toBe('15:30:12');
    expect(clockTime(undefined)).toBe('00:00:00');
  });
});

describe('collectTransactions', () => {
  it('lists trades and external cash movements in order', () => {
    const { records, issues } = collectTransactions(LEDGER, MAPPING, normalizer(true));

    expect(issues).toEqual([]);
    expect(records.map(row)).toEqual([
      ['2024-01-02', '10:00:00', 'DEPOSIT', 'CASH', undefined, undefined, '1000', '1000'],
      ['2024-01-03', '11:00:00', 'BUY', 'ACME', '10', '50', '500', '500'],
      ['2024-01-04', '15:30:00', 'BUY', 'WDGT', '5', '18', '90', undefined],
      ['2024-01-05', '09:05:00', 'WITHDRAWAL', 'CASH', undefined, undefined, '-100', '398'],
      ['2024-01-06', '00:00:00', 'CASH_TRANSFER', 'CASH', undefined, undefined, '50', '448'],
      ['2024-01-08', '12:00:00', 'SELL', 'ACME', '-4', '55', '220', '668'],
      ['2024-01-09', '10:00:00', 'BUY', 'ACME', '3', '50', '150', '518'],
    ]);
    expect(records[1].name).toBe('ACME CORP');
    expect(records[1].description).toBe('Koop 10 @ 50,00 EUR');
    expect(records[0].name).toBe('Cash');
  });

  it('takes the amount from the order conversion row', () => {
    const ledger = parseLedger(
      [
        HEADER,
        '04-01-2024,15:30,,WIDGET INC,US0000000002,"Koop 5 @ 20,00 USD",,USD,"-100,00",USD,"-100,00",ord-2',
        '04-01-2024,15:30,,WIDGET INC,US0000000002,Valuta Creditering,"1,1",USD,"100,00",USD,"0,00",ord-2',
        '04-01-2024,15:30,,WIDGET INC,US0000000002,Valuta Debitering,,EUR,"-92,00",EUR,"408,00",ord-2',
      ].join('\n'),
      { reporting_currency: 'EUR' },
    );

    const { records, issues } = collectTransactions(ledger, MAPPING, normalizer(false));

    expect(issues).toEqual([]);
    expect(records.map(row)).toEqual([['2024-01-04', '15:30:00', 'BUY', 'WDGT', '5', '18.4', '92', '408']]);
  });

  it('reports a foreign trade it cannot convert', () => {
    const { records, issues } = collectTransactions(LEDGER, MAPPING, normalizer(false));

    expect(issues).toEqual([
      {
        type: 'fx_gap',
        instrument_key: 'WIDGET INC',
        currency: 'USD',
        date: '2024-01-04',
        reason: 'no FX rate USD/EUR on or before 2024-01-04',
      },
    ]);
    expect(row(records[2])).toEqual(['2024-01-04', '15:30:00', 'BUY', 'WDGT', '5', undefined, undefined, undefined]);
  });

  it('leaves the ticker empty for an unmapped product', () => {
    const { records } = collectTransactions(LEDGER, parseInstrumentMapping('Product,Ticker\n'), normalizer(true));

    expect(records[1].ticker).toBeNull();
    expect(records[1].name).toBe('ACME CORP');
  });
});
