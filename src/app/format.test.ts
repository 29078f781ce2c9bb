import { describe, it, expect } from 'vitest';
import { Decimal } from '../decimal.js';
import { available, unavailable } from '../outcome.js';
import { holdingOutput, issueMessage, issueOutput, money, outcomeMoney, reportIssues } from './format.js';

// ---------------------------------------------------------------------------
// money
// ---------------------------------------------------------------------------

describe('money', () => {
  it('renders canonical strings without display settings', () => {
    expect(money(new Decimal('1055.90'), {})).toBe('1055.9');
  });

  it('rounds half-up to currency_decimals', () => {
    expect(money(new Decimal('10.125'), { currency_decimals: 2 })).toBe('10.13');
    expect(money(new Decimal('10.10'), { currency_decimals: 2 })).toBe('10.1');
  });

  it('maps an unavailable outcome to null', () => {
    expect(outcomeMoney(unavailable('no price'), {})).toBeNull();
    expect(outcomeMoney(available(new Decimal('-0')), {})).toBe('0');
  });
});

// ---------------------------------------------------------------------------
// issues
// ---------------------------------------------------------------------------

describe('issueOutput', () => {
  it('prefixes parse errors with their column', () => {
    expect(
      issueOutput({ type: 'parse_error', row: 5, column: 'Mutatie', message: "not a number: 'abc'", raw: 'abc' }),
    ).toEqual({ type: 'parse_error', row: 5, message: "Mutatie: not a number: 'abc'" });
  });

  it('keeps the ticker in price gap messages', () => {
    expect(
      issueOutput({
        type: 'price_gap',
        instrument_key: 'ACME CORP',
        ticker: 'ACME',
        date: '2024-01-03',
        reason: 'no price series for ACME',
      }),
    ).toEqual({
      type: 'price_gap',
      date: '2024-01-03',
      instrument_key: 'ACME CORP',
      message: 'ACME: no price series for ACME',
    });
  });

  it('describes consistency warnings', () => {
    expect(
      issueOutput({
        type: 'consistency_warning',
        date: '2024-01-10',
        running_balance: new Decimal('1720'),
        delta_sum: new Decimal('1717.00'),
        difference: new Decimal('3'),
      }),
    ).toEqual({
      type: 'consistency_warning',
      date: '2024-01-10',
      message: 'running balance 1720 differs from delta sum 1717 by 3',
    });
  });

  it('names the series of a preload failure', () => {
    expect(issueOutput({ type: 'preload_failure', key: 'USD/EUR', message: 'timeout' })).toEqual({
      type: 'preload_failure',
      message: 'USD/EUR: timeout',
    });
  });
});

describe('issueMessage', () => {
  it('joins the located fields before the message', () => {
    expect(
      issueMessage({
        type: 'price_gap',
        date: '2024-01-03',
        instrument_key: 'ACME CORP',
        message: 'ACME: no price series for ACME',
      }),
    ).toBe('price_gap 2024-01-03 ACME CORP: ACME: no price series for ACME');
    expect(issueMessage({ type: 'parse_error', row: 7, message: 'Datum: empty date' })).toBe(
      'parse_error row 7: Datum: empty date',
    );
  });

  it('sends one line per issue to the sink', () => {
    const lines: string[] = [];
    reportIssues(
      [
        { type: 'mapping_error', instrument_key: 'WIDGET INC', message: 'no mapping entry' },
        { type: 'preload_failure', message: 'ACME: timeout' },
      ],
      (line) => lines.push(line),
    );
    expect(lines).toEqual(['mapping_error WIDGET INC: no mapping entry', 'preload_failure: ACME: timeout']);
  });

  it('stays silent without a sink', () => {
    expect(() => reportIssues([{ type: 'preload_failure', message: 'x' }], undefined)).not.toThrow();
  });
});

// ---------------------------------------------------------------------------
// holdings
// ---------------------------------------------------------------------------

describe('holdingOutput', () => {
  it('renders a converted holding', () => {
    expect(
      holdingOutput(
        {
          instrument_key: 'WIDGET INC',
          ticker: 'WDGT',
          quantity: new Decimal('5'),
          price: new Decimal('22.00'),
          priced_date: '2024-01-05',
          currency: 'USD',
          fx_rate: new Decimal('0.8'),
          fx_date: '2024-01-03',
          value: available(new Decimal('88.000')),
        },
        { currency_decimals: 2 },
      ),
    ).toEqual({
      instrument_key: 'WIDGET INC',
      ticker: 'WDGT',
      quantity: '5',
      price: '22',
      priced_date: '2024-01-05',
      currency: 'USD',
      fx_rate: '0.8',
      fx_date: '2024-01-03',
      value: '88',
    });
  });

  it('nulls the fields of an unmapped holding', () => {
    expect(
      holdingOutput(
        { instrument_key: 'GADGET SA', quantity: new Decimal('3'), value: unavailable('no mapping entry') },
        {},
      ),
    ).toEqual({
      instrument_key: 'GADGET SA',
      ticker: null,
      quantity: '3',
      price: null,
      priced_date: null,
      currency: null,
      fx_rate: null,
      fx_date: null,
      value: null,
    });
  });
});
