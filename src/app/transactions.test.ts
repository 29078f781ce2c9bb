import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import path from 'node:path';
import os from 'node:os';
import crypto from 'node:crypto';

import type { ResolvedConfig } from '../config.js';
import { JsonlMarketDataStore } from '../market-data/jsonl-store.js';
import { dataFiles, loadConfig } from './config.js';
import { marketDataSource } from './ledger.js';
import { listTransactions } from './transactions.js';

function makeTmpDir(): string {
  const dir = path.join(os.tmpdir(), `portfolio-replay-test-${crypto.randomUUID()}`);
  fs.mkdirSync(dir, { recursive: true });
  return dir;
}

const ACCOUNT_CSV = [
  'Datum,Tijd,Valutadatum,Product,ISIN,Omschrijving,FX,Mutatie,,Saldo,,Order Id',
  '02-01-2024,10:00,,,,iDEAL storting,,EUR,"1.000,00",EUR,"1.000,00",',
  '03-01-2024,11:00,,ACME CORP,NL0000000001,"Koop 10 @ 50,00 EUR",,EUR,"-500,00",EUR,"500,00",ord-1',
  '04-01-2024,15:30,,WIDGET INC,US0000000002,"Koop 5 @ 20,00 USD",,USD,"-100,00",USD,"-100,00",ord-2',
  '04-01-2024,15:30,,WIDGET INC,US0000000002,Valuta Creditering,"1,2500",USD,"100,00",USD,"0,00",ord-2',
  '04-01-2024,15:30,,WIDGET INC,US0000000002,Valuta Debitering,"1,2500",EUR,"-90,00",EUR,"410,00",ord-2',
  '05-01-2024,09:00,,,,iDEAL storting,,EUR,"500,00",EUR,"910,00",',
].join('\n');

const TICKERS_CSV = 'Product,Ticker,Foreign\nACME CORP,ACME,false\nWIDGET INC,WDGT,true\n';

describe('listTransactions', () => {
  let tmpDir: string;
  let warnings: string[];
  const warn = (message: string): void => {
    warnings.push(message);
  };

  async function setup(toml?: string): Promise<ResolvedConfig> {
    const configPath = path.join(tmpDir, 'portfolio-replay.toml');
    if (toml !== undefined) {
      fs.writeFileSync(configPath, toml);
    }
    const { config } = await loadConfig(configPath);
    const files = dataFiles(config);
    fs.writeFileSync(files.ledger, ACCOUNT_CSV);
    fs.writeFileSync(files.mapping, TICKERS_CSV);
    await new JsonlMarketDataStore(files.market_data).put_fx_rates([
      {
        base: 'EUR',
        quote: 'USD',
        as_of_date: '2023-12-29',
        timestamp: new Date('2023-12-29T16:00:00Z'),
        rate: '1.25',
        source: 'test',
      },
    ]);
    return config;
  }

  beforeEach(() => {
    tmpDir = makeTmpDir();
    warnings = [];
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it('lists trades and deposits in the reporting currency', async () => {
    const config = await setup();
    const output = await listTransactions(config, marketDataSource(config), { warn });

    expect(output.currency).toBe('EUR');
    expect(output.issues).toEqual([]);
    expect(warnings).toEqual([]);
    expect(output.transactions.map((t) => [t.date, t.time, t.type, t.ticker, t.amount])).toEqual([
      ['2024-01-02', '10:00:00', 'DEPOSIT', 'CASH', '1000'],
      ['2024-01-03', '11:00:00', 'BUY', 'ACME', '500'],
      ['2024-01-04', '15:30:00', 'BUY', 'WDGT', '90'],
      ['2024-01-05', '09:00:00', 'DEPOSIT', 'CASH', '500'],
    ]);
    expect(output.transactions[2]).toEqual({
      date: '2024-01-04',
      time: '15:30:00',
      type: 'BUY',
      ticker: 'WDGT',
      name: 'WIDGET INC',
      description: 'Koop 5 @ 20,00 USD',
      shares: '5',
      price: '16',
      amount: '90',
      cash_balance: '410',
    });
    expect(output.csv_file).toBeUndefined();
  });

  it('writes the listing as CSV', async () => {
    const config = await setup();
    const csvPath = path.join(tmpDir, 'out', 'transactions.csv');
    const output = await listTransactions(config, marketDataSource(config), { csv: csvPath, warn });

    expect(output.csv_file).toBe(csvPath);
    expect(fs.readFileSync(csvPath, 'utf8')).toBe(
      [
        'Date,Transaction_Time,Type,Ticker,Name,Description,Shares,Price_Per_Share_EUR,Amount_EUR,Cash_Balance_EUR',
        '2024-01-02,10:00:00,DEPOSIT,CASH,Cash,iDEAL storting,,,1000,1000',
        '2024-01-03,11:00:00,BUY,ACME,ACME CORP,"Koop 10 @ 50,00 EUR",10,50,500,500',
        '2024-01-04,15:30:00,BUY,WDGT,WIDGET INC,"Koop 5 @ 20,00 USD",5,16,90,410',
        '2024-01-05,09:00:00,DEPOSIT,CASH,Cash,iDEAL storting,,,500,910',
        '',
      ].join('\n'),
    );
  });

  it('derives the price from the converted amount without a rate in the lookback window', async () => {
    const config = await setup('[market_data]\nlookback = "2d"\n');
    const output = await listTransactions(config, marketDataSource(config), { warn });

    expect(output.transactions[2].price).toBe('18');
    expect(output.transactions[2].amount).toBe('90');
    expect(output.issues).toEqual([]);
  });
});
