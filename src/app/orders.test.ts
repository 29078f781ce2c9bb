import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import path from 'node:path';
import os from 'node:os';
import crypto from 'node:crypto';

import type { ResolvedConfig } from '../config.js';
import { loadConfig } from './config.js';
import { listOrders } from './orders.js';

function makeTmpDir(): string {
  const dir = path.join(os.tmpdir(), `portfolio-replay-test-${crypto.randomUUID()}`);
  fs.mkdirSync(dir, { recursive: true });
  return dir;
}

const ACCOUNT_CSV = [
  'Datum,Tijd,Valutadatum,Product,ISIN,Omschrijving,FX,Mutatie,,Saldo,,Order Id',
  '04-01-2024,15:30,,WIDGET INC,US0000000002,Valuta Debitering,"1,2500",EUR,"-90,00",EUR,"408,00",ord-2',
  '04-01-2024,15:30,,WIDGET INC,US0000000002,Valuta Creditering,"1,2500",USD,"100,00",USD,"0,00",ord-2',
  '04-01-2024,15:30,,WIDGET INC,US0000000002,"Koop 5 @ 20,00 USD",,USD,"-100,00",USD,"-100,00",ord-2',
  '03-01-2024,11:00,,ACME CORP,NL0000000001,Transactiekosten en/of kosten van derden,,EUR,"-2,00",EUR,"498,00",ord-1',
  '03-01-2024,11:00,,ACME CORP,NL0000000001,"Koop 10 @ 50,00 EUR",,EUR,"-500,00",EUR,"500,00",ord-1',
  '02-01-2024,10:00,,,,iDEAL storting,,EUR,"1.000,00",EUR,"1.000,00",',
].join('\n');

describe('listOrders', () => {
  let tmpDir: string;
  let config: ResolvedConfig;

  beforeEach(async () => {
    tmpDir = makeTmpDir();
    config = (await loadConfig(path.join(tmpDir, 'portfolio-replay.toml'))).config;
    fs.writeFileSync(path.join(tmpDir, 'Account.csv'), ACCOUNT_CSV);
    fs.writeFileSync(path.join(tmpDir, 'tickers.csv'), 'Product,Ticker,Foreign,Currency\nACME CORP,ACME,false,\n');
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it('lists orders newest first with costs and reporting-currency amounts', async () => {
    const orders = await listOrders(config);
    expect(orders).toEqual([
      {
        order_id: 'ord-2',
        date: '2024-01-04',
        time: '15:30',
        instrument_key: 'WIDGET INC',
        ticker: null,
        side: 'BUY',
        quantity: '5',
        price: '20',
        currency: 'USD',
        amount: '90',
        transaction_costs: '0',
        transaction_tax: '0',
        total_costs: '0',
        total: '90',
      },
      {
        order_id: 'ord-1',
        date: '2024-01-03',
        time: '11:00',
        instrument_key: 'ACME CORP',
        ticker: 'ACME',
        side: 'BUY',
        quantity: '10',
        price: '50',
        currency: 'EUR',
        amount: '500',
        transaction_costs: '2',
        transaction_tax: '0',
        total_costs: '2',
        total: '502',
      },
    ]);
  });

  it('reports nothing for a clean ledger', async () => {
    const warnings: string[] = [];
    await listOrders(config, { warn: (m) => warnings.push(m) });
    expect(warnings).toEqual([]);
  });
});
