#!/usr/bin/env node
import { Command } from 'commander';

// App layer
import { loadConfig, configOutput } from '../app/config.js';
import type { WarningSink } from '../app/format.js';
import { importFxRates, importPrices } from '../app/import.js';
import { marketDataSource } from '../app/ledger.js';
import { listOrders } from '../app/orders.js';
import { portfolioHistory, portfolioSnapshot } from '../app/portfolio.js';
import { listTickers } from '../app/tickers.js';
import { listTransactions } from '../app/transactions.js';

// ---------------------------------------------------------------------------
// Helper
// ---------------------------------------------------------------------------

interface GlobalOptions {
  config?: string;
  quiet?: boolean;
}

async function run(fn: () => Promise<unknown>): Promise<void> {
  try {
    const result = await fn();
    console.log(JSON.stringify(result, null, 2));
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    console.log(JSON.stringify({ success: false, error: message }, null, 2));
    process.exit(1);
  }
}

async function runWithConfig(
  fn: (cfg: Awaited<ReturnType<typeof loadConfig>>, warn: WarningSink | undefined) => Promise<unknown>,
): Promise<void> {
  await run(async () => {
    const opts = program.opts<GlobalOptions>();
    const cfg = await loadConfig(opts.config);
    const warn: WarningSink | undefined = opts.quiet === true ? undefined : (message) => console.warn(message);
    return fn(cfg, warn);
  });
}

// ---------------------------------------------------------------------------
// Program
// ---------------------------------------------------------------------------

const program = new Command();

program
  .name('portfolio-replay')
  .description('Reconstruct historical portfolio state from a brokerage ledger export')
  .version('0.1.0')
  .option('-c, --config <path>', 'path to config file')
  .option('-q, --quiet', 'do not print warnings to stderr');

// ---------------------------------------------------------------------------
// config
// ---------------------------------------------------------------------------

program
  .command('config')
  .description('Print configuration as JSON')
  .action(async () => {
    await runWithConfig(async (cfg) => {
      return configOutput(cfg.configPath, cfg.config);
    });
  });

// ---------------------------------------------------------------------------
// snapshot / history
// ---------------------------------------------------------------------------

program
  .command('snapshot [date]')
  .description('Cash, holdings, deposits and total value at a date (default today)')
  .action(async (date?: string) => {
    await runWithConfig(async (cfg, warn) => {
      return portfolioSnapshot(cfg.config, marketDataSource(cfg.config), { date, warn });
    });
  });

program
  .command('history')
  .description('Portfolio value series over a date range')
  .option('--start <date>', 'start date (YYYY-MM-DD), default first ledger date')
  .option('--end <date>', 'end date (YYYY-MM-DD), default today')
  .option('--frequency <frequency>', 'daily, business, weekly, monthly or yearly')
  .option('--csv <file>', 'also write the per-position history CSV')
  .action(async (opts: { start?: string; end?: string; frequency?: string; csv?: string }) => {
    await runWithConfig(async (cfg, warn) => {
      return portfolioHistory(cfg.config, marketDataSource(cfg.config), {
        start: opts.start,
        end: opts.end,
        frequency: opts.frequency,
        csv: opts.csv,
        warn,
      });
    });
  });

// ---------------------------------------------------------------------------
// orders / transactions / tickers
// ---------------------------------------------------------------------------

program
  .command('orders')
  .description('Trades grouped by order id, with costs and taxes')
  .action(async () => {
    await runWithConfig(async (cfg, warn) => {
      return listOrders(cfg.config, { warn });
    });
  });

program
  .command('transactions')
  .description('Trades and external cash movements in the reporting currency')
  .option('--csv <file>', 'also write the listing as CSV')
  .action(async (opts: { csv?: string }) => {
    await runWithConfig(async (cfg, warn) => {
      return listTransactions(cfg.config, marketDataSource(cfg.config), { csv: opts.csv, warn });
    });
  });

program
  .command('tickers')
  .description('Instrument keys in the ledger and their ticker mapping')
  .option('--write', 'save newly discovered keys to the mapping file')
  .action(async (opts: { write?: boolean }) => {
    await runWithConfig(async (cfg, warn) => {
      return listTickers(cfg.config, { write: opts.write, warn });
    });
  });

// ---------------------------------------------------------------------------
// prices / fx
// ---------------------------------------------------------------------------

const prices = program.command('prices').description('Price history commands');

prices
  .command('import <ticker> <file>')
  .description('Import a Date,Close CSV for a ticker')
  .option('--currency <code>', 'quote currency (default: reporting currency)')
  .action(async (ticker: string, file: string, opts: { currency?: string }) => {
    await runWithConfig(async (cfg) => {
      return importPrices(cfg.config, ticker, file, { currency: opts.currency });
    });
  });

const fx = program.command('fx').description('FX rate history commands');

fx.command('import <base> <quote> <file>')
  .description('Import a Date,Rate CSV quoted as units of <quote> per <base>')
  .action(async (base: string, quote: string, file: string) => {
    await runWithConfig(async (cfg) => {
      return importFxRates(cfg.config, base, quote, file);
    });
  });

// ---------------------------------------------------------------------------
// Parse and execute
// ---------------------------------------------------------------------------

await program.parseAsync(process.argv);
