/**
 * CLI-specific config loading utilities.
 *
 * Wraps the library-level config parsing (`../config.js`) with file-system
 * awareness: locating the config file, reading TOML, resolving paths, and
 * producing the JSON output shape expected by the `config` command.
 */

import fs from 'node:fs';
import path from 'node:path';
import os from 'node:os';

import {
  type Config,
  type ResolvedConfig,
  parseConfig,
  resolveDataDir,
  resolveDataFile,
} from '../config.js';
import { formatDuration } from '../duration.js';

const CONFIG_FILE_NAME = 'portfolio-replay.toml';

// ---------------------------------------------------------------------------
// Default config path discovery
// ---------------------------------------------------------------------------

/**
 * Determine the default configuration file path.
 *
 * Resolution order:
 * 1. `./portfolio-replay.toml` if it exists in the current working directory.
 * 2. `$XDG_DATA_HOME/portfolio-replay/portfolio-replay.toml` (or the same
 *    under `~/.local/share` when `XDG_DATA_HOME` is not set) if it exists.
 * 3. The XDG path from step 2 (even if it does not yet exist) as the default.
 */
export function defaultConfigPath(): string {
  const localConfig = path.resolve(CONFIG_FILE_NAME);
  if (fs.existsSync(localConfig)) {
    return localConfig;
  }

  const xdgDataHome = process.env.XDG_DATA_HOME || path.join(os.homedir(), '.local', 'share');
  return path.join(xdgDataHome, 'portfolio-replay', CONFIG_FILE_NAME);
}

// ---------------------------------------------------------------------------
// Config loading
// ---------------------------------------------------------------------------

function resolve(parsed: Config, configDir: string): ResolvedConfig {
  return {
    ...parsed,
    data_dir: resolveDataDir(parsed, configDir),
  };
}

/**
 * Load and resolve the configuration.
 *
 * @param configPath - Explicit path to a TOML config file. When omitted the
 *   result of {@link defaultConfigPath} is used.
 * @returns The resolved path that was used and the fully-resolved config.
 *   A missing file yields the defaults, with the config's directory as the
 *   data directory.
 */
export async function loadConfig(
  configPath?: string,
): Promise<{ configPath: string; config: ResolvedConfig }> {
  const resolvedPath = configPath ? path.resolve(configPath) : defaultConfigPath();
  const configDir = path.dirname(resolvedPath);

  if (fs.existsSync(resolvedPath)) {
    const tomlStr = await fs.promises.readFile(resolvedPath, 'utf-8');
    return { configPath: resolvedPath, config: resolve(parseConfig(tomlStr), configDir) };
  }

  return { configPath: resolvedPath, config: resolve(parseConfig(''), configDir) };
}

/** Absolute paths of the ledger export and the instrument mapping. */
export function dataFiles(config: ResolvedConfig): { ledger: string; mapping: string; market_data: string } {
  return {
    ledger: resolveDataFile(config.data_dir, config.ledger_file),
    mapping: resolveDataFile(config.data_dir, config.mapping_file),
    market_data: path.join(config.data_dir, 'market-data'),
  };
}

// ---------------------------------------------------------------------------
// CLI output
// ---------------------------------------------------------------------------

/** Build the JSON-serialisable output object for the `config` CLI command. */
export function configOutput(configPath: string, config: ResolvedConfig): object {
  const files = dataFiles(config);
  return {
    config_file: configPath,
    data_directory: config.data_dir,
    ledger_file: files.ledger,
    mapping_file: files.mapping,
    market_data_directory: files.market_data,
    reporting_currency: config.reporting_currency,
    ledger: {
      date_format: config.ledger.date_format,
      source_order: config.ledger.source_order,
      columns: config.ledger.columns,
    },
    cash: config.cash,
    market_data: {
      foreign_currency: config.market_data.foreign_currency,
      lookback: formatDuration(config.market_data.lookback),
      max_price_age:
        config.market_data.max_price_age !== undefined
          ? formatDuration(config.market_data.max_price_age)
          : null,
    },
    history: config.history,
  };
}
