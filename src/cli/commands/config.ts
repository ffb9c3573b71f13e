/**
 * Config Command
 *
 *   medqa config list               All settings, grouped by section
 *   medqa config get <key>          One setting, e.g. agent.max_iterations
 *   medqa config set <key> <value>  Validate and write to ~/.medqa/config.toml
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { getConfigValue, setConfigValue, listConfig, getConfigPath } from '../../config/index.js';
import { ConfigError } from '../../errors/index.js';
import type { CommandContext } from '../types.js';

export function formatConfigValue(value: unknown): string {
  return typeof value === 'string' ? value : JSON.stringify(value);
}

/**
 * `key = value` lines with a blank line between top-level sections.
 */
export function formatConfigList(entries: ReadonlyArray<readonly [string, unknown]>): string[] {
  const lines: string[] = [];
  let section: string | undefined;
  for (const [key, value] of entries) {
    const current = key.includes('.') ? key.slice(0, key.indexOf('.')) : '';
    if (section !== undefined && current !== section) {
      lines.push('');
    }
    section = current;
    lines.push(`  ${chalk.cyan(key)} = ${chalk.yellow(formatConfigValue(value))}`);
  }
  return lines;
}

export function createConfigCommand(getContext: () => CommandContext): Command {
  const config = new Command('config').description('Show or change settings');

  config
    .command('list')
    .description('List every setting')
    .action(() => {
      const ctx = getContext();
      const entries = listConfig();

      if (ctx.options.json) {
        console.log(JSON.stringify(Object.fromEntries(entries), null, 2));
        return;
      }
      ctx.log(chalk.bold('Configuration:'));
      formatConfigList(entries).forEach((line) => ctx.log(line));
      ctx.log('');
      ctx.log(chalk.dim(`Config file: ${getConfigPath()}`));
    });

  config
    .command('get <key>')
    .description('Print one setting (e.g. search.top_k)')
    .action((key: string) => {
      const ctx = getContext();
      const value = getConfigValue(key);
      if (value === undefined) {
        throw new ConfigError(`Unknown config key: ${key}`);
      }

      if (ctx.options.json) {
        console.log(JSON.stringify({ key, value }));
      } else {
        ctx.log(formatConfigValue(value));
      }
    });

  config
    .command('set <key> <value>')
    .description('Change one setting (e.g. qa.mode agent)')
    .action((key: string, value: string) => {
      const ctx = getContext();
      setConfigValue(key, value);
      const stored = getConfigValue(key);

      if (ctx.options.json) {
        console.log(JSON.stringify({ key, value: stored }));
      } else {
        ctx.log(`${chalk.green('✓')} ${chalk.cyan(key)} = ${chalk.yellow(formatConfigValue(stored))}`);
      }
    });

  return config;
}
