/**
 * Config Command
 *
 * Manages the data directory's config.toml:
 *   cqa config get <key>          - Get a specific value
 *   cqa config set <key> <value>  - Set a value
 *   cqa config list               - Show all configuration
 *   cqa config path               - Show config file location
 *   cqa config reset --force      - Restore the defaults
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { getConfigKeys, getConfigValue, listConfig, resetConfig, setConfigValue } from '../../config/loader.js';
import { getConfigPath } from '../../config/paths.js';
import { ConfigError } from '../../errors/index.js';
import type { CommandContext } from '../types.js';

export function formatValue(value: unknown): string {
  if (typeof value === 'string') return value;
  if (typeof value === 'boolean') return value ? 'true' : 'false';
  if (typeof value === 'number') return String(value);
  return JSON.stringify(value);
}

export function createConfigCommand(getContext: () => CommandContext): Command {
  const configCmd = new Command('config').description('Manage configuration settings');

  configCmd
    .command('get <key>')
    .description('Get a configuration value (e.g., cqa config get agent.max_tool_rounds)')
    .action((key: string) => {
      const ctx = getContext();

      if (!getConfigKeys().includes(key)) {
        throw new ConfigError(`Unknown config key: ${key}`);
      }

      const value = getConfigValue(key);

      if (ctx.options.json) {
        console.log(JSON.stringify({ key, value: value ?? null }));
      } else {
        ctx.log(value === undefined ? chalk.dim('(not set)') : formatValue(value));
      }
    });

  configCmd
    .command('set <key> <value>')
    .description('Set a configuration value (e.g., cqa config set search.max_results 8)')
    .action((key: string, value: string) => {
      const ctx = getContext();
      setConfigValue(key, value);

      if (ctx.options.json) {
        console.log(JSON.stringify({ success: true, key, value: getConfigValue(key) }));
      } else {
        ctx.log(`${chalk.green('✓')} Set ${chalk.cyan(key)} = ${chalk.yellow(value)}`);
      }
    });

  configCmd
    .command('list')
    .alias('ls')
    .description('List all configuration values')
    .action(() => {
      const ctx = getContext();
      const entries = listConfig();

      if (ctx.options.json) {
        console.log(JSON.stringify(Object.fromEntries(entries), null, 2));
        return;
      }

      ctx.log(chalk.bold('Configuration:'));
      ctx.log('');

      // Blank line between top-level sections
      let currentGroup = '';
      for (const [key, value] of entries) {
        const group = key.split('.')[0] ?? '';
        if (group !== currentGroup) {
          if (currentGroup !== '') ctx.log('');
          currentGroup = group;
        }
        ctx.log(`  ${chalk.cyan(key)} = ${chalk.yellow(formatValue(value))}`);
      }

      ctx.log('');
      ctx.log(chalk.dim(`Config file: ${getConfigPath()}`));
    });

  configCmd
    .command('path')
    .description('Show the config file location')
    .action(() => {
      const ctx = getContext();
      const configPath = getConfigPath();

      if (ctx.options.json) {
        console.log(JSON.stringify({ path: configPath }));
      } else {
        ctx.log(configPath);
      }
    });

  configCmd
    .command('reset')
    .description('Reset configuration to defaults')
    .option('-f, --force', 'Skip confirmation')
    .action((options: { force?: boolean }) => {
      const ctx = getContext();

      if (!options.force && !ctx.options.json) {
        ctx.log(chalk.yellow('This will reset all configuration to defaults.'));
        ctx.log(`Run with ${chalk.cyan('--force')} to confirm.`);
        process.exitCode = 1;
        return;
      }

      const configPath = resetConfig();

      if (ctx.options.json) {
        console.log(JSON.stringify({ success: true, path: configPath }));
      } else {
        ctx.log(`${chalk.green('✓')} Configuration reset to defaults`);
      }
    });

  return configCmd;
}
