#!/usr/bin/env node
/**
 * medqa CLI Entry Point
 *
 * Sets up Commander.js with global options and registers all subcommands.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { readFileSync } from 'node:fs';
import type { GlobalOptions, CommandContext } from './types.js';
import { createAskCommand } from './commands/ask.js';
import { createChatCommand } from './commands/chat.js';
import { createConfigCommand } from './commands/config.js';
import { createIndexCommand } from './commands/index.js';
import { handleError, createGlobalErrorHandler, CLIError } from '../errors/index.js';
import { loadConfig } from '../config/index.js';
import { validateProviderKey } from '../providers/validation.js';

function readVersion(): string {
  // src/cli and dist/cli both sit two levels below package.json
  const raw: unknown = JSON.parse(readFileSync(new URL('../../package.json', import.meta.url), 'utf-8'));
  if (typeof raw === 'object' && raw !== null && 'version' in raw && typeof raw.version === 'string') {
    return raw.version;
  }
  return '0.0.0';
}

const program = new Command();

program
  .name('medqa')
  .description('Medical question answering over a local knowledge base')
  .version(readVersion(), '-v, --version', 'Display version number')

  // Global options - available to ALL subcommands
  .option('--verbose', 'Enable verbose output for debugging', false)
  .option('--json', 'Output results as JSON', false)

  .addHelpText('after', `
${chalk.dim('Examples:')}
  ${chalk.cyan('medqa index ./knowledge')}                 Build the knowledge base
  ${chalk.cyan('medqa ask "高血压的诊断标准是什么？"')}    Answer one question
  ${chalk.cyan('medqa ask "头痛发热怎么办？" --mode agent')} Answer with tools
  ${chalk.cyan('medqa chat')}                              Interactive Q&A
  ${chalk.cyan('medqa config set qa.mode agent')}          Change a setting

${chalk.dim('回答仅供参考，不能替代专业医疗建议。')}
`);

/**
 * Create a command context with logging utilities
 * This is passed to all command handlers
 */
function createContext(options: GlobalOptions): CommandContext {
  return {
    options,
    log: (message: string) => {
      if (!options.json) {
        console.log(message);
      }
    },
    debug: (message: string) => {
      if (options.verbose && !options.json) {
        console.log(chalk.dim(`[debug] ${message}`));
      }
    },
    warn: (message: string) => {
      if (!options.json) {
        console.warn(chalk.yellow(`Warning: ${message}`));
      }
    },
    error: (message: string) => {
      if (options.json) {
        console.error(JSON.stringify({ error: message }));
      } else {
        console.error(chalk.red(`Error: ${message}`));
      }
    },
  };
}

/**
 * Get global options from the program
 * Commander stores options on the Command object after parsing
 */
function getGlobalOptions(): GlobalOptions {
  const opts = program.opts<Partial<GlobalOptions>>();
  return {
    verbose: opts.verbose ?? false,
    json: opts.json ?? false,
  };
}

const getContext = (): CommandContext => createContext(getGlobalOptions());

program.addCommand(createAskCommand(getContext));
program.addCommand(createChatCommand(getContext));
program.addCommand(createIndexCommand(getContext));
program.addCommand(createConfigCommand(getContext));

// ============================================================================
// ERROR HANDLING & EXECUTION
// ============================================================================

program.on('command:*', (operands: string[]) => {
  throw new CLIError(`Unknown command: ${operands[0] ?? ''}`, 'Run: medqa --help  to see available commands');
});

// Indexing needs embedding credentials up front; chat commands fall back
// to other providers on their own.
program.hook('preAction', (_program, actionCommand) => {
  if (actionCommand.name() !== 'index') {
    return;
  }

  const provider = loadConfig().embedding.provider;
  const result = validateProviderKey(provider);
  if (!result.valid) {
    throw new CLIError(result.error, result.setupInstructions, 4);
  }
});

async function main(): Promise<void> {
  const getErrorOptions = () => {
    const opts = getGlobalOptions();
    return { verbose: opts.verbose, json: opts.json };
  };

  // Catches errors that escape all try/catch blocks
  const globalHandler = createGlobalErrorHandler(getErrorOptions());
  process.on('uncaughtException', globalHandler);
  process.on('unhandledRejection', globalHandler);

  try {
    await program.parseAsync(process.argv);
  } catch (error) {
    handleError(error, getErrorOptions());
  }
}

void main();
