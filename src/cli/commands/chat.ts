/**
 * Chat Command
 *
 * Interactive medical Q&A REPL. In agent mode the conversation carries
 * over between questions; in llm and rag modes each question stands alone.
 *
 *   medqa chat                 # Start in the configured mode
 *   medqa chat --mode agent    # Start in agent mode
 *
 * REPL Commands:
 *   /help          - Show available commands
 *   /mode <mode>   - Switch between llm, rag and agent
 *   /rag [on|off]  - Toggle knowledge base retrieval
 *   /info          - Show mode, capabilities and tools
 *   /evaluate      - Toggle quality metrics after each answer
 *   /clear         - Clear conversation history
 *   exit           - Exit the chat
 */

import { Command } from 'commander';
import * as readline from 'node:readline';
import chalk from 'chalk';

import type { CommandContext } from '../types.js';
import { openQASession, type QASession } from '../utils/session.js';
import { createReasoningRenderer, renderEnvelope, renderQualityReport } from '../utils/agent-event-renderer.js';
import { CLIError, InvalidModeError } from '../../errors/index.js';
import { QA_MODES } from '../../config/schema.js';
import type { ChatMessage } from '../../providers/types.js';

interface ChatCommandOptions {
  mode?: string;
  rag: boolean;
}

/**
 * Mutable state for one chat session.
 */
export interface ChatState {
  session: QASession;
  /** Agent mode: conversation of the previous turn */
  history?: readonly ChatMessage[];
  /** Print quality metrics after each answer */
  evaluate: boolean;
  /** Aborts the question being answered */
  inFlight?: AbortController;
  rl?: readline.Interface;
}

/**
 * REPL command definition.
 * Handler returns true to continue REPL, false to exit.
 */
export interface REPLCommand {
  name: string;
  aliases: string[];
  description: string;
  usage?: string;
  handler: (args: string[], state: ChatState, ctx: CommandContext) => boolean;
}

function getPrompt(state: ChatState): string {
  return chalk.cyan(`[${state.session.service.currentMode}] > `);
}

function updatePrompt(state: ChatState): void {
  state.rl?.setPrompt(getPrompt(state));
}

function parseOnOff(arg: string | undefined): boolean | undefined | null {
  if (arg === undefined) return undefined;
  const value = arg.toLowerCase();
  if (value === 'on' || value === 'true') return true;
  if (value === 'off' || value === 'false') return false;
  return null;
}

// ============================================================================
// REPL Commands
// ============================================================================

export const REPL_COMMANDS: REPLCommand[] = [
  {
    name: 'help',
    aliases: ['h', '?'],
    description: 'Show available commands',
    handler: (_args, _state, ctx) => {
      ctx.log('');
      ctx.log(chalk.bold('Available Commands:'));
      ctx.log('');
      for (const cmd of REPL_COMMANDS) {
        const aliasStr =
          cmd.aliases.length > 0 ? chalk.dim(` (${cmd.aliases.map((a) => '/' + a).join(', ')})`) : '';
        const usageStr = cmd.usage ? ` ${chalk.cyan(cmd.usage)}` : '';
        ctx.log(`  ${chalk.green('/' + cmd.name)}${usageStr}${aliasStr}`);
        ctx.log(`    ${chalk.dim(cmd.description)}`);
      }
      ctx.log('');
      ctx.log(chalk.dim('Type any other text to ask a question.'));
      ctx.log('');
      return true;
    },
  },
  {
    name: 'mode',
    aliases: ['m'],
    description: 'Switch answering mode',
    usage: '<llm|rag|agent>',
    handler: (args, state, ctx) => {
      const { service } = state.session;
      const target = args[0];
      if (target === undefined) {
        ctx.log(`Current mode: ${chalk.cyan(service.getCurrentMode())}`);
        ctx.log(chalk.dim(`Usage: /mode <${QA_MODES.join('|')}>`));
        return true;
      }

      try {
        service.switchMode(target, service.isRagEnabled || service.currentMode === 'llm');
      } catch (error) {
        if (error instanceof InvalidModeError) {
          ctx.log(chalk.red(error.message));
          return true;
        }
        throw error;
      }

      state.history = undefined;
      updatePrompt(state);
      ctx.log(chalk.blue(`Switched to ${service.getCurrentMode()}`));
      return true;
    },
  },
  {
    name: 'rag',
    aliases: [],
    description: 'Turn knowledge base retrieval on or off',
    usage: '[on|off]',
    handler: (args, state, ctx) => {
      const { service } = state.session;
      const enable = parseOnOff(args[0]);
      if (enable === null) {
        ctx.log(chalk.yellow('Usage: /rag [on|off]'));
        return true;
      }
      if (service.currentMode === 'llm') {
        ctx.log(chalk.yellow('Retrieval is not used in llm mode. Switch with /mode rag'));
        return true;
      }

      const wasAgent = service.currentMode === 'agent';
      const enabled = service.toggleRag(enable);
      if (wasAgent) state.history = undefined;
      ctx.log(chalk.blue(`RAG ${enabled ? 'on' : 'off'}: ${service.getCurrentMode()}`));
      return true;
    },
  },
  {
    name: 'info',
    aliases: ['i'],
    description: 'Show mode, capabilities and tools',
    handler: (_args, state, ctx) => {
      const { service, provider, model, knowledgeBase } = state.session;
      const capabilities = service.getCapabilities();

      ctx.log('');
      ctx.log(`${chalk.dim('Mode:'.padEnd(16))}${capabilities.mode}`);
      ctx.log(`${chalk.dim('Model:'.padEnd(16))}${provider}/${model}`);
      ctx.log(
        `${chalk.dim('Knowledge base:'.padEnd(16))}${
          knowledgeBase ? `${knowledgeBase.passageCount} passages` : 'not available'
        }`
      );
      ctx.log(`${chalk.dim('Capabilities:'.padEnd(16))}${capabilities.capabilities.join(', ')}`);
      if (capabilities.tools) {
        ctx.log(`${chalk.dim('Tools:'.padEnd(16))}${capabilities.tools.join(', ')}`);
      }
      ctx.log(`${chalk.dim('Limitations:'.padEnd(16))}${capabilities.limitations.join(', ')}`);
      ctx.log('');
      return true;
    },
  },
  {
    name: 'evaluate',
    aliases: ['eval'],
    description: 'Toggle quality metrics after each answer',
    usage: '[on|off]',
    handler: (args, state, ctx) => {
      const enable = parseOnOff(args[0]);
      if (enable === null) {
        ctx.log(chalk.yellow('Usage: /evaluate [on|off]'));
        return true;
      }
      state.evaluate = enable ?? !state.evaluate;
      ctx.log(chalk.blue(`Quality metrics ${state.evaluate ? 'on' : 'off'}`));
      return true;
    },
  },
  {
    name: 'clear',
    aliases: ['c'],
    description: 'Clear conversation history',
    handler: (_args, state, ctx) => {
      state.history = undefined;
      ctx.log(chalk.blue('Conversation cleared.'));
      return true;
    },
  },
  {
    name: 'exit',
    aliases: ['quit', 'q'],
    description: 'Exit the chat',
    handler: (_args, _state, ctx) => {
      ctx.log(chalk.dim('Goodbye!'));
      return false;
    },
  },
];

/**
 * Parse user input to detect REPL commands.
 * Returns null if it's a regular question.
 */
export function parseREPLCommand(input: string): { command: REPLCommand; args: string[] } | null {
  const trimmed = input.trim();

  const exitMatch = /^(exit|quit)$/i.test(trimmed);
  const parts = exitMatch ? ['exit'] : trimmed.startsWith('/') ? trimmed.slice(1).split(/\s+/) : null;
  if (!parts) {
    return null;
  }

  const cmdName = parts[0]?.toLowerCase() ?? '';
  const command = REPL_COMMANDS.find((c) => c.name === cmdName || c.aliases.includes(cmdName));
  if (!command) {
    return null; // Unknown command, treat as question
  }

  return { command, args: parts.slice(1) };
}

/**
 * Tab completion for REPL commands and mode names.
 */
export function createCompleter(): (line: string) => [string[], string] {
  return (line: string): [string[], string] => {
    const modeMatch = line.match(/^\/(mode|m)\s+(.*)$/i);
    if (modeMatch) {
      const prefix = modeMatch[1] ?? 'mode';
      const partial = (modeMatch[2] ?? '').toLowerCase();
      return [QA_MODES.filter((mode) => mode.startsWith(partial)).map((mode) => `/${prefix} ${mode}`), line];
    }

    if (/^\/\S*$/.test(line)) {
      const partial = line.slice(1).toLowerCase();
      return [REPL_COMMANDS.filter((c) => c.name.startsWith(partial)).map((c) => `/${c.name}`), line];
    }

    return [[], line];
  };
}

// ============================================================================
// Questions
// ============================================================================

/**
 * Answer one question and print it. Agent mode threads the conversation
 * through `state.history`.
 */
export async function handleQuestion(question: string, state: ChatState, ctx: CommandContext): Promise<void> {
  const { service } = state.session;
  const controller = new AbortController();
  state.inFlight = controller;

  try {
    const envelope = await service.answer(question, {
      history: service.currentMode === 'agent' ? state.history : undefined,
      signal: controller.signal,
    });

    if (envelope.conversation && envelope.agentStatus === 'done') {
      state.history = envelope.conversation;
    }

    ctx.log('');
    renderEnvelope(envelope, ctx);
    if (state.evaluate) {
      renderQualityReport(service.evaluate(envelope), ctx);
    }
    ctx.log('');
  } finally {
    state.inFlight = undefined;
  }
}

export const BUSY_NOTICE = 'Still answering; wait for it or press Ctrl+C to cancel.';

/**
 * One line of REPL input. Resolves false when the session should end.
 * Lines that arrive while an answer is running are dropped.
 */
export async function processLine(line: string, state: ChatState, ctx: CommandContext): Promise<boolean> {
  const input = line.trim();
  if (!input) {
    return true;
  }
  if (state.inFlight) {
    ctx.log(chalk.yellow(BUSY_NOTICE));
    return true;
  }

  const replCmd = parseREPLCommand(input);
  if (replCmd) {
    try {
      return replCmd.command.handler(replCmd.args, state, ctx);
    } catch (error) {
      ctx.error(`Command failed: ${error instanceof Error ? error.message : String(error)}`);
      return true;
    }
  }

  try {
    await handleQuestion(input, state, ctx);
  } catch (error) {
    if (error instanceof CLIError) {
      ctx.error(error.message);
      if (error.hint) {
        ctx.log(chalk.dim(error.hint));
      }
    } else {
      ctx.error(`Failed to process question: ${error instanceof Error ? error.message : String(error)}`);
    }
  }
  return true;
}

function displayWelcome(state: ChatState, ctx: CommandContext): void {
  const { service, provider, model, knowledgeBase } = state.session;

  ctx.log('');
  ctx.log(chalk.bold('Medical QA Chat'));
  ctx.log(chalk.dim(`Model: ${provider}/${model}`));
  ctx.log(chalk.dim(`Mode: ${service.getCurrentMode()}`));
  if (!knowledgeBase) {
    ctx.log(chalk.yellow('No knowledge base indexed.'));
    ctx.log(chalk.dim('Run: medqa index <dir>  to enable retrieval.'));
  }
  ctx.log('');
  ctx.log(chalk.dim('回答仅供参考，不能替代专业医疗建议。'));
  ctx.log(chalk.dim('Type /help for commands, "exit" to quit'));
  ctx.log('');
}

/**
 * Main REPL loop using readline.
 */
async function runChatREPL(state: ChatState, ctx: CommandContext): Promise<void> {
  return new Promise((resolve) => {
    const rl = readline.createInterface({
      input: process.stdin,
      output: process.stdout,
      prompt: getPrompt(state),
      completer: createCompleter(),
    });
    state.rl = rl;

    rl.on('line', (line) => {
      const busy = state.inFlight !== undefined;
      void processLine(line, state, ctx).then((keepGoing) => {
        if (!keepGoing) {
          rl.close();
        } else if (!busy) {
          rl.prompt();
        }
      });
    });

    // First Ctrl+C cancels the running answer, otherwise exits
    rl.on('SIGINT', () => {
      if (state.inFlight) {
        state.inFlight.abort();
        ctx.log('');
        ctx.log(chalk.yellow('Cancelled.'));
        return;
      }
      ctx.log('');
      ctx.log(chalk.dim('Goodbye!'));
      rl.close();
    });

    rl.on('close', () => {
      state.inFlight?.abort();
      resolve();
    });

    displayWelcome(state, ctx);
    rl.prompt();
  });
}

// ============================================================================
// Command Factory
// ============================================================================

/**
 * Create the chat command.
 *
 * @param getContext - Factory to get command context with global options
 */
export function createChatCommand(getContext: () => CommandContext): Command {
  return new Command('chat')
    .description('Interactive medical Q&A')
    .option('-m, --mode <mode>', 'Starting mode: llm, rag or agent (default: qa.mode)')
    .option('--no-rag', 'Start without the knowledge base')
    .action(async (cmdOptions: ChatCommandOptions) => {
      const ctx = getContext();

      if (ctx.options.json) {
        throw new CLIError('chat does not support --json', 'Use: medqa ask "<question>" --json');
      }

      ctx.debug('Starting chat session...');
      const session = await openQASession(ctx, {
        mode: cmdOptions.mode,
        enableRag: cmdOptions.rag ? undefined : false,
        onEvent: createReasoningRenderer(ctx),
      });

      await runChatREPL({ session, evaluate: false }, ctx);
    });
}
