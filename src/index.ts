#!/usr/bin/env node
/**
 * commit-scribe - AI commit message generator
 * Main Entry Point
 */

// Global error handlers - must be set up first to catch any errors during startup
process.on('uncaughtException', (error, origin) => {
  console.error(`[Scribe] Fatal: Uncaught exception from ${origin}:`, error);
  process.exit(1);
});

process.on('unhandledRejection', (reason) => {
  console.error('[Scribe] Fatal: Unhandled promise rejection:', reason);
  process.exit(1);
});

import 'dotenv/config';
import { createInterface } from 'node:readline/promises';
import { stringify as stringifyYaml } from 'yaml';
import {
  parseArgs,
  isAffirmative,
  createProgressPrinter,
  type GenerateOptions,
  type IProgressPrinter,
} from './cli/index.js';
import {
  getConfigPath,
  getConfigValue,
  loadConfig,
  saveConfig,
  setConfigValue,
  stringifyConfig,
} from './config/store.js';
import { applyOverrides, CREDENTIAL_VARIABLES, hasCredential } from './config/env.js';
import type { ScribeConfig } from './config/schema.js';
import { collectStagedChanges } from './git/staged.js';
import { createCommit, installCommitHook, showStagedDiff } from './git/commit.js';
import { GitError } from './git/type.js';
import {
  CommitHistory,
  EXIT_CODES,
  FormatError,
  ScribeError,
  generateCommitMessage,
  type ScribeErrorKind,
} from './commit/index.js';
import { errorMessage } from './utils/index.js';

const VERSION = '0.1.0';

/**
 * Print usage information
 */
function printUsage(): void {
  console.log(`
Usage: scribe [options]
       scribe <command> [args]

Generates a commit message for the staged changes, shows it, and commits
after confirmation.

Options:
  -y, --yes              Commit without asking for confirmation
  --dry-run              Print the generated message and stop
  --verbose              Print the prompt and every failed attempt
  --provider=<name>      Backend to use: openai | anthropic | local
  --model=<name>         Model to request

Commands:
  config show            Print the effective configuration
  config path            Show config file location
  config get <key>       Print one value (dotted key, e.g. commit.maxLength)
  config set <key> <v>   Set one value (lists are comma separated)
  hooks                  Install the prepare-commit-msg hook
  help                   Show this message

Environment:
  OPENAI_API_KEY, OPENAI_BASE_URL         OpenAI credentials
  ANTHROPIC_API_KEY, ANTHROPIC_BASE_URL   Anthropic credentials
  SCRIBE_PROVIDER, SCRIBE_MODEL           Override the configured backend
  SCRIBE_CONFIG                           Config file location

Examples:
  git add -p && scribe
  scribe --provider=openai --model=gpt-4o-mini
  scribe config set commit.coAuthors "Ada <ada@example.com>"
`);
}

/**
 * Print config command usage
 */
function printConfigUsage(): void {
  console.log(`
Usage: scribe config <subcommand> [args]

Subcommands:
  show                 Print the effective configuration
  path                 Show config file location
  get <key>            Print one value
  set <key> <value>    Set one value

Examples:
  scribe config set ai.provider openai
  scribe config set commit.emojis true
  scribe config set system.ignorePaths ".env,*.lock,dist/"
  scribe config get commit.types

Note:
  Config is stored in ${getConfigPath()}
  SCRIBE_PROVIDER and SCRIBE_MODEL take precedence over config file values.
`);
}

/**
 * Print a one-line failure and exit with the code for its kind
 */
function fail(message: string, kind: ScribeErrorKind | 'general' = 'general'): never {
  console.error(`Error: ${message}`);
  process.exit(kind === 'general' ? 1 : EXIT_CODES[kind]);
}

/**
 * Exit for an error thrown outside the pipeline
 */
function failWith(error: unknown): never {
  if (error instanceof ScribeError) {
    fail(error.message, error.kind);
  }
  if (error instanceof GitError) {
    fail(error.stderr ? `${error.message}: ${error.stderr}` : error.message);
  }
  fail(errorMessage(error));
}

/**
 * Handle config command
 */
function runConfigCommand(args: string[]): void {
  const subcommand = args[0];

  if (!subcommand || subcommand === 'help' || subcommand === '--help') {
    printConfigUsage();
    return;
  }

  const configPath = getConfigPath();

  switch (subcommand) {
    case 'show': {
      const config = applyOverrides(loadConfig(configPath));
      process.stdout.write(stringifyConfig(config));
      for (const [provider, variable] of Object.entries(CREDENTIAL_VARIABLES)) {
        if (variable && provider === config.ai.provider) {
          const state = hasCredential(config.ai.provider) ? 'set' : 'not set';
          console.log(`# ${variable}: ${state}`);
        }
      }
      break;
    }

    case 'path': {
      console.log(configPath);
      break;
    }

    case 'get': {
      const key = args[1];
      if (!key) {
        console.error('Error: config get requires <key>\n');
        printConfigUsage();
        process.exit(1);
      }

      const value = getConfigValue(loadConfig(configPath), key);
      if (value === undefined) {
        fail(`Unknown config key "${key}"`);
      }
      if (typeof value === 'object' && value !== null) {
        process.stdout.write(stringifyYaml(value));
      } else {
        console.log(String(value));
      }
      break;
    }

    case 'set': {
      const key = args[1];
      const value = args[2];
      if (!key || value === undefined) {
        console.error('Error: config set requires <key> and <value>\n');
        printConfigUsage();
        process.exit(1);
      }

      const updated = setConfigValue(loadConfig(configPath), key, value);
      saveConfig(updated, configPath);
      console.log(`Set ${key} = ${String(getConfigValue(updated, key))}`);
      break;
    }

    default:
      console.error(`Error: Unknown config subcommand "${subcommand}"\n`);
      printConfigUsage();
      process.exit(1);
  }
}

/**
 * Install the commit hook
 */
function runHooksCommand(): void {
  const config = loadConfig(getConfigPath());
  const hookPath = installCommitHook(config.system.hooksPath);
  console.log(`Installed hook at ${hookPath}`);
}

/**
 * Ask for confirmation on the terminal
 */
async function confirm(question: string): Promise<boolean> {
  const rl = createInterface({ input: process.stdin, output: process.stderr });
  try {
    return isAffirmative(await rl.question(question));
  } finally {
    rl.close();
  }
}

/**
 * Record a commit in the history cache
 *
 * Failures are reported as warnings.
 */
function recordHistory(message: string, hash: string, progress: IProgressPrinter): void {
  const history = new CommitHistory();
  try {
    history.load();
  } catch (error) {
    progress.warn(`Ignoring unreadable commit history: ${errorMessage(error)}`);
  }
  try {
    history.add(message, hash, true);
  } catch (error) {
    progress.warn(`Could not record commit history: ${errorMessage(error)}`);
  }
}

/**
 * Generate a message for the staged changes and commit it
 */
async function runGenerateCommand(options: GenerateOptions): Promise<void> {
  const config: ScribeConfig = applyOverrides(loadConfig(getConfigPath()), {
    provider: options.provider,
    model: options.model,
    debug: options.verbose,
  });
  const verbose = config.display.debug;

  const progress = createProgressPrinter({
    colorMode: config.display.colorMode,
    debug: verbose,
    quiet: config.display.quiet,
  });

  const changeSet = collectStagedChanges({
    ignorePaths: config.system.ignorePaths,
    diffAlgorithm: config.display.diffFormat,
    ticketIntegration: config.commit.ticket,
    onWarning: (message) => progress.warn(message),
  });

  if (verbose) {
    console.error(
      `[Scribe] ${changeSet.files.length} staged files on ${changeSet.branchName || '(detached)'}, +${changeSet.totals.additions}/-${changeSet.totals.deletions}`
    );
  }

  const controller = new AbortController();
  const onSigint = (): void => {
    progress.warn('Interrupted, cancelling...');
    controller.abort();
  };
  process.on('SIGINT', onSigint);

  const result = await generateCommitMessage(changeSet, {
    config,
    signal: controller.signal,
    progress,
    verbose,
  }).finally(() => {
    process.off('SIGINT', onSigint);
  });

  if (!result.ok) {
    if (result.error instanceof FormatError) {
      console.error(result.error.commitMessage);
    }
    fail(result.error.message, result.error.kind);
  }

  if (options.dryRun) {
    console.log(result.message);
    return;
  }

  if (config.display.showDiff && !options.yes) {
    showStagedDiff();
  }

  progress.divider();
  console.log(result.message);
  progress.divider();

  if (!options.yes && !(await confirm('Commit with this message? [Y/n] '))) {
    progress.info('Commit aborted');
    return;
  }

  const hash = createCommit(result.message, { sign: config.commit.sign });
  if (hash) {
    recordHistory(result.message, hash, progress);
  }
  progress.success(`Committed ${hash ? hash.slice(0, 7) : ''}`.trim());
}

/**
 * Main CLI function
 */
export async function main(): Promise<void> {
  // process.argv[2+] = user arguments
  const command = parseArgs(process.argv.slice(2));

  switch (command.name) {
    case 'help':
      printUsage();
      return;

    case 'version':
      console.log(VERSION);
      return;

    case 'invalid':
      console.error(`Error: ${command.message}\n`);
      printUsage();
      process.exit(1);

    case 'config':
      try {
        runConfigCommand(command.args);
      } catch (error) {
        failWith(error);
      }
      return;

    case 'hooks':
      try {
        runHooksCommand();
      } catch (error) {
        failWith(error);
      }
      return;

    case 'generate':
      try {
        await runGenerateCommand(command.options);
      } catch (error) {
        failWith(error);
      }
      return;
  }
}

// Run CLI
main()
  .then(() => process.exit(0))
  .catch((err) => {
    console.error('Fatal error:', err);
    process.exit(1);
  });
