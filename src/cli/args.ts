/**
 * Command-line argument parsing
 */

/**
 * Options for the default generate-and-commit command
 */
export interface GenerateOptions {
  /** Commit without asking for confirmation */
  yes: boolean;
  /** Print the message and stop */
  dryRun: boolean;
  verbose: boolean;
  provider?: string;
  model?: string;
}

/**
 * Parsed command line
 */
export type Command =
  | { name: 'generate'; options: GenerateOptions }
  | { name: 'config'; args: string[] }
  | { name: 'hooks' }
  | { name: 'help' }
  | { name: 'version' }
  | { name: 'invalid'; message: string };

/**
 * Parse arguments (without the node executable and script path)
 */
export function parseArgs(args: string[]): Command {
  const first = args[0];

  if (first === 'help' || first === '--help' || first === '-h') {
    return { name: 'help' };
  }
  if (first === '--version' || first === '-v') {
    return { name: 'version' };
  }
  if (first === 'config') {
    return { name: 'config', args: args.slice(1) };
  }
  if (first === 'hooks') {
    return { name: 'hooks' };
  }

  const options: GenerateOptions = {
    yes: false,
    dryRun: false,
    verbose: false,
  };

  for (const arg of args) {
    if (arg === '--yes' || arg === '-y') {
      options.yes = true;
    } else if (arg === '--dry-run') {
      options.dryRun = true;
    } else if (arg === '--verbose') {
      options.verbose = true;
    } else if (arg.startsWith('--provider=')) {
      const provider = arg.slice('--provider='.length);
      if (!provider) {
        return { name: 'invalid', message: '--provider requires a value' };
      }
      options.provider = provider;
    } else if (arg.startsWith('--model=')) {
      const model = arg.slice('--model='.length);
      if (!model) {
        return { name: 'invalid', message: '--model requires a value' };
      }
      options.model = model;
    } else if (arg.startsWith('-')) {
      return { name: 'invalid', message: `Unknown option "${arg}"` };
    } else {
      return { name: 'invalid', message: `Unknown command "${arg}"` };
    }
  }

  return { name: 'generate', options };
}

/**
 * Whether a confirmation answer accepts the default (yes)
 */
export function isAffirmative(answer: string): boolean {
  const normalized = answer.trim().toLowerCase();
  return normalized === '' || normalized === 'y' || normalized === 'yes';
}
