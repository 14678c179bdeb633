/**
 * CLI Module
 *
 * Argument parsing and terminal output for the command layer.
 */

// Progress Printer
export {
  ProgressPrinter,
  createProgressPrinter,
  nullProgressPrinter,
  resolveColors,
  type ColorMode,
  type IProgressPrinter,
  type OutputStream,
  type ProgressPrinterOptions,
} from './progress.js';

// Arguments
export { parseArgs, isAffirmative, type Command, type GenerateOptions } from './args.js';
