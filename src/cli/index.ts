import { createProgram } from './program.js';
import { handleCommandError } from './utils.js';

createProgram()
  .parseAsync(process.argv)
  .catch((error: unknown) => handleCommandError(error, process.argv.includes('--verbose')));
