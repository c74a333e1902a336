import type { QueryError } from '@domain/types/query.js';
import { bold, red } from '@shared/lib/ansi.js';

function subject(error: QueryError): string {
  return error.type === 'file-error' ? error.path : error.input;
}

export function formatQueryError(error: QueryError): string {
  return `* Could not process '${subject(error)}': ${error.message}`;
}

/** `# Errors:` section printed after command output. Empty string when there are none. */
export function formatQueryErrors(errors: readonly QueryError[]): string {
  if (errors.length === 0) return '';
  return ['', bold(red('# Errors:')), ...errors.map(formatQueryError)].join('\n');
}
