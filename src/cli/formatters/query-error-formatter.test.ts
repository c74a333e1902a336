import { strip } from '@shared/lib/ansi.js';
import { formatQueryError, formatQueryErrors } from './query-error-formatter.js';

describe('formatQueryError', () => {
  it('names the file of a file error', () => {
    expect(
      formatQueryError({ type: 'file-error', path: '/journal/2025/08/2025-08-01.md', message: 'Empty file.' }),
    ).toBe("* Could not process '/journal/2025/08/2025-08-01.md': Empty file.");
  });

  it('names the input of a date error', () => {
    expect(formatQueryError({ type: 'invalid-date', input: 'someday', message: 'Not a valid date or keyword.' })).toBe(
      "* Could not process 'someday': Not a valid date or keyword.",
    );
  });
});

describe('formatQueryErrors', () => {
  it('is empty without errors', () => {
    expect(formatQueryErrors([])).toBe('');
  });

  it('prints a heading after a blank line', () => {
    const output = formatQueryErrors([{ type: 'invalid-time', input: 'soon', message: 'Not a valid time or keyword.' }]);
    expect(strip(output)).toBe("\n# Errors:\n* Could not process 'soon': Not a valid time or keyword.");
  });
});
