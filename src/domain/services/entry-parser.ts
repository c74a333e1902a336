import type { JournalEntry } from '@domain/types/entry.js';
import type { ParseOutcome } from '@domain/types/query.js';
import { parseDate } from '@shared/lib/calendar.js';
import { unescapeBodyHeadings } from './entry-formatter.js';
import { parseClockTime } from './temporal-resolver.js';
import { extractTags } from './tags.js';

const HEADER_PREFIX = '# ';
const BLOCK_DELIMITER = '\n## ';
const HEADING_SEPARATOR = ' - ';

/**
 * Parse a day file:
 *
 * ```md
 * # Friday, 15 Aug 2025
 *
 * ## 09:00 - Title
 *
 * Body
 * ```
 *
 * A missing or unparseable header is fatal for the file. A bad block heading
 * is reported and skipped; the blocks around it are still returned.
 */
export function parseJournalFile(content: string, headerFormat: string): ParseOutcome<JournalEntry> {
  if (content.trim() === '') {
    return { entries: [], errors: ['Empty file: expected a date header like `# DATE` on the first line.'] };
  }

  const lines = content.split(/\r?\n/);
  const header = (lines[0] ?? '').trim();
  const date = header.startsWith(HEADER_PREFIX)
    ? parseDate(header.slice(HEADER_PREFIX.length).trim(), headerFormat)
    : undefined;
  if (!date) {
    return {
      entries: [],
      errors: [`Invalid or missing H1 date header: expected first line like \`# DATE\`, found \`${header}\`.`],
    };
  }

  const entries: JournalEntry[] = [];
  const errors: string[] = [];
  const [preamble = '', ...blocks] = `\n${lines.slice(1).join('\n')}`.split(BLOCK_DELIMITER);

  if (preamble.trim() !== '') {
    const stray = preamble.trim().split('\n')[0] ?? '';
    errors.push(`Unexpected text before the first entry: \`${stray}\`.`);
  }

  for (const block of blocks) {
    if (block.trim() === '') continue;

    const newline = block.indexOf('\n');
    const heading = (newline === -1 ? block : block.slice(0, newline)).trim();
    const body = newline === -1 ? '' : unescapeBodyHeadings(block.slice(newline + 1).trim());

    const separator = heading.indexOf(HEADING_SEPARATOR);
    if (separator === -1) {
      errors.push(`Invalid H2 entry header: \`${heading}\`. Expected \`HH:MM - Title\`.`);
      continue;
    }

    const time = parseClockTime(heading.slice(0, separator));
    if (!time) {
      errors.push(`Invalid time in entry header \`${heading}\`. Expected a 24-hour time \`HH:MM\`.`);
      continue;
    }

    const title = heading.slice(separator + HEADING_SEPARATOR.length).trim();
    entries.push({ date, time, title, body, tags: extractTags(`${title}\n${body}`) });
  }

  return { entries, errors };
}
