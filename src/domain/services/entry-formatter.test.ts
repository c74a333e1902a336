import {
  formatDayHeader,
  formatJournalBlock,
  formatDayFile,
  formatTodoBlock,
  formatTodoListHeader,
} from './entry-formatter.js';

const TODO_FORMAT = 'DD/MM/YYYY HH:mm';

describe('formatDayHeader', () => {
  it('renders the date with the header format and a blank line', () => {
    expect(formatDayHeader('2025-08-15', 'dddd, DD MMM YYYY')).toBe('# Friday, 15 Aug 2025\n\n');
  });
});

describe('formatJournalBlock', () => {
  it('escapes body lines that start like a block heading', () => {
    expect(formatJournalBlock({ time: '10:00:00', title: 'Notes', body: 'a\n## b\n\\## c\n### d' })).toBe(
      '## 10:00 - Notes\n\na\n\\## b\n\\\\## c\n### d\n\n',
    );
  });

  it('renders a title-only block', () => {
    expect(formatJournalBlock({ time: '09:05:00', title: 'Coffee', body: '' })).toBe('## 09:05 - Coffee\n\n');
  });

  it('renders a body followed by exactly one blank line', () => {
    expect(formatJournalBlock({ time: '21:00:00', title: 'Day', body: 'Was good.\n\n\n' })).toBe(
      '## 21:00 - Day\n\nWas good.\n\n',
    );
  });
});

describe('formatDayFile', () => {
  it('joins the header and blocks in order', () => {
    const text = formatDayFile(
      '2025-08-15',
      [
        { time: '07:00:00', title: 'A', body: '' },
        { time: '09:00:00', title: 'B', body: 'b' },
      ],
      'YYYY-MM-DD',
    );
    expect(text).toBe('# 2025-08-15\n\n## 07:00 - A\n\n## 09:00 - B\n\nb\n\n');
  });
});

describe('formatTodoBlock', () => {
  it('renders due and done dates', () => {
    expect(
      formatTodoBlock(
        { title: 'Item 1', body: '', status: 'pending', dueDate: '2025-08-20T07:00:00', doneDate: '2025-08-22T18:00:00' },
        TODO_FORMAT,
      ),
    ).toBe('- [ ] Item 1 | 20/08/2025 07:00 | 22/08/2025 18:00\n');
  });

  it('keeps an empty due slot when only done is set', () => {
    expect(formatTodoBlock({ title: 'Item 1', body: '', status: 'pending', doneDate: '2025-08-22T18:00:00' }, TODO_FORMAT)).toBe(
      '- [ ] Item 1 | | 22/08/2025 18:00\n',
    );
  });

  it('marks done todos and indents every body line', () => {
    expect(formatTodoBlock({ title: 'Pack', body: 'socks\n\nshoes', status: 'done' }, TODO_FORMAT)).toBe(
      '- [x] Pack\n      socks\n\n      shoes\n',
    );
  });
});

describe('formatTodoListHeader', () => {
  it('is followed by a blank line', () => {
    expect(formatTodoListHeader()).toBe('# All my pending todos\n\n');
  });
});
