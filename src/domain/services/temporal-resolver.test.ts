import { KeywordRegistry } from './keyword-registry.js';
import {
  resolveDateToken,
  parseDateToken,
  parseTimeToken,
  parseClockTime,
  parseTimeFilter,
  timeIsInRange,
  dateIsInFilter,
  type ResolveOptions,
} from './temporal-resolver.js';
import { addDays, isoWeekday } from '@shared/lib/calendar.js';
import { WEEKDAY_KEYWORDS } from '@domain/types/keyword.js';

const registry = KeywordRegistry.canonical();

function optionsFor(referenceDate: string, formats: string[] = ['DD/MM/YYYY']): ResolveOptions {
  return { referenceDate, formats, registry };
}

// 2025-08-20 is a Wednesday.
const wednesday = optionsFor('2025-08-20');

describe('resolveDateToken', () => {
  it('resolves relative days', () => {
    expect(resolveDateToken('today', wednesday)).toEqual({ type: 'single', date: '2025-08-20' });
    expect(resolveDateToken('Yesterday', wednesday)).toEqual({ type: 'single', date: '2025-08-19' });
    expect(resolveDateToken('tomorrow', wednesday)).toEqual({ type: 'single', date: '2025-08-21' });
  });

  it('resolves weekdays to the most recent occurrence on or before the reference', () => {
    const expected: Record<string, string> = {
      monday: '2025-08-18',
      tuesday: '2025-08-19',
      wednesday: '2025-08-20',
      thursday: '2025-08-14',
      friday: '2025-08-15',
      saturday: '2025-08-16',
      sunday: '2025-08-17',
    };
    for (const [day, date] of Object.entries(expected)) {
      expect(resolveDateToken(day, wednesday)).toEqual({ type: 'single', date });
    }
  });

  it('resolves periods', () => {
    expect(resolveDateToken('last week', wednesday)).toEqual({ type: 'range', start: '2025-08-11', end: '2025-08-17' });
    expect(resolveDateToken('this week', wednesday)).toEqual({ type: 'range', start: '2025-08-18', end: '2025-08-24' });
    expect(resolveDateToken('last month', wednesday)).toEqual({ type: 'range', start: '2025-07-01', end: '2025-07-31' });
    expect(resolveDateToken('this month', wednesday)).toEqual({ type: 'range', start: '2025-08-01', end: '2025-08-31' });
    expect(resolveDateToken('last year', wednesday)).toEqual({ type: 'range', start: '2024-01-01', end: '2024-12-31' });
    expect(resolveDateToken('this year', wednesday)).toEqual({ type: 'range', start: '2025-01-01', end: '2025-12-31' });
  });

  it('treats last week from a Sunday as the week before the one ending that day', () => {
    expect(resolveDateToken('last week', optionsFor('2025-08-24'))).toEqual({
      type: 'range',
      start: '2025-08-11',
      end: '2025-08-17',
    });
  });

  it('handles last month across a year boundary', () => {
    expect(resolveDateToken('last month', optionsFor('2025-01-10'))).toEqual({
      type: 'range',
      start: '2024-12-01',
      end: '2024-12-31',
    });
  });

  it('falls back to formats in order', () => {
    expect(resolveDateToken('01/08/2025', wednesday)).toEqual({ type: 'single', date: '2025-08-01' });
    const both = optionsFor('2025-08-20', ['DD-MM-YYYY', 'DD/MM/YYYY']);
    expect(resolveDateToken('02-08-2025', both)).toEqual({ type: 'single', date: '2025-08-02' });
    expect(resolveDateToken('02/08/2025', both)).toEqual({ type: 'single', date: '2025-08-02' });
  });

  it('returns undefined for anything else, including time keywords', () => {
    expect(resolveDateToken('someday', wednesday)).toBeUndefined();
    expect(resolveDateToken('morning', wednesday)).toBeUndefined();
    expect(resolveDateToken('', wednesday)).toBeUndefined();
  });

  it('honours synonyms from the registry it is given', () => {
    const options = { ...wednesday, registry: KeywordRegistry.fromSynonyms({ ytd: 'yesterday' }) };
    expect(resolveDateToken('ytd', options)).toEqual({ type: 'single', date: '2025-08-19' });
  });

  it('keeps weekday results within the past week for every reference day', () => {
    for (let offset = 0; offset < 14; offset++) {
      const reference = addDays('2025-08-11', offset);
      WEEKDAY_KEYWORDS.forEach((day, i) => {
        const result = resolveDateToken(day, optionsFor(reference));
        expect(result?.type).toBe('single');
        if (result?.type !== 'single') return;
        expect(result.date <= reference).toBe(true);
        expect(result.date > addDays(reference, -7)).toBe(true);
        expect(isoWeekday(result.date)).toBe(i + 1);
      });
    }
  });

  it('always yields Monday-to-Sunday weeks', () => {
    for (let offset = 0; offset < 14; offset++) {
      const reference = addDays('2025-08-11', offset);
      for (const token of ['last week', 'this week']) {
        const result = resolveDateToken(token, optionsFor(reference));
        if (result?.type !== 'range') throw new Error(`expected a range for ${token}`);
        expect(isoWeekday(result.start)).toBe(1);
        expect(result.end).toBe(addDays(result.start, 6));
      }
    }
  });
});

describe('parseDateToken', () => {
  it('lets a start period win outright', () => {
    expect(parseDateToken('last week', '01/08/2025', wednesday)).toEqual({
      type: 'range',
      start: '2025-08-11',
      end: '2025-08-17',
    });
    expect(parseDateToken('last month', 'last week', wednesday)).toEqual({
      type: 'range',
      start: '2025-07-01',
      end: '2025-07-31',
    });
  });

  it('lets an end period win over a single start day', () => {
    expect(parseDateToken('10/08/2025', 'last week', wednesday)).toEqual({
      type: 'range',
      start: '2025-08-11',
      end: '2025-08-17',
    });
  });

  it('keeps two single days in the order given', () => {
    expect(parseDateToken('20/08/2025', '10/08/2025', wednesday)).toEqual({
      type: 'range',
      start: '2025-08-20',
      end: '2025-08-10',
    });
    expect(parseDateToken('monday', '19/08/2025', wednesday)).toEqual({
      type: 'range',
      start: '2025-08-18',
      end: '2025-08-19',
    });
  });

  it('returns the single day when there is no usable end', () => {
    expect(parseDateToken('10/08/2025', undefined, wednesday)).toEqual({ type: 'single', date: '2025-08-10' });
    expect(parseDateToken('10/08/2025', 'garbage', wednesday)).toEqual({ type: 'single', date: '2025-08-10' });
  });

  it('returns undefined when the start does not resolve', () => {
    expect(parseDateToken('garbage', 'today', wednesday)).toBeUndefined();
  });
});

describe('parseTimeToken', () => {
  it('resolves named times', () => {
    expect(parseTimeToken('morning', registry)).toBe('08:00:00');
    expect(parseTimeToken('Noon', registry)).toBe('12:00:00');
    expect(parseTimeToken('evening', registry)).toBe('18:00:00');
    expect(parseTimeToken('night', registry)).toBe('21:00:00');
    expect(parseTimeToken('midnight', registry)).toBe('00:00:00');
  });

  it('parses 12-hour times', () => {
    expect(parseTimeToken('6am', registry)).toBe('06:00:00');
    expect(parseTimeToken('5PM', registry)).toBe('17:00:00');
    expect(parseTimeToken('5:30am', registry)).toBe('05:30:00');
    expect(parseTimeToken('5:30 pm', registry)).toBe('17:30:00');
    expect(parseTimeToken('12am', registry)).toBe('00:00:00');
    expect(parseTimeToken('12pm', registry)).toBe('12:00:00');
    expect(parseTimeToken('12:45AM', registry)).toBe('00:45:00');
    expect(parseTimeToken('11:59:59pm', registry)).toBe('23:59:59');
  });

  it('parses 24-hour times and bare hours', () => {
    expect(parseTimeToken('08:00', registry)).toBe('08:00:00');
    expect(parseTimeToken('23:59', registry)).toBe('23:59:00');
    expect(parseTimeToken('8', registry)).toBe('08:00:00');
    expect(parseTimeToken('17', registry)).toBe('17:00:00');
    expect(parseTimeToken('0', registry)).toBe('00:00:00');
  });

  it('rejects out-of-range or malformed times', () => {
    for (const token of ['25:00', '13:00pm', '0am', '12:60', '24', 'not-a-time', 'pm', '']) {
      expect(parseTimeToken(token, registry)).toBeUndefined();
    }
  });
});

describe('parseClockTime', () => {
  it('accepts HH:MM only', () => {
    expect(parseClockTime('09:05')).toBe('09:05:00');
    expect(parseClockTime(' 9:05 ')).toBe('09:05:00');
    expect(parseClockTime('9am')).toBeUndefined();
    expect(parseClockTime('NOT A TIME')).toBeUndefined();
  });
});

describe('parseTimeFilter', () => {
  it('maps parts of the day to ranges', () => {
    expect(parseTimeFilter('morning', undefined, registry)).toEqual({ type: 'range', start: '06:00:00', end: '12:00:00' });
    expect(parseTimeFilter('noon', undefined, registry)).toEqual({ type: 'range', start: '12:00:00', end: '18:00:00' });
    expect(parseTimeFilter('evening', undefined, registry)).toEqual({ type: 'range', start: '18:00:00', end: '21:00:00' });
    expect(parseTimeFilter('night', undefined, registry)).toEqual({ type: 'range', start: '21:00:00', end: '06:00:00' });
  });

  it('maps any other time to its hour', () => {
    expect(parseTimeFilter('12:23', undefined, registry)).toEqual({ type: 'single', time: '12:23:00' });
    expect(parseTimeFilter('midnight', undefined, registry)).toEqual({ type: 'single', time: '00:00:00' });
  });

  it('builds an explicit range from two tokens', () => {
    expect(parseTimeFilter('9am', '17:30', registry)).toEqual({ type: 'range', start: '09:00:00', end: '17:30:00' });
  });

  it('returns undefined when the start token does not resolve', () => {
    expect(parseTimeFilter('soon', undefined, registry)).toBeUndefined();
    expect(parseTimeFilter('soon', '17:30', registry)).toBeUndefined();
  });

  it('falls back to the start token when the end does not resolve', () => {
    expect(parseTimeFilter('06:00', 'later', registry)).toEqual({ type: 'single', time: '06:00:00' });
    expect(parseTimeFilter('evening', 'later', registry)).toEqual({ type: 'range', start: '18:00:00', end: '21:00:00' });
  });
});

describe('timeIsInRange', () => {
  it('is half-open', () => {
    const morning = { type: 'range', start: '06:00:00', end: '12:00:00' } as const;
    const afternoon = { type: 'range', start: '12:00:00', end: '18:00:00' } as const;
    expect(timeIsInRange(morning, '06:00:00')).toBe(true);
    expect(timeIsInRange(morning, '11:59:59')).toBe(true);
    expect(timeIsInRange(morning, '12:00:00')).toBe(false);
    expect(timeIsInRange(morning, '05:59:59')).toBe(false);
    expect(timeIsInRange(afternoon, '12:00:00')).toBe(true);
  });

  it('wraps past midnight when start is after end', () => {
    const night = { type: 'range', start: '21:00:00', end: '06:00:00' } as const;
    expect(timeIsInRange(night, '23:00:00')).toBe(true);
    expect(timeIsInRange(night, '00:30:00')).toBe(true);
    expect(timeIsInRange(night, '05:59:59')).toBe(true);
    expect(timeIsInRange(night, '06:00:00')).toBe(false);
    expect(timeIsInRange(night, '20:59:59')).toBe(false);
  });

  it('matches a single time by hour', () => {
    const single = { type: 'single', time: '12:23:00' } as const;
    expect(timeIsInRange(single, '12:00:00')).toBe(true);
    expect(timeIsInRange(single, '12:59:59')).toBe(true);
    expect(timeIsInRange(single, '13:00:00')).toBe(false);
  });
});

describe('dateIsInFilter', () => {
  it('matches inclusive ranges and nothing for reversed ones', () => {
    const range = { type: 'range', start: '2025-08-10', end: '2025-08-20' } as const;
    expect(dateIsInFilter(range, '2025-08-10')).toBe(true);
    expect(dateIsInFilter(range, '2025-08-20')).toBe(true);
    expect(dateIsInFilter(range, '2025-08-21')).toBe(false);
    expect(dateIsInFilter({ type: 'range', start: '2025-08-20', end: '2025-08-10' }, '2025-08-15')).toBe(false);
    expect(dateIsInFilter({ type: 'single', date: '2025-08-15' }, '2025-08-15')).toBe(true);
  });
});
