import type { IClock } from '@domain/ports/clock.js';
import { localNow, localToday } from '@shared/lib/calendar.js';

/** Local wall clock. A reference date pins "today" while the time keeps running. */
export class SystemClock implements IClock {
  constructor(private readonly referenceDate?: string) {}

  today(): string {
    return this.referenceDate ?? localToday();
  }

  now(): string {
    return localNow();
  }
}

export class FixedClock implements IClock {
  constructor(
    private readonly date: string,
    private readonly time = '12:00:00',
  ) {}

  today(): string {
    return this.date;
  }

  now(): string {
    return this.time;
  }
}
