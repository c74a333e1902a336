import type { IClock } from '@domain/ports/clock.js';
import type { ITextStore } from '@domain/ports/text-store.js';
import type { DaylogSettings } from '@domain/types/config.js';
import { KeywordRegistry } from '@domain/services/keyword-registry.js';
import { parseClockTime } from '@domain/services/temporal-resolver.js';
import { SystemClock } from '@infra/clock/system-clock.js';
import { FileTextStore } from '@infra/persistence/text-store.js';
import { Journal } from '@features/journal/journal-service.js';
import { Todos } from '@features/todos/todo-service.js';
import { makeTime } from '@shared/lib/calendar.js';
import { logger } from '@shared/lib/logger.js';

export interface Runtime {
  settings: DaylogSettings;
  registry: KeywordRegistry;
  clock: IClock;
  journal: Journal;
  todos: Todos;
}

export interface RuntimeDeps {
  clock?: IClock;
  store?: ITextStore;
}

function buildRegistry(synonyms: Record<string, string>): KeywordRegistry {
  const registry = KeywordRegistry.fromSynonyms(synonyms);
  for (const [alias, target] of Object.entries(synonyms)) {
    if (KeywordRegistry.isCanonical(alias)) {
      logger.warn('Ignoring synonym that redefines a keyword', { alias, target });
    } else if (!registry.resolve(alias)) {
      logger.warn('Ignoring synonym for an unknown keyword', { alias, target });
    }
  }
  return registry;
}

/** Wire the services for one command run. */
export function buildRuntime(settings: DaylogSettings, deps: RuntimeDeps = {}): Runtime {
  const clock = deps.clock ?? new SystemClock(settings.referenceDate);
  const store = deps.store ?? new FileTextStore();
  const registry = buildRegistry(settings.synonyms);
  const defaultTime = parseClockTime(settings.defaultTime) ?? makeTime(21);
  const shared = { inputFormats: settings.inputDateFormats, defaultTime, registry, clock, store };

  return {
    settings,
    registry,
    clock,
    journal: new Journal({ ...shared, journalDir: settings.journalDir, headerFormat: settings.journalDateFormat }),
    todos: new Todos({ ...shared, todoListDir: settings.todoListDir, datetimeFormat: settings.todoDatetimeFormat }),
  };
}
