import { join } from 'node:path';
import type { IsoDate } from '@domain/types/temporal.js';
import { DAYLOG_PATHS } from '@shared/constants/paths.js';

// <root>/YYYY/MM/YYYY-MM-DD.md

export function yearDir(root: string, date: IsoDate): string {
  return join(root, date.slice(0, 4));
}

export function monthDir(root: string, date: IsoDate): string {
  return join(yearDir(root, date), date.slice(5, 7));
}

export function dayFilePath(root: string, date: IsoDate): string {
  return join(monthDir(root, date), `${date}.md`);
}

export function todoFilePath(dir: string): string {
  return join(dir, DAYLOG_PATHS.todoFile);
}
