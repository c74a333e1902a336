import type { ITextStore } from '@domain/ports/text-store.js';
import { TextStoreError } from './text-store.js';

/**
 * In-memory ITextStore for unit tests.
 *
 * Files live in a Map keyed by path. Directories exist implicitly whenever a
 * file sits below them.
 *
 * ```ts
 * const store = new MemoryTextStore({ '/journal/2025/08/2025-08-15.md': '# Friday, 15 Aug 2025\n' });
 * store.listMarkdown('/journal'); // ['/journal/2025/08/2025-08-15.md']
 * ```
 */
export class MemoryTextStore implements ITextStore {
  private readonly files = new Map<string, string>();

  constructor(seed: Record<string, string> = {}) {
    for (const [path, content] of Object.entries(seed)) {
      this.files.set(path, content);
    }
  }

  read(path: string): string {
    const content = this.files.get(path);
    if (content === undefined) {
      throw new TextStoreError(`File does not exist in path: ${path}.`, path);
    }
    return content;
  }

  exists(path: string): boolean {
    return this.files.has(path) || this.isDirectory(path);
  }

  isDirectory(path: string): boolean {
    const prefix = path.endsWith('/') ? path : `${path}/`;
    for (const key of this.files.keys()) {
      if (key.startsWith(prefix)) return true;
    }
    return false;
  }

  write(path: string, content: string): void {
    this.files.set(path, content);
  }

  append(path: string, content: string): void {
    this.files.set(path, (this.files.get(path) ?? '') + content);
  }

  listMarkdown(dir: string): string[] {
    const prefix = dir.endsWith('/') ? dir : `${dir}/`;
    return [...this.files.keys()].filter((key) => key.startsWith(prefix) && key.endsWith('.md')).sort();
  }

  /** Every stored path, sorted. */
  paths(): string[] {
    return [...this.files.keys()].sort();
  }
}
