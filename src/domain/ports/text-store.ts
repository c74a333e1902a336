/**
 * Port for the plain-text files the journal and todo list live in.
 *
 * `FileTextStore` (`@infra/persistence/text-store.js`) backs it with the disk;
 * `MemoryTextStore` (`@infra/persistence/memory-text-store.js`) keeps files in
 * a Map for tests.
 */
export interface ITextStore {
  /** @throws TextStoreError when the file is missing or unreadable */
  read(path: string): string;
  exists(path: string): boolean;
  isDirectory(path: string): boolean;
  /** Replace the whole file, creating parent directories. */
  write(path: string, content: string): void;
  /** Create the file or add to its end, creating parent directories. */
  append(path: string, content: string): void;
  /** Every `.md` file under `dir`, recursively, sorted by path. Empty when `dir` is missing. */
  listMarkdown(dir: string): string[];
}
