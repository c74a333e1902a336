import { CANONICAL_KEYWORDS, Keyword, type SynonymMap } from '@domain/types/keyword.js';

export type SynonymPair = readonly [alias: string, target: string];

const WORD_PATTERNS = new Map<Keyword, RegExp>(
  CANONICAL_KEYWORDS.map((keyword) => [keyword, new RegExp(`\\b${keyword}\\b`, 'i')]),
);

function normalize(word: string): string {
  return word.trim().toLowerCase();
}

/**
 * Lookup table from lowercase aliases to canonical temporal keywords.
 *
 * Built once (canonical spellings plus user synonyms) and never mutated:
 * `extend()` returns a new registry. Pass the instance to every parsing call
 * that needs to recognise keywords.
 */
export class KeywordRegistry {
  /** alias → keyword; every canonical spelling maps to itself */
  private readonly aliases: ReadonlyMap<string, Keyword>;

  private constructor(aliases: ReadonlyMap<string, Keyword>) {
    this.aliases = aliases;
  }

  /** Registry holding only the built-in spellings. */
  static canonical(): KeywordRegistry {
    return new KeywordRegistry(new Map(CANONICAL_KEYWORDS.map((keyword) => [keyword, keyword])));
  }

  static fromSynonyms(synonyms: SynonymMap | Iterable<SynonymPair>): KeywordRegistry {
    return KeywordRegistry.canonical().extend(synonyms);
  }

  static isCanonical(word: string): boolean {
    return Keyword.safeParse(normalize(word)).success;
  }

  /**
   * Merge alias → target pairs. Aliases spelled like a canonical keyword are
   * dropped, and so are pairs whose target is not yet known; pairs are applied
   * in order, so a target may be an alias added earlier in the same call.
   */
  extend(synonyms: SynonymMap | Iterable<SynonymPair>): KeywordRegistry {
    const pairs: Iterable<SynonymPair> = isSynonymMap(synonyms) ? Object.entries(synonyms) : synonyms;
    const next = new Map(this.aliases);
    for (const [rawAlias, rawTarget] of pairs) {
      const alias = normalize(rawAlias);
      if (!alias || KeywordRegistry.isCanonical(alias)) continue;
      const target = next.get(normalize(rawTarget));
      if (!target) continue;
      next.set(alias, target);
    }
    return new KeywordRegistry(next);
  }

  /** The keyword `input` stands for, ignoring case and surrounding space. */
  resolve(input: string): Keyword | undefined {
    return this.aliases.get(normalize(input));
  }

  matches(keyword: Keyword, input: string): boolean {
    return this.resolve(input) === keyword;
  }

  /**
   * First whole-word occurrence of the keyword's canonical spelling, as written
   * in `input`. Aliases are not searched.
   */
  findWord(keyword: Keyword, input: string): string | undefined {
    return WORD_PATTERNS.get(keyword)?.exec(input)?.[0];
  }

  findPosition(keyword: Keyword, input: string): number | undefined {
    return WORD_PATTERNS.get(keyword)?.exec(input)?.index;
  }

  /** User-defined aliases, sorted by alias. */
  synonyms(): SynonymPair[] {
    return [...this.aliases]
      .filter(([alias]) => !KeywordRegistry.isCanonical(alias))
      .sort(([a], [b]) => a.localeCompare(b));
  }

  get size(): number {
    return this.aliases.size;
  }
}

function isSynonymMap(value: SynonymMap | Iterable<SynonymPair>): value is SynonymMap {
  return !(Symbol.iterator in value);
}
