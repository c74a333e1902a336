const TAG_PATTERN = /(^|\s)@([A-Za-z0-9_][\w-]*)/g;

/** `@tags` in `text`, lowercased, in order of first appearance. */
export function extractTags(text: string): string[] {
  const tags = new Set<string>();
  for (const match of text.matchAll(TAG_PATTERN)) {
    const tag = match[2];
    if (tag) tags.add(tag.toLowerCase());
  }
  return [...tags];
}

/** True when any wanted tag is present (case-insensitive, leading `@` optional). */
export function hasAnyTag(tags: readonly string[], wanted: readonly string[]): boolean {
  const own = new Set(tags.map((tag) => tag.toLowerCase()));
  return wanted.some((tag) => own.has(tag.replace(/^@/, '').toLowerCase()));
}
