export const DEFAULT_SUGGESTION_LIMIT = 10;

// `#` at the start of the text or after whitespace, then a word that does not
// itself start with `#` (so markdown-style `## heading` yields no tag).
const HASHTAG_PATTERN = /(^|\s)#([^\s#]\S*)/g;

export interface HashtagRecord {
  tag: string;
  count: number;
  lastUsedOrder: number;
}

export interface HashtagOccurrence {
  tag: string;
  /** Offset of the `#`. */
  start: number;
}

export function scanHashtags(text: string): HashtagOccurrence[] {
  const occurrences: HashtagOccurrence[] = [];
  for (const match of text.matchAll(HASHTAG_PATTERN)) {
    const lead = match[1] ?? '';
    const tag = match[2];
    if (tag === undefined || match.index === undefined) {
      continue;
    }
    occurrences.push({ tag, start: match.index + lead.length });
  }
  return occurrences;
}

export function stripHash(tag: string): string {
  return tag.startsWith('#') ? tag.slice(1) : tag;
}

/**
 * Tag frequency and recency, derived from the document. Tags are kept
 * exactly as authored; `#Work` and `#work` are different tags.
 */
export class HashtagIndex {
  private readonly entries = new Map<string, HashtagRecord>();
  private readonly pending = new Map<string, number>();
  private clock = 0;

  /** Replaces every record from a fresh scan; later occurrences rank as more recent. */
  rescan(text: string): void {
    this.entries.clear();
    this.pending.clear();
    const occurrences = scanHashtags(text);
    occurrences.forEach((occurrence, index) => {
      const existing = this.entries.get(occurrence.tag);
      this.entries.set(occurrence.tag, {
        tag: occurrence.tag,
        count: (existing?.count ?? 0) + 1,
        lastUsedOrder: index + 1,
      });
    });
    this.clock = occurrences.length;
  }

  /** Incremental update for text added at the end of the document. */
  applyAppend(inserted: string): void {
    for (const occurrence of scanHashtags(inserted)) {
      const existing = this.entries.get(occurrence.tag);
      const pending = this.pending.get(occurrence.tag) ?? 0;
      if (pending > 0) {
        this.pending.set(occurrence.tag, pending - 1);
      }
      this.entries.set(occurrence.tag, {
        tag: occurrence.tag,
        count: (existing?.count ?? 0) + (pending > 0 ? 0 : 1),
        lastUsedOrder: ++this.clock,
      });
    }
  }

  /**
   * Counts a tag as used now, ahead of it reaching the document. The next
   * appended occurrence of that tag is then already counted.
   */
  recordUsage(tag: string): void {
    const name = stripHash(tag);
    if (!name) {
      return;
    }
    const existing = this.entries.get(name);
    this.entries.set(name, {
      tag: name,
      count: (existing?.count ?? 0) + 1,
      lastUsedOrder: ++this.clock,
    });
    this.pending.set(name, (this.pending.get(name) ?? 0) + 1);
  }

  suggestions(prefix: string, limit = DEFAULT_SUGGESTION_LIMIT): string[] {
    const needle = stripHash(prefix);
    return [...this.entries.values()]
      .filter((record) => record.tag.startsWith(needle))
      .sort(
        (left, right) =>
          right.lastUsedOrder - left.lastUsedOrder ||
          right.count - left.count ||
          (left.tag < right.tag ? -1 : left.tag > right.tag ? 1 : 0)
      )
      .slice(0, Math.max(0, limit))
      .map((record) => record.tag);
  }

  get(tag: string): HashtagRecord | undefined {
    const record = this.entries.get(stripHash(tag));
    return record ? { ...record } : undefined;
  }

  records(): HashtagRecord[] {
    return [...this.entries.values()].map((record) => ({ ...record }));
  }

  get size(): number {
    return this.entries.size;
  }
}
