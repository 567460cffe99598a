export interface SearchMatch {
  start: number;
  length: number;
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Literal, case-insensitive, non-overlapping matches of `query` in `text`,
 * in document order.
 */
export function findMatches(query: string, text: string): SearchMatch[] {
  if (!query) {
    return [];
  }

  // The `i` flag folds case per code unit, so offsets stay aligned with `text`.
  const pattern = new RegExp(escapeRegExp(query), 'gi');
  const matches: SearchMatch[] = [];
  for (const match of text.matchAll(pattern)) {
    if (match.index !== undefined) {
      matches.push({ start: match.index, length: match[0].length });
    }
  }
  return matches;
}

/** Search bar state. Hiding the bar keeps the query so reopening restores it. */
export class SearchState {
  private currentQuery = '';
  private currentMatches: SearchMatch[] = [];
  private index = -1;
  private visible = false;

  get query(): string {
    return this.currentQuery;
  }

  get matches(): readonly SearchMatch[] {
    return this.currentMatches;
  }

  get currentIndex(): number {
    return this.index;
  }

  get currentMatch(): SearchMatch | null {
    return this.currentMatches[this.index] ?? null;
  }

  get isVisible(): boolean {
    return this.visible;
  }

  setQuery(query: string, text: string): SearchMatch | null {
    this.currentQuery = query;
    this.currentMatches = findMatches(query, text);
    this.index = this.currentMatches.length > 0 ? 0 : -1;
    return this.currentMatch;
  }

  /** Recomputes matches after the document changed, keeping the position where possible. */
  refresh(text: string): void {
    this.currentMatches = findMatches(this.currentQuery, text);
    if (this.currentMatches.length === 0) {
      this.index = -1;
    } else {
      this.index = Math.min(Math.max(this.index, 0), this.currentMatches.length - 1);
    }
  }

  next(): SearchMatch | null {
    const count = this.currentMatches.length;
    if (count === 0) {
      return null;
    }
    this.index = (this.index + 1) % count;
    return this.currentMatch;
  }

  previous(): SearchMatch | null {
    const count = this.currentMatches.length;
    if (count === 0) {
      return null;
    }
    this.index = (this.index - 1 + count) % count;
    return this.currentMatch;
  }

  show(): void {
    this.visible = true;
  }

  hide(): void {
    this.visible = false;
  }

  toggle(): boolean {
    this.visible = !this.visible;
    return this.visible;
  }
}
