import { scanHashtags, stripHash } from './HashtagIndex.js';

export interface HashtagQuery {
  /** Offset of the `#`. */
  start: number;
  /** Text typed after the `#`, up to the cursor. */
  prefix: string;
}

export interface TextEdit {
  text: string;
  cursor: number;
}

export interface TaggedLine {
  line: number;
  start: number;
  end: number;
  text: string;
}

export interface TagRange {
  start: number;
  length: number;
}

const WHITESPACE = /\s/;

/** The partial hashtag immediately before `cursor`, if one is being typed. */
export function hashtagQueryAt(text: string, cursor: number): HashtagQuery | null {
  const end = Math.max(0, Math.min(cursor, text.length));
  let start = end;
  while (start > 0 && !WHITESPACE.test(text.charAt(start - 1))) {
    start -= 1;
  }

  if (text.charAt(start) !== '#' || start >= end) {
    return null;
  }
  const prefix = text.slice(start + 1, end);
  if (prefix.includes('#')) {
    return null;
  }
  return { start, prefix };
}

/**
 * Replaces the partial hashtag before `cursor` with `#tag` followed by a
 * space, leaving the cursor after that space. Returns null when no hashtag is
 * being typed.
 */
export function completeHashtag(text: string, cursor: number, tag: string): TextEdit | null {
  const query = hashtagQueryAt(text, cursor);
  const name = stripHash(tag);
  if (!query || !name) {
    return null;
  }

  let tokenEnd = Math.min(cursor, text.length);
  while (tokenEnd < text.length && !WHITESPACE.test(text.charAt(tokenEnd))) {
    tokenEnd += 1;
  }

  const after = text.slice(tokenEnd);
  const completed = `#${name}`;
  const replacement = WHITESPACE.test(after.charAt(0)) ? completed : `${completed} `;
  return {
    text: text.slice(0, query.start) + replacement + after,
    cursor: query.start + completed.length + 1,
  };
}

export function linesWithTag(text: string, tag: string): TaggedLine[] {
  const name = stripHash(tag);
  const result: TaggedLine[] = [];
  let offset = 0;

  text.split('\n').forEach((lineText, line) => {
    if (scanHashtags(lineText).some((occurrence) => occurrence.tag === name)) {
      result.push({ line, start: offset, end: offset + lineText.length, text: lineText });
    }
    offset += lineText.length + 1;
  });

  return result;
}

/** First occurrence of `#tag` starting at or after `from`, wrapping to the top. */
export function nextTagOccurrence(text: string, tag: string, from: number): TagRange | null {
  const name = stripHash(tag);
  const occurrences = scanHashtags(text).filter((occurrence) => occurrence.tag === name);
  const first = occurrences[0];
  if (!first) {
    return null;
  }
  const next = occurrences.find((occurrence) => occurrence.start >= from) ?? first;
  return { start: next.start, length: name.length + 1 };
}
