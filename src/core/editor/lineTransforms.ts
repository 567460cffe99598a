import { MalformedMarkerError } from '../../utils/errors.js';

export interface TextRange {
  start: number;
  length: number;
}

export type CheckboxMode = 'toggle' | 'cycle';

export interface LineTransformResult {
  line: string;
  cursorOffset: number;
}

export type LineTransform = (line: string) => LineTransformResult;

const CHECKBOX_MARKER = '[ ] ';
const STRIKE = '~~';

/**
 * The line containing `location`: from just after the previous newline up to
 * and including the next one.
 */
export function lineRangeAt(text: string, location: number): TextRange {
  const position = Math.max(0, Math.min(location, text.length));
  const start = position === 0 ? 0 : text.lastIndexOf('\n', position - 1) + 1;
  const newline = text.indexOf('\n', position);
  const end = newline === -1 ? text.length : newline + 1;
  return { start, length: end - start };
}

interface LineParts {
  leading: string;
  content: string;
  newline: string;
}

function splitLine(line: string): LineParts {
  const leading = /^[^\S\n]*/.exec(line)?.[0] ?? '';
  return {
    leading,
    content: line.trim(),
    newline: line.endsWith('\n') ? '\n' : '',
  };
}

export function toggleCheckboxLine(line: string, mode: CheckboxMode = 'toggle'): LineTransformResult {
  if (line.includes('[x]') || line.includes('[X]')) {
    if (mode === 'cycle') {
      const marker = /\[[xX]\] ?/.exec(line);
      if (marker) {
        const removed = marker[0];
        return {
          line: line.slice(0, marker.index) + line.slice(marker.index + removed.length),
          cursorOffset: -removed.length,
        };
      }
    }
    return { line: line.replaceAll('[x]', '[ ]').replaceAll('[X]', '[ ]'), cursorOffset: 0 };
  }

  if (line.includes('[ ]')) {
    return { line: line.replaceAll('[ ]', '[x]'), cursorOffset: 0 };
  }

  const { leading, content, newline } = splitLine(line);
  return { line: leading + CHECKBOX_MARKER + content + newline, cursorOffset: CHECKBOX_MARKER.length };
}

/** Returns the text inside a `~~…~~` wrap, or null when the content is not wrapped. */
export function unwrapStrikethrough(content: string): string | null {
  const opens = content.startsWith(STRIKE);
  const closes = content.endsWith(STRIKE);
  if (opens && closes && content.length >= STRIKE.length * 2) {
    return content.slice(STRIKE.length, -STRIKE.length);
  }
  if (opens || closes) {
    throw new MalformedMarkerError(`Unbalanced strikethrough markers in "${content}"`);
  }
  return null;
}

export function toggleStrikethroughLine(line: string): LineTransformResult {
  const { leading, content, newline } = splitLine(line);

  let inner: string | null;
  try {
    inner = unwrapStrikethrough(content);
  } catch (error) {
    if (!(error instanceof MalformedMarkerError)) {
      throw error;
    }
    // Half-wrapped lines get a fresh pair of markers.
    inner = null;
  }

  if (inner !== null) {
    return { line: leading + inner + newline, cursorOffset: -STRIKE.length };
  }
  return { line: leading + STRIKE + content + STRIKE + newline, cursorOffset: STRIKE.length };
}
