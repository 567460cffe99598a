export interface TimestampOptions {
  /** Include seconds (`HH:mm:ss`); entries use minutes, the live clock uses seconds. */
  seconds?: boolean;
}

/** Formats `date` as `yyyy-MM-dd HH:mm[:ss]` in the given IANA timezone. */
export function formatTimestamp(date: Date, timezone: string, options: TimestampOptions = {}): string {
  const parts = new Intl.DateTimeFormat('en-US', {
    timeZone: timezone,
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
    hour: '2-digit',
    minute: '2-digit',
    second: options.seconds ? '2-digit' : undefined,
    hourCycle: 'h23',
  }).formatToParts(date);

  const part = (type: Intl.DateTimeFormatPartTypes): string =>
    parts.find((candidate) => candidate.type === type)?.value ?? '00';

  const time = `${part('hour')}:${part('minute')}`;
  return `${part('year')}-${part('month')}-${part('day')} ${options.seconds ? `${time}:${part('second')}` : time}`;
}

export function isValidTimezone(timezone: string): boolean {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone: timezone });
    return true;
  } catch {
    return false;
  }
}

/** One entry block: the timestamp line, the entry text and a trailing blank line. */
export function formatEntry(text: string, timestamp: string): string {
  return `${timestamp}\n${text.trim()}\n\n`;
}

/**
 * Newlines needed after `buffer` so that an appended entry starts after a
 * blank line.
 */
export function entrySeparator(buffer: string): string {
  if (buffer.length === 0 || buffer.endsWith('\n\n')) {
    return '';
  }
  return buffer.endsWith('\n') ? '\n' : '\n\n';
}
