import { z } from 'zod';
import type { SettingsRepository } from '../../persistence/repositories/SettingsRepository.js';
import type { SignalBus } from '../../events/SignalBus.js';
import { createLogger } from '../../utils/logger.js';
import { SettingsError } from '../../utils/errors.js';
import { isValidTimezone } from '../document/entryFormat.js';
import { normalizeHotkey } from './hotkeys.js';

const hotkeySchema = z.string().transform((value, ctx) => {
  try {
    return normalizeHotkey(value);
  } catch (error) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: error instanceof Error ? error.message : 'Invalid hotkey',
    });
    return z.NEVER;
  }
});

const shortcutsSchema = z.object({
  'toggle-checkbox': hotkeySchema,
  'toggle-strikethrough': hotkeySchema,
  'toggle-search': hotkeySchema,
  'submit-entry': hotkeySchema,
});

export const preferencesSchema = z.object({
  theme: z.string().min(1),
  fontName: z.string().min(1),
  fontSize: z.number().min(8).max(48),
  globalHotkey: hotkeySchema,
  shortcuts: shortcutsSchema,
  timezone: z.string().refine(isValidTimezone, { message: 'Unknown timezone' }),
  checkboxMode: z.enum(['toggle', 'cycle']),
});

export const preferencesPatchSchema = preferencesSchema
  .extend({ shortcuts: shortcutsSchema.partial() })
  .partial()
  .strict();

export type Preferences = z.output<typeof preferencesSchema>;
export type PreferencesPatch = z.input<typeof preferencesPatchSchema>;
export type PreferenceKey = keyof Preferences;

const PREFERENCE_KEYS = preferencesSchema.keyof().options;

function isPreferenceKey(key: string): key is PreferenceKey {
  return PREFERENCE_KEYS.some((name) => name === key);
}

export function defaultPreferences(timezone = 'UTC'): Preferences {
  return {
    theme: 'dark',
    fontName: 'Menlo',
    fontSize: 13,
    globalHotkey: 'shift+cmd+space',
    shortcuts: {
      'toggle-checkbox': 'cmd+l',
      'toggle-strikethrough': 'shift+cmd+x',
      'toggle-search': 'cmd+f',
      'submit-entry': 'cmd+enter',
    },
    timezone,
    checkboxMode: 'toggle',
  };
}

function formatIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join('.') || 'settings'}: ${issue.message}`).join('; ');
}

/**
 * Typed preferences over the key/value settings table. Stored values that no
 * longer validate fall back to their defaults.
 */
export class SettingsService {
  private readonly logger = createLogger({ service: 'SettingsService' });
  private readonly defaults: Preferences;
  private cached: Preferences | null = null;

  constructor(
    private readonly repository: SettingsRepository,
    private readonly bus: SignalBus,
    defaults: { timezone?: string } = {}
  ) {
    this.defaults = defaultPreferences(defaults.timezone);
  }

  get(): Preferences {
    if (this.cached) {
      return this.cached;
    }

    const merged: Record<string, unknown> = { ...this.defaults };
    for (const stored of this.repository.getAll()) {
      const key = stored.key;
      if (!isPreferenceKey(key)) {
        this.logger.warn({ key }, 'Ignoring unknown setting');
        continue;
      }
      const candidate =
        key === 'shortcuts' && typeof stored.value === 'object' && stored.value !== null
          ? { ...this.defaults.shortcuts, ...stored.value }
          : stored.value;
      const parsed = preferencesSchema.shape[key].safeParse(candidate);
      if (parsed.success) {
        merged[key] = parsed.data;
      } else {
        this.logger.warn({ key, issues: formatIssues(parsed.error) }, 'Stored setting is invalid; using default');
      }
    }

    this.cached = preferencesSchema.parse(merged);
    return this.cached;
  }

  update(patch: PreferencesPatch): Preferences {
    const parsed = preferencesPatchSchema.safeParse(patch);
    if (!parsed.success) {
      throw new SettingsError(`Invalid settings: ${formatIssues(parsed.error)}`, { cause: parsed.error });
    }

    const current = this.get();
    const { shortcuts, ...rest } = parsed.data;
    const next: Preferences = {
      ...current,
      ...rest,
      shortcuts: { ...current.shortcuts, ...shortcuts },
    };

    const changed = PREFERENCE_KEYS.filter(
      (key) => JSON.stringify(next[key]) !== JSON.stringify(current[key])
    );
    for (const key of changed) {
      this.repository.set(key, next[key]);
    }
    this.cached = next;

    if (changed.length > 0) {
      this.logger.info({ changed }, 'Settings updated');
    }
    if (changed.includes('globalHotkey')) {
      this.bus.emit('hotkey-changed', next.globalHotkey);
    }
    return next;
  }

  reset(): Preferences {
    const previous = this.get();
    this.repository.clear();
    this.cached = null;
    const next = this.get();
    this.logger.info('Settings reset to defaults');
    if (previous.globalHotkey !== next.globalHotkey) {
      this.bus.emit('hotkey-changed', next.globalHotkey);
    }
    return next;
  }

  get timezone(): string {
    return this.get().timezone;
  }

  get checkboxMode(): Preferences['checkboxMode'] {
    return this.get().checkboxMode;
  }
}
