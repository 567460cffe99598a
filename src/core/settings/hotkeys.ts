import { SettingsError } from '../../utils/errors.js';

const MODIFIER_ALIASES: Record<string, Modifier> = {
  ctrl: 'ctrl',
  control: 'ctrl',
  alt: 'alt',
  opt: 'alt',
  option: 'alt',
  shift: 'shift',
  cmd: 'cmd',
  command: 'cmd',
  meta: 'cmd',
  super: 'cmd',
};

type Modifier = 'ctrl' | 'alt' | 'shift' | 'cmd';

const MODIFIER_ORDER: readonly Modifier[] = ['ctrl', 'alt', 'shift', 'cmd'];

const KEY_ALIASES: Record<string, string> = {
  return: 'enter',
  esc: 'escape',
  spacebar: 'space',
};

const KEY_PATTERN =
  /^[a-z0-9]$|^f([1-9]|1[0-9]|20)$|^(space|enter|tab|escape|backspace|delete|up|down|left|right|[`\-=[\]\\;',./])$/;

/**
 * Canonical form of a key combination: lower-case, modifiers in
 * `ctrl, alt, shift, cmd` order, then a single key, joined by `+`.
 */
export function normalizeHotkey(combination: string): string {
  const parts = combination
    .split('+')
    .map((part) => part.trim().toLowerCase())
    .filter((part) => part.length > 0);

  const modifiers = new Set<Modifier>();
  const keys: string[] = [];
  for (const part of parts) {
    const modifier = Object.hasOwn(MODIFIER_ALIASES, part) ? MODIFIER_ALIASES[part] : undefined;
    if (modifier) {
      modifiers.add(modifier);
    } else {
      keys.push(Object.hasOwn(KEY_ALIASES, part) ? (KEY_ALIASES[part] ?? part) : part);
    }
  }

  const key = keys[0];
  if (keys.length !== 1 || key === undefined) {
    throw new SettingsError(`Hotkey "${combination}" must name exactly one key`);
  }
  if (!KEY_PATTERN.test(key)) {
    throw new SettingsError(`Hotkey "${combination}" uses unknown key "${key}"`);
  }

  const ordered = MODIFIER_ORDER.filter((modifier) => modifiers.has(modifier));
  return [...ordered, key].join('+');
}

export function isSameHotkey(left: string, right: string): boolean {
  try {
    return normalizeHotkey(left) === normalizeHotkey(right);
  } catch (error) {
    if (error instanceof SettingsError) {
      return false;
    }
    throw error;
  }
}
