import { describe, it, expect } from 'vitest';
import { isSameHotkey, normalizeHotkey } from '../../core/settings/hotkeys.js';
import { SettingsError } from '../../utils/errors.js';

describe('normalizeHotkey', () => {
  it('orders modifiers and lower-cases', () => {
    expect(normalizeHotkey('Shift+Cmd+Space')).toBe('shift+cmd+space');
    expect(normalizeHotkey('cmd + ctrl + K')).toBe('ctrl+cmd+k');
  });

  it('resolves aliases', () => {
    expect(normalizeHotkey('command+return')).toBe('cmd+enter');
    expect(normalizeHotkey('option+esc')).toBe('alt+escape');
  });

  it('rejects combinations without exactly one known key', () => {
    expect(() => normalizeHotkey('cmd+shift')).toThrow(SettingsError);
    expect(() => normalizeHotkey('cmd+a+b')).toThrow(SettingsError);
    expect(() => normalizeHotkey('ctrl+banana')).toThrow(SettingsError);
    expect(() => normalizeHotkey('constructor+a')).toThrow(SettingsError);
  });
});

describe('isSameHotkey', () => {
  it('compares normalized forms', () => {
    expect(isSameHotkey('cmd+shift+space', 'Shift+Command+Space')).toBe(true);
    expect(isSameHotkey('cmd+space', 'ctrl+space')).toBe(false);
    expect(isSameHotkey('cmd+space', 'not a hotkey')).toBe(false);
  });
});
