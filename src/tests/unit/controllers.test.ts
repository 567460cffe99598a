import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import Database from 'better-sqlite3';
import { runMigrations } from '../../persistence/database.js';
import { SettingsRepository } from '../../persistence/repositories/SettingsRepository.js';
import { SettingsService } from '../../core/settings/SettingsService.js';
import { SignalBus } from '../../events/SignalBus.js';
import { FileService } from '../../core/document/FileService.js';
import { HashtagIndex } from '../../core/hashtags/HashtagIndex.js';
import { SearchState } from '../../core/search/SearchEngine.js';
import { LineTransformEngine } from '../../core/editor/LineTransformEngine.js';
import { DocumentEditorController } from '../../core/editor/DocumentEditorController.js';
import { QuickEntryController } from '../../core/entry/QuickEntryController.js';
import { LocalHotkeyAdapter } from '../../adapters/hotkey/LocalHotkeyAdapter.js';
import { LiveClock } from '../../core/panel/LiveClock.js';
import { PanelController } from '../../core/panel/PanelController.js';

const FIXED_NOW = new Date('2026-03-14T09:26:00Z');

async function createHarness(initial: string) {
  const bus = new SignalBus();
  const db = new Database(':memory:');
  runMigrations(db);
  const settings = new SettingsService(new SettingsRepository(db), bus, { timezone: 'UTC' });
  const storage = {
    location: 'memory://notes.txt',
    read: vi.fn().mockResolvedValue(initial),
    write: vi.fn().mockResolvedValue(undefined),
    writeSync: vi.fn(),
  };
  const fileService = new FileService(storage, { timezone: () => settings.timezone, now: () => FIXED_NOW });
  await fileService.load();

  const hotkey = new LocalHotkeyAdapter();
  const clock = new LiveClock(() => 'UTC', () => ({ stop: vi.fn() }), () => FIXED_NOW);
  const panel = new PanelController({ bus, hotkey, settings, clock });
  const hashtags = new HashtagIndex();
  const search = new SearchState();
  const editor = new DocumentEditorController({
    bus,
    fileService,
    hashtags,
    search,
    panel,
    engine: new LineTransformEngine(),
  });
  const quickEntry = new QuickEntryController({
    bus,
    fileService,
    hashtags,
    panel,
    engine: new LineTransformEngine(),
  });

  panel.start();
  editor.start();
  quickEntry.start();

  return { bus, storage, fileService, panel, hashtags, search, editor, quickEntry };
}

type Harness = Awaited<ReturnType<typeof createHarness>>;

describe('QuickEntryController', () => {
  let harness: Harness;

  beforeEach(async () => {
    vi.useFakeTimers();
    harness = await createHarness('existing\n');
  });

  afterEach(() => {
    harness.panel.dispose();
    vi.useRealTimers();
  });

  it('appends the typed entry and clears the field', () => {
    const { quickEntry, fileService, editor, hashtags, bus } = harness;
    const scrolled = vi.fn();
    bus.on('scroll-to-bottom', scrolled);

    quickEntry.type('buy milk #errand');
    const entry = quickEntry.submit();

    expect(entry).toBe('\n2026-03-14 09:26\nbuy milk #errand\n\n');
    expect(fileService.content).toBe('existing\n\n2026-03-14 09:26\nbuy milk #errand\n\n');
    expect(editor.model.text).toBe(fileService.content);
    expect(hashtags.get('errand')?.count).toBe(1);
    expect(quickEntry.text).toBe('');
    expect(quickEntry.model.selection).toEqual({ location: 0, length: 0 });
    expect(scrolled).toHaveBeenCalledTimes(1);
  });

  it('does not append blank entries', () => {
    const { quickEntry, fileService } = harness;

    quickEntry.type('   \n');

    expect(quickEntry.submit()).toBeNull();
    expect(fileService.content).toBe('existing\n');
    expect(quickEntry.text).toBe('   \n');
  });

  it('toggles markers only while focused', () => {
    const { quickEntry, panel, bus, editor } = harness;
    quickEntry.type('buy milk');

    bus.emit('toggle-checkbox');
    expect(quickEntry.text).toBe('buy milk');

    panel.show();
    vi.advanceTimersByTime(150);
    bus.emit('toggle-checkbox');

    expect(quickEntry.text).toBe('[ ] buy milk');
    expect(quickEntry.model.selection).toEqual({ location: 12, length: 0 });
    expect(editor.model.text).toBe('existing\n');
  });

  it('asks for editor focus', () => {
    const { quickEntry, panel } = harness;
    panel.show();
    vi.advanceTimersByTime(150);

    quickEntry.focusEditor();
    vi.advanceTimersByTime(100);

    expect(panel.focused).toBe('editor');
  });
});

describe('QuickEntryController hashtag completion', () => {
  let harness: Harness;

  beforeEach(async () => {
    vi.useFakeTimers();
    harness = await createHarness('#project notes\n#personal list\n');
  });

  afterEach(() => {
    harness.panel.dispose();
    vi.useRealTimers();
  });

  it('suggests tags for the hashtag being typed', () => {
    const { quickEntry } = harness;

    quickEntry.type('call #p');

    expect(quickEntry.suggestions()).toEqual(['personal', 'project']);
  });

  it('completes the tag and records the usage', () => {
    const { quickEntry, hashtags } = harness;
    quickEntry.type('call #p');

    expect(quickEntry.completeHashtag('project')).toBe(true);

    expect(quickEntry.text).toBe('call #project ');
    expect(quickEntry.model.selection).toEqual({ location: 14, length: 0 });
    expect(quickEntry.suggestions()).toEqual([]);
    expect(hashtags.suggestions('p')).toEqual(['project', 'personal']);
    expect(hashtags.get('project')?.count).toBe(2);
  });

  it('keeps tag counts in step with the document after completing and submitting', () => {
    const { quickEntry, hashtags, fileService } = harness;
    quickEntry.type('note #pro');
    quickEntry.completeHashtag('project');

    quickEntry.submit();

    const occurrences = fileService.content.split('#project').length - 1;
    expect(occurrences).toBe(2);
    expect(hashtags.get('project')?.count).toBe(occurrences);
  });

  it('does nothing without a hashtag at the cursor', () => {
    const { quickEntry } = harness;
    quickEntry.type('call');

    expect(quickEntry.completeHashtag('project')).toBe(false);
    expect(quickEntry.text).toBe('call');
  });
});

describe('DocumentEditorController', () => {
  let harness: Harness;

  beforeEach(async () => {
    vi.useFakeTimers();
    harness = await createHarness('task one #work\ntask two\nalpha #work\n');
  });

  afterEach(() => {
    harness.panel.dispose();
    vi.useRealTimers();
  });

  it('writes edits back through the file service', async () => {
    const { editor, fileService, storage, hashtags } = harness;
    editor.model.setSelectedRange({ location: 0, length: 0 });

    editor.model.insertText('#home ');

    expect(fileService.content).toBe('#home task one #work\ntask two\nalpha #work\n');
    expect(hashtags.get('home')?.count).toBe(1);

    await vi.advanceTimersByTimeAsync(500);
    await fileService.flush();
    expect(storage.write).toHaveBeenCalledTimes(1);
    expect(storage.write).toHaveBeenCalledWith('#home task one #work\ntask two\nalpha #work\n');
  });

  it('strikes through the cursor line when focused', () => {
    const { editor, panel, bus, fileService } = harness;
    panel.show();
    vi.advanceTimersByTime(150);
    bus.emit('focus-editor');
    vi.advanceTimersByTime(100);
    editor.model.setSelectedRange({ location: 15, length: 0 });

    bus.emit('toggle-strikethrough');

    expect(fileService.content).toBe('task one #work\n~~task two~~\nalpha #work\n');
    expect(editor.model.selection).toEqual({ location: 17, length: 0 });
  });

  it('steps through search matches with wrap-around', () => {
    const { editor, search, bus } = harness;
    bus.emit('show-search');

    expect(editor.setSearchQuery('TASK')).toEqual({ start: 0, length: 4 });
    expect(editor.nextMatch()).toEqual({ start: 15, length: 4 });
    expect(editor.nextMatch()).toEqual({ start: 0, length: 4 });
    expect(editor.previousMatch()).toEqual({ start: 15, length: 4 });
    expect(editor.model.selection).toEqual({ location: 15, length: 4 });

    bus.emit('dismiss-search');
    expect(search.isVisible).toBe(false);
    expect(search.query).toBe('TASK');
    bus.emit('toggle-search');
    expect(search.isVisible).toBe(true);
  });

  it('refreshes search matches when an entry is appended', () => {
    const { editor, search, fileService } = harness;
    editor.setSearchQuery('alpha');

    fileService.append('alpha again');

    expect(search.matches).toEqual([
      { start: 24, length: 5 },
      { start: 54, length: 5 },
    ]);
  });

  it('filters lines by the clicked tag', () => {
    const { editor, bus } = harness;

    bus.emit('tag-clicked', '#work');

    expect(editor.tagFilter).toBe('work');
    expect(editor.filteredLines()).toEqual([
      { line: 0, start: 0, end: 14, text: 'task one #work' },
      { line: 2, start: 24, end: 35, text: 'alpha #work' },
    ]);

    bus.emit('clear-tag-filter');
    expect(editor.filteredLines()).toBeNull();
  });

  it('jumps to the next tag occurrence and wraps', () => {
    const { editor, bus } = harness;
    editor.model.setSelectedRange({ location: 0, length: 0 });

    bus.emit('tag-jump', 'work');
    expect(editor.model.selection).toEqual({ location: 9, length: 5 });

    bus.emit('tag-jump', 'work');
    expect(editor.model.selection).toEqual({ location: 30, length: 5 });

    bus.emit('tag-jump', 'work');
    expect(editor.model.selection).toEqual({ location: 9, length: 5 });
  });

  it('returns null for a tag that is not in the document', () => {
    expect(harness.editor.jumpToTag('missing')).toBeNull();
  });
});
