import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import type { Server } from 'node:http';
import Database from 'better-sqlite3';
import { createApp } from '../../server.js';
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

describe('HTTP server', () => {
  let server: Server;
  let baseUrl: string;
  let fileService: FileService;
  let panel: PanelController;
  let editor: DocumentEditorController;
  let quickEntry: QuickEntryController;

  beforeEach(async () => {
    const bus = new SignalBus();
    const db = new Database(':memory:');
    runMigrations(db);
    const settings = new SettingsService(new SettingsRepository(db), bus, { timezone: 'UTC' });
    fileService = new FileService(
      {
        location: 'memory://notes.txt',
        read: vi.fn().mockResolvedValue(null),
        write: vi.fn().mockResolvedValue(undefined),
        writeSync: vi.fn(),
      },
      { timezone: () => settings.timezone, now: () => FIXED_NOW }
    );
    await fileService.load();

    const hotkey = new LocalHotkeyAdapter();
    const clock = new LiveClock(() => 'UTC', () => ({ stop: vi.fn() }), () => FIXED_NOW);
    panel = new PanelController({ bus, hotkey, settings, clock });
    const hashtags = new HashtagIndex();
    const search = new SearchState();
    editor = new DocumentEditorController({ bus, fileService, hashtags, search, panel, engine: new LineTransformEngine() });
    quickEntry = new QuickEntryController({ bus, fileService, hashtags, panel, engine: new LineTransformEngine() });
    panel.start();
    editor.start();
    quickEntry.start();

    const app = createApp({
      bus,
      fileService,
      settings,
      hashtags,
      search,
      transforms: new LineTransformEngine(),
      quickEntry,
      editor,
      panel,
      hotkey,
    });
    server = await new Promise<Server>((resolve) => {
      const listening = app.listen(0, '127.0.0.1', () => resolve(listening));
    });
    const address = server.address();
    baseUrl = typeof address === 'object' && address ? `http://127.0.0.1:${address.port}` : '';
  });

  afterEach(async () => {
    quickEntry.dispose();
    editor.dispose();
    panel.dispose();
    fileService.close();
    await new Promise<void>((resolve) => server.close(() => resolve()));
  });

  function send(method: string, path: string, body?: unknown): Promise<Response> {
    return fetch(`${baseUrl}${path}`, {
      method,
      headers: { 'Content-Type': 'application/json' },
      body: body === undefined ? undefined : JSON.stringify(body),
    });
  }

  it('reports health', async () => {
    const response = await send('GET', '/health');

    expect(response.status).toBe(200);
    expect(await response.json()).toMatchObject({ status: 'ok' });
  });

  it('appends entries and indexes their hashtags', async () => {
    const created = await send('POST', '/entries', { text: ' hello #news ' });
    expect(created.status).toBe(201);
    expect(await created.json()).toEqual({ entry: '2026-03-14 09:26\nhello #news\n\n' });

    const hashtags = await send('GET', '/hashtags?prefix=n');
    expect(await hashtags.json()).toEqual({ suggestions: ['news'] });

    const search = await send('GET', '/search?q=HELLO');
    expect(await search.json()).toEqual({ matches: [{ start: 17, length: 5 }] });
  });

  it('rejects blank entries', async () => {
    const response = await send('POST', '/entries', { text: '   ' });

    expect(response.status).toBe(400);
    expect(fileService.content).toBe('');
  });

  it('answers 400 for a malformed JSON body', async () => {
    const response = await fetch(`${baseUrl}/entries`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: '{"text": ',
    });

    expect(response.status).toBe(400);
    expect(await response.json()).toEqual({ error: 'Malformed request body' });
  });

  it('transforms the line under the selection', async () => {
    const response = await send('POST', '/transforms/checkbox', { text: 'a\nb', selection: { location: 2 } });

    expect(await response.json()).toEqual({
      text: 'a\n[ ] b',
      selection: { location: 6, length: 0 },
      changed: true,
    });
  });

  it('validates settings updates', async () => {
    const invalid = await send('PATCH', '/settings', { fontSize: 200 });
    expect(invalid.status).toBe(400);

    const updated = await send('PATCH', '/settings', { globalHotkey: 'Ctrl+Option+N' });
    expect(updated.status).toBe(200);
    expect(await updated.json()).toMatchObject({ globalHotkey: 'ctrl+alt+n' });

    const state = await send('GET', '/panel');
    expect(await state.json()).toMatchObject({ hotkey: 'ctrl+alt+n', visible: false });
  });

  it('toggles the panel from a forwarded hotkey', async () => {
    const response = await send('POST', '/hotkey/trigger', { combination: 'cmd+shift+space' });

    expect(await response.json()).toEqual({
      triggered: true,
      panel: { visible: true, focused: null, clock: '2026-03-14 09:26:00', hotkey: 'shift+cmd+space' },
    });
  });

  it('relays signals to the editor', async () => {
    expect((await send('POST', '/signals/self-destruct', {})).status).toBe(404);
    expect((await send('POST', '/signals/hotkey-changed', { id: 'cmd+k' })).status).toBe(404);
    expect((await send('POST', '/signals/tag-clicked', {})).status).toBe(400);

    const accepted = await send('POST', '/signals/tag-clicked', { id: 'news' });
    expect(accepted.status).toBe(202);
    expect(editor.tagFilter).toBe('news');

    await send('POST', '/signals/show-search', {});
    const state = await send('GET', '/editor');
    expect(await state.json()).toMatchObject({ tagFilter: 'news', search: { visible: true } });
  });
});
