import express from 'express';
import type { Server } from 'node:http';
import { z } from 'zod';
import type { FileService } from './core/document/FileService.js';
import type { SettingsService } from './core/settings/SettingsService.js';
import type { HashtagIndex } from './core/hashtags/HashtagIndex.js';
import type { LineTransformEngine } from './core/editor/LineTransformEngine.js';
import type { QuickEntryController } from './core/entry/QuickEntryController.js';
import type { DocumentEditorController } from './core/editor/DocumentEditorController.js';
import type { PanelController } from './core/panel/PanelController.js';
import type { SearchState } from './core/search/SearchEngine.js';
import type { HotkeyPort } from './ports/HotkeyPort.js';
import { isSignalName, type SignalBus } from './events/SignalBus.js';
import { preferencesPatchSchema } from './core/settings/SettingsService.js';
import { findMatches } from './core/search/SearchEngine.js';
import { completeHashtag, linesWithTag } from './core/hashtags/tagNavigation.js';
import { createLogger, createRequestLogger, generateCorrelationId, setCorrelationId } from './utils/logger.js';
import { SettingsError } from './utils/errors.js';

const logger = createLogger({ component: 'server' });

export interface AppDependencies {
  bus: SignalBus;
  fileService: FileService;
  settings: SettingsService;
  hashtags: HashtagIndex;
  search: SearchState;
  transforms: LineTransformEngine;
  quickEntry: QuickEntryController;
  editor: DocumentEditorController;
  panel: PanelController;
  hotkey: HotkeyPort;
}

const selectionSchema = z.object({
  location: z.number().int().nonnegative(),
  length: z.number().int().nonnegative().default(0),
});

const transformBodySchema = z.object({
  text: z.string(),
  selection: selectionSchema,
});

const completeBodySchema = z.object({
  text: z.string(),
  cursor: z.number().int().nonnegative(),
  tag: z.string().min(1),
});

const signalBodySchema = z.object({ id: z.string().min(1).optional() });
const focusTargetSchema = z.enum(['quickEntry', 'editor']);

export function createApp(deps: AppDependencies): express.Express {
  const { bus, fileService, settings, hashtags, search, transforms, quickEntry, editor, panel, hotkey } = deps;
  const app = express();

  app.use(express.json({ limit: '10mb' }));

  // Request logging middleware
  app.use((req, _res, next) => {
    setCorrelationId(generateCorrelationId());
    createRequestLogger({ component: 'server' }).debug({ method: req.method, path: req.path }, 'Incoming request');
    next();
  });

  app.get('/health', (_req, res) => {
    res.status(200).json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  // Document
  app.get('/document', (_req, res) => {
    res.json({ content: fileService.content, unsaved: fileService.hasUnsavedChanges });
  });

  app.put('/document', (req, res) => {
    const { content } = z.object({ content: z.string() }).parse(req.body);
    fileService.replace(content);
    res.json({ content: fileService.content });
  });

  app.post('/entries', (req, res) => {
    const { text } = z.object({ text: z.string() }).parse(req.body);
    const entry = fileService.append(text);
    if (entry === null) {
      res.status(400).json({ error: 'Entry text is empty' });
      return;
    }
    res.status(201).json({ entry });
  });

  // Stateless line transforms
  app.post('/transforms/:kind', (req, res) => {
    const kind = z.enum(['checkbox', 'strikethrough']).parse(req.params.kind);
    const { text, selection } = transformBodySchema.parse(req.body);
    res.json(transforms.transformText(text, selection, kind));
  });

  // Hashtags
  app.get('/hashtags', (req, res) => {
    const { prefix, limit } = z
      .object({ prefix: z.string().default(''), limit: z.coerce.number().int().positive().max(100).optional() })
      .parse(req.query);
    res.json({ suggestions: hashtags.suggestions(prefix, limit) });
  });

  app.post('/hashtags/complete', (req, res) => {
    const { text, cursor, tag } = completeBodySchema.parse(req.body);
    const edit = completeHashtag(text, cursor, tag);
    if (edit) {
      hashtags.recordUsage(tag);
    }
    res.json({ completed: edit !== null, ...(edit ?? { text, cursor }) });
  });

  app.get('/hashtags/:tag/lines', (req, res) => {
    res.json({ lines: linesWithTag(fileService.content, req.params.tag) });
  });

  // Search
  app.get('/search', (req, res) => {
    const { q } = z.object({ q: z.string().default('') }).parse(req.query);
    res.json({ matches: findMatches(q, fileService.content) });
  });

  // Quick entry
  app.get('/quick-entry', (_req, res) => {
    res.json({ text: quickEntry.text, selection: quickEntry.model.selection, suggestions: quickEntry.suggestions() });
  });

  app.post('/quick-entry/type', (req, res) => {
    const { text } = z.object({ text: z.string() }).parse(req.body);
    const accepted = quickEntry.type(text);
    res.json({ accepted, text: quickEntry.text, suggestions: quickEntry.suggestions() });
  });

  app.post('/quick-entry/select', (req, res) => {
    quickEntry.model.setSelectedRange(selectionSchema.parse(req.body));
    res.json({ selection: quickEntry.model.selection, suggestions: quickEntry.suggestions() });
  });

  app.post('/quick-entry/complete', (req, res) => {
    const { tag } = z.object({ tag: z.string().min(1) }).parse(req.body);
    const completed = quickEntry.completeHashtag(tag);
    res.json({ completed, text: quickEntry.text, selection: quickEntry.model.selection });
  });

  app.post('/quick-entry/submit', (_req, res) => {
    const entry = quickEntry.submit();
    if (entry === null) {
      res.status(400).json({ error: 'Entry text is empty' });
      return;
    }
    res.status(201).json({ entry });
  });

  // Main editor
  app.get('/editor', (_req, res) => {
    res.json({
      selection: editor.model.selection,
      tagFilter: editor.tagFilter,
      filteredLines: editor.filteredLines(),
      search: {
        visible: search.isVisible,
        query: search.query,
        matches: search.matches,
        currentIndex: search.currentIndex,
      },
    });
  });

  app.post('/editor/search', (req, res) => {
    const { query } = z.object({ query: z.string() }).parse(req.body);
    const match = editor.setSearchQuery(query);
    res.json({ match, count: search.matches.length });
  });

  app.post('/editor/search/:direction', (req, res) => {
    const direction = z.enum(['next', 'previous']).parse(req.params.direction);
    const match = direction === 'next' ? editor.nextMatch() : editor.previousMatch();
    res.json({ match, currentIndex: search.currentIndex });
  });

  // Settings
  app.get('/settings', (_req, res) => {
    res.json(settings.get());
  });

  app.patch('/settings', (req, res) => {
    res.json(settings.update(preferencesPatchSchema.parse(req.body)));
  });

  app.delete('/settings', (_req, res) => {
    res.json(settings.reset());
  });

  // Panel and hotkey
  app.get('/panel', (_req, res) => {
    res.json(panel.state());
  });

  app.post('/panel/:action', (req, res) => {
    const action = z.enum(['show', 'hide', 'toggle']).parse(req.params.action);
    if (action === 'show') {
      panel.show();
    } else if (action === 'hide') {
      panel.hide();
    } else {
      panel.toggle();
    }
    res.json(panel.state());
  });

  app.post('/hotkey/trigger', (req, res) => {
    const { combination } = z.object({ combination: z.string().min(1) }).parse(req.body);
    const triggered = hotkey.trigger?.(combination) ?? false;
    res.json({ triggered, panel: panel.state() });
  });

  // Signals
  app.post('/signals/:name', (req, res) => {
    const name = req.params.name;
    if (!isSignalName(name) || name === 'hotkey-changed') {
      res.status(404).json({ error: `Unknown signal: ${name}` });
      return;
    }
    const { id } = signalBodySchema.parse(req.body ?? {});

    switch (name) {
      case 'tag-jump':
      case 'tag-clicked':
        if (!id) {
          res.status(400).json({ error: `Signal ${name} needs an id` });
          return;
        }
        bus.emit(name, id);
        break;
      case 'focus-request':
        bus.emit('focus-request', focusTargetSchema.optional().parse(id));
        break;
      default:
        bus.emit(name);
    }
    res.status(202).json({ ok: true });
  });

  // Error handling
  app.use((err: Error, _req: express.Request, res: express.Response, _next: express.NextFunction) => {
    if (err instanceof z.ZodError) {
      res.status(400).json({ error: 'Invalid request', issues: err.issues });
      return;
    }
    if (err instanceof SettingsError) {
      res.status(400).json({ error: err.message });
      return;
    }
    // body-parser failures (malformed JSON) carry their own 4xx status
    if ('status' in err && err.status === 400) {
      res.status(400).json({ error: 'Malformed request body' });
      return;
    }
    logger.error({ error: err }, 'Unhandled error in Express');
    res.status(500).json({ error: 'Internal server error' });
  });

  return app;
}

export async function startServer(app: express.Express, port: number, host: string = '127.0.0.1'): Promise<Server> {
  return new Promise((resolve) => {
    const server = app.listen(port, host, () => {
      logger.info({ host, port }, 'HTTP server started');
      resolve(server);
    });
  });
}
