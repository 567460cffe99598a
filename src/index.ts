// Load environment variables first
import 'dotenv/config';

import { loadConfig } from './config/index.js';
import { createLogger } from './utils/logger.js';
import { SignalBus } from './events/SignalBus.js';
import { getDatabase, closeDatabase } from './persistence/database.js';
import { SettingsRepository } from './persistence/repositories/SettingsRepository.js';
import { SettingsService } from './core/settings/SettingsService.js';
import { TextFileAdapter } from './adapters/storage/TextFileAdapter.js';
import { FileService } from './core/document/FileService.js';
import { HashtagIndex } from './core/hashtags/HashtagIndex.js';
import { SearchState } from './core/search/SearchEngine.js';
import { LineTransformEngine } from './core/editor/LineTransformEngine.js';
import type { CheckboxMode } from './core/editor/lineTransforms.js';
import { DocumentEditorController } from './core/editor/DocumentEditorController.js';
import { QuickEntryController } from './core/entry/QuickEntryController.js';
import { LocalHotkeyAdapter } from './adapters/hotkey/LocalHotkeyAdapter.js';
import { DisabledHotkeyAdapter } from './adapters/hotkey/DisabledHotkeyAdapter.js';
import { LiveClock } from './core/panel/LiveClock.js';
import { PanelController } from './core/panel/PanelController.js';
import { createApp, startServer } from './server.js';

const logger = createLogger({ component: 'index' });

async function main(): Promise<void> {
  logger.info('Starting quick capture service');

  try {
    const config = loadConfig();
    const bus = new SignalBus();

    // Preferences
    const settings = new SettingsService(new SettingsRepository(getDatabase(config.databasePath)), bus, {
      timezone: config.timezone,
    });

    // Document
    const fileService = new FileService(new TextFileAdapter(config.notesFilePath), {
      debounceMs: config.saveDebounceMs,
      timezone: () => settings.timezone,
    });
    const loaded = await fileService.load();
    if (!loaded.ok) {
      logger.warn({ path: config.notesFilePath }, 'Continuing with an empty document');
    }

    // Panel, hotkey and clock
    const hotkey = config.hotkeysEnabled ? new LocalHotkeyAdapter() : new DisabledHotkeyAdapter();
    const clock = new LiveClock(() => settings.timezone);
    const panel = new PanelController({ bus, hotkey, settings, clock });

    // Views
    const checkboxMode = (): CheckboxMode => settings.checkboxMode;
    const hashtags = new HashtagIndex();
    const search = new SearchState();
    const editor = new DocumentEditorController({
      bus,
      fileService,
      hashtags,
      search,
      panel,
      engine: new LineTransformEngine({ checkboxMode }),
    });
    const quickEntry = new QuickEntryController({
      bus,
      fileService,
      hashtags,
      panel,
      engine: new LineTransformEngine({ checkboxMode }),
    });

    panel.start();
    editor.start();
    quickEntry.start();

    const app = createApp({
      bus,
      fileService,
      settings,
      hashtags,
      search,
      transforms: new LineTransformEngine({ checkboxMode }),
      quickEntry,
      editor,
      panel,
      hotkey,
    });
    const server = await startServer(app, config.port, config.host);

    const shutdown = async (signal: string): Promise<void> => {
      logger.info({ signal }, 'Shutting down');
      quickEntry.dispose();
      editor.dispose();
      panel.dispose();
      // Let queued writes settle before the final synchronous write.
      await fileService.flush();
      fileService.close();
      closeDatabase();
      server.close(() => {
        process.exit(0);
      });
    };
    const onSignal = (signal: string): void => {
      shutdown(signal).catch((error: unknown) => {
        logger.error({ error }, 'Shutdown failed');
        fileService.close();
        process.exit(1);
      });
    };
    process.once('SIGINT', () => onSignal('SIGINT'));
    process.once('SIGTERM', () => onSignal('SIGTERM'));

    logger.info({ host: config.host, port: config.port, path: config.notesFilePath }, 'Service started successfully');
  } catch (error) {
    logger.error({ error }, 'Failed to start application');
    process.exit(1);
  }
}

main().catch((error) => {
  console.error('Unhandled error:', error);
  process.exit(1);
});
