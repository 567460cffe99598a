import type { SignalBus } from '../../events/SignalBus.js';
import type { FileService } from '../document/FileService.js';
import type { HashtagIndex } from '../hashtags/HashtagIndex.js';
import type { LineTransformEngine } from '../editor/LineTransformEngine.js';
import type { PanelController } from '../panel/PanelController.js';
import { TextEditorModel } from '../editor/TextEditorModel.js';
import { completeHashtag, hashtagQueryAt } from '../hashtags/tagNavigation.js';
import { createLogger } from '../../utils/logger.js';

export interface QuickEntryDependencies {
  bus: SignalBus;
  fileService: FileService;
  hashtags: HashtagIndex;
  panel: PanelController;
  engine: LineTransformEngine;
}

/** The bottom panel where new entries are typed and submitted. */
export class QuickEntryController {
  private readonly logger = createLogger({ service: 'QuickEntryController' });
  private readonly unsubscribers: Array<() => void> = [];
  readonly model = new TextEditorModel();

  constructor(private readonly deps: QuickEntryDependencies) {}

  start(): void {
    const { bus, panel, engine } = this.deps;

    this.unsubscribers.push(
      panel.registerFocusTarget('quickEntry'),
      bus.on('toggle-checkbox', () => {
        if (panel.isFocused('quickEntry')) {
          engine.toggleCheckbox(this.model);
        }
      }),
      bus.on('toggle-strikethrough', () => {
        if (panel.isFocused('quickEntry')) {
          engine.toggleStrikethrough(this.model);
        }
      })
    );
  }

  get text(): string {
    return this.model.text;
  }

  type(text: string): boolean {
    return this.model.insertText(text);
  }

  /** Appends the typed text as a new entry and clears the field. Blank text is ignored. */
  submit(): string | null {
    const appended = this.deps.fileService.append(this.model.text);
    if (appended === null) {
      return null;
    }

    this.model.setText('');
    this.model.setSelectedRange({ location: 0, length: 0 });
    this.deps.bus.emit('scroll-to-bottom');
    this.logger.info({ entryLength: appended.length }, 'Quick entry submitted');
    return appended;
  }

  /** Tag suggestions for the hashtag being typed at the cursor. */
  suggestions(): string[] {
    const query = hashtagQueryAt(this.model.text, this.model.selection.location);
    return query ? this.deps.hashtags.suggestions(query.prefix) : [];
  }

  completeHashtag(tag: string): boolean {
    const edit = completeHashtag(this.model.text, this.model.selection.location, tag);
    if (!edit) {
      return false;
    }

    const whole = { start: 0, length: this.model.text.length };
    if (!this.model.shouldChangeText(whole, edit.text)) {
      return false;
    }
    this.model.replaceCharacters(whole, edit.text);
    this.model.didChangeText();
    this.model.setSelectedRange({ location: edit.cursor, length: 0 });
    this.deps.hashtags.recordUsage(tag);
    return true;
  }

  /** Shift+Tab: hand focus to the main editor. */
  focusEditor(): void {
    this.deps.bus.emit('focus-editor');
  }

  dispose(): void {
    for (const unsubscribe of this.unsubscribers.splice(0)) {
      unsubscribe();
    }
  }
}
