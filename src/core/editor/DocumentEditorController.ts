import type { SignalBus } from '../../events/SignalBus.js';
import type { DocumentSnapshot, FileService } from '../document/FileService.js';
import type { HashtagIndex } from '../hashtags/HashtagIndex.js';
import type { SearchMatch, SearchState } from '../search/SearchEngine.js';
import type { PanelController } from '../panel/PanelController.js';
import type { LineTransformEngine } from './LineTransformEngine.js';
import { TextEditorModel } from './TextEditorModel.js';
import { stripHash } from '../hashtags/HashtagIndex.js';
import { linesWithTag, nextTagOccurrence, type TagRange, type TaggedLine } from '../hashtags/tagNavigation.js';
import { createLogger } from '../../utils/logger.js';

export interface DocumentEditorDependencies {
  bus: SignalBus;
  fileService: FileService;
  hashtags: HashtagIndex;
  search: SearchState;
  panel: PanelController;
  engine: LineTransformEngine;
}

/**
 * Main editor over the whole document. Edits flow into the file service;
 * every document change flows back into the editor, the hashtag index and
 * the search matches.
 */
export class DocumentEditorController {
  private readonly logger = createLogger({ service: 'DocumentEditorController' });
  private readonly unsubscribers: Array<() => void> = [];
  private activeTagFilter: string | null = null;
  readonly model: TextEditorModel;

  constructor(private readonly deps: DocumentEditorDependencies) {
    this.model = new TextEditorModel(deps.fileService.content);
  }

  start(): void {
    const { bus, fileService, hashtags, search, panel, engine } = this.deps;

    this.model.setText(fileService.content);
    hashtags.rescan(fileService.content);
    search.refresh(fileService.content);

    this.unsubscribers.push(
      panel.registerFocusTarget('editor'),
      this.model.onTextChange((text) => {
        fileService.replace(text);
      }),
      fileService.subscribe((snapshot) => {
        this.onDocumentChanged(snapshot);
      }),
      bus.on('toggle-search', () => {
        search.toggle();
      }),
      bus.on('show-search', () => {
        search.show();
      }),
      bus.on('dismiss-search', () => {
        search.hide();
      }),
      bus.on('tag-clicked', (tag) => {
        this.activeTagFilter = stripHash(tag) || null;
      }),
      bus.on('clear-tag-filter', () => {
        this.activeTagFilter = null;
      }),
      bus.on('tag-jump', (tag) => {
        this.jumpToTag(tag);
      }),
      bus.on('toggle-checkbox', () => {
        if (panel.isFocused('editor')) {
          engine.toggleCheckbox(this.model);
        }
      }),
      bus.on('toggle-strikethrough', () => {
        if (panel.isFocused('editor')) {
          engine.toggleStrikethrough(this.model);
        }
      })
    );
  }

  get tagFilter(): string | null {
    return this.activeTagFilter;
  }

  /** Lines carrying the active tag filter, or null when no filter is set. */
  filteredLines(): TaggedLine[] | null {
    return this.activeTagFilter === null ? null : linesWithTag(this.model.text, this.activeTagFilter);
  }

  setSearchQuery(query: string): SearchMatch | null {
    return this.select(this.deps.search.setQuery(query, this.model.text));
  }

  nextMatch(): SearchMatch | null {
    return this.select(this.deps.search.next());
  }

  previousMatch(): SearchMatch | null {
    return this.select(this.deps.search.previous());
  }

  /** Selects the next `#tag` after the current selection, wrapping to the top. */
  jumpToTag(tag: string): TagRange | null {
    const { location, length } = this.model.selection;
    const range = nextTagOccurrence(this.model.text, tag, location + length);
    if (range) {
      this.model.setSelectedRange({ location: range.start, length: range.length });
    } else {
      this.logger.debug({ tag }, 'Tag not found in document');
    }
    return range;
  }

  dispose(): void {
    for (const unsubscribe of this.unsubscribers.splice(0)) {
      unsubscribe();
    }
  }

  private onDocumentChanged(snapshot: DocumentSnapshot): void {
    const { hashtags, search } = this.deps;

    this.model.setText(snapshot.content);
    if (snapshot.change.kind === 'append') {
      hashtags.applyAppend(snapshot.change.inserted);
    } else {
      hashtags.rescan(snapshot.content);
    }
    search.refresh(snapshot.content);
  }

  private select(match: SearchMatch | null): SearchMatch | null {
    if (match) {
      this.model.setSelectedRange({ location: match.start, length: match.length });
    }
    return match;
  }
}
