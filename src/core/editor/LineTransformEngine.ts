import { createLogger } from '../../utils/logger.js';
import { TextEditorModel, type EditableText, type Selection } from './TextEditorModel.js';
import {
  lineRangeAt,
  toggleCheckboxLine,
  toggleStrikethroughLine,
  type CheckboxMode,
  type LineTransform,
} from './lineTransforms.js';

export const CHECKBOX_RETRIGGER_MS = 100;

export type LineTransformKind = 'checkbox' | 'strikethrough';

export interface LineTransformEngineOptions {
  checkboxMode?: () => CheckboxMode;
  now?: () => number;
  retriggerMs?: number;
}

export interface TransformedText {
  text: string;
  selection: Selection;
  changed: boolean;
}

export class LineTransformEngine {
  private readonly logger = createLogger({ service: 'LineTransformEngine' });
  private readonly checkboxMode: () => CheckboxMode;
  private readonly now: () => number;
  private readonly retriggerMs: number;
  private lastCheckboxToggle = Number.NEGATIVE_INFINITY;

  constructor(options: LineTransformEngineOptions = {}) {
    this.checkboxMode = options.checkboxMode ?? (() => 'toggle');
    this.now = options.now ?? Date.now;
    this.retriggerMs = options.retriggerMs ?? CHECKBOX_RETRIGGER_MS;
  }

  /**
   * Cycles the checkbox marker on the cursor's line. A second trigger within
   * the retrigger window is dropped, since hosts can deliver the shortcut twice.
   */
  toggleCheckbox(editor: EditableText): boolean {
    const now = this.now();
    if (now - this.lastCheckboxToggle < this.retriggerMs) {
      this.logger.debug({ sinceLast: now - this.lastCheckboxToggle }, 'Ignoring repeated checkbox toggle');
      return false;
    }
    this.lastCheckboxToggle = now;

    const mode = this.checkboxMode();
    return this.apply(editor, (line) => toggleCheckboxLine(line, mode));
  }

  toggleStrikethrough(editor: EditableText): boolean {
    return this.apply(editor, toggleStrikethroughLine);
  }

  /** Runs a transform over detached text, for callers that keep no editor state. */
  transformText(text: string, selection: Selection, kind: LineTransformKind): TransformedText {
    const model = new TextEditorModel(text);
    model.setSelectedRange(selection);
    const transform: LineTransform =
      kind === 'checkbox'
        ? (line) => toggleCheckboxLine(line, this.checkboxMode())
        : toggleStrikethroughLine;
    const changed = this.apply(model, transform);
    return { text: model.text, selection: model.selection, changed };
  }

  private apply(editor: EditableText, transform: LineTransform): boolean {
    const { text, selection } = editor;
    const range = lineRangeAt(text, selection.location);
    const line = text.slice(range.start, range.start + range.length);
    const result = transform(line);

    if (!editor.shouldChangeText(range, result.line)) {
      this.logger.debug({ lineStart: range.start }, 'Editor rejected line replacement');
      return false;
    }

    editor.replaceCharacters(range, result.line);
    editor.didChangeText();

    // Floor is the edited line's start rather than 0, so removing a marker
    // never moves the cursor onto the previous line.
    const cursor = Math.max(
      range.start,
      Math.min(selection.location + result.cursorOffset, editor.text.length)
    );
    editor.setSelectedRange({ location: cursor, length: 0 });
    return true;
  }
}
