import type { TextRange } from './lineTransforms.js';

export interface Selection {
  location: number;
  length: number;
}

/** The editing surface line transforms operate on. */
export interface EditableText {
  readonly text: string;
  readonly selection: Selection;
  shouldChangeText(range: TextRange, replacement: string): boolean;
  replaceCharacters(range: TextRange, replacement: string): void;
  didChangeText(): void;
  setSelectedRange(selection: Selection): void;
}

export type TextChangeListener = (text: string) => void;

function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(value, max));
}

/**
 * In-memory text widget: a string, a selection and a text-changed callback.
 * Programmatic `setText` does not notify; edits do.
 */
export class TextEditorModel implements EditableText {
  private value: string;
  private range: Selection = { location: 0, length: 0 };
  private readonly listeners = new Set<TextChangeListener>();
  readOnly = false;

  constructor(initialText = '') {
    this.value = initialText;
    this.range = { location: initialText.length, length: 0 };
  }

  get text(): string {
    return this.value;
  }

  get selection(): Selection {
    return { ...this.range };
  }

  onTextChange(listener: TextChangeListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /** Replaces the text from outside (e.g. the document changed) without notifying. */
  setText(text: string): void {
    if (text === this.value) {
      return;
    }
    this.value = text;
    this.setSelectedRange(this.range);
  }

  /** Types `text` over the current selection, as a user edit. */
  insertText(text: string): boolean {
    const range = { start: this.range.location, length: this.range.length };
    if (!this.shouldChangeText(range, text)) {
      return false;
    }
    this.replaceCharacters(range, text);
    this.didChangeText();
    this.setSelectedRange({ location: range.start + text.length, length: 0 });
    return true;
  }

  shouldChangeText(_range: TextRange, _replacement: string): boolean {
    return !this.readOnly;
  }

  replaceCharacters(range: TextRange, replacement: string): void {
    const start = clamp(range.start, 0, this.value.length);
    const end = clamp(range.start + range.length, start, this.value.length);
    this.value = this.value.slice(0, start) + replacement + this.value.slice(end);
  }

  didChangeText(): void {
    for (const listener of this.listeners) {
      listener(this.value);
    }
  }

  setSelectedRange(selection: Selection): void {
    const location = clamp(selection.location, 0, this.value.length);
    const length = clamp(selection.length, 0, this.value.length - location);
    this.range = { location, length };
  }
}
