import type { HotkeyPort } from '../../ports/HotkeyPort.js';
import { createLogger } from '../../utils/logger.js';

export class DisabledHotkeyAdapter implements HotkeyPort {
  private readonly logger = createLogger({ adapter: 'DisabledHotkeyAdapter' });

  readonly registered = null;

  register(combination: string): void {
    this.logger.warn({ combination }, 'Hotkeys are disabled; not registering global hotkey');
  }

  unregister(): void {
    // Nothing is ever registered
  }

  onTriggered(): void {
    this.logger.warn('Hotkeys are disabled; trigger handler will never run');
  }
}
