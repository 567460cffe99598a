import type { HotkeyHandler, HotkeyPort } from '../../ports/HotkeyPort.js';
import { isSameHotkey } from '../../core/settings/hotkeys.js';
import { createLogger } from '../../utils/logger.js';

/**
 * Holds the hotkey registration for a host shell that forwards key presses
 * (through `POST /hotkey/trigger`) instead of registering with the OS itself.
 */
export class LocalHotkeyAdapter implements HotkeyPort {
  private readonly logger = createLogger({ adapter: 'LocalHotkeyAdapter' });
  private readonly handlers: HotkeyHandler[] = [];
  private combination: string | null = null;

  get registered(): string | null {
    return this.combination;
  }

  register(combination: string): void {
    this.combination = combination;
    this.logger.info({ combination }, 'Global hotkey registered');
  }

  unregister(): void {
    if (this.combination) {
      this.logger.info({ combination: this.combination }, 'Global hotkey unregistered');
    }
    this.combination = null;
  }

  onTriggered(handler: HotkeyHandler): void {
    this.handlers.push(handler);
  }

  /** Returns true when `combination` matched the registration and handlers ran. */
  trigger(combination: string): boolean {
    if (!this.combination || !isSameHotkey(combination, this.combination)) {
      this.logger.debug({ combination, registered: this.combination }, 'Ignoring unregistered hotkey');
      return false;
    }
    for (const handler of this.handlers) {
      try {
        handler();
      } catch (error) {
        this.logger.error({ error, combination }, 'Hotkey handler failed');
      }
    }
    return true;
  }
}
