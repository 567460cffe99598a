import type { FocusTarget, SignalBus } from '../../events/SignalBus.js';
import type { HotkeyPort } from '../../ports/HotkeyPort.js';
import type { SettingsService } from '../settings/SettingsService.js';
import type { LiveClock } from './LiveClock.js';
import { createLogger } from '../../utils/logger.js';
import { FocusRaceError } from '../../utils/errors.js';

export const SHOW_FOCUS_DELAY_MS = 150;
export const FOCUS_DELAY_MS = 100;

export interface PanelControllerDependencies {
  bus: SignalBus;
  hotkey: HotkeyPort;
  settings: SettingsService;
  clock: LiveClock;
}

export interface PanelState {
  visible: boolean;
  focused: FocusTarget | null;
  clock: string;
  hotkey: string | null;
}

/**
 * Floating panel lifecycle: the global hotkey toggles it, and focus requests
 * land a short moment later, once the views they target have appeared.
 */
export class PanelController {
  private readonly logger = createLogger({ service: 'PanelController' });
  private readonly targets = new Set<FocusTarget>();
  private readonly timers = new Set<NodeJS.Timeout>();
  private readonly unsubscribers: Array<() => void> = [];
  private visible = false;
  private focusedTarget: FocusTarget | null = null;

  constructor(private readonly deps: PanelControllerDependencies) {}

  start(): void {
    const { bus, hotkey, settings } = this.deps;

    hotkey.onTriggered(() => {
      this.toggle();
    });
    hotkey.register(settings.get().globalHotkey);

    this.unsubscribers.push(
      bus.on('hotkey-changed', (combination) => {
        hotkey.unregister();
        hotkey.register(combination);
      }),
      bus.on('focus-request', (target) => {
        this.requestFocus(target ?? 'quickEntry');
      }),
      bus.on('focus-editor', () => {
        this.requestFocus('editor');
      })
    );
  }

  get isVisible(): boolean {
    return this.visible;
  }

  get focused(): FocusTarget | null {
    return this.focusedTarget;
  }

  isFocused(target: FocusTarget): boolean {
    return this.visible && this.focusedTarget === target;
  }

  /** Views announce themselves here; the returned function removes them again. */
  registerFocusTarget(target: FocusTarget): () => void {
    this.targets.add(target);
    return () => {
      this.targets.delete(target);
      if (this.focusedTarget === target) {
        this.focusedTarget = null;
      }
    };
  }

  show(): void {
    if (this.visible) {
      return;
    }
    this.visible = true;
    this.deps.clock.start();
    this.logger.info('Panel shown');
    this.requestFocus('quickEntry', SHOW_FOCUS_DELAY_MS);
  }

  hide(): void {
    if (!this.visible) {
      return;
    }
    this.visible = false;
    this.focusedTarget = null;
    this.clearTimers();
    this.deps.clock.stop();
    this.logger.info('Panel hidden');
  }

  toggle(): boolean {
    if (this.visible) {
      this.hide();
    } else {
      this.show();
    }
    return this.visible;
  }

  requestFocus(target: FocusTarget, delayMs = FOCUS_DELAY_MS): void {
    const timer = setTimeout(() => {
      this.timers.delete(timer);
      try {
        this.applyFocus(target);
      } catch (error) {
        if (!(error instanceof FocusRaceError)) {
          throw error;
        }
        this.logger.debug({ target, reason: error.message }, 'Focus request dropped');
      }
    }, delayMs);
    this.timers.add(timer);
  }

  state(): PanelState {
    return {
      visible: this.visible,
      focused: this.focusedTarget,
      clock: this.deps.clock.current,
      hotkey: this.deps.hotkey.registered,
    };
  }

  dispose(): void {
    this.clearTimers();
    for (const unsubscribe of this.unsubscribers.splice(0)) {
      unsubscribe();
    }
    this.deps.hotkey.unregister();
    this.deps.clock.stop();
  }

  private applyFocus(target: FocusTarget): void {
    if (!this.visible) {
      throw new FocusRaceError(target, 'Panel is hidden');
    }
    if (!this.targets.has(target)) {
      throw new FocusRaceError(target, 'Focus target no longer exists');
    }
    this.focusedTarget = target;
  }

  private clearTimers(): void {
    for (const timer of this.timers) {
      clearTimeout(timer);
    }
    this.timers.clear();
  }
}
