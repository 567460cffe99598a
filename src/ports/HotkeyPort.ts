export type HotkeyHandler = () => void;

/** System-wide shortcut that summons the capture panel. */
export interface HotkeyPort {
  register(combination: string): void;
  unregister(): void;
  onTriggered(handler: HotkeyHandler): void;
  /** The combination currently registered, or null. */
  readonly registered: string | null;
  /** Deliver a key press from the host shell. Optional; OS-level adapters fire on their own. */
  trigger?(combination: string): boolean;
}
