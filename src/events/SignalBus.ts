import { EventEmitter } from 'node:events';
import { createLogger } from '../utils/logger.js';

export type FocusTarget = 'quickEntry' | 'editor';

/** Payload carried by each signal; `void` signals carry nothing. */
export interface SignalPayloads {
  'focus-request': FocusTarget | undefined;
  'focus-editor': void;
  'hotkey-changed': string;
  'tag-jump': string;
  'tag-clicked': string;
  'clear-tag-filter': void;
  'toggle-checkbox': void;
  'toggle-strikethrough': void;
  'toggle-search': void;
  'show-search': void;
  'dismiss-search': void;
  'scroll-to-bottom': void;
}

export type SignalName = keyof SignalPayloads;

export const SIGNAL_NAMES: readonly SignalName[] = [
  'focus-request',
  'focus-editor',
  'hotkey-changed',
  'tag-jump',
  'tag-clicked',
  'clear-tag-filter',
  'toggle-checkbox',
  'toggle-strikethrough',
  'toggle-search',
  'show-search',
  'dismiss-search',
  'scroll-to-bottom',
];

export type SignalListener<K extends SignalName> = (payload: SignalPayloads[K]) => void;

/** Signals that may be emitted without a payload. */
type OptionalPayloadSignal = {
  [K in SignalName]: undefined extends SignalPayloads[K] ? K : never;
}[SignalName];

export function isSignalName(value: string): value is SignalName {
  return SIGNAL_NAMES.some((name) => name === value);
}

/**
 * Fire-and-forget broadcast between components. A listener that throws is
 * logged and the remaining listeners still run.
 */
export class SignalBus {
  private readonly logger = createLogger({ component: 'SignalBus' });
  private readonly emitter = new EventEmitter();

  constructor() {
    this.emitter.setMaxListeners(50);
  }

  on<K extends SignalName>(signal: K, listener: SignalListener<K>): () => void {
    const wrapped = (payload: SignalPayloads[K]): void => {
      try {
        listener(payload);
      } catch (error) {
        this.logger.error({ error, signal }, 'Signal listener failed');
      }
    };
    this.emitter.on(signal, wrapped);
    return () => {
      this.emitter.off(signal, wrapped);
    };
  }

  emit<K extends OptionalPayloadSignal>(signal: K, payload?: SignalPayloads[K]): void;
  emit<K extends SignalName>(signal: K, payload: SignalPayloads[K]): void;
  emit(signal: SignalName, payload?: unknown): void {
    this.logger.debug({ signal, payload }, 'Signal emitted');
    this.emitter.emit(signal, payload);
  }

  listenerCount(signal: SignalName): number {
    return this.emitter.listenerCount(signal);
  }
}
