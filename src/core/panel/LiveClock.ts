import cron from 'node-cron';
import { createLogger } from '../../utils/logger.js';
import { formatTimestamp } from '../document/entryFormat.js';

// Six fields: node-cron's leading field is seconds.
export const EVERY_SECOND = '* * * * * *';

export interface TickTask {
  stop(): void;
}

export type TickScheduler = (expression: string, tick: () => void) => TickTask;

export const cronScheduler: TickScheduler = (expression, tick) => cron.schedule(expression, tick);

export type ClockListener = (display: string) => void;

/** Live timestamp shown above the quick entry; always includes seconds. */
export class LiveClock {
  private readonly logger = createLogger({ component: 'LiveClock' });
  private readonly listeners = new Set<ClockListener>();
  private task: TickTask | null = null;
  private display = '';

  constructor(
    private readonly timezone: () => string,
    private readonly scheduler: TickScheduler = cronScheduler,
    private readonly now: () => Date = () => new Date()
  ) {}

  get current(): string {
    return this.display;
  }

  get running(): boolean {
    return this.task !== null;
  }

  start(): void {
    if (this.task) {
      return;
    }
    this.tick();
    this.task = this.scheduler(EVERY_SECOND, () => this.tick());
    this.logger.debug('Live clock started');
  }

  stop(): void {
    this.task?.stop();
    this.task = null;
  }

  onTick(listener: ClockListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  tick(): void {
    this.display = formatTimestamp(this.now(), this.timezone(), { seconds: true });
    for (const listener of this.listeners) {
      try {
        listener(this.display);
      } catch (error) {
        this.logger.error({ error }, 'Clock listener failed');
      }
    }
  }
}
