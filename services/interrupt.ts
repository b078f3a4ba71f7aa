import { rm } from 'node:fs/promises';
import { CleanupError, describeError } from './errors';
import type { Logger } from './logger';

export type RemoveFile = (path: string) => Promise<void>;

export interface SignalSource {
  on(event: NodeJS.Signals, listener: () => void): unknown;
  off(event: NodeJS.Signals, listener: () => void): unknown;
}

const HANDLED_SIGNALS: NodeJS.Signals[] = ['SIGINT', 'SIGTERM'];

const removeIfExists: RemoveFile = (path) => rm(path, { force: true });

/**
 * Files this run owns and must delete before it exits. Paths are registered
 * before the file is written, so an interrupt that lands mid-write still
 * removes it.
 */
export class TransientAssets {
  private readonly paths = new Set<string>();
  private readonly creating = new Set<Promise<void>>();
  private released: Promise<void> | null = null;

  constructor(
    private readonly logger: Logger,
    private readonly remove: RemoveFile = removeIfExists
  ) {}

  register(path: string): void {
    this.paths.add(path);
  }

  /**
   * Registers `path`, then runs `create`. `release()` does not delete anything
   * until every tracked creation has settled, aborted ones included.
   */
  track<T>(path: string, create: () => Promise<T>): Promise<T> {
    this.register(path);
    const creation = create();
    const settled: Promise<void> = creation.then(
      () => {
        this.creating.delete(settled);
      },
      () => {
        this.creating.delete(settled);
      }
    );
    this.creating.add(settled);
    return creation;
  }

  list(): string[] {
    return [...this.paths];
  }

  /** Waits for tracked creations, then deletes every registered file once; later calls resolve with the first result. */
  release(): Promise<void> {
    if (!this.released) {
      this.released = this.removeAll();
    }
    return this.released;
  }

  private async removeAll(): Promise<void> {
    while (this.creating.size > 0) {
      await Promise.all([...this.creating]);
    }
    await Promise.all(
      this.list().map(async (path) => {
        try {
          await this.remove(path);
          this.logger.debug('asset.removed', { path });
        } catch (err) {
          const failure = new CleanupError(path, { cause: err });
          this.logger.warn('asset.cleanup_failed', { path, error: failure.message, cause: describeError(err) });
        }
      })
    );
  }
}

interface InterruptHandlerOptions {
  assets: TransientAssets;
  logger: Logger;
  exit?: (code: number) => void;
  signals?: SignalSource;
}

/**
 * Turns SIGINT/SIGTERM into an aborted signal for the running loop, then
 * releases the transient assets and exits. Nothing is printed on the way out.
 */
export class InterruptHandler {
  private readonly controller = new AbortController();
  private readonly assets: TransientAssets;
  private readonly logger: Logger;
  private readonly exit: (code: number) => void;
  private readonly signals: SignalSource;
  private readonly listeners = new Map<NodeJS.Signals, () => void>();
  private pending: Promise<void> | null = null;

  constructor({ assets, logger, exit = (code) => process.exit(code), signals = process }: InterruptHandlerOptions) {
    this.assets = assets;
    this.logger = logger;
    this.exit = exit;
    this.signals = signals;
  }

  install(): AbortSignal {
    for (const name of HANDLED_SIGNALS) {
      if (this.listeners.has(name)) continue;
      const listener = () => {
        this.logger.debug('interrupt.received', { signal: name });
        this.interrupt().catch((err: unknown) => {
          this.logger.error('interrupt.failed', { error: describeError(err) });
        });
      };
      this.listeners.set(name, listener);
      this.signals.on(name, listener);
    }
    return this.controller.signal;
  }

  dispose(): void {
    for (const [name, listener] of this.listeners) {
      this.signals.off(name, listener);
    }
    this.listeners.clear();
  }

  interrupt(): Promise<void> {
    if (!this.pending) {
      this.pending = this.shutdown();
    }
    return this.pending;
  }

  private async shutdown(): Promise<void> {
    this.controller.abort();
    await this.assets.release();
    this.dispose();
    this.exit(0);
  }
}
