import { spawn, type SpawnOptions } from 'node:child_process';
import type { AssetHandle, AudioPlayer } from '../types';
import { describeError } from './errors';
import type { Logger } from './logger';

interface DetachedChild {
  on(event: 'error', listener: (err: Error) => void): unknown;
  unref(): void;
}

export type SpawnProcess = (command: string, args: string[], options: SpawnOptions) => DetachedChild;

/**
 * Plays a file with an external command (`aplay` by default) and walks away:
 * the child is detached, its output discarded, and a failure to start only
 * shows up in the debug log.
 */
export class CommandPlayer implements AudioPlayer {
  private readonly file: string;
  private readonly args: string[];

  constructor(
    command: string,
    private readonly logger: Logger,
    private readonly spawnProcess: SpawnProcess = spawn
  ) {
    const [file, ...args] = command.trim().split(/\s+/);
    this.file = file;
    this.args = args;
  }

  play(asset: AssetHandle): void {
    const onFailure = (err: unknown) => {
      this.logger.debug('playback.failed', { command: this.file, path: asset.path, error: describeError(err) });
    };

    try {
      const child = this.spawnProcess(this.file, [...this.args, asset.path], { detached: true, stdio: 'ignore' });
      child.on('error', onFailure);
      child.unref();
    } catch (err) {
      onFailure(err);
    }
  }
}
