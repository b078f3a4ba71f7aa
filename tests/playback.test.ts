import { EventEmitter } from 'node:events';
import { describe, test, expect, vi } from 'vitest';
import { createLogger, silentLogger } from '../services/logger';
import { CommandPlayer, type SpawnProcess } from '../services/playback';

const fakeChild = () => Object.assign(new EventEmitter(), { unref: vi.fn() });

describe('CommandPlayer', () => {
  test('spawns the player detached with output discarded', () => {
    const child = fakeChild();
    const spawnProcess = vi.fn<SpawnProcess>(() => child);

    new CommandPlayer('aplay', silentLogger, spawnProcess).play({ path: '/tmp/rising_1.wav' });

    expect(spawnProcess).toHaveBeenCalledWith('aplay', ['/tmp/rising_1.wav'], { detached: true, stdio: 'ignore' });
    expect(child.unref).toHaveBeenCalledTimes(1);
  });

  test('extra words in the command become arguments before the file', () => {
    const spawnProcess = vi.fn<SpawnProcess>(() => fakeChild());

    new CommandPlayer('  paplay --volume 40000 ', silentLogger, spawnProcess).play({ path: '/tmp/falling_1.wav' });

    expect(spawnProcess).toHaveBeenCalledWith('paplay', ['--volume', '40000', '/tmp/falling_1.wav'], {
      detached: true,
      stdio: 'ignore'
    });
  });

  test('a player that fails to start is only logged', () => {
    const lines: string[] = [];
    const logger = createLogger({ level: 'debug', sink: (line) => lines.push(line) });
    const child = fakeChild();

    new CommandPlayer('aplay', logger, () => child).play({ path: '/tmp/rising_1.wav' });
    child.emit('error', new Error('spawn aplay ENOENT'));

    expect(lines).toHaveLength(1);
    expect(JSON.parse(lines[0].slice('[pacer] '.length))).toMatchObject({
      level: 'DEBUG',
      event: 'playback.failed',
      command: 'aplay',
      path: '/tmp/rising_1.wav',
      error: 'spawn aplay ENOENT'
    });
  });

  test('a spawn that throws does not reach the caller', () => {
    const player = new CommandPlayer('aplay', silentLogger, () => {
      throw new Error('EAGAIN');
    });

    expect(() => player.play({ path: '/tmp/rising_1.wav' })).not.toThrow();
  });
});
