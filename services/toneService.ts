import { execFile } from 'node:child_process';
import { writeFile } from 'node:fs/promises';
import path from 'node:path';
import { promisify } from 'node:util';
import {
  BreathPhase,
  type AssetHandle,
  type PhaseTones,
  type ToneBackend,
  type ToneSpec,
  type ToneSynthesizer
} from '../types';
import { encodeWav, FADE_IN_SECONDS, renderSweep, soxArgs } from './audioUtils';
import { ConfigurationError, describeError, ExternalToolError, isAbortError } from './errors';
import type { PacerConfig } from './config';
import type { TransientAssets } from './interrupt';
import type { Logger } from './logger';

const SYNTH_TIMEOUT_MS = 30000;

export type RunCommand = (
  file: string,
  args: string[],
  options: { signal?: AbortSignal; timeout: number }
) => Promise<unknown>;

const execFileAsync = promisify(execFile);
const runCommand: RunCommand = (file, args, options) => execFileAsync(file, args, options);

const errorField = (err: unknown, field: 'code' | 'stderr'): unknown =>
  err instanceof Error && field in err ? Reflect.get(err, field) : undefined;

/**
 * Generates tones with `sox ... synth`. The running sox is killed if the signal aborts.
 */
export class SoxSynthesizer implements ToneSynthesizer {
  constructor(
    private readonly command: string = 'sox',
    private readonly run: RunCommand = runCommand
  ) {}

  async synthesize(spec: ToneSpec, target: string, signal?: AbortSignal): Promise<AssetHandle> {
    try {
      await this.run(this.command, soxArgs(spec, target), { signal, timeout: SYNTH_TIMEOUT_MS });
    } catch (err) {
      if (isAbortError(err)) throw err;
      if (errorField(err, 'code') === 'ENOENT') {
        throw new ExternalToolError(this.command, `${this.command} not found. Install it or use --synth builtin`, { cause: err });
      }
      const stderr = String(errorField(err, 'stderr') ?? '').trim();
      throw new ExternalToolError(this.command, `${this.command} failed: ${stderr || describeError(err)}`, { cause: err });
    }
    return { path: target };
  }
}

/**
 * Renders the sweep in-process and writes a WAV file, for hosts without sox.
 */
export class WaveSynthesizer implements ToneSynthesizer {
  async synthesize(spec: ToneSpec, target: string, signal?: AbortSignal): Promise<AssetHandle> {
    const wav = encodeWav(renderSweep(spec));
    try {
      await writeFile(target, wav, { signal });
    } catch (err) {
      if (isAbortError(err)) throw err;
      throw new ExternalToolError('builtin', `Could not write ${target}: ${describeError(err)}`, { cause: err });
    }
    return { path: target };
  }
}

export const createSynthesizer = (backend: ToneBackend): ToneSynthesizer => {
  switch (backend) {
    case 'builtin':
      return new WaveSynthesizer();
    case 'sox':
    default:
      return new SoxSynthesizer();
  }
};

/** Tones end a little early so the player has time to start the next one. */
export const toneDurationMs = (phaseSeconds: number, latencyMs: number): number => {
  const duration = phaseSeconds * 1000 - latencyMs;
  if (duration <= 0) {
    throw new ConfigurationError(`Tone latency ${latencyMs} ms leaves no tone in a ${phaseSeconds} s phase`);
  }
  return duration;
};

interface PrepareTonesOptions {
  synthesizer: ToneSynthesizer;
  assets: TransientAssets;
  logger: Logger;
  signal?: AbortSignal;
  pid?: number;
}

/**
 * Generates the rising (inhale) and falling (exhale) tones once; every cycle
 * replays the same two files. File names carry the pid so concurrent runs
 * don't collide.
 */
export const prepareTones = async (
  config: PacerConfig,
  { synthesizer, assets, logger, signal, pid = process.pid }: PrepareTonesOptions
): Promise<PhaseTones> => {
  const plan = [
    { phase: BreathPhase.INHALE, file: `rising_${pid}.wav`, seconds: config.inhaleSeconds, startHz: config.toneLowHz, endHz: config.toneHighHz },
    { phase: BreathPhase.EXHALE, file: `falling_${pid}.wav`, seconds: config.exhaleSeconds, startHz: config.toneHighHz, endHz: config.toneLowHz }
  ];

  const handles = new Map<BreathPhase, AssetHandle>();
  for (const step of plan) {
    const target = path.join(config.tmpDir, step.file);
    const spec: ToneSpec = {
      durationMs: toneDurationMs(step.seconds, config.toneLatencyMs),
      startHz: step.startHz,
      endHz: step.endHz,
      fadeInSeconds: FADE_IN_SECONDS
    };

    signal?.throwIfAborted();
    const handle = await assets.track(target, () => synthesizer.synthesize(spec, target, signal));
    logger.info('tone.ready', { phase: step.phase, path: handle.path, durationMs: spec.durationMs });
    handles.set(step.phase, handle);
  }

  const inhale = handles.get(BreathPhase.INHALE);
  const exhale = handles.get(BreathPhase.EXHALE);
  if (!inhale || !exhale) {
    throw new ExternalToolError(config.synth, 'Tone generation did not produce both tones');
  }
  return { [BreathPhase.INHALE]: inhale, [BreathPhase.EXHALE]: exhale };
};
