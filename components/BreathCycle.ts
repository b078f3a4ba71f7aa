import { BreathPhase, type AudioPlayer, type PhaseDelay, type PhaseDelays, type PhaseTones } from '../types';
import { describeError, isAbortError } from '../services/errors';
import type { Logger } from '../services/logger';

export const PHASE_CAPTIONS: Record<BreathPhase, string> = {
  [BreathPhase.INHALE]: 'IN ',
  [BreathPhase.EXHALE]: 'OUT'
};

export const nextPhase = (phase: BreathPhase): BreathPhase =>
  phase === BreathPhase.INHALE ? BreathPhase.EXHALE : BreathPhase.INHALE;

export interface PhaseRenderer {
  render(caption: string, delay: PhaseDelay, signal?: AbortSignal): Promise<void>;
}

export interface BreathCycleOptions {
  renderer: PhaseRenderer;
  delays: PhaseDelays;
  signal: AbortSignal;
  logger: Logger;
  tones?: PhaseTones | null;
  player?: AudioPlayer | null;
}

/**
 * INHALE, EXHALE, INHALE, ... until the signal aborts. Each phase starts its
 * tone (if any) and then draws its bar; the tone is never waited on.
 * Resolves only on cancellation.
 */
export const runBreathCycle = async ({ renderer, delays, signal, logger, tones, player }: BreathCycleOptions): Promise<void> => {
  let phase = BreathPhase.INHALE;

  while (!signal.aborted) {
    if (tones && player) {
      try {
        player.play(tones[phase]);
      } catch (err) {
        logger.debug('playback.failed', { phase, error: describeError(err) });
      }
    }

    try {
      await renderer.render(PHASE_CAPTIONS[phase], delays[phase], signal);
    } catch (err) {
      if (signal.aborted || isAbortError(err)) return;
      throw err;
    }

    phase = nextPhase(phase);
  }
};
