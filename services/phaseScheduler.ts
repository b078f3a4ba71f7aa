import { BreathPhase, type PhaseDelay, type PhaseDelays } from '../types';
import { divide } from './fixedPoint';
import type { PacerConfig } from './config';

/**
 * Spreads a whole-second phase evenly over the bar's columns.
 * The per-column value is truncated, so `columns * seconds` may fall short of
 * the phase by less than one unit in the last digit per column. Nothing corrects for that.
 */
export const phaseDelay = (durationSeconds: number, columns: number): PhaseDelay => {
  const durationMs = durationSeconds * 1000;
  return {
    seconds: divide(durationMs, columns * 1000),
    milliseconds: Number(divide(durationMs, columns))
  };
};

export const schedulePhases = (config: Pick<PacerConfig, 'inhaleSeconds' | 'exhaleSeconds' | 'columns'>): PhaseDelays => ({
  [BreathPhase.INHALE]: phaseDelay(config.inhaleSeconds, config.columns),
  [BreathPhase.EXHALE]: phaseDelay(config.exhaleSeconds, config.columns)
});
