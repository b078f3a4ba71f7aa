import { BarGraph } from './components/BarGraph';
import { runBreathCycle } from './components/BreathCycle';
import { loadConfig, USAGE, type PacerConfig } from './services/config';
import { describeError } from './services/errors';
import { InterruptHandler, TransientAssets, type SignalSource } from './services/interrupt';
import { createLogger } from './services/logger';
import { CommandPlayer } from './services/playback';
import { schedulePhases } from './services/phaseScheduler';
import { createSynthesizer, prepareTones } from './services/toneService';
import { BreathPhase, type AudioPlayer, type PhaseTones, type Sleep, type TerminalOutput, type ToneSynthesizer } from './types';

/** Seams for tests; production leaves them all unset. */
export interface AppDependencies {
  output?: TerminalOutput;
  report?: (message: string) => void;
  logSink?: (line: string) => void;
  sleep?: Sleep;
  synthesizer?: ToneSynthesizer;
  player?: AudioPlayer;
  signals?: SignalSource;
  exit?: (code: number) => void;
  pid?: number;
}

/**
 * Reads the configuration, prepares the tones and runs the breathing loop.
 * Resolves with an exit code: 0 after --help or cancellation, 1 when startup
 * fails. While the loop runs, an interrupt ends the process from the
 * interrupt handler; any other loop failure releases the tones and rejects.
 */
export const runApp = async (argv: string[], env: NodeJS.ProcessEnv, deps: AppDependencies = {}): Promise<number> => {
  const output = deps.output ?? process.stdout;
  const report = deps.report ?? ((message: string) => console.error(message));

  let config: PacerConfig;
  try {
    const loaded = loadConfig(argv, env);
    if (!loaded.config) {
      output.write(USAGE);
      return 0;
    }
    config = loaded.config;
  } catch (err) {
    report(describeError(err));
    return 1;
  }

  const logger = createLogger({ level: config.logLevel, sink: deps.logSink });
  const delays = schedulePhases(config);

  const assets = new TransientAssets(logger);
  const interrupt = new InterruptHandler({ assets, logger, exit: deps.exit, signals: deps.signals });
  const signal = interrupt.install();

  let tones: PhaseTones | null = null;
  if (config.enableTone) {
    try {
      tones = await prepareTones(config, {
        synthesizer: deps.synthesizer ?? createSynthesizer(config.synth),
        assets,
        logger,
        signal,
        pid: deps.pid
      });
    } catch (err) {
      // an interrupt during synthesis is already cleaning up and exiting
      if (signal.aborted) return 0;
      logger.error('tone.synthesis_failed', { synth: config.synth, error: describeError(err) });
      report(describeError(err));
      await assets.release();
      interrupt.dispose();
      return 1;
    }
  }

  logger.info('cycle.start', {
    columns: config.columns,
    inhaleSecondsPerColumn: delays[BreathPhase.INHALE].seconds,
    exhaleSecondsPerColumn: delays[BreathPhase.EXHALE].seconds,
    tones: tones !== null
  });

  try {
    await runBreathCycle({
      renderer: new BarGraph({ columns: config.columns, output, sleep: deps.sleep }),
      delays,
      signal,
      logger,
      tones,
      player: tones ? deps.player ?? new CommandPlayer(config.player, logger) : null
    });
  } catch (err) {
    logger.error('cycle.failed', { error: describeError(err) });
    await assets.release();
    interrupt.dispose();
    throw err;
  }

  return 0;
};
