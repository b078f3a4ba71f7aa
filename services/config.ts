import os from 'node:os';
import { parseArgs } from 'node:util';
import { z } from 'zod';
import { ConfigurationError } from './errors';

const BOOLEAN_WORDS: Record<string, boolean> = {
  '1': true,
  true: true,
  yes: true,
  on: true,
  '0': false,
  false: false,
  no: false,
  off: false
};

// keeps every per-column delay a safe integer and within a single timer
export const MAX_PHASE_SECONDS = 3600;
export const MAX_COLUMNS = 1000;

const wholeNumber = () => z.coerce.number().int('Expected a whole number');

const flag = z.preprocess(
  (value) => (typeof value === 'string' ? BOOLEAN_WORDS[value.trim().toLowerCase()] ?? value : value),
  z.boolean()
);

const PacerConfigShape = z.object({
  inhaleSeconds: wholeNumber().positive().max(MAX_PHASE_SECONDS),
  exhaleSeconds: wholeNumber().positive().max(MAX_PHASE_SECONDS),
  columns: wholeNumber().min(2).max(MAX_COLUMNS),
  enableTone: flag,
  toneLatencyMs: wholeNumber().nonnegative(),
  toneHighHz: wholeNumber().positive(),
  toneLowHz: wholeNumber().positive(),
  synth: z.enum(['sox', 'builtin']),
  player: z.string().trim().min(1),
  tmpDir: z.string().trim().min(1),
  logLevel: z.enum(['debug', 'info', 'warn', 'error'])
});

export const PacerConfigSchema = PacerConfigShape.superRefine((cfg, ctx) => {
  if (!cfg.enableTone) return;
  // the tone is the phase minus the latency, so something has to be left over
  const shortestMs = Math.min(cfg.inhaleSeconds, cfg.exhaleSeconds) * 1000;
  if (cfg.toneLatencyMs >= shortestMs) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['toneLatencyMs'],
      message: `Must be shorter than the shortest phase (${shortestMs} ms)`
    });
  }
});

export type PacerConfig = Readonly<z.infer<typeof PacerConfigSchema>>;
export type ConfigKey = keyof PacerConfig;
export type ConfigInput = Partial<Record<ConfigKey, unknown>>;

export const defaultConfig = (): PacerConfig => ({
  inhaleSeconds: 2,
  exhaleSeconds: 4,
  columns: 40,
  enableTone: true,
  toneLatencyMs: 200,
  toneHighHz: 300,
  toneLowHz: 150,
  synth: 'sox',
  player: 'aplay',
  tmpDir: os.tmpdir(),
  logLevel: 'warn'
});

const FLAG_NAMES: Record<ConfigKey, string> = {
  inhaleSeconds: '--inhale',
  exhaleSeconds: '--exhale',
  columns: '--columns',
  enableTone: '--no-tone',
  toneLatencyMs: '--tone-latency',
  toneHighHz: '--tone-high',
  toneLowHz: '--tone-low',
  synth: '--synth',
  player: '--player',
  tmpDir: '--tmp-dir',
  logLevel: '--verbose'
};

const ENV_NAMES: Record<ConfigKey, string> = {
  inhaleSeconds: 'PACER_INHALE',
  exhaleSeconds: 'PACER_EXHALE',
  columns: 'PACER_COLUMNS',
  enableTone: 'PACER_TONE',
  toneLatencyMs: 'PACER_TONE_LATENCY_MS',
  toneHighHz: 'PACER_TONE_HIGH_HZ',
  toneLowHz: 'PACER_TONE_LOW_HZ',
  synth: 'PACER_SYNTH',
  player: 'PACER_PLAYER',
  tmpDir: 'PACER_TMP_DIR',
  logLevel: 'PACER_LOG_LEVEL'
};

const CONFIG_KEYS = PacerConfigShape.keyof().options;
const FLAG_LOOKUP = new Map<PropertyKey, string>(Object.entries(FLAG_NAMES));

export const USAGE = `Usage: paced-breathing [options]

Draws a bar that fills while you breathe in, then again while you breathe out,
until interrupted with Ctrl+C.

Options:
  --inhale <s>          seconds to breathe in, 1-${MAX_PHASE_SECONDS} (default 2)
  --exhale <s>          seconds to breathe out, 1-${MAX_PHASE_SECONDS} (default 4)
  --columns <n>         width of the bar, 2-${MAX_COLUMNS} (default 40)
  --no-tone             do not play rising/falling tones
  --tone-latency <ms>   how much shorter each tone is than its phase (default 200)
  --tone-high <hz>      upper tone frequency (default 300)
  --tone-low <hz>       lower tone frequency (default 150)
  --synth <backend>     tone generator: sox or builtin (default sox)
  --player <cmd>        command used to play tones (default aplay)
  --tmp-dir <dir>       where generated tones are written (default: OS temp dir)
  -v, --verbose         log diagnostics to stderr
  -h, --help            show this help

Every option can also be set from the environment: ${CONFIG_KEYS.map((k) => ENV_NAMES[k]).join(', ')}.
`;

export interface CommandLine {
  help: boolean;
  overrides: ConfigInput;
}

const readFlags = (argv: string[]) => {
  try {
    return parseArgs({
      args: argv,
      strict: true,
      allowPositionals: false,
      options: {
        inhale: { type: 'string' },
        exhale: { type: 'string' },
        columns: { type: 'string' },
        'no-tone': { type: 'boolean' },
        'tone-latency': { type: 'string' },
        'tone-high': { type: 'string' },
        'tone-low': { type: 'string' },
        synth: { type: 'string' },
        player: { type: 'string' },
        'tmp-dir': { type: 'string' },
        verbose: { type: 'boolean', short: 'v' },
        help: { type: 'boolean', short: 'h' }
      }
    }).values;
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ConfigurationError(message, { cause: err });
  }
};

export const parseCommandLine = (argv: string[]): CommandLine => {
  const values = readFlags(argv);

  const overrides: ConfigInput = {
    inhaleSeconds: values.inhale,
    exhaleSeconds: values.exhale,
    columns: values.columns,
    enableTone: values['no-tone'] ? false : undefined,
    toneLatencyMs: values['tone-latency'],
    toneHighHz: values['tone-high'],
    toneLowHz: values['tone-low'],
    synth: values.synth,
    player: values.player,
    tmpDir: values['tmp-dir'],
    logLevel: values.verbose ? 'debug' : undefined
  };

  return { help: values.help === true, overrides };
};

export const envOverrides = (env: NodeJS.ProcessEnv): ConfigInput => {
  const overrides: ConfigInput = {};
  for (const key of CONFIG_KEYS) {
    const raw = env[ENV_NAMES[key]];
    if (raw !== undefined && raw.trim() !== '') overrides[key] = raw;
  }
  return overrides;
};

/**
 * Layers the sources over the defaults (later sources win, undefined never
 * overrides) and validates the result.
 */
export const resolveConfig = (sources: ConfigInput[], base: PacerConfig = defaultConfig()): PacerConfig => {
  const merged: ConfigInput = { ...base };
  for (const source of sources) {
    for (const key of CONFIG_KEYS) {
      if (source[key] !== undefined) merged[key] = source[key];
    }
  }

  const parsed = PacerConfigSchema.safeParse(merged);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => {
        const key = issue.path[0];
        return `${FLAG_LOOKUP.get(key) ?? String(key)}: ${issue.message}`;
      })
      .join('; ');
    throw new ConfigurationError(`Invalid configuration: ${details}`, { cause: parsed.error });
  }
  return Object.freeze(parsed.data);
};

export const loadConfig = (argv: string[], env: NodeJS.ProcessEnv): { help: boolean; config: PacerConfig | null } => {
  const { help, overrides } = parseCommandLine(argv);
  if (help) return { help, config: null };
  return { help, config: resolveConfig([envOverrides(env), overrides]) };
};
