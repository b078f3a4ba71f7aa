export enum BreathPhase {
  INHALE = 'INHALE',
  EXHALE = 'EXHALE'
}

export type ToneBackend = 'sox' | 'builtin';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface PhaseDelay {
  seconds: string; // fixed 5-digit decimal, e.g. "0.05000"
  milliseconds: number;
}

export type PhaseDelays = Record<BreathPhase, PhaseDelay>;

export interface ToneSpec {
  durationMs: number;
  startHz: number;
  endHz: number;
  fadeInSeconds: number;
}

export interface AssetHandle {
  path: string;
}

export type PhaseTones = Record<BreathPhase, AssetHandle>;

export interface ToneSynthesizer {
  synthesize(spec: ToneSpec, path: string, signal?: AbortSignal): Promise<AssetHandle>;
}

export interface AudioPlayer {
  play(asset: AssetHandle): void;
}

export interface TerminalOutput {
  write(chunk: string): unknown;
}

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;
