import type { ToneSpec } from '../types';
import { divide } from './fixedPoint';

export const SAMPLE_RATE = 24000;
export const TONE_VOLUME = 0.8;
export const FADE_IN_SECONDS = 0.1;

const WAV_HEADER_BYTES = 44;

/**
 * Renders a mono sine sweep as 16-bit PCM. The frequency moves linearly from
 * `startHz` to `endHz` over the whole tone; the gain ramps linearly from 0 to
 * `volume` over the fade-in and then holds.
 */
export const renderSweep = (spec: ToneSpec, sampleRate: number = SAMPLE_RATE, volume: number = TONE_VOLUME): Int16Array => {
  const frameCount = Math.round((spec.durationMs * sampleRate) / 1000);
  const fadeFrames = Math.round(spec.fadeInSeconds * sampleRate);
  const samples = new Int16Array(frameCount);

  let phase = 0;
  for (let i = 0; i < frameCount; i++) {
    const gain = fadeFrames > 0 ? Math.min(1, i / fadeFrames) : 1;
    samples[i] = Math.round(Math.sin(phase) * gain * volume * 32767);

    const freq = spec.startHz + (spec.endHz - spec.startHz) * (i / frameCount);
    phase += (2 * Math.PI * freq) / sampleRate;
  }

  return samples;
};

/**
 * Wraps raw PCM 16-bit mono samples in a RIFF/WAVE container.
 */
export const encodeWav = (samples: Int16Array, sampleRate: number = SAMPLE_RATE): Buffer => {
  const dataBytes = samples.length * 2;
  const buf = Buffer.alloc(WAV_HEADER_BYTES + dataBytes);

  buf.write('RIFF', 0, 'ascii');
  buf.writeUInt32LE(36 + dataBytes, 4);
  buf.write('WAVE', 8, 'ascii');
  buf.write('fmt ', 12, 'ascii');
  buf.writeUInt32LE(16, 16); // fmt chunk size
  buf.writeUInt16LE(1, 20); // PCM
  buf.writeUInt16LE(1, 22); // mono
  buf.writeUInt32LE(sampleRate, 24);
  buf.writeUInt32LE(sampleRate * 2, 28); // byte rate
  buf.writeUInt16LE(2, 32); // block align
  buf.writeUInt16LE(16, 34); // bits per sample
  buf.write('data', 36, 'ascii');
  buf.writeUInt32LE(dataBytes, 40);

  for (let i = 0; i < samples.length; i++) {
    buf.writeInt16LE(samples[i], WAV_HEADER_BYTES + i * 2);
  }

  return buf;
};

/** Arguments for `sox -n <path> synth ...`, no fade-out. */
export const soxArgs = (spec: ToneSpec, path: string): string[] => [
  '-n',
  path,
  'synth',
  divide(spec.durationMs, 1000),
  'sine',
  `${spec.startHz}:${spec.endHz}`,
  'fade',
  String(spec.fadeInSeconds),
  '0'
];
