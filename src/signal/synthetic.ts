/**
 * Synthetic Signal Generator
 *
 * Generates long test recordings: ramps for exact layout checks, and a
 * slow "circadian" drift with a faster rhythm on top for visual review.
 *
 * @module signal/synthetic
 */

import type { Recording, SignalTrace } from '../types';

export type SyntheticShape = 'ramp' | 'sine' | 'flat' | 'circadian';

/**
 * One synthetic channel
 */
export interface SyntheticSignalOptions {
  label: string;
  /** Samples per second */
  sampleRate: number;
  shape: SyntheticShape;
  /** Sine frequency in Hz (default 1) */
  frequency?: number;
  /** Peak amplitude (default 100) */
  amplitude?: number;
  /** Uniform noise amplitude (default 0) */
  noise?: number;
}

/**
 * Synthetic recording options
 */
export interface SyntheticRecordingOptions {
  /** Total duration in seconds */
  durationSeconds: number;
  /** Data record duration in seconds (default 1) */
  recordDurationSeconds?: number;
  signals: SyntheticSignalOptions[];
}

/**
 * `start, start + 1, ...`, `length` values
 */
export function generateRamp(length: number, start: number = 1): number[] {
  return Array.from({ length }, (_, i) => start + i);
}

/**
 * Generate a flat line signal (for testing)
 */
export function generateFlatLine(length: number, value: number = 0): number[] {
  return new Array<number>(length).fill(value);
}

export function generateSineWave(
  durationSeconds: number,
  sampleRate: number,
  frequency: number = 1,
  amplitude: number = 100
): number[] {
  const totalSamples = Math.round(sampleRate * durationSeconds);
  return Array.from({ length: totalSamples }, (_, i) =>
    amplitude * Math.sin((2 * Math.PI * frequency * i) / sampleRate)
  );
}

/**
 * 24-hour drift plus a faster rhythm at `frequency`
 */
export function generateCircadianSignal(
  durationSeconds: number,
  sampleRate: number,
  frequency: number = 1,
  amplitude: number = 100
): number[] {
  const totalSamples = Math.round(sampleRate * durationSeconds);
  const day = 24 * 3600;

  return Array.from({ length: totalSamples }, (_, i) => {
    const t = i / sampleRate;
    const drift = 0.5 * amplitude * Math.sin((2 * Math.PI * t) / day);
    return drift + 0.5 * amplitude * Math.sin(2 * Math.PI * frequency * t);
  });
}

/**
 * Add random noise to signal
 */
function addNoise(samples: number[], noiseLevel: number): number[] {
  return samples.map(s => s + (Math.random() - 0.5) * 2 * noiseLevel);
}

function shapeSamples(
  shape: SyntheticShape,
  length: number,
  durationSeconds: number,
  sampleRate: number,
  frequency: number,
  amplitude: number
): number[] {
  switch (shape) {
    case 'ramp':
      return generateRamp(length);
    case 'flat':
      return generateFlatLine(length);
    case 'sine':
      return generateSineWave(durationSeconds, sampleRate, frequency, amplitude);
    case 'circadian':
      return generateCircadianSignal(durationSeconds, sampleRate, frequency, amplitude);
  }
}

function generateTrace(
  signal: SyntheticSignalOptions,
  durationSeconds: number,
  recordDurationSeconds: number
): SignalTrace {
  const samplesPerRecord = Math.round(signal.sampleRate * recordDurationSeconds);
  const length = Math.round(signal.sampleRate * durationSeconds);
  const frequency = signal.frequency ?? 1;
  const amplitude = signal.amplitude ?? 100;

  let samples = shapeSamples(signal.shape, length, durationSeconds, signal.sampleRate, frequency, amplitude);

  if (signal.noise && signal.noise > 0) {
    samples = addNoise(samples, signal.noise);
  }

  return { label: signal.label, samplesPerRecord, samples };
}

/**
 * Generate a multi-signal recording
 */
export function generateRecording(options: SyntheticRecordingOptions): Recording {
  const recordDurationSeconds = options.recordDurationSeconds ?? 1;

  return {
    header: {
      recordCount: Math.ceil(options.durationSeconds / recordDurationSeconds),
      recordDurationSeconds,
    },
    signals: options.signals.map(s => generateTrace(s, options.durationSeconds, recordDurationSeconds)),
  };
}
