/**
 * Synthetic signal tests
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import {
  generateCircadianSignal,
  generateFlatLine,
  generateRamp,
  generateRecording,
  generateSineWave,
} from '../../../src/signal/synthetic';

describe('generators', () => {
  it('should count up from the start value', () => {
    expect(generateRamp(3)).toEqual([1, 2, 3]);
    expect(generateRamp(3, 0)).toEqual([0, 1, 2]);
  });

  it('should fill a flat line', () => {
    expect(generateFlatLine(2, 7)).toEqual([7, 7]);
    expect(generateFlatLine(2)).toEqual([0, 0]);
  });

  it('should sample a sine wave at the given rate', () => {
    const wave = generateSineWave(1, 4, 1, 100);

    expect(wave).toHaveLength(4);
    expect(wave[0]).toBe(0);
    expect(wave[1]).toBeCloseTo(100, 9);
    expect(wave[2]).toBeCloseTo(0, 9);
    expect(wave[3]).toBeCloseTo(-100, 9);
  });

  it('should put the fast rhythm on a slow drift', () => {
    const signal = generateCircadianSignal(1, 4, 1, 100);

    expect(signal).toHaveLength(4);
    expect(signal[0]).toBe(0);
    expect(signal[1]).toBeCloseTo(50, 2);
  });
});

describe('generateRecording', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should lay out records from the sample rate', () => {
    const recording = generateRecording({
      durationSeconds: 3,
      recordDurationSeconds: 2,
      signals: [
        { label: 'EEG', sampleRate: 4, shape: 'ramp' },
        { label: 'ECG', sampleRate: 2, shape: 'flat' },
      ],
    });

    expect(recording.header).toEqual({ recordCount: 2, recordDurationSeconds: 2 });
    expect(recording.signals.map(s => [s.label, s.samplesPerRecord, s.samples.length])).toEqual([
      ['EEG', 8, 12],
      ['ECG', 4, 6],
    ]);
    expect(recording.signals[0].samples).toEqual(generateRamp(12));
  });

  it('should keep noise within its amplitude', () => {
    const recording = generateRecording({
      durationSeconds: 100,
      signals: [{ label: 'A', sampleRate: 10, shape: 'flat', noise: 0.5 }],
    });
    const { samples } = recording.signals[0];

    expect(samples).toHaveLength(1000);
    expect(samples.every(value => value >= -0.5 && value <= 0.5)).toBe(true);
  });

  it('should scale each random draw to the noise amplitude', () => {
    vi.spyOn(Math, 'random').mockReturnValue(0.75);

    const recording = generateRecording({
      durationSeconds: 2,
      signals: [{ label: 'A', sampleRate: 2, shape: 'flat', noise: 0.5 }],
    });

    expect(recording.signals[0].samples).toEqual([0.25, 0.25, 0.25, 0.25]);
  });

  it('should leave samples untouched without noise', () => {
    const random = vi.spyOn(Math, 'random');

    generateRecording({ durationSeconds: 2, signals: [{ label: 'A', sampleRate: 2, shape: 'flat' }] });

    expect(random).not.toHaveBeenCalled();
  });
});
