/**
 * Signal selection tests
 */

import { describe, it, expect } from 'vitest';
import { buildSignalIndex, isAnnotationLabel, resolveSignalIndexes } from '../../../src/heatmap/signal-index';
import { LabelNotFoundError } from '../../../src/utils/validation';

const labels = ['EEG', 'EDF Annotations', 'ECG', 'EEG', 'AIRFLOW'];

describe('isAnnotationLabel', () => {
  it('should match annotation channels regardless of case and padding', () => {
    expect(isAnnotationLabel('EDF Annotations')).toBe(true);
    expect(isAnnotationLabel(' edf annotations ')).toBe(true);
  });

  it('should not match data channels', () => {
    expect(isAnnotationLabel('ECG')).toBe(false);
    expect(isAnnotationLabel('Annotations')).toBe(false);
  });
});

describe('buildSignalIndex', () => {
  it('should map each label to its first occurrence', () => {
    const index = buildSignalIndex(labels);

    expect(index.get('EEG')).toBe(0);
    expect(index.get('ECG')).toBe(2);
    expect(index.get('AIRFLOW')).toBe(4);
    expect(index.size).toBe(4);
  });
});

describe('resolveSignalIndexes', () => {
  it('should return indexes in request order', () => {
    expect(resolveSignalIndexes(labels, ['AIRFLOW', 'EEG'])).toEqual([4, 0]);
  });

  it('should select every data channel when nothing is requested', () => {
    expect(resolveSignalIndexes(labels)).toEqual([0, 2, 3, 4]);
    expect(resolveSignalIndexes(labels, [])).toEqual([0, 2, 3, 4]);
  });

  it('should allow annotation channels when asked for by name', () => {
    expect(resolveSignalIndexes(labels, ['EDF Annotations'])).toEqual([1]);
  });

  it('should match labels exactly', () => {
    expect(() => resolveSignalIndexes(labels, ['ecg'])).toThrow(LabelNotFoundError);
  });

  it('should name the missing label and the available ones', () => {
    expect(() => resolveSignalIndexes(['EEG', 'ECG'], ['SpO2'])).toThrow(
      'signalLabels: Signal "SpO2" not found (available: EEG, ECG)'
    );
  });

  it('should report the first unknown label', () => {
    try {
      resolveSignalIndexes(labels, ['ECG', 'PLETH', 'SpO2']);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(LabelNotFoundError);
      expect(error instanceof LabelNotFoundError && error.label).toBe('PLETH');
    }
  });
});
