/**
 * EDF Writer
 *
 * Serialises signals to European Data Format. Used to produce fixtures and
 * synthetic recordings that the loader reads back.
 *
 * @module signal/edf-writer
 */

import type { EDFHeader, EDFSignalHeader } from './loader/edf';
import { ValidationError } from '../utils/validation';

/**
 * A signal to write
 */
export interface EDFWriteSignal {
  label: string;

  samplesPerRecord: number;

  /** Physical values; missing samples in the last record are written as physical minimum */
  samples: readonly number[];

  /** Physical dimension (default "uV") */
  physicalDimension?: string;

  /** Physical range; derived from the data when omitted */
  physicalMin?: number;
  physicalMax?: number;

  /** Digital range (default full 16-bit) */
  digitalMin?: number;
  digitalMax?: number;
}

export interface EDFWriteOptions {
  /** Data record duration in seconds (default: 1) */
  recordDurationSeconds?: number;

  patientId?: string;

  recordingId?: string;

  startDate?: Date;
}

/** 16-bit signed integer range */
const DIGITAL_MIN = -32768;
const DIGITAL_MAX = 32767;

/** Width of every numeric signal header field */
const NUMBER_FIELD_WIDTH = 8;

/**
 * Format date as dd.mm.yy
 */
function formatDate(date: Date): string {
  const dd = String(date.getDate()).padStart(2, '0');
  const mm = String(date.getMonth() + 1).padStart(2, '0');
  const yy = String(date.getFullYear() % 100).padStart(2, '0');
  return `${dd}.${mm}.${yy}`;
}

/**
 * Format time as hh.mm.ss
 */
function formatTime(date: Date): string {
  const hh = String(date.getHours()).padStart(2, '0');
  const mm = String(date.getMinutes()).padStart(2, '0');
  const ss = String(date.getSeconds()).padStart(2, '0');
  return `${hh}.${mm}.${ss}`;
}

function dataRange(samples: readonly number[]): { min: number; max: number } {
  let min = Infinity;
  let max = -Infinity;
  for (const sample of samples) {
    if (sample < min) min = sample;
    if (sample > max) max = sample;
  }
  if (min > max) return { min: -1, max: 1 };
  if (min === max) return { min: min - 1, max: max + 1 };
  return { min, max };
}

function trimFixed(text: string): string {
  const trimmed = text.includes('.') ? text.replace(/0+$/, '').replace(/\.$/, '') : text;
  return trimmed === '-0' ? '0' : trimmed;
}

/**
 * Largest-precision decimal text of `value` that fits a numeric header field.
 * Fractional digits are dropped rounding toward `rounding`, so a physical
 * minimum only moves down and a maximum only moves up.
 *
 * @throws ValidationError when even the integer part does not fit
 */
export function formatHeaderNumber(
  value: number,
  field: string,
  rounding: 'floor' | 'ceil' | 'round' = 'round',
  width: number = NUMBER_FIELD_WIDTH
): string {
  const plain = String(value);
  if (Number.isFinite(value) && !plain.includes('e') && plain.length <= width) {
    return plain;
  }

  if (Number.isFinite(value) && !Number.isInteger(value)) {
    for (let decimals = width - 2; decimals >= 0; decimals--) {
      const scale = 10 ** decimals;
      const text = trimFixed((Math[rounding](value * scale) / scale).toFixed(decimals));
      if (text.length <= width) return text;
    }
  }

  throw new ValidationError(`${plain} does not fit an EDF header field of ${width} characters`, field, value);
}

function toSignalHeader(signal: EDFWriteSignal): EDFSignalHeader {
  const range = dataRange(signal.samples);
  const physicalMin = Number(formatHeaderNumber(signal.physicalMin ?? range.min, 'physicalMin', 'floor'));
  const physicalMax = Number(formatHeaderNumber(signal.physicalMax ?? range.max, 'physicalMax', 'ceil'));
  const digitalMin = signal.digitalMin ?? DIGITAL_MIN;
  const digitalMax = signal.digitalMax ?? DIGITAL_MAX;

  if (!(physicalMax > physicalMin)) {
    throw new ValidationError(
      `Physical range [${physicalMin}, ${physicalMax}] of "${signal.label}" is empty`,
      'physicalMax',
      physicalMax
    );
  }

  const digitalValid =
    Number.isInteger(digitalMin) &&
    Number.isInteger(digitalMax) &&
    digitalMin >= DIGITAL_MIN &&
    digitalMax <= DIGITAL_MAX &&
    digitalMax > digitalMin;

  if (!digitalValid) {
    throw new ValidationError(
      `Digital range [${digitalMin}, ${digitalMax}] of "${signal.label}" must be increasing 16-bit integers`,
      'digitalMax',
      digitalMax
    );
  }

  return {
    label: signal.label,
    transducerType: '',
    physicalDimension: signal.physicalDimension ?? 'uV',
    physicalMin,
    physicalMax,
    digitalMin,
    digitalMax,
    prefiltering: '',
    numSamples: signal.samplesPerRecord,
    reserved: '',
  };
}

/**
 * Build the header a write of `signals` produces. Physical ranges are
 * rounded outward to what the 8-character header fields can hold, and the
 * data records are scaled with those rounded values.
 *
 * @throws ValidationError when a range cannot be stored
 */
export function buildEDFHeader(
  signals: readonly EDFWriteSignal[],
  options: EDFWriteOptions = {}
): EDFHeader {
  const startDate = options.startDate ?? new Date(2000, 0, 1, 22, 0, 0);
  const numDataRecords = signals.reduce(
    (count, s) => Math.max(count, Math.ceil(s.samples.length / s.samplesPerRecord)),
    0
  );

  return {
    version: '0',
    patientId: options.patientId ?? 'X',
    recordingId: options.recordingId ?? 'X',
    startDate: formatDate(startDate),
    startTime: formatTime(startDate),
    headerBytes: 256 + signals.length * 256,
    reserved: '',
    numDataRecords,
    dataRecordDuration: options.recordDurationSeconds ?? 1,
    numSignals: signals.length,
    signals: signals.map(toSignalHeader),
  };
}

function serializeHeader(header: EDFHeader): Uint8Array {
  const bytes = new Uint8Array(header.headerBytes);
  const encoder = new TextEncoder();
  let offset = 0;

  // Text fields are cut to width; numbers must fit
  const writeString = (value: string | number, length: number) => {
    const text = typeof value === 'number' ? formatHeaderNumber(value, 'header', 'round', length) : value;
    if (typeof value === 'number' && Number(text) !== value) {
      throw new ValidationError(`${value} does not fit an EDF header field of ${length} characters`, 'header', value);
    }
    bytes.set(encoder.encode(text.padEnd(length).slice(0, length)), offset);
    offset += length;
  };

  writeString(header.version, 8);
  writeString(header.patientId, 80);
  writeString(header.recordingId, 80);
  writeString(header.startDate, 8);
  writeString(header.startTime, 8);
  writeString(header.headerBytes, 8);
  writeString(header.reserved, 44);
  writeString(header.numDataRecords, 8);
  writeString(header.dataRecordDuration, 8);
  writeString(header.numSignals, 4);

  const fields: Array<[keyof EDFSignalHeader, number]> = [
    ['label', 16],
    ['transducerType', 80],
    ['physicalDimension', 8],
    ['physicalMin', 8],
    ['physicalMax', 8],
    ['digitalMin', 8],
    ['digitalMax', 8],
    ['prefiltering', 80],
    ['numSamples', 8],
    ['reserved', 32],
  ];

  for (const [field, length] of fields) {
    for (const signal of header.signals) {
      writeString(signal[field], length);
    }
  }

  return bytes;
}

/**
 * Serialise signals to an EDF byte array
 */
export function writeEDF(
  signals: readonly EDFWriteSignal[],
  options: EDFWriteOptions = {}
): Uint8Array {
  const header = buildEDFHeader(signals, options);
  const headerBytes = serializeHeader(header);

  const recordBytes = header.signals.reduce((sum, s) => sum + s.numSamples * 2, 0);
  const result = new Uint8Array(header.headerBytes + header.numDataRecords * recordBytes);
  result.set(headerBytes, 0);

  const view = new DataView(result.buffer);
  let offset = header.headerBytes;

  for (let record = 0; record < header.numDataRecords; record++) {
    signals.forEach((signal, s) => {
      const sh = header.signals[s];
      const scale = (sh.digitalMax - sh.digitalMin) / (sh.physicalMax - sh.physicalMin);
      const start = record * sh.numSamples;

      for (let i = 0; i < sh.numSamples; i++) {
        const index = start + i;
        const value = index < signal.samples.length ? signal.samples[index] : sh.physicalMin;
        const digital = Math.round((value - sh.physicalMin) * scale + sh.digitalMin);
        view.setInt16(offset, Math.max(sh.digitalMin, Math.min(sh.digitalMax, digital)), true);
        offset += 2;
      }
    });
  }

  return result;
}
