/**
 * EDF/EDF+ Loader
 *
 * Parses European Data Format recordings into a header, per-signal headers
 * and physical sample arrays.
 *
 * Layout: a 256-byte fixed header, 256 bytes of signal header per signal
 * (each field stored for all signals before the next field), then data
 * records. Each data record holds `numSamples` 16-bit little-endian values
 * for every signal in turn.
 *
 * Specification: https://www.edfplus.info/specs/
 *
 * @module signal/loader/edf
 */

import { readFile } from 'node:fs/promises';
import type { Recording } from '../../types';
import { createLogger } from '../../utils/logger';

const logger = createLogger('signal:edf');

// =============================================================================
// Types
// =============================================================================

/**
 * EDF header record
 */
export interface EDFHeader {
  /** Version of data format (always "0") */
  version: string;

  patientId: string;

  recordingId: string;

  /** Start date of recording (dd.mm.yy) */
  startDate: string;

  /** Start time of recording (hh.mm.ss) */
  startTime: string;

  /** Number of bytes in header record */
  headerBytes: number;

  /** "EDF+C" or "EDF+D" for EDF+, empty for plain EDF */
  reserved: string;

  /** Number of data records; -1 in the file means unknown */
  numDataRecords: number;

  /** Duration of a data record in seconds */
  dataRecordDuration: number;

  numSignals: number;

  signals: EDFSignalHeader[];
}

export interface EDFSignalHeader {
  /** Signal label (e.g., "EEG C3-A2", "ECG") */
  label: string;

  transducerType: string;

  /** Physical dimension (e.g., "uV", "mV") */
  physicalDimension: string;

  physicalMin: number;

  physicalMax: number;

  digitalMin: number;

  digitalMax: number;

  prefiltering: string;

  /** Number of samples in each data record */
  numSamples: number;

  reserved: string;
}

/**
 * Parsed recording with physical sample values
 */
export interface EDFRecording {
  header: EDFHeader;

  /** One array per signal, in header order */
  signals: number[][];
}

/**
 * Malformed or truncated EDF content
 */
export class EDFParseError extends Error {
  constructor(
    message: string,
    public offset?: number
  ) {
    super(offset === undefined ? message : `${message} (at byte ${offset})`);
    this.name = 'EDFParseError';
  }
}

// =============================================================================
// Constants
// =============================================================================

const FIXED_HEADER_BYTES = 256;
const SIGNAL_HEADER_BYTES = 256;
const BYTES_PER_SAMPLE = 2;

// =============================================================================
// Header
// =============================================================================

class HeaderReader {
  private offset = 0;
  private readonly decoder = new TextDecoder('ascii');

  constructor(private readonly bytes: Uint8Array) {}

  get position(): number {
    return this.offset;
  }

  string(length: number): string {
    if (this.offset + length > this.bytes.byteLength) {
      throw new EDFParseError('Header ends unexpectedly', this.offset);
    }
    const value = this.decoder.decode(this.bytes.subarray(this.offset, this.offset + length)).trim();
    this.offset += length;
    return value;
  }

  integer(length: number, field: string): number {
    const start = this.offset;
    const raw = this.string(length);
    const value = Number(raw);
    if (raw === '' || !Number.isInteger(value)) {
      throw new EDFParseError(`Field "${field}" is not an integer: "${raw}"`, start);
    }
    return value;
  }

  decimal(length: number, field: string): number {
    const start = this.offset;
    const raw = this.string(length);
    const value = Number(raw);
    if (raw === '' || !Number.isFinite(value)) {
      throw new EDFParseError(`Field "${field}" is not a number: "${raw}"`, start);
    }
    return value;
  }

  /** Read one fixed-width field for every signal */
  column<T>(count: number, read: () => T): T[] {
    return Array.from({ length: count }, read);
  }
}

function toBytes(input: ArrayBuffer | Uint8Array): Uint8Array {
  return input instanceof Uint8Array ? input : new Uint8Array(input);
}

/**
 * Parse the header record
 * @throws EDFParseError when a field is missing or not numeric
 */
export function parseEDFHeader(input: ArrayBuffer | Uint8Array): EDFHeader {
  const bytes = toBytes(input);

  if (bytes.byteLength < FIXED_HEADER_BYTES) {
    throw new EDFParseError(`File is ${bytes.byteLength} bytes, shorter than the ${FIXED_HEADER_BYTES}-byte header`);
  }

  const reader = new HeaderReader(bytes);

  const version = reader.string(8);
  const patientId = reader.string(80);
  const recordingId = reader.string(80);
  const startDate = reader.string(8);
  const startTime = reader.string(8);
  const headerBytes = reader.integer(8, 'header bytes');
  const reserved = reader.string(44);
  const numDataRecords = reader.integer(8, 'number of data records');
  const dataRecordDuration = reader.decimal(8, 'data record duration');
  const numSignals = reader.integer(4, 'number of signals');

  if (numSignals < 0) {
    throw new EDFParseError(`Negative signal count ${numSignals}`);
  }

  const expectedHeaderBytes = FIXED_HEADER_BYTES + numSignals * SIGNAL_HEADER_BYTES;
  if (headerBytes !== expectedHeaderBytes) {
    throw new EDFParseError(
      `Header declares ${headerBytes} bytes but ${numSignals} signals need ${expectedHeaderBytes}`
    );
  }

  const labels = reader.column(numSignals, () => reader.string(16));
  const transducerTypes = reader.column(numSignals, () => reader.string(80));
  const physicalDimensions = reader.column(numSignals, () => reader.string(8));
  const physicalMins = reader.column(numSignals, () => reader.decimal(8, 'physical minimum'));
  const physicalMaxs = reader.column(numSignals, () => reader.decimal(8, 'physical maximum'));
  const digitalMins = reader.column(numSignals, () => reader.integer(8, 'digital minimum'));
  const digitalMaxs = reader.column(numSignals, () => reader.integer(8, 'digital maximum'));
  const prefilterings = reader.column(numSignals, () => reader.string(80));
  const numSamples = reader.column(numSignals, () => reader.integer(8, 'samples per record'));
  const reserveds = reader.column(numSignals, () => reader.string(32));

  const signals: EDFSignalHeader[] = labels.map((label, i) => ({
    label,
    transducerType: transducerTypes[i],
    physicalDimension: physicalDimensions[i],
    physicalMin: physicalMins[i],
    physicalMax: physicalMaxs[i],
    digitalMin: digitalMins[i],
    digitalMax: digitalMaxs[i],
    prefiltering: prefilterings[i],
    numSamples: numSamples[i],
    reserved: reserveds[i],
  }));

  return {
    version,
    patientId,
    recordingId,
    startDate,
    startTime,
    headerBytes,
    reserved,
    numDataRecords,
    dataRecordDuration,
    numSignals,
    signals,
  };
}

// =============================================================================
// Data records
// =============================================================================

/**
 * Digital-to-physical conversion of one signal
 */
export function physicalScale(signal: EDFSignalHeader): { gain: number; offset: number } {
  const digitalRange = signal.digitalMax - signal.digitalMin;
  if (digitalRange === 0) {
    return { gain: 1, offset: 0 };
  }
  const gain = (signal.physicalMax - signal.physicalMin) / digitalRange;
  return { gain, offset: signal.physicalMin - signal.digitalMin * gain };
}

/**
 * Parse header and data records
 *
 * Trailing bytes that do not fill a complete data record are ignored with a
 * warning. A record count of -1 is replaced by the count the data holds.
 */
export function parseEDF(input: ArrayBuffer | Uint8Array): EDFRecording {
  const bytes = toBytes(input);
  const header = parseEDFHeader(bytes);
  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);

  const recordBytes = header.signals.reduce((sum, s) => sum + s.numSamples * BYTES_PER_SAMPLE, 0);
  const dataBytes = bytes.byteLength - header.headerBytes;
  const availableRecords = recordBytes > 0 ? Math.floor(dataBytes / recordBytes) : 0;

  let numRecords = header.numDataRecords;
  if (numRecords < 0) {
    numRecords = availableRecords;
  } else if (numRecords > availableRecords) {
    logger.warn('EDF data is shorter than the header declares', {
      declaredRecords: numRecords,
      availableRecords,
    });
    numRecords = availableRecords;
  }

  const scales = header.signals.map(physicalScale);
  const signals = header.signals.map(s => new Array<number>(s.numSamples * numRecords));

  let offset = header.headerBytes;
  for (let record = 0; record < numRecords; record++) {
    header.signals.forEach((signal, s) => {
      const { gain, offset: physicalOffset } = scales[s];
      const target = signals[s];
      const base = record * signal.numSamples;
      for (let i = 0; i < signal.numSamples; i++) {
        target[base + i] = view.getInt16(offset, true) * gain + physicalOffset;
        offset += BYTES_PER_SAMPLE;
      }
    });
  }

  logger.debug('Parsed EDF', {
    signals: header.numSignals,
    records: numRecords,
    recordDuration: header.dataRecordDuration,
  });

  return {
    header: { ...header, numDataRecords: numRecords },
    signals,
  };
}

/**
 * Read and parse an EDF file from disk
 */
export async function loadEDFFile(path: string): Promise<EDFRecording> {
  const data = await readFile(path);
  logger.debug('Loaded EDF file', { path, bytes: data.byteLength });
  return parseEDF(data);
}

/**
 * Convert to the recording shape the heatmap pipeline consumes
 */
export function toRecording(edf: EDFRecording): Recording {
  return {
    header: {
      recordCount: edf.header.numDataRecords,
      recordDurationSeconds: edf.header.dataRecordDuration,
    },
    signals: edf.header.signals.map((signal, i) => ({
      label: signal.label,
      samplesPerRecord: signal.numSamples,
      samples: edf.signals[i],
    })),
  };
}
