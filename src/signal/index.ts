/**
 * Signal loading and generation exports
 * @module signal
 */

// Synthetic signal generation
export {
  generateRamp,
  generateFlatLine,
  generateSineWave,
  generateCircadianSignal,
  generateRecording,
  type SyntheticShape,
  type SyntheticSignalOptions,
  type SyntheticRecordingOptions,
} from './synthetic';

// EDF loading
export {
  parseEDF,
  parseEDFHeader,
  loadEDFFile,
  toRecording,
  physicalScale,
  detectRecordingFormat,
  EDFParseError,
  type EDFHeader,
  type EDFSignalHeader,
  type EDFRecording,
  type RecordingFormat,
} from './loader';

// EDF writing
export {
  writeEDF,
  buildEDFHeader,
  formatHeaderNumber,
  type EDFWriteSignal,
  type EDFWriteOptions,
} from './edf-writer';
