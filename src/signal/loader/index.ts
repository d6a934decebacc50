/**
 * Signal Loader Module
 *
 * Supported formats:
 * - EDF and EDF+ (European Data Format)
 *
 * @module signal/loader
 */

export * from './edf';

export type RecordingFormat = 'edf' | 'edf+' | 'unknown';

/**
 * Detect the recording format from the first header bytes
 */
export function detectRecordingFormat(input: ArrayBuffer | Uint8Array): RecordingFormat {
  const bytes = input instanceof Uint8Array ? input : new Uint8Array(input);
  if (bytes.byteLength < 256) {
    return 'unknown';
  }

  const decoder = new TextDecoder('ascii');
  const version = decoder.decode(bytes.subarray(0, 8)).trim();
  if (version !== '0') {
    return 'unknown';
  }

  // Reserved field at offset 192 carries "EDF+C" or "EDF+D"
  const reserved = decoder.decode(bytes.subarray(192, 236));
  return reserved.startsWith('EDF+') ? 'edf+' : 'edf';
}
