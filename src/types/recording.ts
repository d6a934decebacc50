/**
 * Recording data types
 *
 * A recording is what the loader hands to the raster transform: a header
 * describing the data-record layout and one sample array per signal.
 *
 * @module types/recording
 */

/**
 * Data-record layout shared by every signal of a recording
 */
export interface RecordingHeader {
  /** Number of data records in the recording */
  recordCount: number;

  /** Duration of one data record in seconds */
  recordDurationSeconds: number;
}

/**
 * One channel of one recording. Treated as read-only by the transform.
 */
export interface SignalTrace {
  /** Display label, e.g. "EEG", "ECG", "AIRFLOW" */
  label: string;

  /** Samples stored per data record */
  samplesPerRecord: number;

  /** Decoded physical samples, earliest first */
  samples: readonly number[];
}

export interface Recording {
  header: RecordingHeader;
  signals: readonly SignalTrace[];
}
