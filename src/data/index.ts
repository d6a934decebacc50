/**
 * Static data tables
 * @module data
 */

export {
  DURATION_TABLE,
  AXIS_UNIT_LABELS,
  Y_AXIS_LABEL,
  getDurationEntry,
  findDurationIndex,
  getAxisUnitLabel,
  validateDurationTable,
} from './durationTable';
