/**
 * Signal selection by label
 * @module heatmap/signal-index
 */

import { LabelNotFoundError } from '../utils/validation';

const ANNOTATION_LABEL = 'edf annotations';

/**
 * True for EDF+ annotation channels, which carry text rather than samples
 */
export function isAnnotationLabel(label: string): boolean {
  return label.trim().toLowerCase() === ANNOTATION_LABEL;
}

/**
 * Map each label to the 0-based index of its first occurrence.
 * Later duplicates of a label are never selected.
 */
export function buildSignalIndex(labels: readonly string[]): ReadonlyMap<string, number> {
  const index = new Map<string, number>();

  labels.forEach((label, i) => {
    if (!index.has(label)) {
      index.set(label, i);
    }
  });

  return index;
}

/**
 * Resolve requested labels to signal indexes, in request order.
 *
 * An empty or missing request selects every signal that is not an
 * annotation channel.
 *
 * @throws LabelNotFoundError for the first unknown label
 */
export function resolveSignalIndexes(
  labels: readonly string[],
  requested?: readonly string[]
): number[] {
  if (!requested || requested.length === 0) {
    return labels.flatMap((label, i) => (isAnnotationLabel(label) ? [] : [i]));
  }

  const index = buildSignalIndex(labels);

  return requested.map(label => {
    const found = index.get(label);
    if (found === undefined) {
      throw new LabelNotFoundError(label, labels);
    }
    return found;
  });
}
