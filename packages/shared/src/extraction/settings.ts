/**
 * Extraction tunables. Distances are in page units (points).
 */

import { config } from '../config';

export interface ExtractionSettings {
  /** Baseline rounding unit for grouping tokens into lines. */
  lineBucket: number;
  /** Furthest a value may start to the right of its label. */
  maxHorizontalDistance: number;
  /** Half-height of the same-line search band around the label's centre line. */
  sameLineTolerance: number;
  /** Furthest a next-line value may sit below its label. */
  maxVerticalGap: number;
  /** How far left of the label a next-line value may start. */
  nextLineSlack: number;
  /** Largest gap between two words of one value. */
  maxWordGap: number;
  /** Largest gap between two words of one label. */
  labelWordGap: number;
  /** Weight of horizontal misalignment in the next-line distance. */
  misalignmentWeight: number;
  /** Vicinity searched around a checkbox label. */
  checkboxSearchRadius: number;
}

export function defaultExtractionSettings(): ExtractionSettings {
  return {
    lineBucket: config.lineBucket,
    maxHorizontalDistance: config.maxHorizontalDistance,
    sameLineTolerance: config.sameLineTolerance,
    maxVerticalGap: config.maxVerticalGap,
    nextLineSlack: config.nextLineSlack,
    maxWordGap: config.maxWordGap,
    labelWordGap: config.labelWordGap,
    misalignmentWeight: 0.5,
    checkboxSearchRadius: config.checkboxSearchRadius,
  };
}
