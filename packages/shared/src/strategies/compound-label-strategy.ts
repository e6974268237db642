/**
 * Compound Label Strategy
 *
 * Multi-word dictionary labels ("Date of Birth", "Passport No.") matched
 * case-insensitively against unconsumed token runs.
 */

import type { LabelMatch } from '../types';
import type { PageExtractionContext } from '../extraction/page-context';
import { phraseLabelAt } from '../extraction/label-detector';
import { LabelStrategy } from './label-strategy';

export class CompoundLabelStrategy extends LabelStrategy {
  readonly kind = 'compound-label' as const;
  readonly method = 'Compound Label' as const;
  readonly description = 'Multi-word labels from the label dictionary';

  protected labelAt(ctx: PageExtractionContext, lineIndex: number, pos: number): LabelMatch | null {
    return phraseLabelAt(ctx.layout, lineIndex, pos, this.labels.compound, ctx.isConsumed);
  }
}
