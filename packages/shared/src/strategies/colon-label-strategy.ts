/**
 * Colon Label Strategy
 *
 * Any token ending in a colon is a label, together with the tight run of
 * words that leads up to it at the start of a line.
 */

import type { LabelMatch } from '../types';
import type { PageExtractionContext } from '../extraction/page-context';
import { colonLabelAt } from '../extraction/label-detector';
import { LabelStrategy } from './label-strategy';

export class ColonLabelStrategy extends LabelStrategy {
  readonly kind = 'colon-label' as const;
  readonly method = 'Form Field' as const;
  readonly description = 'Colon-terminated labels';

  protected labelAt(ctx: PageExtractionContext, lineIndex: number, pos: number): LabelMatch | null {
    return colonLabelAt(ctx.layout, lineIndex, pos, ctx.settings.labelWordGap, ctx.isConsumed);
  }
}
