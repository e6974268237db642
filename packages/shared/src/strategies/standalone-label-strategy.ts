/**
 * Standalone Label Strategy
 *
 * Bare dictionary words ("Surname", "Address") with no colon. Tried last,
 * and skipped when a key already emitted on the page overlaps the word.
 */

import type { LabelMatch } from '../types';
import type { PageExtractionContext } from '../extraction/page-context';
import { overlapsEmittedKey, phraseLabelAt } from '../extraction/label-detector';
import { cleanKey } from '../extraction/text-normalizer';
import { LabelStrategy } from './label-strategy';

export class StandaloneLabelStrategy extends LabelStrategy {
  readonly kind = 'standalone-label' as const;
  readonly method = 'Label Match' as const;
  readonly description = 'Single-word labels from the label dictionary';

  protected labelAt(
    ctx: PageExtractionContext,
    lineIndex: number,
    pos: number,
    emittedKeys: string[]
  ): LabelMatch | null {
    const match = phraseLabelAt(ctx.layout, lineIndex, pos, this.labels.standalone, ctx.isConsumed);
    if (!match) return null;
    if (overlapsEmittedKey(cleanKey(match.text, { titleCase: true }), emittedKeys)) return null;
    return match;
  }
}
