/**
 * Checkbox Group Strategy
 *
 * Option words of the dictionary's checkbox groups ("Male", "Female") are
 * labels of their own boxes. A group is only read when at least two of its
 * options appear on the page, and its options share one set of claims so a
 * tick is never given to two of them. Options are resolved nearest-mark
 * first.
 */

import type { ExtractionRecord, LabelMatch } from '../types';
import type { StrategyResult } from './types';
import type { CheckboxGroup } from '../schemas';
import type { PageExtractionContext } from '../extraction/page-context';
import { LabelMatcher, findCompoundLabels } from '../extraction/label-detector';
import { createClaims, isBoxSized, isCheckboxMarker, resolveCheckbox } from '../extraction/checkbox-resolver';
import { centroidDistance, expand, intersects } from '../extraction/geometry';
import { BaseStrategy } from './base-strategy';

interface OptionLabel {
  option: string;
  label: LabelMatch;
  nearestMark: number;
}

export class CheckboxGroupStrategy extends BaseStrategy {
  readonly kind = 'checkbox-group' as const;
  readonly method = 'Checkbox Option' as const;
  readonly description = 'Checkbox option groups from the label dictionary';

  constructor(private readonly groups: CheckboxGroup[]) {
    super();
  }

  protected extract(ctx: PageExtractionContext): StrategyResult {
    const records: ExtractionRecord[] = [];

    for (const group of this.groups) {
      const options = this.locateOptions(ctx, group);
      if (options.length < 2) continue;

      const claims = createClaims();
      for (const { option, label } of options) {
        const resolution = resolveCheckbox(ctx.page, ctx.tokens, label.rect, {
          searchRadius: ctx.settings.checkboxSearchRadius,
          claims,
          isConsumed: ctx.isConsumed,
        });
        if (resolution.state === 'Not Found') continue;

        ctx.consume(label.consumedTokenIndices);
        if (resolution.markerTokenIndex !== null) {
          ctx.consume([resolution.markerTokenIndex]);
        }
        records.push(this.record(ctx, option, resolution.state, resolution.rect));
      }
    }

    return { records, warnings: [] };
  }

  /**
   * First unconsumed occurrence of each option, ordered by distance to the
   * closest mark (marker glyph or box-sized shape) around it.
   */
  private locateOptions(ctx: PageExtractionContext, group: CheckboxGroup): OptionLabel[] {
    const shapes = ctx.page.vectorShapes().filter(isBoxSized);
    const markers = ctx.tokens.filter((t, i) => !ctx.isConsumed(i) && isCheckboxMarker(t.text));
    const radius = ctx.settings.checkboxSearchRadius;
    const located: OptionLabel[] = [];

    for (const option of group.options) {
      const matcher = new LabelMatcher([option], { caseSensitive: false });
      const [label] = findCompoundLabels(ctx.layout, matcher, ctx.isConsumed);
      if (!label) continue;

      const vicinity = expand(label.rect, radius);
      const distances = [...markers.map((m) => m.rect), ...shapes]
        .filter((r) => intersects(vicinity, r))
        .map((r) => centroidDistance(label.rect, r));

      located.push({
        option,
        label,
        nearestMark: distances.length > 0 ? Math.min(...distances) : Number.POSITIVE_INFINITY,
      });
    }

    return located
      .map((entry, order) => ({ entry, order }))
      .sort((a, b) => a.entry.nearestMark - b.entry.nearestMark || a.order - b.order)
      .map(({ entry }) => entry);
  }
}
