/**
 * Template-Driven Line Parser
 *
 * Walks a page line by line, left to right, matching declared labels exactly
 * (longest first). A matched label takes the tokens that follow it on its own
 * line as its value, or, when there are none, the left-aligned run on the
 * next line. Any declared label ends a value. The walk consumes tokens as it
 * goes, so two runs over the same page always agree.
 */

import type { FieldConfig, Rect, Token } from '../types';
import type { ExtractionSettings } from './settings';
import type { ConsumedPredicate } from './label-detector';
import { LabelMatcher } from './label-detector';
import { PageLayout } from './tokens';
import { unionAll } from './geometry';
import { cleanValue } from './text-normalizer';

export interface TemplateFieldMatch {
  field: FieldConfig;
  value: string;
  /** Value rectangle, or the label's when the value is empty. */
  rect: Rect;
  labelRect: Rect;
  labelTokenIndices: number[];
  valueTokenIndices: number[];
}

function occurrenceKey(label: string, instance: number): string {
  return `${label}\u0000${instance}`;
}

export class TemplateLineParser {
  private readonly matcher: LabelMatcher;
  private readonly fieldsByOccurrence = new Map<string, FieldConfig[]>();

  constructor(fields: FieldConfig[], private readonly settings: ExtractionSettings) {
    this.matcher = new LabelMatcher(
      fields.map((f) => f.label),
      { caseSensitive: true }
    );
    for (const field of fields) {
      const key = occurrenceKey(field.label.trim().split(/\s+/).join(' '), field.instance);
      const list = this.fieldsByOccurrence.get(key) ?? [];
      list.push(field);
      this.fieldsByOccurrence.set(key, list);
    }
  }

  parse(tokens: Token[], isConsumed: ConsumedPredicate = () => false): TemplateFieldMatch[] {
    const layout = new PageLayout(tokens, this.settings.lineBucket);
    const consumed = new Set<number>();
    const taken: ConsumedPredicate = (i) => consumed.has(i) || isConsumed(i);
    const occurrences = new Map<string, number>();
    const recorded = new Set<string>();
    const matches: TemplateFieldMatch[] = [];

    layout.lines.forEach((line, lineIndex) => {
      const order = line.tokenIndices;
      let pos = 0;

      while (pos < order.length) {
        if (taken(order[pos])) {
          pos++;
          continue;
        }

        const match = this.matcher.matchAt(tokens, order, pos, taken);
        if (!match) {
          pos++;
          continue;
        }

        const labelIndices = order.slice(pos, pos + match.length);
        labelIndices.forEach((i) => consumed.add(i));
        pos += match.length;

        const occurrence = occurrences.get(match.phrase) ?? 0;
        occurrences.set(match.phrase, occurrence + 1);

        const field = (this.fieldsByOccurrence.get(occurrenceKey(match.phrase, occurrence)) ?? []).find(
          (f) => !recorded.has(f.name)
        );
        if (!field) continue;

        const labelRect = unionAll(labelIndices.map((i) => tokens[i].rect));
        if (!labelRect) continue;

        let valueIndices = this.collect(tokens, order, pos, labelRect, taken, false);
        if (valueIndices.length === 0) {
          valueIndices = this.collectNextLine(tokens, layout, lineIndex + 1, labelRect, taken);
        }
        valueIndices.forEach((i) => consumed.add(i));

        const value = cleanValue(valueIndices.map((i) => tokens[i].text).join(' '));
        if (!value && !field.allowEmpty) continue;

        recorded.add(field.name);
        matches.push({
          field,
          value,
          rect: unionAll(valueIndices.map((i) => tokens[i].rect)) ?? labelRect,
          labelRect,
          labelTokenIndices: labelIndices,
          valueTokenIndices: valueIndices,
        });
      }
    });

    return matches;
  }

  /**
   * Absorb tokens from `order[start]` rightward until a gap, a declared label
   * or a consumed token.
   */
  private collect(
    tokens: Token[],
    order: number[],
    start: number,
    labelRect: Rect,
    taken: ConsumedPredicate,
    belowLabel: boolean
  ): number[] {
    const absorbed: number[] = [];

    for (let pos = start; pos < order.length; pos++) {
      const index = order[pos];
      if (taken(index)) break;
      if (this.matcher.matchAt(tokens, order, pos, taken)) break;

      const token = tokens[index];
      if (absorbed.length === 0) {
        if (!belowLabel && token.rect.x0 - labelRect.x1 > this.settings.maxHorizontalDistance) break;
      } else {
        const previous = tokens[absorbed[absorbed.length - 1]];
        if (token.rect.x0 - previous.rect.x1 > this.settings.maxWordGap) break;
      }
      absorbed.push(index);
    }

    return absorbed;
  }

  private collectNextLine(
    tokens: Token[],
    layout: PageLayout,
    lineIndex: number,
    labelRect: Rect,
    taken: ConsumedPredicate
  ): number[] {
    const order = layout.lineOrder(lineIndex);
    const start = order.findIndex(
      (i) =>
        !taken(i) &&
        tokens[i].rect.x0 >= labelRect.x0 - this.settings.nextLineSlack &&
        tokens[i].rect.x0 <= labelRect.x1 + this.settings.maxHorizontalDistance
    );
    if (start < 0) return [];
    if (tokens[order[start]].rect.y0 - labelRect.y1 > this.settings.maxVerticalGap) return [];
    return this.collect(tokens, order, start, labelRect, taken, true);
  }
}

/**
 * Parse one page against a set of declared fields.
 */
export function parseTemplatePage(
  tokens: Token[],
  fields: FieldConfig[],
  settings: ExtractionSettings,
  isConsumed?: ConsumedPredicate
): TemplateFieldMatch[] {
  if (fields.length === 0) return [];
  return new TemplateLineParser(fields, settings).parse(tokens, isConsumed);
}
