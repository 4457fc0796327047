/**
 * TextRegion and TableCell models
 */

import { centroid, convexHull, meanY, outerRings, parsePoints, unionRings } from '../geometry';
import type { Ring } from '../geometry';
import { attributeValue, childElements, elementText, firstChildElement, reorderElements } from '../io/dom';
import { TextLine } from './text-line';
import type { LineCountLevel } from './text-line';
import type { Page } from './page';
import type { TableRegion } from './table-region';

export type RegionCountLevel = 'textlines' | LineCountLevel;

export const DEFAULT_ROW_TOLERANCE = 10;

interface SortEntry {
  line: TextLine;
  index: number;
  x: number;
  y: number;
}

/**
 * Polygon of two merged lines: their union, or the convex hull of both
 * when the union falls apart into several pieces.
 */
export function mergeLinePolygons(a: Ring, b: Ring): Ring {
  const pieces = outerRings(unionRings([a, b]));
  if (pieces.length === 1) {
    return pieces[0];
  }
  return convexHull([...a, ...b]);
}

export class TextRegion {
  readonly lines: TextLine[];

  constructor(
    readonly element: Element,
    readonly page: Page
  ) {
    this.lines = childElements(element, 'TextLine').map((lineElement) => new TextLine(lineElement, this));
  }

  get id(): string {
    return attributeValue(this.element, 'id') ?? '';
  }

  get boundary(): Ring | undefined {
    const coords = firstChildElement(this.element, 'Coords');
    const points = coords ? parsePoints(coords.getAttribute('points')) : undefined;
    return points && points.length > 0 ? points : undefined;
  }

  /**
   * Reorder lines top to bottom, grouping lines whose vertical position is
   * within `rowTolerance` of a row's first line into one row, read left to
   * right. The order is stable, and the XML children follow it.
   */
  sortLines(rowTolerance = DEFAULT_ROW_TOLERANCE): void {
    const entries: SortEntry[] = this.lines.map((line, index) => ({ line, index, ...sortKey(line) }));
    entries.sort((a, b) => a.y - b.y || a.index - b.index);

    const rows: SortEntry[][] = [];
    for (const entry of entries) {
      const row = rows[rows.length - 1];
      if (row && entry.y - row[0].y <= rowTolerance) {
        row.push(entry);
      } else {
        rows.push([entry]);
      }
    }
    const ordered = rows.flatMap((row) => [...row].sort((a, b) => a.x - b.x || a.index - b.index)).map((e) => e.line);

    if (ordered.every((line, i) => line === this.lines[i])) {
      return;
    }
    reorderElements(
      this.lines.map((line) => line.element),
      ordered.map((line) => line.element)
    );
    this.lines.splice(0, this.lines.length, ...ordered);
  }

  /**
   * Merge consecutive lines whose baselines continue each other: the next
   * line starts at most `gapX` right of where the current one ends and at
   * most `gapY` above or below it. A merged line can absorb further lines in
   * the same pass. Returns the number of merges.
   */
  mergeSplittedLines(gapX: number, gapY: number): number {
    let merges = 0;
    let i = 0;
    while (i < this.lines.length - 1) {
      const current = this.lines[i];
      const next = this.lines[i + 1];
      if (shouldMerge(current, next, gapX, gapY)) {
        current.absorb(next, mergeLinePolygons);
        this.lines.splice(i + 1, 1);
        merges++;
      } else {
        i++;
      }
    }
    return merges;
  }

  removeLine(line: TextLine): void {
    const index = this.lines.indexOf(line);
    if (index >= 0) {
      this.lines.splice(index, 1);
    }
    line.element.parentNode?.removeChild(line.element);
  }

  counter(level: RegionCountLevel = 'textlines'): number {
    if (level === 'textlines') {
      return this.lines.length;
    }
    return this.lines.reduce((sum, line) => sum + line.counter(level), 0);
  }

  /**
   * Region-level transcription, if any.
   */
  getText(): string | undefined {
    const textEquiv = firstChildElement(this.element, 'TextEquiv');
    return textEquiv ? elementText(firstChildElement(textEquiv, 'Unicode')) : undefined;
  }
}

export class TableCell extends TextRegion {
  constructor(
    element: Element,
    readonly table: TableRegion
  ) {
    super(element, table.page);
  }
}

function sortKey(line: TextLine): { x: number; y: number } {
  const baseline = line.baseline;
  if (baseline && baseline.length > 0) {
    return { y: meanY(baseline), x: Math.min(...baseline.map(([x]) => x)) };
  }
  const polygon = line.polygon;
  if (polygon && polygon.length > 0) {
    return { y: centroid(polygon)[1], x: Math.min(...polygon.map(([x]) => x)) };
  }
  return { x: Infinity, y: Infinity };
}

function shouldMerge(current: TextLine, next: TextLine, gapX: number, gapY: number): boolean {
  const a = current.baseline;
  const b = next.baseline;
  if (!a || !b || a.length === 0 || b.length === 0) {
    return false;
  }
  const end = a[a.length - 1];
  const start = b[0];
  const dx = start[0] - end[0];
  // the next line continues to the right and overlaps by at most gapX
  return start[0] > a[0][0] && dx >= -gapX && dx <= gapX && Math.abs(start[1] - end[1]) <= gapY;
}
