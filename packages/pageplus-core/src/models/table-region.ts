import { parsePoints } from '../geometry';
import type { Ring } from '../geometry';
import { attributeValue, childElements, firstChildElement } from '../io/dom';
import type { Page } from './page';
import type { TextLine } from './text-line';
import { TableCell } from './text-region';
import type { RegionCountLevel } from './text-region';

export type TableCountLevel = 'tablecells' | RegionCountLevel;

export class TableRegion {
  readonly cells: TableCell[];

  constructor(
    readonly element: Element,
    readonly page: Page
  ) {
    this.cells = childElements(element, 'TableCell').map((cell) => new TableCell(cell, this));
  }

  get id(): string {
    return attributeValue(this.element, 'id') ?? '';
  }

  get boundary(): Ring | undefined {
    const coords = firstChildElement(this.element, 'Coords');
    const points = coords ? parsePoints(coords.getAttribute('points')) : undefined;
    return points && points.length > 0 ? points : undefined;
  }

  /** Lines of every cell, in cell order */
  get lines(): TextLine[] {
    return this.cells.flatMap((cell) => cell.lines);
  }

  counter(level: TableCountLevel = 'textlines'): number {
    if (level === 'tablecells') {
      return this.cells.length;
    }
    return this.cells.reduce((sum, cell) => sum + cell.counter(level), 0);
  }
}
