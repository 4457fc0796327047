/**
 * TextLine model
 *
 * Geometry is held as parsed points and written through to the line's
 * Coords and Baseline elements on every change. Fallible operations return
 * a Result; on failure the line's geometry is left as it was.
 */

import { GeometryError } from '@pageplus/errors';
import {
  buffer as bufferGeometry,
  convexHull as hullOf,
  distance,
  distinctPoints,
  fitIntoParent as fitRing,
  formatPoints,
  isSimpleRing,
  lineLength,
  bounds,
  meanY,
  parsePoints,
  removeRepeatedPoints as dedupe,
  splitOverlappingRings,
  translate as shift,
} from '../geometry';
import type { BufferDirection, LineString, Point, Ring } from '../geometry';
import {
  attributeValue,
  childElements,
  elementText,
  firstChildElement,
  insertChildElement,
  removeElement,
  setElementText,
} from '../io/dom';
import { err, ok, OK, Result } from '../result';
import type { TextRegion } from './text-region';

const AFTER_COORDS = ['Baseline', 'Word', 'TextEquiv', 'TextStyle', 'UserDefined', 'Labels'];
const AFTER_BASELINE = ['Word', 'TextEquiv', 'TextStyle', 'UserDefined', 'Labels'];
const AFTER_WORDS = ['TextEquiv', 'TextStyle', 'UserDefined', 'Labels'];
const AFTER_TEXT = ['TextStyle', 'UserDefined', 'Labels'];

export type LineCountLevel = 'words' | 'glyphs';

export interface LineGeometry {
  baseline?: LineString;
  polygon?: Ring;
}

export class TextLine {
  private _baseline: LineString | undefined;
  private _polygon: Ring | undefined;

  constructor(
    readonly element: Element,
    readonly region: TextRegion
  ) {
    this._polygon = readPoints(firstChildElement(element, 'Coords'));
    this._baseline = readPoints(firstChildElement(element, 'Baseline'));
  }

  get id(): string {
    return attributeValue(this.element, 'id') ?? '';
  }

  get baseline(): LineString | undefined {
    return this._baseline;
  }

  set baseline(points: LineString | undefined) {
    this._baseline = points;
    this.writePoints('Baseline', AFTER_BASELINE, points);
  }

  get polygon(): Ring | undefined {
    return this._polygon;
  }

  set polygon(points: Ring | undefined) {
    this._polygon = points;
    this.writePoints('Coords', AFTER_COORDS, points);
  }

  snapshot(): LineGeometry {
    return { baseline: this._baseline, polygon: this._polygon };
  }

  restore(geometry: LineGeometry): void {
    if (geometry.polygon !== this._polygon) {
      this.polygon = geometry.polygon;
    }
    if (geometry.baseline !== this._baseline) {
      this.baseline = geometry.baseline;
    }
  }

  removeRepeatedPoints(tolerance: number): Result<void> {
    if (this._polygon) {
      this.polygon = dedupe(this._polygon, tolerance);
    }
    return OK;
  }

  /**
   * True when the polygon is absent or a simple ring with at least three
   * distinct vertices.
   */
  validateRegion(): boolean {
    return this._polygon === undefined || isSimpleRing(this._polygon);
  }

  convexHull(): Result<void> {
    if (!this._polygon) {
      return OK;
    }
    const hull = hullOf(this._polygon);
    if (hull.length < 3) {
      return err(new GeometryError('Polygon collapses to fewer than 3 points', { points: this._polygon.length }));
    }
    this.polygon = hull;
    return OK;
  }

  validateBaseline(): Result<void> {
    const baseline = this._baseline;
    if (!baseline || baseline.length < 2) {
      return err(new GeometryError('Baseline has fewer than 2 points', { points: baseline?.length ?? 0 }));
    }
    if (lineLength(baseline) === 0) {
      return err(new GeometryError('Baseline has zero length'));
    }
    return OK;
  }

  /**
   * Replace the polygon with the buffer of the polygon, or of the baseline
   * when the line has no polygon.
   */
  buffer(distanceInPixels: number, direction: BufferDirection = 'all', rectangle = false): Result<void> {
    const input = this._polygon
      ? { kind: 'ring' as const, points: this._polygon }
      : this._baseline
        ? { kind: 'line' as const, points: this._baseline }
        : undefined;
    if (!input) {
      return err(new GeometryError('Line has neither polygon nor baseline'));
    }
    const result = bufferGeometry(input, distanceInPixels, { direction, rectangular: rectangle });
    if (!result.ok) {
      return result;
    }
    this.polygon = result.value;
    return OK;
  }

  /**
   * Boundary the polygon must stay within: the region's coordinates, or the
   * page frame when the region has none.
   */
  parentBoundary(): Ring {
    const boundary = this.region.boundary;
    if (boundary && distinctPoints(boundary).length >= 3) {
      return boundary;
    }
    return this.region.page.pageCoords('ring');
  }

  fitIntoParent(): Result<void> {
    if (!this._polygon) {
      return err(new GeometryError('Line has no polygon to fit'));
    }
    const result = fitRing(this._polygon, this.parentBoundary());
    if (!result.ok) {
      return result;
    }
    this.polygon = result.value;
    return OK;
  }

  /**
   * Derive the polygon from the baseline alone, grown above and below.
   */
  computePseudoTextLinePolygon(buffersize: number): Result<void> {
    const valid = this.validateBaseline();
    if (!valid.ok || !this._baseline) {
      return valid;
    }
    const result = bufferGeometry({ kind: 'line', points: this._baseline }, buffersize, { direction: 'y' });
    if (!result.ok) {
      return result;
    }
    this.polygon = result.value;
    return OK;
  }

  translateBaseline(yoff: number): Result<void> {
    if (!this._baseline) {
      return err(new GeometryError('Line has no baseline'));
    }
    this.baseline = shift(this._baseline, 0, yoff);
    return OK;
  }

  translate(xoff: number, yoff: number): Result<void> {
    if (this._baseline) {
      this.baseline = shift(this._baseline, xoff, yoff);
    }
    if (this._polygon) {
      this.polygon = shift(this._polygon, xoff, yoff);
    }
    return OK;
  }

  /**
   * Prolong both baseline ends by `pixels` along their end segments.
   */
  extendBaseline(pixels = 4): Result<void> {
    const baseline = this._baseline;
    if (!baseline || baseline.length < 2) {
      return err(new GeometryError('Baseline has fewer than 2 points', { points: baseline?.length ?? 0 }));
    }
    const last = baseline.length - 1;
    const head = prolong(baseline[1], baseline[0], pixels);
    const tail = prolong(baseline[last - 1], baseline[last], pixels);
    if (!head || !tail) {
      return err(new GeometryError('Baseline end segment has zero length'));
    }
    this.baseline = [head, ...baseline.slice(1, last), tail];
    return OK;
  }

  /**
   * Resolve the overlap between the predecessor's ring and this line's ring.
   */
  splitOverlappingLinearrings(
    predecessorRing: Ring,
    thisRing: Ring,
    predecessorBaseline?: LineString
  ): [Ring, Ring] {
    return splitOverlappingRings(predecessorRing, thisRing, {
      baselineA: predecessorBaseline,
      baselineB: this._baseline,
    });
  }

  /**
   * Shift the polygon vertically so its bounding-box midline lies on the
   * baseline's mean y.
   */
  placeTextLinePolygonOverBaseline(): Result<void> {
    if (!this._polygon) {
      return OK;
    }
    if (!this._baseline || this._baseline.length === 0) {
      return err(new GeometryError('Line has no baseline'));
    }
    const box = bounds(this._polygon);
    const yoff = meanY(this._baseline) - (box.minY + box.maxY) / 2;
    if (yoff !== 0) {
      this.polygon = shift(this._polygon, 0, yoff);
    }
    return OK;
  }

  getText(): string | undefined {
    const textEquiv = firstChildElement(this.element, 'TextEquiv');
    return textEquiv ? elementText(firstChildElement(textEquiv, 'Unicode')) : undefined;
  }

  updateText(text: string): void {
    const textEquiv =
      firstChildElement(this.element, 'TextEquiv') ?? insertChildElement(this.element, 'TextEquiv', AFTER_TEXT);
    const unicode = firstChildElement(textEquiv, 'Unicode') ?? insertChildElement(textEquiv, 'Unicode');
    setElementText(unicode, text);
  }

  words(): Element[] {
    return childElements(this.element, 'Word');
  }

  counter(level: LineCountLevel): number {
    const words = this.words();
    if (level === 'words') {
      return words.length;
    }
    return words.reduce((sum, word) => sum + childElements(word, 'Glyph').length, 0);
  }

  /**
   * Take over another line: baselines concatenated, polygons united, text
   * joined by one space, Word elements moved here. The other line's element
   * is removed from the document.
   */
  absorb(other: TextLine, mergePolygons: (a: Ring, b: Ring) => Ring): void {
    if (this._baseline && other.baseline) {
      this.baseline = [...this._baseline, ...other.baseline];
    }
    if (this._polygon && other.polygon) {
      this.polygon = mergePolygons(this._polygon, other.polygon);
    } else if (other.polygon) {
      this.polygon = other.polygon;
    }

    const texts = [this.getText(), other.getText()].filter(
      (text): text is string => text !== undefined && text.length > 0
    );
    if (texts.length > 0) {
      this.updateText(texts.join(' '));
    }

    const anchor = childElements(this.element).find((child) => AFTER_WORDS.includes(child.localName));
    for (const word of other.words()) {
      if (anchor) {
        this.element.insertBefore(word, anchor);
      } else {
        this.element.appendChild(word);
      }
    }
    removeElement(other.element);
  }

  private writePoints(localName: string, before: string[], points: Point[] | undefined): void {
    const existing = firstChildElement(this.element, localName);
    if (!points) {
      if (existing) {
        removeElement(existing);
      }
      return;
    }
    const target = existing ?? insertChildElement(this.element, localName, before);
    target.setAttribute('points', formatPoints(points));
  }
}

function readPoints(element: Element | undefined): Point[] | undefined {
  if (!element) {
    return undefined;
  }
  const points = parsePoints(element.getAttribute('points'));
  return points && points.length > 0 ? points : undefined;
}

function prolong(from: Point, to: Point, pixels: number): Point | undefined {
  const length = distance(from, to);
  if (length === 0) {
    return undefined;
  }
  return [to[0] + ((to[0] - from[0]) / length) * pixels, to[1] + ((to[1] - from[1]) / length) * pixels];
}
