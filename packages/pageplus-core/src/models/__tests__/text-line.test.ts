/**
 * TextLine - Unit Tests
 */

import { childElements, firstChildElement } from '../../io/dom';
import type { Point } from '../../geometry';
import { Page } from '../page';
import type { TextLine } from '../text-line';
import { pageXml } from './fixtures';
import type { LineFixture } from './fixtures';

const sorted = (points: Point[] | undefined): Point[] =>
  [...(points ?? [])].sort((p, q) => p[0] - q[0] || p[1] - q[1]);

function lineOf(fixture: Omit<LineFixture, 'id'>, regionCoords?: string): TextLine {
  const page = Page.fromString(
    pageXml({ regions: [{ id: 'r1', coords: regionCoords, lines: [{ id: 'l1', ...fixture }] }] })
  );
  return page.textRegions[0].lines[0];
}

const childNames = (line: TextLine): string[] => childElements(line.element).map((child) => child.localName);

describe('TextLine', () => {
  describe('geometry access', () => {
    it('should read baseline and polygon from the element', () => {
      const line = lineOf({ coords: '0,0 10,0 10,10', baseline: '0,8 10,8' });

      expect(line.id).toBe('l1');
      expect(line.polygon).toEqual([[0, 0], [10, 0], [10, 10]]);
      expect(line.baseline).toEqual([[0, 8], [10, 8]]);
    });

    it('should write rounded coordinates through to Coords', () => {
      const line = lineOf({ coords: '0,0 10,0 10,10' });

      line.polygon = [[1.6, 2.4], [10, 2], [10, 10]];

      expect(firstChildElement(line.element, 'Coords')?.getAttribute('points')).toBe('2,2 10,2 10,10');
    });

    it('should create a missing Baseline right after Coords', () => {
      const line = lineOf({ coords: '0,0 10,0 10,10', text: 'abc' });
      expect(childNames(line)).toEqual(['Coords', 'TextEquiv']);

      line.baseline = [[0, 8], [10, 8]];

      expect(childNames(line)).toEqual(['Coords', 'Baseline', 'TextEquiv']);
      expect(firstChildElement(line.element, 'Baseline')?.getAttribute('points')).toBe('0,8 10,8');
    });
  });

  describe('validation', () => {
    it('should treat a missing polygon as valid', () => {
      expect(lineOf({ baseline: '0,0 10,0' }).validateRegion()).toBe(true);
    });

    it('should flag a self-intersecting polygon', () => {
      expect(lineOf({ coords: '0,0 10,10 10,0 0,10' }).validateRegion()).toBe(false);
    });

    it('should reject a baseline with a single point', () => {
      const result = lineOf({ baseline: '100,200' }).validateBaseline();
      expect(result.ok).toBe(false);
    });

    it('should reject a zero-length baseline', () => {
      const result = lineOf({ baseline: '100,200 100,200' }).validateBaseline();

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.message).toBe('Baseline has zero length');
      }
    });
  });

  describe('convexHull', () => {
    it('should replace a bow tie by its hull', () => {
      const line = lineOf({ coords: '0,0 10,10 10,0 0,10' });

      expect(line.convexHull().ok).toBe(true);
      expect(line.polygon).toEqual([[0, 0], [10, 0], [10, 10], [0, 10]]);
    });
  });

  describe('buffer and fitIntoParent', () => {
    it('should build a rectangle around a baseline-only line', () => {
      const line = lineOf({ baseline: '100,200 300,210' }, '50,150 500,150 500,300 50,300');

      expect(line.buffer(16, 'all', true).ok).toBe(true);
      expect(line.fitIntoParent().ok).toBe(true);

      expect(sorted(line.polygon)).toEqual([[84, 184], [84, 226], [316, 184], [316, 226]]);
    });

    it('should clip the extension at the region boundary', () => {
      const line = lineOf({ baseline: '100,200 300,210' }, '50,150 300,150 300,300 50,300');

      line.buffer(16, 'all', true);
      line.fitIntoParent();

      expect(sorted(line.polygon)).toEqual([[84, 184], [84, 226], [300, 184], [300, 226]]);
    });

    it('should fit into the page frame when the region has no coordinates', () => {
      const line = lineOf({ coords: '900,700 1100,700 1100,900 900,900' });

      expect(line.fitIntoParent().ok).toBe(true);
      expect(sorted(line.polygon)).toEqual([[900, 700], [900, 800], [1000, 700], [1000, 800]]);
    });

    it('should keep the polygon when it lies outside its region', () => {
      const line = lineOf({ coords: '600,600 700,600 700,700 600,700' }, '0,0 100,0 100,100 0,100');

      const result = line.fitIntoParent();

      expect(result.ok).toBe(false);
      expect(line.polygon).toEqual([[600, 600], [700, 600], [700, 700], [600, 700]]);
    });
  });

  describe('baseline operations', () => {
    it('should build a pseudo polygon above and below the baseline', () => {
      const line = lineOf({ baseline: '100,200 300,200' });

      expect(line.computePseudoTextLinePolygon(16).ok).toBe(true);
      expect(sorted(line.polygon)).toEqual([[100, 184], [100, 216], [300, 184], [300, 216]]);
    });

    it('should prolong both baseline ends', () => {
      const line = lineOf({ baseline: '100,200 150,200 200,200' });

      expect(line.extendBaseline().ok).toBe(true);
      expect(line.baseline).toEqual([[96, 200], [150, 200], [204, 200]]);
    });

    it('should move the baseline only', () => {
      const line = lineOf({ coords: '0,0 10,0 10,10', baseline: '0,8 10,8' });

      line.translateBaseline(10);

      expect(line.baseline).toEqual([[0, 18], [10, 18]]);
      expect(line.polygon).toEqual([[0, 0], [10, 0], [10, 10]]);
    });
  });

  describe('placeTextLinePolygonOverBaseline', () => {
    it('should center the polygon on the baseline and translate afterwards', () => {
      const line = lineOf({ coords: '0,0 100,0 100,20 0,20', baseline: '0,50 100,50' });

      expect(line.placeTextLinePolygonOverBaseline().ok).toBe(true);
      expect(line.polygon).toEqual([[0, 40], [100, 40], [100, 60], [0, 60]]);

      line.translate(5, -5);
      expect(line.polygon).toEqual([[5, 35], [105, 35], [105, 55], [5, 55]]);
      expect(line.baseline).toEqual([[5, 45], [105, 45]]);
    });

    it('should fail without a baseline', () => {
      expect(lineOf({ coords: '0,0 10,0 10,10' }).placeTextLinePolygonOverBaseline().ok).toBe(false);
    });
  });

  describe('text', () => {
    it('should create TextEquiv after the words', () => {
      const line = lineOf({ coords: '0,0 10,0 10,10', words: [{ id: 'w1', glyphs: ['g1', 'g2'] }] });
      expect(line.getText()).toBeUndefined();

      line.updateText('hello');

      expect(line.getText()).toBe('hello');
      expect(childNames(line)).toEqual(['Coords', 'Word', 'TextEquiv']);
    });

    it('should count words and glyphs', () => {
      const line = lineOf({ words: [{ id: 'w1', glyphs: ['g1', 'g2'] }, { id: 'w2', glyphs: ['g3'] }] });

      expect(line.counter('words')).toBe(2);
      expect(line.counter('glyphs')).toBe(3);
    });
  });
});
