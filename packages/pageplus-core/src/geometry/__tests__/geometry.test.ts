/**
 * Geometry primitives - Unit Tests
 */

import {
  buffer,
  bounds,
  convexHull,
  fitIntoParent,
  formatPoints,
  isSimpleRing,
  parsePoints,
  removeRepeatedPoints,
  ringArea,
  splitOverlappingRings,
  translate,
  distance,
} from '../index';
import type { Point, Ring } from '../types';

const sorted = (ring: Ring): Point[] => [...ring].sort((p, q) => p[0] - q[0] || p[1] - q[1]);

function unwrap<T>(result: { ok: true; value: T } | { ok: false; error: Error }): T {
  if (!result.ok) {
    throw result.error;
  }
  return result.value;
}

describe('Geometry primitives', () => {
  describe('points attribute', () => {
    it('should parse PAGE point lists', () => {
      expect(parsePoints('10,20  30,40 ')).toEqual([[10, 20], [30, 40]]);
    });

    it('should reject malformed point lists', () => {
      expect(parsePoints('10,20 30;40')).toBeUndefined();
      expect(parsePoints(null)).toBeUndefined();
    });

    it('should round and clamp when formatting', () => {
      expect(formatPoints([[1.4, -3], [2.6, 5]])).toBe('1,0 3,5');
    });
  });

  describe('removeRepeatedPoints', () => {
    it('should collapse neighbours closer than the tolerance, closing edge included', () => {
      const ring: Ring = [[0, 0], [0, 0], [10, 0], [10, 0.5], [10, 10], [0, 10], [0, 0.2]];

      const cleaned = removeRepeatedPoints(ring, 1);

      expect(cleaned).toEqual([[0, 0], [10, 0], [10, 10], [0, 10]]);
      expect(cleaned.length).toBeLessThanOrEqual(ring.length);
      for (let i = 0; i < cleaned.length; i++) {
        expect(distance(cleaned[i], cleaned[(i + 1) % cleaned.length])).toBeGreaterThanOrEqual(1);
      }
    });

    it('should keep a clean ring unchanged', () => {
      const ring: Ring = [[0, 0], [10, 0], [10, 10]];
      expect(removeRepeatedPoints(ring, 1)).toEqual(ring);
    });
  });

  describe('isSimpleRing', () => {
    it('should accept a square, with or without closing vertex', () => {
      expect(isSimpleRing([[0, 0], [10, 0], [10, 10], [0, 10]])).toBe(true);
      expect(isSimpleRing([[0, 0], [10, 0], [10, 10], [0, 10], [0, 0]])).toBe(true);
    });

    it('should reject a bow tie', () => {
      expect(isSimpleRing([[0, 0], [10, 10], [10, 0], [0, 10]])).toBe(false);
    });

    it('should reject degenerate rings', () => {
      expect(isSimpleRing([[0, 0], [10, 0]])).toBe(false);
      expect(isSimpleRing([[0, 0], [5, 0], [10, 0]])).toBe(false);
    });

    it('should reject a spike folding back over its edge', () => {
      expect(isSimpleRing([[0, 0], [10, 0], [20, 0], [15, 0], [15, 10], [0, 10]])).toBe(false);
    });
  });

  describe('convexHull', () => {
    it('should drop interior and collinear points', () => {
      expect(convexHull([[0, 0], [10, 0], [10, 10], [0, 10], [5, 5], [5, 0]])).toEqual([
        [0, 0], [10, 0], [10, 10], [0, 10],
      ]);
    });

    it('should return fewer than three points as they are', () => {
      expect(convexHull([[3, 3], [3, 3], [7, 7]])).toEqual([[3, 3], [7, 7]]);
    });
  });

  describe('translate', () => {
    it('should shift every point', () => {
      expect(translate([[1, 2], [3, 4]], 10, -1)).toEqual([[11, 1], [13, 3]]);
    });
  });

  describe('buffer', () => {
    it('should grow a rectangle around a baseline on all sides', () => {
      const ring = unwrap(buffer({ kind: 'line', points: [[100, 200], [300, 210]] }, 16, { rectangular: true }));
      expect(ring).toEqual([[84, 184], [316, 184], [316, 226], [84, 226]]);
    });

    it('should grow a rectangle only vertically for direction y', () => {
      const ring = unwrap(
        buffer({ kind: 'line', points: [[100, 200], [300, 210]] }, 16, { direction: 'y', rectangular: true })
      );
      expect(ring).toEqual([[100, 184], [300, 184], [300, 226], [100, 226]]);
    });

    it('should enclose the line by at least the distance in every direction', () => {
      const ring = unwrap(buffer({ kind: 'line', points: [[0, 100], [100, 100]] }, 10));
      const box = bounds(ring);

      expect(isSimpleRing(ring)).toBe(true);
      expect(box.minX).toBeCloseTo(-10, 6);
      expect(box.maxX).toBeCloseTo(110, 6);
      expect(box.minY).toBeCloseTo(90, 6);
      expect(box.maxY).toBeCloseTo(110, 6);
    });

    it('should buffer a bent baseline into one simple polygon', () => {
      const ring = unwrap(buffer({ kind: 'line', points: [[0, 0], [50, 40], [100, 0]] }, 5));
      const box = bounds(ring);

      expect(isSimpleRing(ring)).toBe(true);
      expect(box.minX).toBeCloseTo(-5, 6);
      expect(box.maxX).toBeCloseTo(105, 6);
      expect(box.minY).toBeCloseTo(-5, 6);
      expect(box.maxY).toBeCloseTo(45, 6);
    });

    it('should build a band above and below for direction y', () => {
      const ring = unwrap(buffer({ kind: 'line', points: [[0, 50], [100, 50]] }, 8, { direction: 'y' }));
      expect(sorted(ring)).toEqual([[0, 42], [0, 58], [100, 42], [100, 58]]);
    });

    it('should buffer a ring around its own area', () => {
      const ring = unwrap(
        buffer({ kind: 'ring', points: [[0, 0], [10, 0], [10, 10], [0, 10]] }, 2, { rectangular: true })
      );
      expect(ring).toEqual([[-2, -2], [12, -2], [12, 12], [-2, 12]]);
    });

    it('should fail for fewer than two distinct points', () => {
      const result = buffer({ kind: 'line', points: [[5, 5], [5, 5]] }, 10);
      expect(result.ok).toBe(false);
    });

    it('should fail for a non-positive distance', () => {
      expect(buffer({ kind: 'line', points: [[0, 0], [10, 0]] }, 0).ok).toBe(false);
    });

    it('should fail when the permitted direction cannot give the line an area', () => {
      expect(buffer({ kind: 'line', points: [[0, 50], [100, 50]] }, 8, { direction: 'x' }).ok).toBe(false);
    });
  });

  describe('fitIntoParent', () => {
    const parent: Ring = [[0, 0], [100, 0], [100, 100], [0, 100]];

    it('should clip a polygon to its parent', () => {
      const fitted = unwrap(fitIntoParent([[-10, -10], [50, -10], [50, 50], [-10, 50]], parent));

      expect(sorted(fitted)).toEqual([[0, 0], [0, 50], [50, 0], [50, 50]]);
      expect(ringArea(fitted)).toBe(2500);
    });

    it('should be idempotent', () => {
      const once = unwrap(fitIntoParent([[-10, 20], [120, 20], [120, 60], [-10, 60]], parent));
      const twice = unwrap(fitIntoParent(once, parent));

      expect(twice).toEqual(once);
    });

    it('should fail on an empty intersection', () => {
      const result = fitIntoParent([[200, 200], [300, 200], [300, 300], [200, 300]], parent);
      expect(result.ok).toBe(false);
    });
  });

  describe('splitOverlappingRings', () => {
    const upper: Ring = [[0, 0], [100, 0], [100, 30], [0, 30]];
    const lower: Ring = [[0, 20], [100, 20], [100, 50], [0, 50]];

    it('should cut stacked rings in the middle of their overlap', () => {
      const [a, b] = splitOverlappingRings(upper, lower);

      expect(sorted(a)).toEqual([[0, 0], [0, 25], [100, 0], [100, 25]]);
      expect(sorted(b)).toEqual([[0, 25], [0, 50], [100, 25], [100, 50]]);
    });

    it('should fall back to the baseline midpoint when the overlap middle is outside the baselines', () => {
      const [a, b] = splitOverlappingRings(upper, lower, {
        baselineA: [[0, 28], [100, 28]],
        baselineB: [[0, 45], [100, 45]],
      });

      expect(a).toBe(upper);
      expect(sorted(b)).toEqual([[0, 30], [0, 50], [100, 30], [100, 50]]);
    });

    it('should cut side-by-side rings vertically', () => {
      const left: Ring = [[0, 0], [60, 0], [60, 20], [0, 20]];
      const right: Ring = [[50, 0], [110, 0], [110, 20], [50, 20]];

      const [a, b] = splitOverlappingRings(left, right);

      expect(sorted(a)).toEqual([[0, 0], [0, 20], [55, 0], [55, 20]]);
      expect(sorted(b)).toEqual([[55, 0], [55, 20], [110, 0], [110, 20]]);
    });

    it('should return disjoint rings unchanged', () => {
      const far: Ring = [[0, 200], [100, 200], [100, 230], [0, 230]];
      const [a, b] = splitOverlappingRings(upper, far);

      expect(a).toBe(upper);
      expect(b).toBe(far);
    });
  });
});
