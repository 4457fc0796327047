/**
 * TextRegion / TableRegion - Unit Tests
 */

import { attributeValue, childElements } from '../../io/dom';
import { Page } from '../page';
import { mergeLinePolygons } from '../text-region';
import { pageXml } from './fixtures';
import type { LineFixture } from './fixtures';

function regionWith(lines: LineFixture[]) {
  const page = Page.fromString(pageXml({ regions: [{ id: 'r1', lines }] }));
  return page.textRegions[0];
}

const ids = (lines: { id: string }[]): string[] => lines.map((line) => line.id);

describe('TextRegion', () => {
  describe('sortLines', () => {
    const unsorted: LineFixture[] = [
      { id: 'c', baseline: '10,300 200,300' },
      { id: 'b', baseline: '300,104 400,104' },
      { id: 'a', baseline: '10,100 200,100' },
      { id: 'd', baseline: '10,150 200,150' },
    ];

    it('should order rows top to bottom and lines left to right', () => {
      const region = regionWith(unsorted);

      region.sortLines();

      expect(ids(region.lines)).toEqual(['a', 'b', 'd', 'c']);
    });

    it('should reorder the XML children', () => {
      const region = regionWith(unsorted);

      region.sortLines();

      const xmlIds = childElements(region.element, 'TextLine').map((element) => element.getAttribute('id'));
      expect(xmlIds).toEqual(['a', 'b', 'd', 'c']);
    });

    it('should be idempotent', () => {
      const region = regionWith(unsorted);

      region.sortLines();
      const once = ids(region.lines);
      region.sortLines();

      expect(ids(region.lines)).toEqual(once);
    });

    it('should read lines within the row tolerance left to right', () => {
      const region = regionWith([
        { id: 'right', baseline: '500,100 600,100' },
        { id: 'left', baseline: '10,110 100,110' },
      ]);

      region.sortLines();
      expect(ids(region.lines)).toEqual(['left', 'right']);

      region.sortLines(5);
      expect(ids(region.lines)).toEqual(['right', 'left']);
    });

    it('should fall back to the polygon centroid without a baseline', () => {
      const region = regionWith([
        { id: 'low', coords: '0,200 100,200 100,220 0,220' },
        { id: 'high', baseline: '0,50 100,50' },
      ]);

      region.sortLines();

      expect(ids(region.lines)).toEqual(['high', 'low']);
    });
  });

  describe('mergeSplittedLines', () => {
    it('should merge a chain of split lines in one pass', () => {
      const region = regionWith([
        { id: 'l1', baseline: '10,100 100,100', text: 'one' },
        { id: 'l2', baseline: '130,104 250,104', text: 'two' },
        { id: 'l3', baseline: '300,110 400,110', text: 'three' },
      ]);

      const merges = region.mergeSplittedLines(64, 10);

      expect(merges).toBe(2);
      expect(ids(region.lines)).toEqual(['l1']);
      expect(region.lines[0].baseline).toEqual([
        [10, 100], [100, 100], [130, 104], [250, 104], [300, 110], [400, 110],
      ]);
      expect(region.lines[0].getText()).toBe('one two three');
      expect(childElements(region.element, 'TextLine')).toHaveLength(1);
    });

    it('should not merge beyond the thresholds', () => {
      const region = regionWith([
        { id: 'l1', baseline: '10,100 100,100' },
        { id: 'l2', baseline: '200,100 300,100' },
        { id: 'l3', baseline: '310,120 400,120' },
      ]);

      expect(region.mergeSplittedLines(64, 10)).toBe(0);
      expect(region.lines).toHaveLength(3);
    });

    it('should keep the rows of a skewed region apart', () => {
      const region = regionWith([
        { id: 'upper', baseline: '0,100 500,110', text: 'first row' },
        { id: 'lower', baseline: '0,116 500,116', text: 'second row' },
      ]);

      expect(region.mergeSplittedLines(64, 10)).toBe(0);
      expect(ids(region.lines)).toEqual(['upper', 'lower']);
      expect(region.lines[0].baseline).toEqual([[0, 100], [500, 110]]);
      expect(region.lines[0].getText()).toBe('first row');
    });

    it('should merge lines overlapping by less than the horizontal gap', () => {
      const region = regionWith([
        { id: 'l1', baseline: '10,100 200,100' },
        { id: 'l2', baseline: '180,102 300,102' },
      ]);

      expect(region.mergeSplittedLines(64, 10)).toBe(1);
      expect(ids(region.lines)).toEqual(['l1']);
    });

    it('should converge after one pass', () => {
      const region = regionWith([
        { id: 'l1', baseline: '10,100 100,100' },
        { id: 'l2', baseline: '120,102 200,102' },
        { id: 'l3', baseline: '10,200 100,200' },
      ]);

      expect(region.mergeSplittedLines(64, 10)).toBe(1);
      expect(region.mergeSplittedLines(64, 10)).toBe(0);
      expect(ids(region.lines)).toEqual(['l1', 'l3']);
    });

    it('should move the words of the consumed line', () => {
      const region = regionWith([
        { id: 'l1', baseline: '10,100 100,100', words: [{ id: 'w1' }], text: 'a' },
        { id: 'l2', baseline: '110,100 200,100', words: [{ id: 'w2' }, { id: 'w3' }], text: 'b' },
      ]);

      region.mergeSplittedLines(64, 10);

      const children = childElements(region.lines[0].element).map(
        (child) => attributeValue(child, 'id') ?? child.localName
      );
      expect(children).toEqual(['Baseline', 'w1', 'w2', 'w3', 'TextEquiv']);
    });

    it('should unite the polygons of merged lines', () => {
      const region = regionWith([
        { id: 'l1', coords: '10,80 100,80 100,110 10,110', baseline: '10,100 100,100' },
        { id: 'l2', coords: '100,80 200,80 200,110 100,110', baseline: '110,100 200,100' },
      ]);

      region.mergeSplittedLines(64, 10);

      const polygon = region.lines[0].polygon ?? [];
      expect([...polygon].sort((p, q) => p[0] - q[0] || p[1] - q[1])).toEqual([
        [10, 80], [10, 110], [200, 80], [200, 110],
      ]);
    });
  });

  describe('mergeLinePolygons', () => {
    it('should fall back to the hull of both rings when they do not touch', () => {
      const merged = mergeLinePolygons(
        [[0, 0], [10, 0], [10, 10], [0, 10]],
        [[20, 0], [30, 0], [30, 10], [20, 10]]
      );

      expect(merged).toEqual([[0, 0], [30, 0], [30, 10], [0, 10]]);
    });
  });

  describe('counter', () => {
    it('should count lines, words and glyphs', () => {
      const region = regionWith([
        { id: 'l1', words: [{ id: 'w1', glyphs: ['g1', 'g2'] }] },
        { id: 'l2', words: [{ id: 'w2', glyphs: ['g3'] }, { id: 'w3' }] },
      ]);

      expect(region.counter('textlines')).toBe(2);
      expect(region.counter('words')).toBe(3);
      expect(region.counter('glyphs')).toBe(3);
    });
  });
});

describe('TableRegion', () => {
  it('should expose cells and their lines', () => {
    const page = Page.fromString(
      pageXml({
        tables: [
          {
            id: 't1',
            coords: '0,0 500,0 500,500 0,500',
            cells: [
              { id: 'c1', coords: '0,0 250,0 250,500 0,500', lines: [{ id: 'l1' }, { id: 'l2' }] },
              { id: 'c2', coords: '250,0 500,0 500,500 250,500', lines: [{ id: 'l3' }] },
            ],
          },
        ],
      })
    );
    const table = page.tableRegions[0];

    expect(table.counter('tablecells')).toBe(2);
    expect(table.counter('textlines')).toBe(3);
    expect(ids(table.lines)).toEqual(['l1', 'l2', 'l3']);
    expect(table.cells[1].table).toBe(table);
    expect(table.cells[1].lines[0].region).toBe(table.cells[1]);
  });
});
