/**
 * Page document model
 *
 * Wraps one parsed PAGE-XML document: its regions, reading order, identifier
 * management, text extraction and serialization.
 */

import fs from 'fs-extra';
import path from 'path';
import { PageXmlError, SerializationError } from '@pageplus/errors';
import { boxRing, formatPoints } from '../geometry';
import type { Ring } from '../geometry';
import {
  attributeValue,
  childElements,
  descendantElements,
  firstChildElement,
  insertChildElement,
  removeElement,
  setElementText,
} from '../io/dom';
import { parsePageXml, serializePageXml } from '../io/page-xml';
import { TableRegion } from './table-region';
import { TextRegion } from './text-region';
import type { TableCell } from './text-region';
import { dehyphenate } from './dehyphenate';

export type ReadingOrderMode = 'auto' | 'reading_order' | 'document';

export type PageCountLevel = 'textlines' | 'words' | 'glyphs' | 'tablecells' | 'textregions' | 'tableregions';

export type TextLevel = 'word' | 'line' | 'region';

export type FulltextLevel = 'textline' | 'region';

export interface FulltextOptions {
  /** Line-level or region-level TextEquiv (default: textline) */
  level?: FulltextLevel;
  dehyphenate?: boolean;
  /** Visit regions in reading order (default: true); otherwise document order */
  readingOrder?: boolean;
  mode?: ReadingOrderMode;
  delimiter?: string;
}

const REGION_TAGS = ['TextRegion', 'TableRegion'];

const REF_TAGS = ['RegionRefIndexed', 'RegionRef'];

/** Child element renamed under each parent, with its id prefix */
const CHILD_IDS: Record<string, { tag: string; prefix: string }> = {
  TableRegion: { tag: 'TableCell', prefix: 'c' },
  TableCell: { tag: 'TextLine', prefix: 'l' },
  TextRegion: { tag: 'TextLine', prefix: 'l' },
  TextLine: { tag: 'Word', prefix: 'w' },
  Word: { tag: 'Glyph', prefix: 'g' },
};

const METADATA_AFTER_LAST_CHANGE = ['Comments', 'UserDefined', 'MetadataItem'];

export class Page {
  readonly document: Document;
  readonly root: Element;
  readonly pageElement: Element;
  readonly namespace: string;
  readonly width: number;
  readonly height: number;
  readonly textRegions: TextRegion[];
  readonly tableRegions: TableRegion[];

  private constructor(
    xml: string,
    readonly source: string
  ) {
    const parsed = parsePageXml(xml, source);
    this.document = parsed.document;
    this.root = parsed.root;
    this.pageElement = parsed.page;
    this.namespace = parsed.namespace;

    this.width = readDimension(parsed.page, 'imageWidth', source);
    this.height = readDimension(parsed.page, 'imageHeight', source);

    this.textRegions = descendantElements(parsed.page, 'TextRegion').map((element) => new TextRegion(element, this));
    this.tableRegions = descendantElements(parsed.page, 'TableRegion').map(
      (element) => new TableRegion(element, this)
    );
  }

  static fromString(xml: string, source = '<memory>'): Page {
    return new Page(xml, source);
  }

  static async fromFile(file: string): Promise<Page> {
    const xml = await fs.readFile(file, 'utf8');
    return new Page(xml, file);
  }

  get imageFilename(): string {
    return attributeValue(this.pageElement, 'imageFilename') ?? '';
  }

  /**
   * Every line container: text regions, then the cells of each table.
   */
  regions(): Array<TextRegion | TableCell> {
    return [...this.textRegions, ...this.tableRegions.flatMap((table) => table.cells)];
  }

  pageSize(): [number, number] {
    return [this.width, this.height];
  }

  pageCoords(returntype?: 'string'): string;
  pageCoords(returntype: 'tuples' | 'ring'): Ring;
  pageCoords(returntype: 'string' | 'tuples' | 'ring' = 'string'): string | Ring {
    const ring = boxRing({ minX: 0, minY: 0, maxX: this.width, maxY: this.height });
    return returntype === 'string' ? formatPoints(ring) : ring;
  }

  /**
   * Region ids in visiting order. `reading_order` reads the ordered groups
   * of the ReadingOrder element, `document` the Text/Table regions in
   * document order; `auto` falls back to document order when the reading
   * order yields nothing.
   */
  getRegionReadingOrderIds(mode: ReadingOrderMode = 'auto'): string[] {
    const ids: string[] = [];
    if (mode === 'auto' || mode === 'reading_order') {
      const readingOrder = firstChildElement(this.pageElement, 'ReadingOrder');
      if (readingOrder) {
        for (const group of descendantElements(readingOrder)) {
          if (group.localName !== 'OrderedGroup' && group.localName !== 'OrderedGroupIndexed') {
            continue;
          }
          const refs = childElements(group, 'RegionRefIndexed').sort(
            (a, b) => Number(a.getAttribute('index')) - Number(b.getAttribute('index'))
          );
          for (const ref of refs) {
            const regionRef = attributeValue(ref, 'regionRef');
            if (regionRef) {
              ids.push(regionRef);
            }
          }
        }
      }
    }
    if (mode === 'document' || (mode === 'auto' && ids.length === 0)) {
      for (const region of this.regionElements()) {
        const id = attributeValue(region, 'id');
        if (id) {
          ids.push(id);
        }
      }
    }
    return ids;
  }

  /**
   * `r<n>` may be handed out unless an element other than a Text/Table
   * region already owns it.
   */
  validRegionId(n: number): boolean {
    const id = `r${n}`;
    const owner = descendantElements(this.root).find((element) => element.getAttribute('id') === id);
    return owner === undefined || REGION_TAGS.includes(owner.localName);
  }

  /**
   * Renumber every Text/Table region as `r1, r2, ...` in the resolved
   * reading order (regions missing from it follow in document order) and
   * their children below them. Reading-order references are rewritten.
   * Returns the mapping from old to new region ids.
   */
  reassignIds(mode: ReadingOrderMode = 'auto'): Map<string, string> {
    // regions without an id are grouped under their own element
    const groups = new Map<string | Element, Element[]>();
    for (const id of this.getRegionReadingOrderIds(mode)) {
      groups.set(id, []);
    }
    this.regionElements().forEach((region) => {
      const key = attributeValue(region, 'id') ?? region;
      const group = groups.get(key);
      if (group) {
        group.push(region);
      } else {
        groups.set(key, [region]);
      }
    });

    const mapping = new Map<string, string>();
    let next = 1;
    for (const [oldId, regions] of groups) {
      if (regions.length === 0) {
        continue;
      }
      while (!this.validRegionId(next)) {
        next++;
      }
      const newId = `r${next}`;
      if (typeof oldId === 'string') {
        mapping.set(oldId, newId);
      }
      for (const region of regions) {
        region.setAttribute('id', newId);
        renameChildren(region, newId);
      }
      next++;
    }

    const readingOrder = firstChildElement(this.pageElement, 'ReadingOrder');
    if (readingOrder) {
      const refs = descendantElements(readingOrder).filter((element) => REF_TAGS.includes(element.localName));
      for (const ref of refs) {
        const regionRef = attributeValue(ref, 'regionRef');
        const renamed = regionRef === undefined ? undefined : mapping.get(regionRef);
        if (renamed !== undefined) {
          ref.setAttribute('regionRef', renamed);
        }
      }
    }
    return mapping;
  }

  counter(level: PageCountLevel = 'textlines'): number {
    switch (level) {
      case 'textlines':
      case 'words':
      case 'glyphs':
        return this.regions().reduce((sum, region) => sum + region.counter(level), 0);
      case 'tablecells':
        return this.tableRegions.reduce((sum, table) => sum + table.cells.length, 0);
      case 'textregions':
        return this.textRegions.length;
      case 'tableregions':
        return this.tableRegions.length;
    }
  }

  /**
   * Remove transcriptions at one level, leaving geometry alone: `word`
   * drops Word elements, `line` and `region` drop the TextEquiv of lines or
   * regions. Returns the number of removed elements.
   */
  deleteTextlevel(level: TextLevel = 'region'): number {
    let targets: Element[];
    if (level === 'word') {
      targets = descendantElements(this.pageElement, 'Word');
    } else if (level === 'line') {
      targets = this.regions().flatMap((region) =>
        region.lines.flatMap((line) => childElements(line.element, 'TextEquiv'))
      );
    } else {
      targets = [...this.regions(), ...this.tableRegions].flatMap((region) =>
        childElements(region.element, 'TextEquiv')
      );
    }
    targets.forEach(removeElement);
    return targets.length;
  }

  /**
   * Remove every text line from every region. Returns the number removed.
   */
  deleteTextLines(): number {
    let removed = 0;
    for (const region of this.regions()) {
      for (const line of [...region.lines]) {
        region.removeLine(line);
        removed++;
      }
    }
    return removed;
  }

  extractFulltext(options: FulltextOptions = {}): string {
    const { level = 'textline', readingOrder = true, mode = 'auto', delimiter = '\n' } = options;

    let containers: Element[];
    if (readingOrder) {
      const byId = new Map<string, Element>();
      for (const region of this.regionElements()) {
        const id = attributeValue(region, 'id');
        if (id && !byId.has(id)) {
          byId.set(id, region);
        }
      }
      containers = this.getRegionReadingOrderIds(mode).flatMap((id) => {
        const region = byId.get(id);
        return region ? [region] : [];
      });
    } else {
      containers = level === 'region' ? this.regionElements() : [this.pageElement];
    }

    const texts = containers.flatMap((container) => {
      if (level === 'region') {
        const regions = [container, ...descendantElements(container, 'TableCell')];
        return regions.flatMap((region) => (unicodeOf(region) ?? '').split('\n'));
      }
      return descendantElements(container, 'TextLine').map((line) => unicodeOf(line) ?? '');
    });

    const lines = texts.filter((text) => text.length > 0);
    return (options.dehyphenate ? dehyphenate(lines) : lines).join(delimiter);
  }

  /**
   * Stamp Metadata/LastChange.
   */
  touch(now: Date = new Date()): void {
    const metadata = firstChildElement(this.root, 'Metadata');
    if (!metadata) {
      return;
    }
    const lastChange =
      firstChildElement(metadata, 'LastChange') ?? insertChildElement(metadata, 'LastChange', METADATA_AFTER_LAST_CHANGE);
    setElementText(lastChange, now.toISOString().replace(/\.\d{3}Z$/, ''));
  }

  toXml(): string {
    return serializePageXml(this.document);
  }

  async save(file: string): Promise<void> {
    this.touch();
    try {
      await fs.outputFile(file, this.toXml(), 'utf8');
    } catch (error) {
      throw new SerializationError(
        `Cannot write ${path.basename(file)}`,
        file,
        error instanceof Error ? error : undefined
      );
    }
  }

  private regionElements(): Element[] {
    return descendantElements(this.pageElement).filter((element) => REGION_TAGS.includes(element.localName));
  }
}

function readDimension(page: Element, attribute: string, source: string): number {
  const value = Number(page.getAttribute(attribute));
  if (!Number.isInteger(value) || value <= 0) {
    throw new PageXmlError(`${source} has no valid ${attribute}`, { source, attribute });
  }
  return value;
}

function renameChildren(parent: Element, parentId: string): void {
  const rule = CHILD_IDS[parent.localName];
  if (!rule) {
    return;
  }
  childElements(parent, rule.tag).forEach((child, index) => {
    const id = `${parentId}${rule.prefix}${index + 1}`;
    child.setAttribute('id', id);
    renameChildren(child, id);
  });
}

function unicodeOf(element: Element): string | undefined {
  const textEquiv = firstChildElement(element, 'TextEquiv');
  const unicode = textEquiv ? firstChildElement(textEquiv, 'Unicode') : undefined;
  return unicode?.textContent ?? undefined;
}
