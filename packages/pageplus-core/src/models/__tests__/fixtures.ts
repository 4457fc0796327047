/**
 * In-memory PAGE-XML builders for tests
 */

export const PAGE_NS = 'http://schema.primaresearch.org/PAGE/gts/pagecontent/2019-07-15';

export interface WordFixture {
  id: string;
  text?: string;
  glyphs?: string[];
}

export interface LineFixture {
  id: string;
  baseline?: string;
  coords?: string;
  text?: string;
  words?: WordFixture[];
}

export interface RegionFixture {
  id: string;
  coords?: string;
  lines?: LineFixture[];
  text?: string;
}

export interface TableFixture {
  id: string;
  coords?: string;
  cells: RegionFixture[];
}

export interface PageFixture {
  width?: number;
  height?: number;
  regions?: RegionFixture[];
  tables?: TableFixture[];
  /** Region ids of a single OrderedGroup */
  readingOrder?: string[];
  /** Raw XML appended inside Page after the regions */
  extra?: string;
}

const textEquiv = (text: string | undefined): string =>
  text === undefined ? '' : `<TextEquiv><Unicode>${text}</Unicode></TextEquiv>`;

const coords = (points: string | undefined): string => (points === undefined ? '' : `<Coords points="${points}"/>`);

function word(fixture: WordFixture): string {
  const glyphs = (fixture.glyphs ?? [])
    .map((id) => `<Glyph id="${id}"><Coords points="0,0 1,0 1,1"/></Glyph>`)
    .join('');
  return `<Word id="${fixture.id}"><Coords points="0,0 1,0 1,1"/>${glyphs}${textEquiv(fixture.text)}</Word>`;
}

function line(fixture: LineFixture): string {
  const baseline = fixture.baseline === undefined ? '' : `<Baseline points="${fixture.baseline}"/>`;
  const words = (fixture.words ?? []).map(word).join('');
  return `<TextLine id="${fixture.id}">${coords(fixture.coords)}${baseline}${words}${textEquiv(fixture.text)}</TextLine>`;
}

function region(fixture: RegionFixture, tag = 'TextRegion'): string {
  const lines = (fixture.lines ?? []).map(line).join('\n');
  return `<${tag} id="${fixture.id}">${coords(fixture.coords)}\n${lines}\n${textEquiv(fixture.text)}</${tag}>`;
}

function table(fixture: TableFixture): string {
  const cells = fixture.cells.map((cell) => region(cell, 'TableCell')).join('\n');
  return `<TableRegion id="${fixture.id}">${coords(fixture.coords)}\n${cells}\n</TableRegion>`;
}

export function pageXml(fixture: PageFixture = {}): string {
  const { width = 1000, height = 800 } = fixture;
  const readingOrder = fixture.readingOrder
    ? `<ReadingOrder><OrderedGroup id="ro1">${fixture.readingOrder
        .map((id, index) => `<RegionRefIndexed index="${index}" regionRef="${id}"/>`)
        .join('')}</OrderedGroup></ReadingOrder>`
    : '';
  const regions = (fixture.regions ?? []).map((r) => region(r)).join('\n');
  const tables = (fixture.tables ?? []).map(table).join('\n');
  return `<?xml version="1.0" encoding="UTF-8"?>
<PcGts xmlns="${PAGE_NS}">
<Metadata><Creator>test</Creator><Created>2024-01-01T00:00:00</Created><LastChange>2024-01-01T00:00:00</LastChange></Metadata>
<Page imageFilename="page.png" imageWidth="${width}" imageHeight="${height}">
${readingOrder}
${regions}
${tables}
${fixture.extra ?? ''}
</Page>
</PcGts>`;
}
