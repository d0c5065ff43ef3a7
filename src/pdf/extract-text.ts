import * as pdfjs from 'pdfjs-dist';
import { SourcePage } from '../edi/interfaces/edi.interfaces';

// ============================================================================
// PDF TOKEN EXTRACTION WITH COORDINATES (for layout-based parsing)
// ============================================================================

/**
 * A text token from PDF with position coordinates
 */
export interface PdfToken {
  str: string;
  x: number;
  y: number;
  width: number;
  height: number;
  page: number;
}

export interface PdfCell {
  text: string;
  x: number;
}

/**
 * A reconstructed row from PDF tokens
 */
export interface PdfRow {
  cells: PdfCell[];
  page: number;
  y: number;
}

/**
 * Statistics about token/row reconstruction
 */
export interface LayoutExtractionStats {
  totalPages: number;
  totalTokens: number;
  totalRows: number;
  avgCellsPerRow: number;
  medianGapX: number;
  medianHeight: number;
  gapThreshold: number;
}

/**
 * Configuration for layout extraction
 */
export interface LayoutExtractionConfig {
  yTolerance?: number;       // vertical tolerance for grouping tokens into rows (default: 3)
  minGapForCell?: number;    // fixed x-gap that creates a new cell when dynamicGap is off (default: 10)
  dynamicGap?: boolean;      // derive the x-gap from the median token height (default: true)
  gapMultiplier?: number;    // x-gap in token heights (default: 0.8)
  tableGapFactor?: number;   // vertical gap, in line pitches, that closes a table (default: 2.5)
  columnTolerance?: number;  // x distance merged into one column anchor (default: 6)
}

export interface ExtractedPdf {
  pageCount: number;
  tokens: PdfToken[];
}

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

function median(values: number[]): number {
  if (values.length === 0) return 0;
  const sorted = [...values].sort((a, b) => a - b);
  return sorted[Math.floor(sorted.length / 2)];
}

/**
 * Extract PDF tokens with x/y coordinates
 * This preserves spatial information for accurate column detection
 */
export async function extractPdfTokens(data: Uint8Array): Promise<ExtractedPdf> {
  const loadingTask = pdfjs.getDocument({
    data,
    isEvalSupported: false,
    useSystemFonts: true,
  });
  const pdf = await loadingTask.promise;

  const tokens: PdfToken[] = [];

  try {
    for (let pageNum = 1; pageNum <= pdf.numPages; pageNum++) {
      const page = await pdf.getPage(pageNum);
      const textContent = await page.getTextContent();

      for (const item of textContent.items) {
        if (!('str' in item)) continue;

        const str = item.str;
        // Skip empty strings
        if (!str || str.trim() === '') continue;

        // Transform matrix: [scaleX, skewX, skewY, scaleY, translateX, translateY]
        const transform: number[] = item.transform.length === 6 ? item.transform : [1, 0, 0, 1, 0, 0];
        const x = transform[4];
        const y = transform[5];
        const width = item.width || str.length * 5; // estimate if not available
        const height = item.height || Math.abs(transform[0]) || 10;

        tokens.push({
          str,
          x: round2(x),
          y: round2(y),
          width: round2(width),
          height: round2(height),
          page: pageNum,
        });
      }
    }

    return { pageCount: pdf.numPages, tokens };
  } finally {
    await pdf.destroy();
  }
}

/**
 * Group tokens into rows based on y-coordinate proximity
 * Then segment each row into cells based on x-gaps
 */
export function tokensToRows(
  tokens: PdfToken[],
  config: LayoutExtractionConfig = {},
): { rows: PdfRow[]; stats: LayoutExtractionStats } {
  const {
    yTolerance = 3,
    minGapForCell = 10,
    dynamicGap = true,
    gapMultiplier = 0.8,
  } = config;

  // Group tokens by page
  const tokensByPage = new Map<number, PdfToken[]>();
  for (const token of tokens) {
    const pageTokens = tokensByPage.get(token.page) || [];
    pageTokens.push(token);
    tokensByPage.set(token.page, pageTokens);
  }

  // Group into rows by y-proximity (PDF y grows upward: higher y first)
  const rowGroupsByPage = new Map<number, PdfToken[][]>();
  const allGaps: number[] = [];

  for (const [pageNum, pageTokens] of tokensByPage) {
    const sorted = [...pageTokens].sort((a, b) => {
      const yDiff = b.y - a.y;
      if (Math.abs(yDiff) > yTolerance) return yDiff;
      return a.x - b.x;
    });

    const rowGroups: PdfToken[][] = [];
    let currentRow: PdfToken[] = [];
    let currentY = 0;

    for (const token of sorted) {
      if (currentRow.length > 0 && Math.abs(token.y - currentY) <= yTolerance) {
        currentRow.push(token);
        continue;
      }
      if (currentRow.length > 0) rowGroups.push(currentRow);
      currentRow = [token];
      currentY = token.y;
    }
    if (currentRow.length > 0) rowGroups.push(currentRow);

    // x-gaps, reported in the stats
    for (const row of rowGroups) {
      const sortedByX = [...row].sort((a, b) => a.x - b.x);
      for (let i = 1; i < sortedByX.length; i++) {
        const gap = sortedByX[i].x - (sortedByX[i - 1].x + sortedByX[i - 1].width);
        if (gap > 0) allGaps.push(gap);
      }
    }

    rowGroupsByPage.set(pageNum, rowGroups);
  }

  const medianGapX = median(allGaps);
  // Un espace entre mots vaut ~0.3 em, un écart de colonne dépasse 1 em:
  // la hauteur des tokens (taille de police) sépare les deux.
  const medianHeight = median(tokens.map((t) => t.height).filter((h) => h > 0));
  const gapThreshold = dynamicGap && medianHeight > 0 ? medianHeight * gapMultiplier : minGapForCell;

  const rows: PdfRow[] = [];
  for (const [pageNum, rowGroups] of rowGroupsByPage) {
    for (const row of rowGroups) {
      const cells = splitCells(row, gapThreshold);
      if (cells.length === 0) continue;
      rows.push({
        cells,
        page: pageNum,
        y: row.reduce((sum, t) => sum + t.y, 0) / row.length,
      });
    }
  }

  const totalCells = rows.reduce((sum, r) => sum + r.cells.length, 0);

  return {
    rows,
    stats: {
      totalPages: tokensByPage.size,
      totalTokens: tokens.length,
      totalRows: rows.length,
      avgCellsPerRow: rows.length > 0 ? round2(totalCells / rows.length) : 0,
      medianGapX: round2(medianGapX),
      medianHeight: round2(medianHeight),
      gapThreshold: round2(gapThreshold),
    },
  };
}

function splitCells(row: PdfToken[], gapThreshold: number): PdfCell[] {
  const sortedByX = [...row].sort((a, b) => a.x - b.x);
  const cells: PdfCell[] = [];
  let current: PdfCell | null = null;
  let lastEnd = 0;

  for (const token of sortedByX) {
    const gap = token.x - lastEnd;
    if (!current || gap > gapThreshold) {
      if (current && current.text.trim()) cells.push({ ...current, text: current.text.trim() });
      current = { text: token.str, x: token.x };
    } else {
      // Same cell - add space if there's a small gap
      current.text += gap > 2 ? ' ' + token.str : token.str;
    }
    lastEnd = token.x + token.width;
  }

  if (current && current.text.trim()) cells.push({ ...current, text: current.text.trim() });
  return cells;
}

/**
 * Page text: one line per row, cells separated by a single space
 */
export function rowsToPageText(rows: PdfRow[]): string {
  return rows.map((row) => row.cells.map((c) => c.text).join(' ')).join('\n');
}

/**
 * Split a page's rows into tables on large vertical gaps, then place each
 * cell in a column anchored on the x positions shared by the table rows.
 */
export function rowsToTables(rows: PdfRow[], config: LayoutExtractionConfig = {}): string[][][] {
  const { tableGapFactor = 2.5, columnTolerance = 6 } = config;
  if (rows.length === 0) return [];

  const pitches: number[] = [];
  for (let i = 1; i < rows.length; i++) {
    const pitch = rows[i - 1].y - rows[i].y;
    if (pitch > 0) pitches.push(pitch);
  }
  const maxGap = median(pitches) * tableGapFactor;

  const blocks: PdfRow[][] = [];
  let block: PdfRow[] = [rows[0]];
  for (let i = 1; i < rows.length; i++) {
    if (maxGap > 0 && rows[i - 1].y - rows[i].y > maxGap) {
      blocks.push(block);
      block = [];
    }
    block.push(rows[i]);
  }
  blocks.push(block);

  return blocks
    .filter((b) => b.some((row) => row.cells.length > 1))
    .map((b) => toGrid(b, columnTolerance));
}

function toGrid(rows: PdfRow[], tolerance: number): string[][] {
  const xs = rows.flatMap((row) => row.cells.map((c) => c.x)).sort((a, b) => a - b);

  const anchors: number[] = [];
  for (const x of xs) {
    if (anchors.length === 0 || x - anchors[anchors.length - 1] > tolerance) {
      anchors.push(x);
    }
  }

  return rows.map((row) => {
    const grid: string[] = anchors.map(() => '');
    for (const cell of row.cells) {
      let col = 0;
      while (col + 1 < anchors.length && anchors[col + 1] <= cell.x + tolerance) col++;
      grid[col] = grid[col] ? `${grid[col]} ${cell.text}` : cell.text;
    }
    return grid;
  });
}

/**
 * Full pipeline: tokens → rows → page text and tables
 */
export function buildSourcePages(
  extracted: ExtractedPdf,
  config: LayoutExtractionConfig = {},
): { pages: SourcePage[]; stats: LayoutExtractionStats } {
  const { rows, stats } = tokensToRows(extracted.tokens, config);

  const pages: SourcePage[] = [];
  for (let pageNum = 1; pageNum <= extracted.pageCount; pageNum++) {
    const pageRows = rows.filter((row) => row.page === pageNum);
    pages.push({
      text: rowsToPageText(pageRows),
      tables: rowsToTables(pageRows, config),
    });
  }

  return { pages, stats };
}
