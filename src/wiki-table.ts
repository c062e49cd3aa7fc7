/**
 * Wikitable grid reconstruction
 *
 * Reads MediaWiki table markup into a row-major grid of cells, resolving
 * `rowspan` / `colspan` merges into absolute grid positions.
 */

import { FormatError } from './errors';
import type { WikiTableCell } from './types';

type DraftCell = { -readonly [K in keyof WikiTableCell]: WikiTableCell[K] };

export interface ParsedTable {
  table: WikiTable;
  /** Text after the table's closing line, or null when the input ended */
  rest: string | null;
}

const TABLE_OPEN = '{|';
const TABLE_CLOSE = '|}';
const ROW_SEPARATOR = '|-';
const CAPTION = '|+';
const SPAN_ATTRIBUTE = /^(colspan|rowspan)\s*=\s*/;
const QUOTED_INTEGER = /^"\s*(\d+)\s*"/;

export class WikiTable {
  readonly rows: readonly (readonly WikiTableCell[])[];
  readonly width: number;
  readonly height: number;
  readonly caption?: string;

  constructor(rows: WikiTableCell[][], caption?: string) {
    let width = 0;
    for (const row of rows) {
      for (const cell of row) {
        width = Math.max(width, cell.x + cell.colspan);
      }
    }

    this.rows = Object.freeze(rows.map(row => Object.freeze(row.map(cell => Object.freeze({ ...cell })))));
    this.width = width;
    this.height = rows.length;
    this.caption = caption;
  }

  /**
   * Cells originating in row `y`; empty for rows outside the table.
   */
  row(y: number): readonly WikiTableCell[] {
    return this.rows[y] ?? [];
  }

  /**
   * Cell whose top-left corner is at (x, y).
   */
  get(x: number, y: number): WikiTableCell | undefined {
    return this.row(y).find(cell => cell.x === x);
  }

  /**
   * Cell whose rectangle covers (x, y), including positions merged into
   * it from earlier rows or columns.
   */
  cellAt(x: number, y: number): WikiTableCell | undefined {
    for (let rowIndex = Math.min(y, this.height - 1); rowIndex >= 0; rowIndex--) {
      for (const cell of this.rows[rowIndex]) {
        if (cell.x <= x && x < cell.x + cell.colspan && cell.y <= y && y < cell.y + cell.rowspan) {
          return cell;
        }
      }
    }
    return undefined;
  }

  // Headers can only exist on the first row
  searchHeaders(predicate: (content: string) => boolean): WikiTableCell[] {
    return this.row(0).filter(cell => cell.isHeader && predicate(cell.content));
  }

  /**
   * Rectangular view of the cells originating in
   * [x0, x0 + width) × [y0, y0 + height), rebased so (x0, y0) becomes (0, 0).
   * Omitted extents reach the far edge of the table. Trailing rows left
   * without cells are dropped.
   */
  crop(x0: number, y0: number, width = Infinity, height = Infinity): WikiTable {
    if (x0 < 0 || y0 < 0) {
      throw new RangeError(`Cannot crop at negative offset (${x0}, ${y0})`);
    }

    const xEnd = x0 + width;
    const yEnd = Math.min(y0 + height, this.height);
    const rows: WikiTableCell[][] = [];

    for (let y = y0; y < yEnd; y++) {
      rows.push(
        this.rows[y]
          .filter(cell => cell.x >= x0 && cell.x < xEnd)
          .map(cell => ({ ...cell, x: cell.x - x0, y: cell.y - y0 }))
      );
    }

    while (rows.length > 0 && rows[rows.length - 1].length === 0) {
      rows.pop();
    }

    return new WikiTable(rows);
  }
}

/**
 * Parse a wikitable starting at `text` (leading whitespace allowed).
 */
export function parseWikiTable(text: string): ParsedTable {
  const lines = text.trimStart().split('\n');

  if (!lines[0].trimStart().startsWith(TABLE_OPEN)) {
    throw new FormatError(`Expected table to open with "${TABLE_OPEN}", found "${lines[0].trim()}"`);
  }

  const builder = new TableBuilder();
  let rest: string | null = null;

  for (let index = 1; index < lines.length; index++) {
    const line = lines[index].trim();

    if (line.startsWith(TABLE_CLOSE)) {
      if (index + 1 < lines.length) {
        rest = lines.slice(index + 1).join('\n');
      }
      break;
    }

    builder.consume(line);
  }

  return { table: builder.finish(), rest };
}

class TableBuilder {
  private rows: WikiTableCell[][] = [];
  private currentRow: DraftCell[] = [];
  private activeSpans: WikiTableCell[] = [];
  private caption?: string;
  private x = 0;
  private y = 0;

  consume(line: string): void {
    if (line.length === 0) return;

    if (line.startsWith(ROW_SEPARATOR)) {
      this.endRow();
    } else if (line.startsWith(CAPTION)) {
      this.caption = line.slice(CAPTION.length).trim();
    } else if (line.startsWith('!') || line.startsWith('|')) {
      this.addCell(line);
    } else {
      // Multi-line cell content
      const last = this.currentRow[this.currentRow.length - 1];
      if (!last) {
        throw new FormatError(`Cannot parse WikiTable due to line: "${line}"`);
      }
      last.content += '\n' + line;
    }
  }

  finish(): WikiTable {
    this.rows.push(this.currentRow);
    this.currentRow = [];
    return new WikiTable(this.rows, this.caption);
  }

  private endRow(): void {
    // A separator right after the table opener does not close a row
    if (this.rows.length === 0 && this.currentRow.length === 0) return;

    this.rows.push(this.currentRow);
    this.currentRow = [];
    this.y++;
    this.x = 0;
    this.activeSpans = this.activeSpans.filter(cell => cell.y + cell.rowspan > this.y);
  }

  private addCell(line: string): void {
    const isHeader = line[0] === '!';
    let rest = line.slice(1).trimStart();

    // Skip over cells merged down from earlier rows
    let covering = this.findCoveringSpan();
    while (covering) {
      this.x = covering.x + covering.colspan;
      covering = this.findCoveringSpan();
    }

    let colspan = 1;
    let rowspan = 1;
    let attribute = SPAN_ATTRIBUTE.exec(rest);
    while (attribute) {
      const valueText = rest.slice(attribute[0].length);
      const value = QUOTED_INTEGER.exec(valueText);
      const span = value ? Number(value[1]) : 0;
      if (!value || span < 1) {
        throw new FormatError(`Invalid ${attribute[1]} in table line: "${line}"`);
      }

      if (attribute[1] === 'colspan') {
        colspan = span;
      } else {
        rowspan = span;
      }
      rest = valueText.slice(value[0].length).trimStart();
      attribute = SPAN_ATTRIBUTE.exec(rest);
    }

    if (rest.startsWith('|')) {
      rest = rest.slice(1);
    }

    const cell: DraftCell = {
      content: rest.trim(),
      isHeader,
      x: this.x,
      y: this.y,
      rowspan,
      colspan
    };

    if (rowspan > 1) {
      this.activeSpans.push(cell);
    }
    this.currentRow.push(cell);
    this.x += colspan;
  }

  private findCoveringSpan(): WikiTableCell | undefined {
    return this.activeSpans.find(cell =>
      cell.x <= this.x && this.x < cell.x + cell.colspan &&
      cell.y <= this.y && this.y < cell.y + cell.rowspan
    );
  }
}
