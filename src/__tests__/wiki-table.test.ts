import { describe, it, expect } from 'vitest';
import { readFileSync } from 'fs';
import { FormatError } from '../errors';
import { parseWikiTable, WikiTable } from '../wiki-table';
import type { WikiTableCell } from '../types';

const merchantOffers = readFileSync(new URL('./fixtures/merchant-offers.wiki', import.meta.url), 'utf-8');

function coveringCells(table: WikiTable, x: number, y: number): WikiTableCell[] {
  return table.rows.flat().filter(cell =>
    cell.x <= x && x < cell.x + cell.colspan && cell.y <= y && y < cell.y + cell.rowspan
  );
}

describe('parseWikiTable', () => {
  it('emits one row per separator-delimited row', () => {
    const { table } = parseWikiTable(merchantOffers);

    // Header row plus 15 data rows
    expect(table.height).toBe(16);
    expect(table.width).toBe(8);
    expect(table.rows[0].map(cell => cell.content)).toEqual([
      'Packet ID', 'State', 'Bound To', 'Field Name', 'Field Type', 'Notes'
    ]);
  });

  it('places cells after columns merged down from earlier rows', () => {
    const { table } = parseWikiTable(merchantOffers);

    expect(table.get(3, 2)).toEqual({ content: 'Trades', isHeader: false, x: 3, y: 2, rowspan: 10, colspan: 1 });
    expect(table.get(4, 2)?.content).toBe('Input item 1');
    expect(table.get(5, 2)?.content).toBe('{{Type|Prefixed Array}}');
    expect(table.get(6, 2)?.content).toBe('Trade Item');
    expect(table.get(4, 3)?.content).toBe('Output item');
    expect(table.get(5, 3)).toBeUndefined();
    expect(table.get(6, 3)?.content).toBe('{{Type|Slot}}');
    expect(table.get(7, 3)?.content).toBe('Item handed back.');
  });

  it('reads span attributes and strips the cell separator', () => {
    const { table } = parseWikiTable(merchantOffers);

    expect(table.get(3, 0)).toEqual({ content: 'Field Name', isHeader: true, x: 3, y: 0, rowspan: 1, colspan: 2 });
    expect(table.get(0, 1)?.content).toBe(
      "''protocol:''<br/><code>0x2D</code><br/><br/>''resource:''<br/><code>merchant_offers</code>"
    );
    expect(table.get(0, 1)?.rowspan).toBe(15);
  });

  it('appends continuation lines to the previous cell', () => {
    const { table } = parseWikiTable(merchantOffers);

    expect(table.get(7, 12)?.content).toBe('Level shown in the window.\nValues run from 1 to 5.');
  });

  it('accepts span attributes in any order', () => {
    const { table } = parseWikiTable('{|\n| rowspan="2" colspan="3"| merged\n| next\n|}');

    expect(table.get(0, 0)).toEqual({ content: 'merged', isHeader: false, x: 0, y: 0, rowspan: 2, colspan: 3 });
    expect(table.get(3, 0)?.content).toBe('next');
  });

  it('ignores a separator directly after the table opener', () => {
    const { table } = parseWikiTable('{| class="wikitable"\n|-\n| a\n| b\n|-\n| c\n|}');

    expect(table.height).toBe(2);
    expect(table.rows.map(row => row.map(cell => cell.content))).toEqual([['a', 'b'], ['c']]);
  });

  it('returns the text following the table', () => {
    const { rest } = parseWikiTable('  \n{|\n| a\n|}\nafter\n');

    expect(rest).toBe('after\n');
  });

  it('returns null when nothing follows the table', () => {
    expect(parseWikiTable('{|\n| a\n|}').rest).toBeNull();
  });

  it('flushes the pending row at end of input', () => {
    const { table, rest } = parseWikiTable('{|\n| a\n|-\n| b');

    expect(rest).toBeNull();
    expect(table.rows.map(row => row.map(cell => cell.content))).toEqual([['a'], ['b']]);
  });

  it('reads the caption', () => {
    const { table } = parseWikiTable('{|\n|+ Handshake fields\n| a\n|}');

    expect(table.caption).toBe('Handshake fields');
    expect(table.rows[0]).toHaveLength(1);
  });

  it('skips blank lines', () => {
    const { table } = parseWikiTable('{|\n| a\n\n| b\n|}');

    expect(table.rows[0].map(cell => cell.content)).toEqual(['a', 'b']);
  });

  it('rejects text that does not open a table', () => {
    expect(() => parseWikiTable('| a\n|}')).toThrow(FormatError);
  });

  it('rejects a continuation line with no cell to extend', () => {
    expect(() => parseWikiTable('{|\n|-\nstray text\n|}')).toThrow('Cannot parse WikiTable due to line: "stray text"');
  });

  it('rejects span attributes that are not quoted positive integers', () => {
    expect(() => parseWikiTable('{|\n| colspan="two"| a\n|}')).toThrow(FormatError);
    expect(() => parseWikiTable('{|\n| rowspan=2| a\n|}')).toThrow(FormatError);
    expect(() => parseWikiTable('{|\n| rowspan="0"| a\n|}')).toThrow(FormatError);
  });
});

describe('WikiTable', () => {
  it('resolves every merged position to exactly one cell', () => {
    const { table } = parseWikiTable(merchantOffers);

    for (const cell of table.rows.flat()) {
      let covered = 0;
      for (let y = 0; y < table.height; y++) {
        for (let x = 0; x < table.width; x++) {
          if (table.cellAt(x, y) === cell) covered++;
        }
      }
      expect(covered).toBe(cell.rowspan * cell.colspan);
    }

    for (let y = 0; y < table.height; y++) {
      for (let x = 0; x < table.width; x++) {
        expect(coveringCells(table, x, y)).toHaveLength(1);
      }
    }
  });

  it('returns nothing outside the table', () => {
    const { table } = parseWikiTable(merchantOffers);

    expect(table.row(99)).toEqual([]);
    expect(table.get(0, 99)).toBeUndefined();
    expect(table.cellAt(20, 1)).toBeUndefined();
  });

  it('finds header cells in the first row', () => {
    const { table } = parseWikiTable(merchantOffers);

    const headers = table.searchHeaders(content => content.trim() === 'Field Type');
    expect(headers).toEqual([{ content: 'Field Type', isHeader: true, x: 5, y: 0, rowspan: 1, colspan: 2 }]);
    expect(table.searchHeaders(content => content === 'Window ID')).toEqual([]);
  });

  it('crops and rebases coordinates', () => {
    const { table } = parseWikiTable(merchantOffers);
    const names = table.crop(3, 1, 2, table.height - 1);

    expect(names.height).toBe(15);
    expect(names.width).toBe(2);
    expect(names.get(0, 0)).toEqual({ content: 'Window ID', isHeader: false, x: 0, y: 0, rowspan: 1, colspan: 2 });
    expect(names.get(0, 1)?.content).toBe('Trades');
    expect(names.get(1, 1)?.content).toBe('Input item 1');
    expect(names.get(1, 2)?.content).toBe('Output item');
    expect(names.get(0, 14)?.content).toBe('Can restock');
  });

  it('keeps interior empty rows and drops trailing ones', () => {
    const table = new WikiTable([
      [{ content: 'a', isHeader: false, x: 0, y: 0, rowspan: 2, colspan: 1 }, { content: 'b', isHeader: false, x: 1, y: 0, rowspan: 1, colspan: 1 }],
      [],
      [{ content: 'c', isHeader: false, x: 0, y: 2, rowspan: 1, colspan: 1 }],
      [{ content: 'd', isHeader: false, x: 1, y: 3, rowspan: 1, colspan: 1 }]
    ]);

    const left = table.crop(0, 0, 1);
    expect(left.height).toBe(3);
    expect(left.row(1)).toEqual([]);
    expect(left.get(0, 2)?.content).toBe('c');
  });

  it('composes nested crops', () => {
    const { table } = parseWikiTable(merchantOffers);

    const nested = table.crop(3, 1, 4, 15).crop(1, 1, 2, 10);
    const direct = table.crop(4, 2, 2, 10);

    expect(nested.rows).toEqual(direct.rows);
    expect(nested.width).toBe(direct.width);
    expect(nested.height).toBe(direct.height);
    expect(direct.height).toBe(10);
    expect(direct.get(0, 0)?.content).toBe('Input item 1');
  });

  it('does not share cells with the parent table', () => {
    const { table } = parseWikiTable(merchantOffers);
    const view = table.crop(0, 0);

    expect(view.get(3, 2)).toEqual(table.get(3, 2));
    expect(view.get(3, 2)).not.toBe(table.get(3, 2));
    expect(Object.isFrozen(view.rows)).toBe(true);
  });

  it('rejects negative crop offsets', () => {
    const { table } = parseWikiTable(merchantOffers);

    expect(() => table.crop(-1, 0)).toThrow(RangeError);
  });
});
