/**
 * Text renderings used when tracking down malformed tables
 */

import type { BatchResult, Field, TypeNode } from './types';
import type { WikiTable } from './wiki-table';

/**
 * Draw the outline of every cell in the table, showing how the spans were
 * resolved.
 */
export function renderShape(table: WikiTable, colWidth = 5, rowHeight = 2): string[] {
  let maxX = 0;
  let maxY = 0;
  for (const row of table.rows) {
    for (const cell of row) {
      maxX = Math.max(maxX, (cell.x + cell.colspan) * colWidth);
      maxY = Math.max(maxY, (cell.y + cell.rowspan) * rowHeight);
    }
  }

  const canvas = Array.from({ length: maxY + 1 }, () => Array<string>(maxX + 1).fill(' '));

  for (const row of table.rows) {
    for (const cell of row) {
      const ox = cell.x * colWidth;
      const oy = cell.y * rowHeight;
      const mx = ox + cell.colspan * colWidth;
      const my = oy + cell.rowspan * rowHeight;

      for (let x = ox + 1; x < mx; x++) {
        canvas[oy][x] = '─';
        canvas[my][x] = '─';
      }
      for (let y = oy + 1; y < my; y++) {
        canvas[y][ox] = '│';
        canvas[y][mx] = '│';
      }
    }
  }

  return canvas.map(line => line.join('').trimEnd());
}

export function describeType(type: TypeNode): string {
  switch (type.kind) {
    case 'leaf':
      return type.text;
    case 'paired':
      return `${describeType(type.descriptor)} & ${describeType(type.content)}`;
    case 'list':
      return describeFields(type.fields);
    default: {
      const unreachable: never = type;
      return unreachable;
    }
  }
}

export function describeFields(fields: Field[]): string {
  if (fields.length === 0) return '{}';

  const lines = fields.map(field => `${field.name} : ${describeType(field.type).replace(/\n/g, '\n\t')}`);
  return '{\n\t' + lines.join('\n\t') + '\n}';
}

/**
 * Count the fields in a tree, nested ones included.
 */
export function countFields(fields: Field[]): number {
  let count = 0;
  for (const field of fields) {
    count += 1 + countFields(nestedFields(field.type));
  }
  return count;
}

export function nestedFields(type: TypeNode): Field[] {
  switch (type.kind) {
    case 'leaf':
      return [];
    case 'paired':
      return [...nestedFields(type.descriptor), ...nestedFields(type.content)];
    case 'list':
      return type.fields;
  }
}

export function countPackets(result: BatchResult): number {
  return result.states.reduce(
    (sum, state) => sum + state.directions.reduce((inner, dir) => inner + dir.packets.length, 0),
    0
  );
}
