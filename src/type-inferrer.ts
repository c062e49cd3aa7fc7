/**
 * Field tree inference from a table's name and type columns
 *
 * A packet table lists field names and field types in two parallel column
 * groups. A cell merged down over several rows in both groups marks a
 * composite field; the rows it covers, minus its own column, describe the
 * composite's nested fields.
 */

import { DepthLimitError, SymmetryError } from './errors';
import type { Field, TypeNode, TypeResolver, WikiTableCell } from './types';
import type { WikiTable } from './wiki-table';

export const DEFAULT_NO_FIELDS_MARKER = "''no fields''";
export const DEFAULT_MAX_DEPTH = 32;

export interface TypeInferrerOptions {
  noFieldsMarker?: string;
  maxDepth?: number;
  resolveType?: TypeResolver;
}

export const resolveRawType: TypeResolver = (content) => ({ kind: 'leaf', text: content });

export class TypeInferrer {
  private noFieldsMarker: string;
  private maxDepth: number;
  private resolveType: TypeResolver;

  constructor(options: TypeInferrerOptions = {}) {
    this.noFieldsMarker = options.noFieldsMarker ?? DEFAULT_NO_FIELDS_MARKER;
    this.maxDepth = options.maxDepth ?? DEFAULT_MAX_DEPTH;
    this.resolveType = options.resolveType ?? resolveRawType;
  }

  /**
   * Infer the fields described by a name view and a type view covering the
   * same rows.
   *
   * @throws SymmetryError when the views disagree on row structure
   * @throws DepthLimitError when composites nest deeper than `maxDepth`
   */
  inferFields(names: WikiTable, types: WikiTable): Field[] {
    return this.inferLevel(names, types, 0);
  }

  private inferLevel(names: WikiTable, types: WikiTable, depth: number): Field[] {
    if (depth > this.maxDepth) {
      throw new DepthLimitError(this.maxDepth);
    }

    // Only heights are compared: enum tables widen the type column
    if (names.height !== types.height && !names.rows.some(row => this.isNoFieldsRow(row))) {
      throw new SymmetryError(`Name column has ${names.height} rows but type column has ${types.height}`);
    }

    const fields: Field[] = [];
    const rowCount = Math.max(names.height, types.height);

    for (let y = 0; y < rowCount; y++) {
      const nameRow = names.row(y);
      const typeRow = types.row(y);

      if (this.isNoFieldsRow(nameRow)) {
        y += nameRow[0].rowspan - 1;
        continue;
      }

      if (nameRow.length !== typeRow.length) {
        throw new SymmetryError(`Row ${y} has ${nameRow.length} name cells but ${typeRow.length} type cells`);
      }

      if (nameRow.length === 0) continue;

      if (nameRow.length === 1) {
        fields.push({ name: nameRow[0].content, type: this.resolveType(typeRow[0].content) });
        continue;
      }

      // The first cell's rowspan is the number of rows the composite covers
      const nameCell = nameRow[0];
      const typeCell = typeRow[0];
      if (nameCell.rowspan !== typeCell.rowspan) {
        throw new SymmetryError(
          `Composite "${nameCell.content}" spans ${nameCell.rowspan} name rows but ${typeCell.rowspan} type rows`
        );
      }

      const nested = this.inferLevel(
        names.crop(nameCell.x + nameCell.colspan, nameCell.y, Infinity, nameCell.rowspan),
        types.crop(typeCell.x + typeCell.colspan, typeCell.y, Infinity, typeCell.rowspan),
        depth + 1
      );

      fields.push({
        name: nameCell.content,
        type: compositeType(this.resolveType(typeCell.content), nested)
      });

      y += nameCell.rowspan - 1;
    }

    return fields;
  }

  private isNoFieldsRow(row: readonly WikiTableCell[]): boolean {
    return row.length === 1 && row[0].content.trim() === this.noFieldsMarker;
  }
}

export function compositeType(descriptor: TypeNode, fields: Field[]): TypeNode {
  return { kind: 'paired', descriptor, content: { kind: 'list', fields } };
}
