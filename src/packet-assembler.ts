/**
 * Packet assembly from a single wiki subsection
 */

import { DepthLimitError, DialectError, MissingTableError, SymmetryError } from './errors';
import { loadDialect, type WikiDialect } from './dialect';
import { TypeInferrer } from './type-inferrer';
import { parseWikiTable, type WikiTable } from './wiki-table';
import type { Packet, TypeResolver, WikiTableCell } from './types';

export interface PacketAssemblerOptions {
  dialect?: WikiDialect;
  resolveType?: TypeResolver;
}

/**
 * Decode the contents of a packet table's identifier cell.
 *
 * Modern tables list `key: value` groups, e.g.
 * `''protocol:''<br/><code>0x00</code><br/><br/>''resource:''<br/><code>intention</code>`.
 * Older tables only hold the bare hex id.
 */
export function parsePacketId(content: string): Map<string, string> {
  const ids = new Map<string, string>();
  let text = content.trim();

  if (text.startsWith('0x')) {
    ids.set('protocol', text);
    return ids;
  }

  while (text) {
    if (!text.startsWith("''")) {
      throw new DialectError(`Packet id format error, see: ${content}`);
    }
    text = text.slice(2);

    const nameEnd = text.indexOf(":''");
    if (nameEnd === -1) {
      throw new DialectError(`Packet id key is not terminated, see: ${content}`);
    }
    const name = text.slice(0, nameEnd).trim();
    text = skipLineBreaks(text.slice(nameEnd + 3));

    if (!text.startsWith('<code>')) {
      throw new DialectError(`Packet id value for "${name}" is not code, see: ${content}`);
    }
    text = text.slice('<code>'.length);

    const valueEnd = text.indexOf('</code>');
    if (valueEnd === -1) {
      throw new DialectError(`Packet id value for "${name}" is not terminated, see: ${content}`);
    }
    ids.set(name, text.slice(0, valueEnd).trim());
    text = skipLineBreaks(text.slice(valueEnd + '</code>'.length));
  }

  return ids;
}

function skipLineBreaks(text: string): string {
  return text.replace(/^(?:\s*<br\s*\/?>)*\s*/i, '');
}

/**
 * Split a subsection into the text preceding its first table and the text
 * starting at that table.
 */
export function splitPreamble(text: string): { preamble: string; tableText: string | null } {
  const lines = text.split('\n');
  let preamble = '';

  for (let index = 0; index < lines.length; index++) {
    if (lines[index].trimStart().startsWith('{|')) {
      return { preamble, tableText: lines.slice(index).join('\n') };
    }
    preamble += lines[index].trimEnd() + '\n';
  }

  return { preamble, tableText: null };
}

export class PacketAssembler {
  private dialect: WikiDialect;
  private inferrer: TypeInferrer;

  constructor(options: PacketAssemblerOptions = {}) {
    this.dialect = options.dialect ?? loadDialect();
    this.inferrer = new TypeInferrer({
      noFieldsMarker: this.dialect.noFieldsMarker,
      maxDepth: this.dialect.maxDepth,
      resolveType: options.resolveType
    });
  }

  /**
   * Parse the packet described by one wiki subsection.
   *
   * Returns null when the packet's field columns are asymmetric; the
   * table needs fixing on the wiki before it can be read.
   */
  parsePacket(name: string, text: string): Packet | null {
    const { preamble, tableText } = splitPreamble(text);
    if (tableText === null) {
      throw new MissingTableError(name);
    }

    try {
      const { table } = parseWikiTable(tableText);

      const header = table.get(0, 0);
      if (!header || header.content.trim() !== this.dialect.packetIdHeader) {
        throw new DialectError(`Packet ${name} not of expected packet table format. Intervention required!`);
      }

      const idCell = table.get(0, 1);
      if (!idCell) {
        throw new DialectError(`Packet ${name} has no packet id cell`);
      }
      const ids = parsePacketId(idCell.content);
      const protocolId = ids.get('protocol');
      if (protocolId === undefined) {
        throw new DialectError(`Packet ${name} has no protocol id`);
      }

      const nameHeader = this.findHeader(table, this.dialect.fieldNameHeader, name);
      const typeHeader = this.findHeader(table, this.dialect.fieldTypeHeader, name);

      const fields = this.inferrer.inferFields(
        table.crop(nameHeader.x, 1, nameHeader.colspan, table.height - 1),
        table.crop(typeHeader.x, 1, typeHeader.colspan, table.height - 1)
      );

      return {
        name,
        preamble,
        protocolId,
        resourceId: ids.get('resource'),
        fields
      };
    } catch (error) {
      if (error instanceof SymmetryError || error instanceof DepthLimitError) {
        console.warn(`  ⚠️  ${error instanceof SymmetryError ? 'Symmetry' : 'Depth limit'} error in packet ${name}. Intervention required!`);
        return null;
      }
      console.error(`  ❌ Unknown exception condition in ${name}. Intervention required!`);
      throw error;
    }
  }

  private findHeader(table: WikiTable, content: string, packetName: string): WikiTableCell {
    const matches = table.searchHeaders(cell => cell.trim() === content);
    if (matches.length !== 1) {
      throw new DialectError(`Packet ${packetName} has ${matches.length} "${content}" headers, expected exactly one`);
    }
    return matches[0];
  }
}
