import { describe, it, expect } from 'vitest';
import { compositeType } from '../type-inferrer';
import { countFields, countPackets, describeFields, describeType, renderShape } from '../diagnostics';
import { parseWikiTable } from '../wiki-table';
import type { Field } from '../types';

const fields: Field[] = [
  { name: 'a', type: { kind: 'leaf', text: 'int' } },
  { name: 'G', type: compositeType({ kind: 'leaf', text: 'Array' }, [{ name: 'x', type: { kind: 'leaf', text: 'Int' } }]) }
];

describe('renderShape', () => {
  it('draws a single cell', () => {
    const { table } = parseWikiTable('{|\n| a\n|}');

    expect(renderShape(table)).toEqual([' ────', '│    │', ' ────']);
  });

  it('draws merged cells as one box', () => {
    const { table } = parseWikiTable('{|\n| rowspan="2"| a\n| b\n|-\n| c\n|}');

    expect(renderShape(table, 2, 2)).toEqual([
      ' ─ ─',
      '│ │ │',
      '│ │─',
      '│ │ │',
      ' ─ ─'
    ]);
  });
});

describe('describeType', () => {
  it('renders leaves as their text', () => {
    expect(describeType({ kind: 'leaf', text: 'VarInt' })).toBe('VarInt');
  });

  it('renders nested field lists indented', () => {
    expect(describeFields(fields)).toBe('{\n\ta : int\n\tG : Array & {\n\t\tx : Int\n\t}\n}');
  });

  it('renders an empty list', () => {
    expect(describeFields([])).toBe('{}');
  });
});

describe('counting', () => {
  it('counts nested fields', () => {
    expect(countFields(fields)).toBe(3);
  });

  it('counts packets across states and directions', () => {
    const packet = { name: 'p', preamble: '', protocolId: '0x00', fields: [] };
    const result = {
      states: [
        { state: 'Status', directions: [{ direction: 'Clientbound', packets: [packet, packet] }] },
        { state: 'Play', directions: [{ direction: 'Clientbound', packets: [packet] }, { direction: 'Serverbound', packets: [] }] }
      ],
      skipped: []
    };

    expect(countPackets(result)).toBe(3);
  });
});
