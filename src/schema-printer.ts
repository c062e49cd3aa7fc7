/**
 * Markdown rendering of extracted packet schemas
 */

import { countFields, countPackets } from './diagnostics';
import type { BatchResult, Field, Packet, TypeNode } from './types';

export class SchemaPrinter {
  private title: string;

  constructor(title: string) {
    this.title = title;
  }

  render(result: BatchResult): string[] {
    const lines: string[] = [];

    lines.push(`# ${this.title}`);
    lines.push('');

    // Statistics
    const totalPackets = countPackets(result);
    lines.push('## Overview');
    lines.push('');
    lines.push(`- **States**: ${result.states.length}`);
    lines.push(`- **Total Packets**: ${totalPackets}`);
    lines.push(`- **Skipped Packets**: ${result.skipped.length}`);
    lines.push('');

    for (const state of result.states) {
      for (const { direction, packets } of state.directions) {
        lines.push(`## ${state.state} / ${direction}`);
        lines.push('');
        lines.push(...this.renderIndex(packets));

        for (const packet of packets) {
          lines.push(...this.renderPacket(packet));
        }
      }
    }

    if (result.skipped.length > 0) {
      lines.push('## Skipped');
      lines.push('');
      for (const entry of result.skipped) {
        lines.push(`- ${entry.state} / ${entry.direction} / ${entry.packet} (${entry.reason})`);
      }
      lines.push('');
    }

    return lines;
  }

  private renderIndex(packets: Packet[]): string[] {
    if (packets.length === 0) {
      return ['_No packets._', ''];
    }

    const lines = ['| ID | Resource | Name | Fields |', '|----|----------|------|--------|'];
    for (const packet of packets) {
      const resource = packet.resourceId !== undefined ? `\`${packet.resourceId}\`` : '-';
      lines.push(`| \`${packet.protocolId}\` | ${resource} | ${packet.name} | ${countFields(packet.fields)} |`);
    }
    lines.push('');
    return lines;
  }

  renderPacket(packet: Packet): string[] {
    const lines: string[] = [];

    lines.push(`### ${packet.name}`);
    lines.push('');
    if (packet.preamble.trim()) {
      lines.push(packet.preamble.trim());
      lines.push('');
    }

    if (packet.fields.length === 0) {
      lines.push('_This packet has no fields._');
      lines.push('');
      return lines;
    }

    lines.push('| Field | Type |');
    lines.push('|-------|------|');
    this.pushFieldRows(lines, packet.fields, 0);
    lines.push('');
    return lines;
  }

  private pushFieldRows(lines: string[], fields: Field[], depth: number): void {
    const indent = '&nbsp;&nbsp;'.repeat(depth);
    for (const field of fields) {
      lines.push(`| ${indent}${this.escapeCell(field.name)} | ${this.escapeCell(this.typeLabel(field.type))} |`);
      if (field.type.kind === 'paired' && field.type.content.kind === 'list') {
        this.pushFieldRows(lines, field.type.content.fields, depth + 1);
      }
    }
  }

  private typeLabel(type: TypeNode): string {
    switch (type.kind) {
      case 'leaf':
        return type.text;
      case 'paired':
        return this.typeLabel(type.descriptor);
      case 'list':
        return `${type.fields.length} fields`;
    }
  }

  private escapeCell(text: string): string {
    return text.replace(/\|/g, '\\|').replace(/\n/g, ' ');
  }
}
