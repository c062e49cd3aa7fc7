/**
 * Walks the protocol page's section tree and collects every packet
 */

import { DialectError, MissingTableError } from './errors';
import { loadDialect, type WikiDialect } from './dialect';
import { PacketAssembler } from './packet-assembler';
import type { BatchResult, DirectionPackets, Packet, SkippedPacket, StatePackets, TypeResolver, WikiSection } from './types';

export interface SectionWalkerOptions {
  dialect?: WikiDialect;
  resolveType?: TypeResolver;
  /** What to do with a packet section that has no table (default: throw) */
  onMissingTable?: 'throw' | 'skip';
}

export class SectionWalker {
  private dialect: WikiDialect;
  private assembler: PacketAssembler;
  private onMissingTable: 'throw' | 'skip';

  constructor(options: SectionWalkerOptions = {}) {
    this.dialect = options.dialect ?? loadDialect();
    this.assembler = new PacketAssembler({ dialect: this.dialect, resolveType: options.resolveType });
    this.onMissingTable = options.onMissingTable ?? 'throw';
  }

  walk(root: WikiSection): BatchResult {
    const result: BatchResult = { states: [], skipped: [] };

    for (const stateSection of root.children) {
      if (this.dialect.ignoredSections.includes(stateSection.name)) {
        continue;
      }

      // Only known headers are accepted, anything else means the page changed shape
      if (!this.dialect.states.includes(stateSection.name)) {
        throw new DialectError(`Unknown wiki header '${stateSection.name}'`);
      }

      result.states.push(this.walkState(stateSection, result.skipped));
    }

    return result;
  }

  private walkState(stateSection: WikiSection, skipped: SkippedPacket[]): StatePackets {
    const directions: DirectionPackets[] = [];

    for (const directionSection of stateSection.children) {
      if (!this.dialect.directions.includes(directionSection.name)) {
        throw new DialectError(`Unknown destination ${directionSection.name}`, stateSection.name);
      }

      const packets: Packet[] = [];
      for (const packetSection of directionSection.children) {
        const entry = {
          packet: packetSection.name,
          state: stateSection.name,
          direction: directionSection.name
        };

        try {
          const packet = this.assembler.parsePacket(packetSection.name, packetSection.text);
          if (packet) {
            packets.push(packet);
          } else {
            skipped.push({ ...entry, reason: 'symmetry' });
          }
        } catch (error) {
          if (error instanceof MissingTableError && this.onMissingTable === 'skip') {
            console.warn(`  ⚠️  ${error.message}`);
            skipped.push({ ...entry, reason: 'missing-table' });
            continue;
          }
          throw error;
        }
      }

      directions.push({ direction: directionSection.name, packets });
    }

    return { state: stateSection.name, directions };
  }
}
