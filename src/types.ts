/**
 * Type definitions for the protocol wiki packet extractor
 */

export interface WikiTableCell {
  readonly content: string;
  readonly isHeader: boolean;
  // Top-left grid position, zero-based
  readonly x: number;
  readonly y: number;
  readonly rowspan: number;
  readonly colspan: number;
}

/**
 * Type descriptor attached to a field.
 *
 * `leaf` is the raw (unresolved) text of a type cell, `paired` joins a
 * composite's descriptor with its nested schema, `list` is an ordered
 * field list.
 */
export type TypeNode =
  | { kind: 'leaf'; text: string }
  | { kind: 'paired'; descriptor: TypeNode; content: TypeNode }
  | { kind: 'list'; fields: Field[] };

export interface Field {
  name: string;
  type: TypeNode;
}

/**
 * Turns the content of a type cell into a type node. Hook for mapping
 * wiki type names onto wire encodings.
 */
export type TypeResolver = (content: string) => TypeNode;

export interface Packet {
  /** Name of the wiki subsection the packet was read from */
  name: string;
  /** Text the wiki gives before the packet table, often empty */
  preamble: string;
  /** Hex literal identifying the packet on the wire, e.g. `0x2D` */
  protocolId: string;
  /** Registry name of the packet; absent for older protocol versions */
  resourceId?: string;
  fields: Field[];
}

export interface WikiSection {
  name: string;
  depth: number;
  text: string;
  children: WikiSection[];
}

export type SkipReason = 'symmetry' | 'missing-table';

export interface SkippedPacket {
  packet: string;
  state: string;
  direction: string;
  reason: SkipReason;
}

export interface DirectionPackets {
  direction: string;
  packets: Packet[];
}

export interface StatePackets {
  state: string;
  directions: DirectionPackets[];
}

export interface BatchResult {
  states: StatePackets[];
  skipped: SkippedPacket[];
}
