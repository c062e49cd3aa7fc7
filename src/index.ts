/**
 * Protocol wiki packet extractor
 *
 * @example
 * const root = splitSections(await fetchRevision(3024144));
 * const result = new SectionWalker().walk(root);
 */

// Types
export type {
  WikiTableCell,
  TypeNode,
  Field,
  TypeResolver,
  Packet,
  WikiSection,
  SkipReason,
  SkippedPacket,
  DirectionPackets,
  StatePackets,
  BatchResult,
} from './types';

export {
  WikiExtractError,
  FormatError,
  SymmetryError,
  DepthLimitError,
  DialectError,
  MissingTableError,
  RevisionError,
  ConfigError,
} from './errors';

// Grid reconstruction
export { WikiTable, parseWikiTable } from './wiki-table';
export type { ParsedTable } from './wiki-table';

// Inference
export { TypeInferrer, compositeType, resolveRawType, DEFAULT_MAX_DEPTH, DEFAULT_NO_FIELDS_MARKER } from './type-inferrer';
export type { TypeInferrerOptions } from './type-inferrer';

// Packets and sections
export { PacketAssembler, parsePacketId, splitPreamble } from './packet-assembler';
export type { PacketAssemblerOptions } from './packet-assembler';
export { SectionWalker } from './section-walker';
export type { SectionWalkerOptions } from './section-walker';
export { splitSections, findSection } from './sections';

// Configuration and sources
export { WikiDialectSchema, loadDialect, parseDialect, DEFAULT_DIALECT_PATH } from './dialect';
export type { WikiDialect } from './dialect';
export { fetchRevision, readRevisionFile, revisionUrl, DEFAULT_API_URL } from './revision-source';
export type { RevisionSourceOptions } from './revision-source';

// Output
export { renderShape, describeType, describeFields, countFields, countPackets, nestedFields } from './diagnostics';
export { SchemaPrinter } from './schema-printer';
