/**
 * agp2fasta - build FASTA assemblies from AGP v2.1 layouts
 *
 * Parses and validates AGP files, checks that every object is tiled exactly
 * once by its components and gaps, and writes the assembled sequences from
 * an indexed component FASTA file.
 */

export {
  AgpError,
  type AgpErrorKind,
  AgpRecordError,
  BufferError,
  CompressionError,
  ConsistencyError,
  CoordinateError,
  CoverageError,
  EnumError,
  FileError,
  isAgpRecordError,
  OrderingError,
  ParseError,
  RetrievalError,
  StreamError,
  StructuralError,
  ValidationError,
} from "./errors";
export * from "./formats/agp";
export { FastaStreamWriter, type FastaWriterOptions, writeToStream } from "./formats/fasta";
export { CompressionDetector } from "./compression/detector";
export { FileReader } from "./io/file-reader";
export { openForWriting, writeString } from "./io/file-writer";
export { readLines } from "./io/stream-utils";
export {
  type AssembleOptions,
  type AssemblyEmission,
  type AssemblyState,
  type AssemblyStep,
  assembleFasta,
  finishAssembly,
  initialAssemblyState,
  planRecord,
} from "./operations/assemble";
export { type AgpToFastaOptions, type AgpToFastaSummary, agpToFasta } from "./operations/agp2fasta";
export {
  type CoverageDefect,
  findCoverageDefect,
  type Interval,
  isCovered,
  toInterval,
} from "./operations/core/coverage";
export { complement, reverse, reverseComplement } from "./operations/core/sequence-manipulation";
export {
  FaidxSequenceProvider,
  InMemorySequenceProvider,
  type SequenceProvider,
  type SequenceRange,
} from "./operations/core/sequence-provider";
export { Faidx, FaiBuilder, type FaidxOptions, type FaidxRange, type FaidxRecord } from "./operations/faidx";
export type {
  CompressionDetection,
  CompressionFormat,
  FastaSequence,
  ParserOptions,
  WarningHandler,
} from "./types";
