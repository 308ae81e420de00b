/**
 * Half-open address range in the 32-bit address space.
 */
export interface AddressRange {
  /** Inclusive start address. */
  start: number;
  /** Exclusive end address. */
  end: number;
}

/**
 * Address->byte map for all emitted bytes.
 */
export interface EmittedByteMap {
  /**
   * Address -> byte (0..255). Addresses are unsigned 32-bit values.
   */
  bytes: Map<number, number>;
  writtenRange?: AddressRange;
  /**
   * Source-attributed ranges, one per instruction or data request, in emission order.
   */
  sourceSegments?: EmittedSourceSegment[];
}

/**
 * Source-attributed emitted range used by the listing writer.
 */
export interface EmittedSourceSegment {
  start: number;
  end: number;
  file: string;
  line: number;
  kind: 'code' | 'data';
}

/**
 * A symbol entry for listings.
 */
export type SymbolEntry =
  | {
      kind: 'constant';
      name: string;
      /** Constant value (not an address). */
      value: number;
      file?: string;
      line?: number;
    }
  | {
      kind: 'label';
      name: string;
      address: number;
      file?: string;
      line?: number;
    };

/**
 * Options for Intel HEX writing.
 */
export interface WriteHexOptions {
  /**
   * Line ending to use when emitting text formats.
   */
  lineEnding?: '\n' | '\r\n';
  /**
   * Data bytes per record (default 16).
   */
  recordSize?: number;
}

/**
 * Options for BIN writing.
 */
export interface WriteBinOptions {
  /**
   * Byte used for unwritten addresses inside the written range (default `0x00`).
   */
  padByte?: number;
}

/**
 * Options for listing writing.
 */
export interface WriteListingOptions {
  /**
   * Line ending to use when emitting text formats.
   */
  lineEnding?: '\n' | '\r\n';
  /**
   * Number of bytes shown per listing line.
   */
  bytesPerLine?: number;
}

/**
 * In-memory Intel HEX artifact.
 */
export interface HexArtifact {
  kind: 'hex';
  path?: string;
  text: string;
}

/**
 * In-memory flat binary artifact.
 */
export interface BinArtifact {
  kind: 'bin';
  path?: string;
  bytes: Uint8Array;
}

/**
 * In-memory listing artifact.
 */
export interface ListingArtifact {
  kind: 'lst';
  path?: string;
  text: string;
}

/**
 * Union of all artifact kinds produced by the assembler.
 */
export type Artifact = HexArtifact | BinArtifact | ListingArtifact;

/**
 * Format writers used by the pipeline to turn emitted bytes/symbols into artifacts.
 */
export interface FormatWriters {
  writeHex(map: EmittedByteMap, symbols: SymbolEntry[], opts?: WriteHexOptions): HexArtifact;
  writeBin(map: EmittedByteMap, symbols: SymbolEntry[], opts?: WriteBinOptions): BinArtifact;
  writeListing?(
    map: EmittedByteMap,
    symbols: SymbolEntry[],
    opts?: WriteListingOptions,
  ): ListingArtifact;
}
