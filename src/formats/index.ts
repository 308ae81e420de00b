import type { FormatWriters } from './types.js';
import { writeBin } from './writeBin.js';
import { writeHex } from './writeHex.js';
import { writeListing } from './writeListing.js';

/**
 * Default in-memory artifact writers.
 *
 * These writers implement the `FormatWriters` contract and return artifacts without touching disk.
 */
export const defaultFormatWriters: FormatWriters = {
  writeHex,
  writeBin,
  writeListing,
};
