/**
 * Classification Module Ports
 */

import type { MetadataRecord } from './types.js';

/**
 * Read-only source of per-code metadata.
 */
export interface MetadataStore {
  /** Number of records */
  readonly size: number;

  /**
   * All records in source order.
   */
  entries(): readonly MetadataRecord[];

  /**
   * Resolves a record by canonical (`A0111x`), unpadded (`A0111`) or numeric
   * (`0111`, `01110`) code.
   */
  getByCode(code: string): MetadataRecord | null;
}
