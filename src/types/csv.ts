/**
 * CSV/TSV specific types for parsing operations.
 */

export interface ParsedTable {
  /** Header name → index of its cell in each row; the last duplicate wins */
  headerMap: Map<string, number>;
  headers: string[];
  rows: string[][];
}
