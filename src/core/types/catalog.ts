/**
 * Catalog and extraction types
 */

/** Integer VP price extracted from one catalog row */
export type PriceRecord = number;

export interface PriceStatistics {
  count: number;
  total: number;
  average: number;
  min: number;
  max: number;
  range: number;
}

export type SkinEdition =
  | "Select"
  | "Deluxe"
  | "Premium"
  | "Exclusive"
  | "Ultra"
  | "Unknown";

export type SkinSource = "Store" | "Battle Pass" | "Agent Gear" | "Unknown";

/** Per-row metadata, verification path only */
export interface SkinRecordMeta {
  name: string;
  weapon: string;
  price: number;
  edition: SkinEdition;
  source: SkinSource;
  rowIndex: number; // 0-based, header excluded
  tableIndex: number; // 0-based among the target tables
}

/** Plain view of a table cell once the markup is parsed */
export interface ParsedCell {
  text: string;
  /** Present when the cell carries a data-sort-value attribute */
  sortValue?: string;
}

export interface ParsedRow {
  cells: ParsedCell[];
  text: string;
}

export interface ParsedTable {
  /** 0-based position among all tables matching the table selector */
  index: number;
  /** Text of every th in the table */
  headers: string[];
  /** All rows, header included */
  rowCount: number;
  /** Data rows, header row already dropped */
  rows: ParsedRow[];
}

/** Layout summary of a matching table, for diagnosing markup drift */
export interface TableSummary {
  index: number;
  headers: string[];
  rowCount: number;
  dataRowCount: number;
  markedRowCount: number;
  /** Text of the first few marked price cells */
  sampleMarkedPrices: string[];
}
