/**
 * Catalog table extraction shared by every price source and the verifier
 */

import { load as loadHtml } from "cheerio";
import {
  CATALOG_CONSTANTS,
  PRICE_BOUNDS,
  VERIFICATION_CONSTANTS,
} from "../constants/index";
import { ParseError, ValidationError } from "../errors/index";
import type {
  ParsedCell,
  ParsedRow,
  ParsedTable,
  SkinEdition,
  SkinRecordMeta,
  SkinSource,
  TableSummary,
} from "../types/index";
import { Logger } from "../utils/logger";

// 3-4 digits, optionally comma grouped ("1775", "1,775")
const PRICE_PATTERN = /(\d{3,4}(?:,\d{3})*)/;
const MARKED_NOISE = /[\u00a0\n,]/g;

const EDITION_KEYWORDS: Array<[SkinEdition, string[]]> = [
  ["Ultra", ["ultra"]],
  ["Exclusive", ["exclusive"]],
  ["Premium", ["premium"]],
  ["Deluxe", ["deluxe"]],
  ["Select", ["select"]],
];

const SOURCE_KEYWORDS: Array<[SkinSource, string[]]> = [
  ["Battle Pass", ["battle pass", "battlepass"]],
  ["Agent Gear", ["agent gear"]],
  ["Store", ["store", "night market"]],
];

/**
 * Parses every table matching the catalog table selector into plain rows
 * and cells. The first row of each table is treated as its header; every
 * `th` in the table is reported as a header.
 * @param html - Raw catalog markup
 */
export function parseCatalogTables(html: string): ParsedTable[] {
  const $ = loadHtml(html);
  return $(CATALOG_CONSTANTS.TABLE_SELECTOR)
    .toArray()
    .map((table, index) => {
      const rows = $(table).find("tr").toArray();
      return {
        index,
        headers: $(table)
          .find("th")
          .toArray()
          .map((th) => $(th).text().trim()),
        rowCount: rows.length,
        rows: rows.slice(1).map((row) => ({
          text: $(row).text(),
          cells: $(row)
            .find("td")
            .toArray()
            .map((cell): ParsedCell => {
              const text = $(cell).text();
              return $(cell).is(CATALOG_CONSTANTS.MARKED_CELL_SELECTOR)
                ? { text, sortValue: $(cell).attr("data-sort-value") ?? "" }
                : { text };
            }),
        })),
      };
    });
}

/**
 * Picks the 2nd and, when present, 3rd catalog table. The ordinal positions
 * mirror the current page layout; anything with fewer than two matching
 * tables is rejected rather than guessed at.
 * @throws ParseError when fewer than two catalog tables exist
 */
export function selectTargetTables(tables: ParsedTable[]): ParsedTable[] {
  if (tables.length < CATALOG_CONSTANTS.MIN_TABLES) {
    throw new ParseError(
      `Could not find weapon skins table (found ${tables.length} matching tables)`,
    );
  }
  return CATALOG_CONSTANTS.TARGET_TABLE_INDEXES.flatMap((i) => {
    const table = tables[i];
    return table ? [table] : [];
  });
}

/**
 * Parses the text of a marked (data-sort-value) cell. No range check is
 * applied on this path.
 * @throws ValidationError when the cleaned text is not an integer
 */
export function parseMarkedPrice(text: string): number {
  const cleaned = text.trim().replace(MARKED_NOISE, "").trim();
  if (!/^[+-]?\d+$/.test(cleaned)) {
    throw new ValidationError(`Unparsable marked price "${cleaned}"`, "price");
  }
  return parseInt(cleaned, 10);
}

/**
 * Scans cells in order for a plausible price, returning the first one
 * inside the sanity bounds
 */
export function scanCellsForPrice(cells: ParsedCell[]): number | null {
  for (const cell of cells) {
    const m = cell.text.trim().match(PRICE_PATTERN);
    if (!m) continue;
    const price = parseInt(m[1].replace(/,/g, ""), 10);
    if (isWithinPriceBounds(price)) return price;
  }
  return null;
}

export const isWithinPriceBounds = (price: number): boolean =>
  Number.isFinite(price) &&
  price >= PRICE_BOUNDS.MIN_VP &&
  price <= PRICE_BOUNDS.MAX_VP;

/**
 * Extracts the price of one row: the first marked cell when there is one,
 * otherwise a bounded scan of all cells
 * @returns The price, or null when the row carries none
 */
export function extractPriceFromRow(row: ParsedRow): number | null {
  const marked = row.cells.find((c) => c.sortValue !== undefined);
  if (marked) {
    try {
      return parseMarkedPrice(marked.text);
    } catch (error) {
      if (error instanceof ValidationError) {
        Logger.debug(`Could not extract price from row: ${error.message}`);
        return null;
      }
      throw error;
    }
  }
  return scanCellsForPrice(row.cells);
}

/**
 * Extracts every price from the target catalog tables
 * @param html - Raw catalog markup
 * @returns Prices in row order
 * @throws ParseError when the catalog tables are missing
 */
export function extractPrices(html: string): number[] {
  const targets = selectTargetTables(parseCatalogTables(html));
  const prices: number[] = [];

  targets.forEach((table, tableIndex) => {
    Logger.debug(
      `Processing ${table.rows.length} rows from target table ${tableIndex + 1}`,
      { tableIndex: table.index, count: table.rows.length },
    );
    for (const row of table.rows) {
      const price = extractPriceFromRow(row);
      if (price !== null) prices.push(price);
    }
  });

  return prices;
}

export function inferEdition(rowText: string): SkinEdition {
  return matchKeyword(rowText, EDITION_KEYWORDS) ?? "Unknown";
}

export function inferSource(rowText: string): SkinSource {
  return matchKeyword(rowText, SOURCE_KEYWORDS) ?? "Unknown";
}

function matchKeyword<K extends string>(
  text: string,
  table: Array<[K, string[]]>,
): K | null {
  const lower = text.toLowerCase();
  for (const [label, keywords] of table) {
    if (keywords.some((k) => lower.includes(k))) return label;
  }
  return null;
}

function isPlaceholder(text: string): boolean {
  const placeholders: readonly string[] = VERIFICATION_CONSTANTS.PLACEHOLDER_NAMES;
  return !text || placeholders.includes(text);
}

/**
 * Builds the verification view of one row
 * @returns null for rows without a price
 */
export function extractSkinRecord(
  row: ParsedRow,
  rowIndex: number,
  tableIndex: number,
): SkinRecordMeta | null {
  const price = extractPriceFromRow(row);
  if (price === null || row.cells.length === 0) return null;

  const nameText = row.cells[0].text.trim();
  const weaponText = row.cells[1]?.text.trim() ?? "";

  return {
    name: isPlaceholder(nameText) ? `Skin_${rowIndex}` : nameText,
    weapon: isPlaceholder(weaponText)
      ? VERIFICATION_CONSTANTS.UNKNOWN
      : weaponText,
    price,
    edition: inferEdition(row.text),
    source: inferSource(row.text),
    rowIndex,
    tableIndex,
  };
}

/**
 * Verification-mode extraction: same row selection as extractPrices, with
 * name, weapon, edition and source attached
 * @throws ParseError when the catalog tables are missing
 */
export function extractSkinRecords(html: string): SkinRecordMeta[] {
  const targets = selectTargetTables(parseCatalogTables(html));
  return targets.flatMap((table, tableIndex) =>
    table.rows.flatMap((row, rowIndex) => {
      const record = extractSkinRecord(row, rowIndex, tableIndex);
      return record ? [record] : [];
    }),
  );
}

/**
 * Summarizes every matching table; used to spot layout changes on the page
 */
export function describeTables(html: string): TableSummary[] {
  return parseCatalogTables(html).map((table) => {
    const marked = table.rows.flatMap((r) =>
      r.cells.filter((c) => c.sortValue !== undefined),
    );
    return {
      index: table.index,
      headers: table.headers,
      rowCount: table.rowCount,
      dataRowCount: table.rows.length,
      markedRowCount: table.rows.filter((r) =>
        r.cells.some((c) => c.sortValue !== undefined),
      ).length,
      sampleMarkedPrices: marked
        .slice(0, CATALOG_CONSTANTS.INSPECT_SAMPLE_SIZE)
        .map((c) => c.text.trim()),
    };
  });
}
