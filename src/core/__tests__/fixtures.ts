/**
 * Catalog markup builders shared by the test suites
 */

export type FixtureCell = string | { text: string; sort: string };

const renderCell = (cell: FixtureCell) =>
  typeof cell === "string"
    ? `<td>${cell}</td>`
    : `<td data-sort-value="${cell.sort}">${cell.text}</td>`;

export function catalogTable(rows: FixtureCell[][], headers = ["Name", "Weapon", "Price"]): string {
  const head = `<tr>${headers.map((h) => `<th>${h}</th>`).join("")}</tr>`;
  const body = rows.map((r) => `<tr>${r.map(renderCell).join("")}</tr>`).join("\n");
  return `<table class="wikitable sortable">\n${head}\n${body}\n</table>`;
}

export function catalogPage(...tables: string[]): string {
  return `<html><body><h1>Weapon Skins</h1>\n${tables.join("\n")}\n</body></html>`;
}

/** Table 0 is the bundle overview and must never be read */
export const BUNDLE_TABLE = catalogTable(
  [["Overview Bundle", "Bundle", { text: "7,100", sort: "7100" }]],
  ["Bundle", "Type", "Price"],
);

export const FIRST_SKIN_TABLE = catalogTable([
  ["Prime Vandal", "Vandal", { text: "1,775", sort: "1775" }],
  ["Glitchpop Sheriff", "Sheriff", "Exclusive Edition 2175"],
  ["Unreleased Ghost", "Ghost", { text: "TBD", sort: "0" }],
]);

export const SECOND_SKIN_TABLE = catalogTable([
  ["—", "Knife", { text: "12,000", sort: "12000" }],
  ["Reaver Classic", "Classic", "700", "1275"],
  ["Starter Bulldog", "Bulldog", "Free"],
]);

/** Prices in FIRST_SKIN_TABLE then SECOND_SKIN_TABLE */
export const CATALOG_PRICES = [1775, 2175, 12000, 1275];

export const CATALOG_HTML = catalogPage(BUNDLE_TABLE, FIRST_SKIN_TABLE, SECOND_SKIN_TABLE);
