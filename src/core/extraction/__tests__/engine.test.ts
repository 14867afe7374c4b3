import { describe, expect, it } from "vitest";
import { ParseError, ValidationError } from "../../errors/index";
import {
  describeTables,
  extractPriceFromRow,
  extractPrices,
  extractSkinRecords,
  inferEdition,
  inferSource,
  parseMarkedPrice,
  scanCellsForPrice,
} from "../engine";
import {
  BUNDLE_TABLE,
  CATALOG_HTML,
  CATALOG_PRICES,
  FIRST_SKIN_TABLE,
  catalogPage,
  catalogTable,
} from "../../__tests__/fixtures";

describe("extractPrices", () => {
  it("reads the second and third catalog tables in row order", () => {
    expect(extractPrices(CATALOG_HTML)).toEqual(CATALOG_PRICES);
  });

  it("uses only the second table when there are exactly two", () => {
    expect(extractPrices(catalogPage(BUNDLE_TABLE, FIRST_SKIN_TABLE))).toEqual([1775, 2175]);
  });

  it("ignores tables beyond the third", () => {
    const extra = catalogTable([["Extra", "Odin", { text: "3,550", sort: "3550" }]]);
    expect(extractPrices(`${CATALOG_HTML}${extra}`)).toEqual(CATALOG_PRICES);
  });

  it("takes marked prices as given and scans the rest within bounds", () => {
    const html = catalogPage(
      BUNDLE_TABLE,
      catalogTable([
        ["Kuronami", "Melee", { text: "9,950", sort: "9950" }],
        ["Tiny", "Classic", "Price 12"],
        ["Huge", "Classic", "7000 VP"],
        ["Select", "Stinger", "875"],
      ]),
    );
    expect(extractPrices(html)).toEqual([9950, 875]);
  });

  it.each([0, 1])("throws ParseError with %i catalog tables", (count) => {
    const html = catalogPage(...Array.from({ length: count }, () => FIRST_SKIN_TABLE));
    expect(() => extractPrices(html)).toThrow(ParseError);
  });

  it("does not match tables missing the sortable class", () => {
    const plain = FIRST_SKIN_TABLE.replace("wikitable sortable", "wikitable");
    expect(() => extractPrices(catalogPage(plain, FIRST_SKIN_TABLE))).toThrow(
      "Could not find weapon skins table (found 1 matching tables)",
    );
  });
});

describe("parseMarkedPrice", () => {
  it("drops commas, newlines and non-breaking spaces", () => {
    expect(parseMarkedPrice(" 1,775\n")).toBe(1775);
    expect(parseMarkedPrice("2\u00a0175")).toBe(2175);
  });

  it("applies no range check", () => {
    expect(parseMarkedPrice("25,000")).toBe(25000);
    expect(parseMarkedPrice("0")).toBe(0);
  });

  it("rejects text that is not an integer", () => {
    expect(() => parseMarkedPrice("TBD")).toThrow(ValidationError);
    expect(() => parseMarkedPrice("1775 VP")).toThrow(ValidationError);
  });
});

describe("extractPriceFromRow", () => {
  it("never falls back to scanning when the marked cell is unparsable", () => {
    const row = {
      text: "Ghost N/A 1775",
      cells: [{ text: "Ghost" }, { text: "N/A", sortValue: "0" }, { text: "1775" }],
    };
    expect(extractPriceFromRow(row)).toBeNull();
  });

  it("uses the first marked cell", () => {
    const row = {
      text: "",
      cells: [
        { text: "1,275", sortValue: "1275" },
        { text: "2,475", sortValue: "2475" },
      ],
    };
    expect(extractPriceFromRow(row)).toBe(1275);
  });
});

describe("scanCellsForPrice", () => {
  it("returns the first in-bounds match across cells", () => {
    expect(scanCellsForPrice([{ text: "500" }, { text: "1775" }, { text: "2175" }])).toBe(1775);
  });

  it("accepts the bounds themselves", () => {
    expect(scanCellsForPrice([{ text: "800" }])).toBe(800);
    expect(scanCellsForPrice([{ text: "6000" }])).toBe(6000);
  });

  it("returns null when nothing fits", () => {
    expect(scanCellsForPrice([{ text: "799" }, { text: "6001" }, { text: "free" }])).toBeNull();
  });
});

describe("inferEdition / inferSource", () => {
  it("prefers the highest edition keyword", () => {
    expect(inferEdition("Ultra Edition, formerly Premium")).toBe("Ultra");
    expect(inferEdition("DELUXE")).toBe("Deluxe");
    expect(inferEdition("Standard")).toBe("Unknown");
  });

  it("checks battle pass before agent gear before store", () => {
    expect(inferSource("Battlepass reward, later in Store")).toBe("Battle Pass");
    expect(inferSource("Agent Gear / Night Market")).toBe("Agent Gear");
    expect(inferSource("Night Market")).toBe("Store");
    expect(inferSource("Event")).toBe("Unknown");
  });
});

describe("extractSkinRecords", () => {
  it("attaches row metadata and names placeholder rows", () => {
    const records = extractSkinRecords(CATALOG_HTML);

    expect(records.map((r) => [r.name, r.weapon, r.price, r.rowIndex, r.tableIndex])).toEqual([
      ["Prime Vandal", "Vandal", 1775, 0, 0],
      ["Glitchpop Sheriff", "Sheriff", 2175, 1, 0],
      ["Skin_0", "Knife", 12000, 0, 1],
      ["Reaver Classic", "Classic", 1275, 1, 1],
    ]);
    expect(records[1].edition).toBe("Exclusive");
  });

  it("reports a missing weapon as Unknown", () => {
    const html = catalogPage(BUNDLE_TABLE, catalogTable([["Lone Name", "-", { text: "875", sort: "875" }]]));
    expect(extractSkinRecords(html)[0].weapon).toBe("Unknown");
  });
});

describe("describeTables", () => {
  it("summarizes every matching table", () => {
    expect(describeTables(CATALOG_HTML)).toEqual([
      {
        index: 0,
        headers: ["Bundle", "Type", "Price"],
        rowCount: 2,
        dataRowCount: 1,
        markedRowCount: 1,
        sampleMarkedPrices: ["7,100"],
      },
      {
        index: 1,
        headers: ["Name", "Weapon", "Price"],
        rowCount: 4,
        dataRowCount: 3,
        markedRowCount: 2,
        sampleMarkedPrices: ["1,775", "TBD"],
      },
      {
        index: 2,
        headers: ["Name", "Weapon", "Price"],
        rowCount: 4,
        dataRowCount: 3,
        markedRowCount: 1,
        sampleMarkedPrices: ["12,000"],
      },
    ]);
  });

  it("collects headers from every row and caps the price sample", () => {
    const rows = Array.from({ length: 7 }, (_, i) => [`Skin ${i}`, "Odin", { text: `${900 + i}`, sort: `${900 + i}` }]);
    const table = catalogTable(rows).replace("<tr><td>Skin 3</td>", "<tr><th>Section</th></tr>\n<tr><td>Skin 3</td>");
    const [summary] = describeTables(catalogPage(table));

    expect(summary.headers).toEqual(["Name", "Weapon", "Price", "Section"]);
    expect(summary.sampleMarkedPrices).toEqual(["900", "901", "902", "903", "904"]);
    expect(summary.markedRowCount).toBe(7);
  });

  it("treats an empty sort value as a marked cell", () => {
    const html = catalogPage(BUNDLE_TABLE, catalogTable([["Odd", "Odin", { text: "3,200", sort: "" }]]));
    expect(extractPrices(html)).toEqual([3200]);
  });
});
