import { describe, expect, it } from "vitest";
import type { SkinRecordMeta } from "../../types/index";
import { analyzeRecords, computeCoverage, coverageTier } from "../analysis";
import { QualityVerifier } from "../verifier";
import { CATALOG_HTML, type FixtureCell, catalogPage, catalogTable } from "../../__tests__/fixtures";

function record(overrides: Partial<SkinRecordMeta>): SkinRecordMeta {
  return {
    name: "Prime Vandal",
    weapon: "Vandal",
    price: 1775,
    edition: "Premium",
    source: "Store",
    rowIndex: 0,
    tableIndex: 0,
    ...overrides,
  };
}

describe("analyzeRecords", () => {
  const records = [
    record({ rowIndex: 0 }),
    record({ name: "Ion Phantom", weapon: "Phantom", rowIndex: 1 }),
    record({ name: "Prime Vandal", rowIndex: 2, edition: "Ultra" }),
    record({ name: "Oni Claw", weapon: "Unknown", price: 4350, rowIndex: 3, source: "Unknown" }),
    record({ name: "Broken", weapon: "Ghost", price: 0, rowIndex: 4 }),
  ];
  const report = analyzeRecords(records, 10);

  it("totals and breaks down the records", () => {
    expect(report.totalSkins).toBe(5);
    expect(report.totalPrice).toBe(1775 * 3 + 4350);
    expect(report.weaponBreakdown).toEqual({ Vandal: 2, Phantom: 1, Unknown: 1, Ghost: 1 });
    expect(report.editionBreakdown).toEqual({ Premium: 4, Ultra: 1 });
    expect(report.sourceBreakdown).toEqual({ Store: 4, Unknown: 1 });
  });

  it("flags duplicates and missing data", () => {
    expect(report.duplicateSkins).toEqual(["Prime Vandal"]);
    expect(report.missingData).toEqual(["Row 3: Missing weapon type", "Row 4: Invalid price (0)"]);
    expect(report.dataQualityScore).toBeCloseTo(60);
  });

  it("summarizes the price range", () => {
    expect(report.priceRanges).toEqual({ min: 0, max: 4350, average: 9675 / 5, total: 9675 });
    expect(analyzeRecords([]).priceRanges).toBeNull();
  });

  it("measures coverage against the expected total", () => {
    expect(report.coverage).toEqual({ expected: 10, actual: 5, percent: 50, tier: "poor" });
  });
});

describe("coverage tiers", () => {
  it.each([
    [95, "excellent"],
    [94.9, "good"],
    [80, "good"],
    [60, "acceptable"],
    [59.9, "poor"],
  ])("%f%% is %s", (percent, tier) => {
    expect(coverageTier(percent)).toBe(tier);
  });

  it("is 0% when nothing was found or expected", () => {
    expect(computeCoverage(0, 496)).toBe(0);
    expect(computeCoverage(10, 0)).toBe(0);
  });
});

describe("QualityVerifier", () => {
  it("verifies the catalog markup", () => {
    const report = new QualityVerifier({ expectedTotal: 4 }).verify(CATALOG_HTML);

    expect(report.error).toBeUndefined();
    expect(report.totalSkins).toBe(4);
    expect(report.totalPrice).toBe(17225);
    expect(report.coverage.tier).toBe("excellent");
    expect(report.skinDetails.map((s) => s.name)).toEqual([
      "Prime Vandal",
      "Glitchpop Sheriff",
      "Skin_0",
      "Reaver Classic",
    ]);
  });

  it("renders an excellent coverage report", () => {
    const rows: FixtureCell[][] = Array.from({ length: 480 }, (_, i) => [
      `Skin ${i}`,
      "Vandal",
      { text: "1,775", sort: "1775" },
    ]);
    const html = catalogPage(catalogTable([]), catalogTable(rows));
    const verifier = new QualityVerifier();

    const lines = verifier.renderReport(verifier.verify(html)).split("\n");

    expect(lines.slice(0, 3)).toEqual([
      "=".repeat(60),
      "SKIN CATALOG VERIFICATION REPORT",
      "=".repeat(60),
    ]);
    expect(lines).toContain("   Total Skins Found: 480");
    expect(lines).toContain("   Total Price: 852,000 VP");
    expect(lines).toContain("   Data Quality Score: 100.0%");
    expect(lines).toContain("   Expected Total: 496 purchasable skins");
    expect(lines).toContain("   Coverage: 96.8%");
    expect(lines).toContain("   Coverage is excellent (found 480 purchasable skins)");
    expect(lines).not.toContain("DUPLICATE SKINS (0):");
  });

  it("lists duplicates and truncates long issue lists", () => {
    const rows: FixtureCell[][] = Array.from({ length: 12 }, () => [
      "Same Name",
      "-",
      { text: "875", sort: "875" },
    ]);
    const verifier = new QualityVerifier();
    const lines = verifier
      .renderReport(verifier.verify(catalogPage(catalogTable([]), catalogTable(rows))))
      .split("\n");

    expect(lines).toContain("MISSING DATA (12):");
    expect(lines).toContain("   • Row 9: Missing weapon type");
    expect(lines).not.toContain("   • Row 10: Missing weapon type");
    expect(lines).toContain("   ... and 2 more");
    expect(lines).toContain("DUPLICATE SKINS (1):");
    expect(lines).toContain("   • Same Name");
    expect(lines).toContain("   Coverage is poor - some purchasable skins may be missing");
  });

  it("reports structural failures instead of throwing", () => {
    const verifier = new QualityVerifier();
    const report = verifier.verify("<html><body><p>maintenance</p></body></html>");

    expect(report.error).toBe("Could not find weapon skins table (found 0 matching tables)");
    expect(report.totalSkins).toBe(0);
    expect(verifier.renderReport(report).split("\n")).toEqual([
      "=".repeat(60),
      "SKIN CATALOG VERIFICATION REPORT",
      "=".repeat(60),
      "ERROR: Could not find weapon skins table (found 0 matching tables)",
    ]);
  });
});
