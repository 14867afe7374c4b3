/**
 * Plain-text rendering of an analysis report
 */

import { VERIFICATION_CONSTANTS } from "../constants/index";
import type { AnalysisReport, CoverageAnalysis } from "../types/index";

const RULE = "=".repeat(60);
const num = (n: number) => n.toLocaleString("en-US");

function breakdown(title: string, counts: Record<string, number>): string[] {
  const keys = Object.keys(counts).sort();
  if (keys.length === 0) return [];
  return ["", `${title}:`, ...keys.map((k) => `   ${k}: ${num(counts[k])}`)];
}

function limited(title: string, items: string[], max: number): string[] {
  if (items.length === 0) return [];
  const lines = ["", `${title} (${items.length}):`, ...items.slice(0, max).map((i) => `   • ${i}`)];
  if (items.length > max) lines.push(`   ... and ${items.length - max} more`);
  return lines;
}

export function coverageVerdict(coverage: CoverageAnalysis): string {
  const found = `found ${num(coverage.actual)} purchasable skins`;
  switch (coverage.tier) {
    case "excellent":
      return `Coverage is excellent (${found})`;
    case "good":
      return `Coverage is good (${found})`;
    case "acceptable":
      return `Coverage is acceptable (${found})`;
    case "poor":
      return "Coverage is poor - some purchasable skins may be missing";
  }
}

/**
 * Renders the report as the multi-section text shown by the CLI
 */
export function renderReport(report: AnalysisReport): string {
  const lines = [RULE, "SKIN CATALOG VERIFICATION REPORT", RULE];

  if (report.error) {
    lines.push(`ERROR: ${report.error}`);
    return lines.join("\n");
  }

  lines.push(
    "SUMMARY:",
    `   Total Skins Found: ${num(report.totalSkins)}`,
    `   Total Price: ${num(report.totalPrice)} VP`,
    `   Data Quality Score: ${report.dataQualityScore.toFixed(1)}%`,
  );

  lines.push(...breakdown("WEAPON BREAKDOWN", report.weaponBreakdown));
  lines.push(...breakdown("EDITION BREAKDOWN", report.editionBreakdown));
  lines.push(...breakdown("SOURCE BREAKDOWN", report.sourceBreakdown));

  if (report.priceRanges) {
    const r = report.priceRanges;
    lines.push(
      "",
      "PRICE ANALYSIS:",
      `   Min Price: ${num(r.min)} VP`,
      `   Max Price: ${num(r.max)} VP`,
      `   Average Price: ${num(Math.round(r.average))} VP`,
    );
  }

  lines.push(
    ...limited("MISSING DATA", report.missingData, VERIFICATION_CONSTANTS.MAX_LISTED_ISSUES),
    ...limited("DUPLICATE SKINS", report.duplicateSkins, VERIFICATION_CONSTANTS.MAX_LISTED_DUPLICATES),
  );

  const c = report.coverage;
  lines.push(
    "",
    "COVERAGE ANALYSIS:",
    `   Expected Total: ${num(c.expected)} purchasable skins`,
    `   Actual Found: ${num(c.actual)} purchasable skins`,
    `   Coverage: ${c.percent.toFixed(1)}%`,
    `   ${coverageVerdict(c)}`,
    RULE,
  );

  return lines.join("\n");
}
