/**
 * Data quality analysis over verification records
 */

import { VERIFICATION_CONSTANTS } from "../constants/index";
import type {
  AnalysisReport,
  CoverageAnalysis,
  CoverageTier,
  PriceRange,
  SkinRecordMeta,
} from "../types/index";
import { countBy, duplicates, sum } from "../utils/array";

/**
 * Found records as a percentage of the expected count
 */
export function computeCoverage(actual: number, expected: number): number {
  if (actual <= 0 || expected <= 0) return 0;
  return (actual / expected) * 100;
}

export function coverageTier(percent: number): CoverageTier {
  if (percent >= 95) return "excellent";
  if (percent >= 80) return "good";
  if (percent >= 60) return "acceptable";
  return "poor";
}

export function analyzeCoverage(actual: number, expected: number): CoverageAnalysis {
  const percent = computeCoverage(actual, expected);
  return { expected, actual, percent, tier: coverageTier(percent) };
}

const hasName = (r: SkinRecordMeta) => r.name.trim() !== "";
const hasWeapon = (r: SkinRecordMeta) =>
  r.weapon.trim() !== "" && r.weapon !== VERIFICATION_CONSTANTS.UNKNOWN;
const hasPrice = (r: SkinRecordMeta) => r.price > 0;

export function isValidRecord(record: SkinRecordMeta): boolean {
  return hasName(record) && hasWeapon(record) && hasPrice(record);
}

export function findMissingData(records: SkinRecordMeta[]): string[] {
  const issues: string[] = [];
  for (const r of records) {
    if (!hasName(r)) issues.push(`Row ${r.rowIndex}: Missing skin name`);
    if (!hasWeapon(r)) issues.push(`Row ${r.rowIndex}: Missing weapon type`);
    if (!hasPrice(r)) issues.push(`Row ${r.rowIndex}: Invalid price (${r.price})`);
  }
  return issues;
}

export function priceRange(prices: number[]): PriceRange | null {
  if (prices.length === 0) return null;
  const total = sum(prices);
  return {
    min: Math.min(...prices),
    max: Math.max(...prices),
    average: total / prices.length,
    total,
  };
}

/**
 * Share of records with a name, a known weapon and a positive price, as a
 * percentage; 0 when there are no records
 */
export function dataQualityScore(records: SkinRecordMeta[]): number {
  if (records.length === 0) return 0;
  return (records.filter(isValidRecord).length / records.length) * 100;
}

/**
 * Builds the full analysis for a set of verification records
 * @param records - Records from every target table
 * @param expectedTotal - Baseline count of purchasable skins
 */
export function analyzeRecords(
  records: SkinRecordMeta[],
  expectedTotal: number = VERIFICATION_CONSTANTS.EXPECTED_TOTAL,
): AnalysisReport {
  const prices = records.map((r) => r.price);
  return {
    totalSkins: records.length,
    totalPrice: sum(prices),
    weaponBreakdown: countBy(records, (r) => r.weapon),
    editionBreakdown: countBy(records, (r) => r.edition),
    sourceBreakdown: countBy(records, (r) => r.source),
    duplicateSkins: duplicates(records.map((r) => r.name)),
    missingData: findMissingData(records),
    priceRanges: priceRange(prices),
    dataQualityScore: dataQualityScore(records),
    coverage: analyzeCoverage(records.length, expectedTotal),
    skinDetails: records,
  };
}
