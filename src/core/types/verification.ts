/**
 * Quality verification types
 */

import type { SkinRecordMeta } from "./catalog";

export type CoverageTier = "excellent" | "good" | "acceptable" | "poor";

export interface PriceRange {
  min: number;
  max: number;
  average: number;
  total: number;
}

export interface CoverageAnalysis {
  expected: number;
  actual: number;
  percent: number;
  tier: CoverageTier;
}

export interface AnalysisReport {
  totalSkins: number;
  totalPrice: number;
  weaponBreakdown: Record<string, number>;
  editionBreakdown: Record<string, number>;
  sourceBreakdown: Record<string, number>;
  duplicateSkins: string[];
  missingData: string[];
  priceRanges: PriceRange | null;
  dataQualityScore: number;
  coverage: CoverageAnalysis;
  skinDetails: SkinRecordMeta[];
  error?: string;
}
