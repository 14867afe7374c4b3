/**
 * Catalog extraction self-check
 */

import { VERIFICATION_CONSTANTS } from "../constants/index";
import { toError } from "../errors/index";
import { extractSkinRecords } from "../extraction/index";
import type { AnalysisReport } from "../types/index";
import { Logger } from "../utils/logger";
import { analyzeRecords } from "./analysis";
import { renderReport } from "./report";

export interface VerifierOptions {
  /** Known count of purchasable skins that coverage is measured against */
  expectedTotal?: number;
}

/**
 * Re-runs extraction with per-row metadata and scores how complete the
 * result looks. Runs independently of price fetching.
 */
export class QualityVerifier {
  private readonly expectedTotal: number;

  constructor(options: VerifierOptions = {}) {
    this.expectedTotal = options.expectedTotal ?? VERIFICATION_CONSTANTS.EXPECTED_TOTAL;
  }

  /**
   * Structural failures are reported through the error field, not thrown
   * @param markup - Raw catalog markup
   */
  verify(markup: string): AnalysisReport {
    try {
      const report = analyzeRecords(extractSkinRecords(markup), this.expectedTotal);
      Logger.info("Skin verification report generated", {
        count: report.totalSkins,
        coverage: Number(report.coverage.percent.toFixed(1)),
        quality: Number(report.dataQualityScore.toFixed(1)),
      });
      return report;
    } catch (error) {
      const err = toError(error);
      Logger.error("Error verifying skins", err);
      return { ...analyzeRecords([], this.expectedTotal), error: err.message };
    }
  }

  renderReport(report: AnalysisReport): string {
    return renderReport(report);
  }
}
