/**
 * サイト種別除外（プッシュ通知系の配信面）
 */

import { CellValue } from "../../types";
import { EXCLUDED_SITE_PATTERN } from "../constants";

export interface SiteExclusionResult {
  kept: Record<string, CellValue>[];
  excludedCount: number;
}

function matchesExcludedPattern(value: CellValue | undefined, pattern: RegExp): boolean {
  return typeof value === "string" && pattern.test(value);
}

/**
 * siteName または campaignName が除外パターンに一致する行を取り除く
 */
export function excludeSiteTypes(
  rows: Record<string, CellValue>[],
  pattern: RegExp = EXCLUDED_SITE_PATTERN
): SiteExclusionResult {
  const kept = rows.filter(
    (row) =>
      !matchesExcludedPattern(row.siteName, pattern) &&
      !matchesExcludedPattern(row.campaignName, pattern)
  );

  return { kept, excludedCount: rows.length - kept.length };
}
