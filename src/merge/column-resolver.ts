/**
 * 列解決
 *
 * 広告主データセットの列名はエクスポート元ごとに異なるため、
 * 部分一致のヒューリスティックで列を特定する。判定ロジックはこのファイルに閉じ込め、
 * マージ処理・判定エンジンからは型付きの結果だけを参照する。
 */

import { ColumnResolutionError, ConfigurationError } from "../errors";

// =============================================================================
// 型定義
// =============================================================================

export type KeyColumnResolution =
  | { ok: true; campaignColumn: string; siteIdColumn: string }
  | { ok: false; missing: string[] };

/**
 * 呼び出し側で列名を明示する場合の指定
 */
export interface KeyColumnOverrides {
  campaignColumn?: string;
  siteIdColumn?: string;
}

// =============================================================================
// キー列
// =============================================================================

function findColumn(
  columns: readonly string[],
  predicate: (lowerName: string) => boolean
): string | undefined {
  return columns.find((column) => predicate(column.toLowerCase()));
}

/**
 * キャンペーン名列・サイトID列を特定
 *
 * - キャンペーン列: "campaign" と "name" を両方含む列を優先し、なければ "campaign" を含む列
 * - サイトID列: "site" と "id" を両方含む列
 */
export function resolveExternalKeyColumns(
  columns: readonly string[],
  overrides: KeyColumnOverrides = {}
): KeyColumnResolution {
  const campaignColumn =
    overrides.campaignColumn ??
    findColumn(columns, (c) => c.includes("campaign") && c.includes("name")) ??
    findColumn(columns, (c) => c.includes("campaign"));

  const siteIdColumn =
    overrides.siteIdColumn ??
    findColumn(columns, (c) => c.includes("site") && c.includes("id"));

  if (campaignColumn !== undefined && siteIdColumn !== undefined) {
    return { ok: true, campaignColumn, siteIdColumn };
  }

  const missing: string[] = [];
  if (campaignColumn === undefined) missing.push("campaign name");
  if (siteIdColumn === undefined) missing.push("site id");
  return { ok: false, missing };
}

// =============================================================================
// KPI列
// =============================================================================

/**
 * 列番号（0始まり）からKPI列名を取得
 *
 * @throws {ColumnResolutionError} 範囲外の場合
 */
export function resolveKpiColumn(columns: readonly string[], index: number): string {
  const column = Number.isInteger(index) ? columns[index] : undefined;
  if (column === undefined) {
    throw new ColumnResolutionError(
      "external",
      [`KPI column #${index}`],
      `KPI column index ${index} is out of range (external dataset has ${columns.length} columns)`
    );
  }
  return column;
}

/**
 * スプレッドシートの列記号を0始まりの列番号に変換
 *
 * 例: "I" → 8, "K" → 10, "AA" → 26
 */
export function columnLetterToIndex(letter: string): number {
  const normalized = letter.trim().toUpperCase();
  if (!/^[A-Z]+$/.test(normalized)) {
    throw new ConfigurationError(`Invalid column letter: "${letter}"`, [
      `column letter must consist of A-Z, received "${letter}"`,
    ]);
  }

  let result = 0;
  for (const char of normalized) {
    result = result * 26 + (char.charCodeAt(0) - "A".charCodeAt(0) + 1);
  }
  return result - 1;
}

const PRIMARY_KPI_PATTERNS = ["d7", "roas d7", "roi d7", "d 7"] as const;
const SECONDARY_KPI_PATTERNS = ["d30", "d14", "roas d3", "roi d3", "d 30"] as const;

function findPatternIndex(
  columns: readonly string[],
  patterns: readonly string[],
  fallback: number
): number {
  for (const pattern of patterns) {
    const index = columns.findIndex((column) => column.toLowerCase().includes(pattern));
    if (index >= 0) {
      return index;
    }
  }
  return fallback;
}

/**
 * KPI列のデフォルト候補を推定
 *
 * 主KPIは D7 系、副KPIは D30 / D14 系の列を探す。副KPIが主KPIと重なった場合は次の列
 */
export function suggestKpiColumns(columns: readonly string[]): {
  primaryColumnIndex: number;
  secondaryColumnIndex: number;
} {
  const primaryColumnIndex = findPatternIndex(columns, PRIMARY_KPI_PATTERNS, 0);
  let secondaryColumnIndex = findPatternIndex(columns, SECONDARY_KPI_PATTERNS, 1);

  if (secondaryColumnIndex === primaryColumnIndex) {
    secondaryColumnIndex = (primaryColumnIndex + 1) % Math.max(columns.length, 1);
  }

  return { primaryColumnIndex, secondaryColumnIndex };
}
