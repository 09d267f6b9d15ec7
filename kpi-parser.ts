/**
 * キャンペーン入札最適化エンジン - KPIパーサー
 *
 * 広告主レポートのKPIセル（"5.9%" / "5.9" / 0.059 など）を小数表現に正規化する
 */

import { CellValue } from "./types";

/**
 * KPI列名として認識するプレフィックス（大文字小文字は区別しない）
 */
const KNOWN_KPI_PREFIXES = ["Full ROAS ", "ROAS ", "Full Roas ", "ROI "] as const;

/**
 * 厳密な数値表現（末尾のゴミ文字は不可）
 */
const NUMERIC_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

/**
 * 数値文字列を厳密にパース
 *
 * @returns 有限数でなければ null
 */
export function parseStrictNumber(text: string): number | null {
  const trimmed = text.trim();
  if (!NUMERIC_PATTERN.test(trimmed)) {
    return null;
  }
  const value = Number(trimmed);
  return Number.isFinite(value) ? value : null;
}

/**
 * KPIセルを小数表現に変換
 *
 * 絶対値が 1.0 を超える値は整数パーセント表記とみなして 100 で割る。
 * "1.5"（150% の意図）は 1.5% と解釈される点に注意。
 * パースできない値は null を返し、例外は投げない。
 */
export function parseKpiValue(raw: CellValue | undefined): number | null {
  if (raw === null || raw === undefined || typeof raw === "boolean") {
    return null;
  }

  let value: number | null;
  if (typeof raw === "number") {
    value = Number.isFinite(raw) ? raw : null;
  } else {
    value = parseStrictNumber(raw.replace(/%/g, ""));
  }

  if (value === null) {
    return null;
  }

  return Math.abs(value) > 1.0 ? value / 100 : value;
}

/**
 * KPI列名から表示ラベルを生成
 *
 * 例: "Full ROAS D30" → "ROI D30", "Day 7 revenue" → "ROI Day 7 revenue"
 */
export function buildKpiLabel(columnName: string): string {
  const name = columnName.trim();
  const lower = name.toLowerCase();

  for (const prefix of KNOWN_KPI_PREFIXES) {
    if (lower.includes(prefix.toLowerCase())) {
      const tokens = name.split(/\s+/);
      const period = tokens[tokens.length - 1];
      return `ROI ${period}`;
    }
  }

  return `ROI ${name}`;
}

/**
 * 主・副KPIのラベルを生成（衝突時は副KPIに接尾辞を付ける）
 */
export function buildKpiLabels(
  primaryColumn: string,
  secondaryColumn: string
): { primary: string; secondary: string } {
  const primary = buildKpiLabel(primaryColumn);
  const secondary = buildKpiLabel(secondaryColumn);

  if (primary === secondary) {
    return { primary, secondary: `${secondary} (secondary)` };
  }
  return { primary, secondary };
}
