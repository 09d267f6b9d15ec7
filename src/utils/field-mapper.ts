/**
 * 型安全なセル値マッピングユーティリティ
 *
 * スプレッドシート / CSV 由来の行（Record<string, CellValue>）を内部型に安全に変換する
 */

import { CellValue } from "../../types";
import { parseStrictNumber } from "../../kpi-parser";

// =============================================================================
// フィールド値取得
// =============================================================================

/**
 * 複数の候補列名から最初の非null値を取得
 */
export function getCell(
  row: Record<string, CellValue>,
  columnNames: string[]
): CellValue {
  for (const name of columnNames) {
    const value = row[name];
    if (value !== undefined && value !== null) {
      return value;
    }
  }
  return null;
}

/**
 * 文字列として値を取得
 */
export function getString(
  row: Record<string, CellValue>,
  columnNames: string[],
  defaultValue: string = ""
): string {
  const value = getCell(row, columnNames);
  return value === null ? defaultValue : String(value);
}

/**
 * セル値を数値に変換（変換できなければ null）
 *
 * 文字列は "$" と桁区切りの "," を除去してからパースする
 */
export function toNullableNumber(value: CellValue | undefined): number | null {
  if (value === null || value === undefined || typeof value === "boolean") {
    return null;
  }
  if (typeof value === "number") {
    return Number.isFinite(value) ? value : null;
  }
  return parseStrictNumber(value.replace(/[$,]/g, ""));
}

/**
 * 数値として値を取得（null 許容）
 */
export function getNullableNumber(
  row: Record<string, CellValue>,
  columnNames: string[]
): number | null {
  return toNullableNumber(getCell(row, columnNames));
}

/**
 * 数値として値を取得（欠損はデフォルト値）
 */
export function getNumber(
  row: Record<string, CellValue>,
  columnNames: string[],
  defaultValue: number = 0
): number {
  return getNullableNumber(row, columnNames) ?? defaultValue;
}

/**
 * 整数に変換（0方向に切り捨て）。変換できなければ null
 */
export function toInteger(value: CellValue | undefined): number | null {
  const num = toNullableNumber(value);
  return num === null ? null : Math.trunc(num);
}

// =============================================================================
// 列チェック
// =============================================================================

/**
 * テーブルに存在しない列名を返す
 */
export function findMissingColumns(
  columns: readonly string[],
  required: readonly string[]
): string[] {
  const present = new Set(columns);
  return required.filter((name) => !present.has(name));
}
