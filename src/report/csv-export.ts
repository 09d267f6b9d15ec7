/**
 * レポートのCSV出力
 */

import { CellValue, RunMetadata } from "../../types";
import { ReportArtifact } from "./types";

const NEEDS_QUOTING = /[",\r\n]/;

/**
 * セル値をCSVフィールドに変換
 *
 * カンマ・ダブルクォート・改行を含む値はクォートし、内部の " は "" にエスケープする
 */
export function toCsvField(value: CellValue | undefined): string {
  if (value === null || value === undefined) {
    return "";
  }
  const text = String(value);
  return NEEDS_QUOTING.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

const METADATA_LABELS: ReadonlyArray<[keyof RunMetadata, string]> = [
  ["optimizationType", "Optimization Type"],
  ["reportDuration", "Report Duration"],
  ["notes", "Notes"],
];

/**
 * 実行メタデータをヘッダー前のコメント行に変換（未指定・空の項目は出力しない）
 */
export function formatMetadataPreamble(metadata: RunMetadata): string[] {
  return METADATA_LABELS.flatMap(([field, label]) => {
    const value = metadata[field]?.replace(/\r?\n/g, " ").trim();
    return value ? [`# ${label}: ${value}`] : [];
  });
}

/**
 * レポートをCSV文字列に変換（ヘッダー行付き、行区切りは LF、末尾改行あり）
 *
 * メタデータがあればヘッダーの前に "# " で始まるコメント行として出力する
 */
export function exportReportToCsv(report: ReportArtifact): string {
  const lines = [
    ...formatMetadataPreamble(report.metadata),
    report.columns.map(toCsvField).join(","),
    ...report.rows.map((row) =>
      report.columns.map((column) => toCsvField(row[column])).join(",")
    ),
  ];
  return `${lines.join("\n")}\n`;
}
