/**
 * レコードマージ
 *
 * 社内データ（キャンペーン×サイトの配信指標）と広告主データ（KPI）を
 * キー campaignName_siteId で左結合し、CampaignRecord を生成する
 */

import {
  CampaignRecord,
  CellValue,
  DataTable,
  ScorableRecord,
} from "../../types";
import { buildKpiLabels, parseKpiValue } from "../../kpi-parser";
import { ColumnResolutionError, KeyConstructionError } from "../errors";
import { logger, StructuredLogger } from "../logger";
import { KpiLabels } from "../report/types";
import {
  getNullableNumber,
  getNumber,
  getString,
  toInteger,
} from "../utils/field-mapper";
import {
  KeyColumnOverrides,
  resolveExternalKeyColumns,
  resolveKpiColumn,
} from "./column-resolver";

// =============================================================================
// 定数・型定義
// =============================================================================

/**
 * 社内データの必須列
 */
export const REQUIRED_INTERNAL_COLUMNS = [
  "campaignName",
  "siteId",
  "siteName",
  "status",
  "spend",
  "preloads",
  "maxPreloads",
  "fillRate",
  "installs",
  "effectiveBidFloor",
  "bidRate",
  "highTier",
] as const;

interface KpiValues {
  kpiPrimary: number | null;
  kpiSecondary: number | null;
}

export interface MergeOptions {
  /** キー列を明示する場合（省略時はヒューリスティックで解決） */
  keyColumns?: KeyColumnOverrides;
  log?: StructuredLogger;
}

export interface MergeResult {
  records: CampaignRecord[];
  labels: KpiLabels;
  /** キー生成に失敗してスキップした社内データ行数 */
  malformedKeyRows: number;
  /** キー生成に失敗してスキップした広告主データ行数 */
  externalMalformedKeyRows: number;
  /** KPIとしてパースできなかったセル数 */
  unparseableKpiCells: number;
  /** 広告主データと一致した行数 */
  matchedRows: number;
}

// =============================================================================
// キー生成
// =============================================================================

/**
 * 結合キーを生成: trim(campaignName) + "_" + int(siteId)
 *
 * @throws {KeyConstructionError} siteId が整数に変換できない場合
 */
export function buildRecordKey(
  campaignName: CellValue | undefined,
  siteId: CellValue | undefined
): { key: string; siteId: number } {
  const name = campaignName === null || campaignName === undefined ? "" : String(campaignName);
  const site = toInteger(siteId);

  if (site === null) {
    throw new KeyConstructionError(name, siteId ?? null);
  }

  return { key: `${name.trim()}_${site}`, siteId: site };
}

// =============================================================================
// 広告主データのルックアップ
// =============================================================================

function isBlankCell(value: CellValue | undefined): boolean {
  return value === null || value === undefined || (typeof value === "string" && value.trim() === "");
}

interface KpiLookup {
  entries: Map<string, KpiValues>;
  malformedKeyRows: number;
  unparseableKpiCells: number;
}

/**
 * 広告主データからキー → KPI のルックアップを構築
 *
 * 同一キーが複数ある場合は最初の行を採用する
 */
function buildKpiLookup(
  external: DataTable,
  columns: { campaign: string; siteId: string; primary: string; secondary: string },
  log: StructuredLogger
): KpiLookup {
  const entries = new Map<string, KpiValues>();
  let malformedKeyRows = 0;
  let unparseableKpiCells = 0;

  external.rows.forEach((row, index) => {
    const primaryRaw = row[columns.primary];
    const secondaryRaw = row[columns.secondary];
    const kpiPrimary = parseKpiValue(primaryRaw);
    const kpiSecondary = parseKpiValue(secondaryRaw);

    if (kpiPrimary === null && !isBlankCell(primaryRaw)) unparseableKpiCells++;
    if (kpiSecondary === null && !isBlankCell(secondaryRaw)) unparseableKpiCells++;

    let key: string;
    try {
      key = buildRecordKey(row[columns.campaign], row[columns.siteId]).key;
    } catch (error) {
      if (!(error instanceof KeyConstructionError)) {
        throw error;
      }
      malformedKeyRows++;
      log.debug("Skipping external row with malformed key", {
        rowIndex: index,
        siteId: error.siteId,
      });
      return;
    }

    if (!entries.has(key)) {
      entries.set(key, { kpiPrimary, kpiSecondary });
    }
  });

  return { entries, malformedKeyRows, unparseableKpiCells };
}

// =============================================================================
// レコード生成
// =============================================================================

/**
 * 社内データ1行からCampaignRecordを生成
 */
export function toCampaignRecord(
  row: Record<string, CellValue>,
  identity: { key: string; siteId: number },
  kpis: KpiValues
): CampaignRecord {
  return {
    key: identity.key,
    campaignName: getString(row, ["campaignName"]).trim(),
    siteId: identity.siteId,
    siteName: getString(row, ["siteName"]),
    status: getString(row, ["status"]),

    spend: getNumber(row, ["spend"]),
    preloads: getNumber(row, ["preloads"]),
    maxPreloads: getNullableNumber(row, ["maxPreloads"]),
    fillRate: getNullableNumber(row, ["fillRate"]),
    installs: getNumber(row, ["installs"]),

    bidRate: getNumber(row, ["bidRate"]),
    effectiveBidFloor: getNullableNumber(row, ["effectiveBidFloor"]),
    highTier: getNullableNumber(row, ["highTier"]),
    midTier: getNullableNumber(row, ["midTier"]),
    lowTier: getNullableNumber(row, ["lowTier"]),

    kpiPrimary: kpis.kpiPrimary,
    kpiSecondary: kpis.kpiSecondary,

    source: row,
  };
}

// =============================================================================
// マージ
// =============================================================================

/**
 * 社内データに広告主KPIを左結合
 *
 * - 社内データの行数・順序は保持（キー生成に失敗した行のみスキップ）
 * - 一致しない行のKPIは null（後段の null 除去で落ちる）
 *
 * @throws {ColumnResolutionError} KPI列番号が範囲外、またはキー列が特定できない場合
 */
export function mergeAdvertiserData(
  internalRows: Record<string, CellValue>[],
  external: DataTable,
  primaryColumnIndex: number,
  secondaryColumnIndex: number,
  options: MergeOptions = {}
): MergeResult {
  const log = options.log ?? logger;

  const primaryColumn = resolveKpiColumn(external.columns, primaryColumnIndex);
  const secondaryColumn = resolveKpiColumn(external.columns, secondaryColumnIndex);
  const labels = buildKpiLabels(primaryColumn, secondaryColumn);

  const keyColumns = resolveExternalKeyColumns(external.columns, options.keyColumns);
  if (!keyColumns.ok) {
    throw new ColumnResolutionError("external", keyColumns.missing);
  }

  const lookup = buildKpiLookup(
    external,
    {
      campaign: keyColumns.campaignColumn,
      siteId: keyColumns.siteIdColumn,
      primary: primaryColumn,
      secondary: secondaryColumn,
    },
    log
  );

  const records: CampaignRecord[] = [];
  let malformedKeyRows = 0;
  let matchedRows = 0;

  internalRows.forEach((row, index) => {
    let identity: { key: string; siteId: number };
    try {
      identity = buildRecordKey(row.campaignName, row.siteId);
    } catch (error) {
      if (!(error instanceof KeyConstructionError)) {
        throw error;
      }
      malformedKeyRows++;
      log.warn("Skipping internal row with malformed key", {
        rowIndex: index,
        campaignName: error.campaignName,
        siteId: error.siteId,
      });
      return;
    }

    const kpis = lookup.entries.get(identity.key);
    if (kpis !== undefined) {
      matchedRows++;
    }

    records.push(
      toCampaignRecord(row, identity, kpis ?? { kpiPrimary: null, kpiSecondary: null })
    );
  });

  log.info("Advertiser data merged", {
    internalRows: internalRows.length,
    externalRows: external.rows.length,
    lookupKeys: lookup.entries.size,
    matchedRows,
    malformedKeyRows,
    externalMalformedKeyRows: lookup.malformedKeyRows,
    unparseableKpiCells: lookup.unparseableKpiCells,
    kpiPrimaryColumn: primaryColumn,
    kpiSecondaryColumn: secondaryColumn,
  });

  return {
    records,
    labels,
    malformedKeyRows,
    externalMalformedKeyRows: lookup.malformedKeyRows,
    unparseableKpiCells: lookup.unparseableKpiCells,
    matchedRows,
  };
}

// =============================================================================
// null 除去
// =============================================================================

/**
 * スコアリングに必要な値（両KPI・maxPreloads・fillRate）が揃っているか
 */
export function isScorable(record: CampaignRecord): record is ScorableRecord {
  return (
    record.kpiPrimary !== null &&
    record.kpiSecondary !== null &&
    record.maxPreloads !== null &&
    record.fillRate !== null
  );
}

/**
 * 必須値が欠けたレコードを除去
 */
export function dropIncompleteRecords(records: CampaignRecord[]): {
  records: ScorableRecord[];
  droppedCount: number;
} {
  const scorable = records.filter(isScorable);
  return { records: scorable, droppedCount: records.length - scorable.length };
}
