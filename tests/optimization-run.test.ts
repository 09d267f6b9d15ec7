/**
 * 最適化実行（エンドツーエンド）のテスト
 */

import { RunConfig } from "../types";
import { ColumnResolutionError, ConfigurationError } from "../src/errors";
import { StructuredLogger } from "../src/logger";
import { resolveRunConfig, runOptimization } from "../src/engine";
import { exportReportToCsv } from "../src/report";
import {
  INTERNAL_COLUMNS,
  createExternalTable,
  createInternalTable,
  createRunConfig,
} from "./fixtures/campaign-tables";

jest.mock("uuid", () => ({ v4: jest.fn(() => "test-run-id") }));

const quietLogger = (): StructuredLogger => {
  const log = new StructuredLogger();
  log.setLevel("error");
  return log;
};

const run = (configOverrides: Partial<RunConfig> = {}) =>
  runOptimization(
    createInternalTable(),
    createExternalTable(),
    createRunConfig(configOverrides),
    { optimizationType: "ROAS" },
    { log: quietLogger() }
  );

describe("runOptimization", () => {
  describe("レポート", () => {
    it("除外・スキップ・null 除去後の行を判定順に出力する", () => {
      const result = run();

      expect(result.runId).toBe("test-run-id");
      expect(result.report.rows.map((row) => row.Key)).toEqual([
        "Alpha_1",
        "Bravo_2",
        "Charlie_3",
        "Delta_4",
        "Echo_5",
      ]);
    });

    it("列順は Key → 社内データ列 → KPI → Action → Recommended bid → Daily Cap Suggestion", () => {
      expect(run().report.columns).toEqual([
        "Key",
        "campaignId",
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
        "ROI D7",
        "ROI D30",
        "Action",
        "Recommended bid",
        "Daily Cap Suggestion",
      ]);
    });

    it("行ごとのアクション・推奨入札額・日次上限提案", () => {
      const rows = run().report.rows;
      const pick = (index: number) => ({
        action: rows[index]?.Action,
        bid: rows[index]?.["Recommended bid"],
        cap: rows[index]?.["Daily Cap Suggestion"],
      });

      expect(pick(0)).toEqual({ action: "Decrease bid 15%", bid: 0.85, cap: null });
      expect(pick(1)).toEqual({ action: "Decrease bid 30%", bid: 0.7, cap: "Suggest pause" });
      expect(pick(2)).toEqual({ action: null, bid: null, cap: null });
      expect(pick(3)).toEqual({ action: "Increase bid 15%", bid: 1.1, cap: null });
      expect(pick(4)).toEqual({ action: null, bid: null, cap: "Add daily cap $25.00" });
    });

    it("重複した広告主データは最初の行の KPI を使う", () => {
      const alpha = run().report.rows[0];
      expect(alpha?.["ROI D7"]).toBe(0.05);
      expect(alpha?.["ROI D30"]).toBe(0.05);
    });

    it("メタデータをレポートに含める", () => {
      const result = run();
      expect(result.report.metadata).toEqual({ optimizationType: "ROAS" });
      expect(result.report.kpiLabels).toEqual({ primary: "ROI D7", secondary: "ROI D30" });
    });

    it("CSV に変換できる", () => {
      const lines = exportReportToCsv(run().report).split("\n");

      expect(lines).toHaveLength(8);
      expect(lines[0]).toBe("# Optimization Type: ROAS");
      expect(lines[1]?.startsWith("Key,campaignId,")).toBe(true);
      expect(lines[2]).toBe(
        "Alpha_1,c-1,Alpha,1,Site,active,500,500,1000,0.5,10,0.5,1,2,0.05,0.05,Decrease bid 15%,0.85,"
      );
      expect(lines[7]).toBe("");
    });
  });

  describe("アノテーション", () => {
    it("除外行は KPI を着色せず、日次上限提案の行は専用色", () => {
      const annotations = run().annotations;

      expect(annotations.map((a) => a.kpiFill)).toEqual([
        "FFEB9C",
        "FFC7CE",
        null,
        "C6EFCE",
        "FFCC99",
      ]);
      expect(annotations.map((a) => a.actionFill)).toEqual([
        "FFEB9C",
        "FFC7CE",
        null,
        "C6EFCE",
        null,
      ]);
      expect(annotations.map((a) => a.dailyCapFill)).toEqual([
        null,
        "DAE3F3",
        null,
        null,
        "DAE3F3",
      ]);
    });

    it("配色を差し替えられる", () => {
      const result = runOptimization(
        createInternalTable(),
        createExternalTable(),
        createRunConfig(),
        {},
        {
          log: quietLogger(),
          palette: {
            segments: { green: "00FF00", yellow: "FFFF00", orange: "FF8800", red: "FF0000" },
            dailyCap: "0000FF",
          },
        }
      );

      expect(result.annotations[3]?.kpiFill).toBe("00FF00");
      expect(result.annotations[1]?.dailyCapFill).toBe("0000FF");
    });
  });

  describe("サマリー", () => {
    it("件数を集計する", () => {
      expect(run().summary).toEqual({
        totalRows: 5,
        excludedRows: 1,
        droppedForNulls: 1,
        malformedKeyRows: 1,
        actionedRows: 3,
        disregardedRows: 2,
        dailyCapFlags: 2,
        actionBreakdown: {
          "Decrease bid 15%": 1,
          "Decrease bid 30%": 1,
          "Increase bid 15%": 1,
        },
        segmentBreakdown: { green: 2, yellow: 1, orange: 1, red: 1 },
        kpiPrimaryLabel: "ROI D7",
        kpiSecondaryLabel: "ROI D30",
        unparseableKpiCells: 0,
      });
    });

    it("フロア張り付き行を含めても actioned + disregarded が総数と一致する", () => {
      const { summary, report } = run();

      expect(report.rows[4]?.Key).toBe("Echo_5");
      expect(report.rows[4]?.Action).toBeNull();
      expect(summary.actionedRows + summary.disregardedRows).toBe(summary.totalRows);
    });
  });

  describe("エラー", () => {
    it("重みの合計が 1 でなければ ConfigurationError", () => {
      expect(() => run({ weightPrimary: 0.7, weightSecondary: 0.2 })).toThrow(ConfigurationError);
    });

    it("社内データの必須列が欠けていれば ColumnResolutionError", () => {
      const internal = createInternalTable();
      internal.columns = INTERNAL_COLUMNS.filter((column) => column !== "bidRate");

      expect(() =>
        runOptimization(internal, createExternalTable(), createRunConfig(), {}, { log: quietLogger() })
      ).toThrow(
        expect.objectContaining({
          dataset: "internal",
          missing: ["bidRate"],
          statusCode: 422,
        })
      );
    });

    it("KPI 列番号が範囲外なら ColumnResolutionError", () => {
      expect(() => run({ primaryColumnIndex: 10 })).toThrow(ColumnResolutionError);
    });
  });
});

describe("resolveRunConfig", () => {
  it("検証済みの設定を凍結して返す", () => {
    const config = resolveRunConfig(createRunConfig());

    expect(config).toEqual(createRunConfig());
    expect(Object.isFrozen(config)).toBe(true);
  });

  it("違反内容をメッセージに含める", () => {
    expect(() => resolveRunConfig(createRunConfig({ kpiTargetPrimary: 0 }))).toThrow(
      "Invalid run configuration: kpiTargetPrimary: KPI target must be greater than 0"
    );
  });
});
