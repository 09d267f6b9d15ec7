/**
 * レポート生成・CSV出力のテスト
 */

import {
  buildReportColumns,
  buildReportArtifact,
  annotateReport,
  toCsvField,
  exportReportToCsv,
  formatMetadataPreamble,
  DEFAULT_SEGMENT_FILLS,
  ReportArtifact,
} from "../src/report";
import { EvaluatedRecord } from "../types";
import { createInternalRow } from "./fixtures/campaign-tables";

describe("report", () => {
  const labels = { primary: "ROI D7", secondary: "ROI D30" };

  const createEvaluated = (overrides: Partial<EvaluatedRecord> = {}): EvaluatedRecord => ({
    key: "Alpha_1",
    campaignName: "Alpha",
    siteId: 1,
    siteName: "Site",
    status: "active",
    spend: 500,
    preloads: 500,
    maxPreloads: 1000,
    fillRate: 0.5,
    installs: 10,
    bidRate: 1,
    effectiveBidFloor: 0.5,
    highTier: 2,
    midTier: null,
    lowTier: null,
    kpiPrimary: 0.05,
    kpiSecondary: 0.05,
    source: createInternalRow(),
    segment: "yellow",
    progression: "flat",
    discard: false,
    atFloor: false,
    dailyCapSuggestion: null,
    action: "Decrease bid 15%",
    recommendedBid: 0.85,
    ruleId: "YELLOW",
    ...overrides,
  });

  describe("buildReportColumns", () => {
    it("固定の列順で、社内データに存在する列のみ出力する", () => {
      const columns = buildReportColumns(
        [
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
          "cvr",
          "unrelated",
        ],
        labels
      );

      expect(columns).toEqual([
        "Key",
        "campaignName",
        "siteId",
        "siteName",
        "status",
        "spend",
        "preloads",
        "maxPreloads",
        "fillRate",
        "installs",
        "cvr",
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
  });

  describe("buildReportArtifact", () => {
    it("元の行の値と判定結果を1行にまとめる", () => {
      const report = buildReportArtifact(
        [
          createEvaluated(),
          createEvaluated({
            key: "Bravo_2",
            source: createInternalRow({ campaignName: "Bravo", siteId: 2, spend: "$1,500" }),
            kpiPrimary: 0,
            kpiSecondary: 0,
            dailyCapSuggestion: "Suggest pause",
            action: "Decrease bid 30%",
            recommendedBid: 0.7,
          }),
        ],
        ["campaignName", "siteId", "spend"],
        labels,
        { optimizationType: "Scale", reportDuration: "Last 30 days" }
      );

      expect(report.columns).toEqual([
        "Key",
        "campaignName",
        "siteId",
        "spend",
        "ROI D7",
        "ROI D30",
        "Action",
        "Recommended bid",
        "Daily Cap Suggestion",
      ]);
      expect(report.rows).toEqual([
        {
          Key: "Alpha_1",
          campaignName: "Alpha",
          siteId: 1,
          spend: 500,
          "ROI D7": 0.05,
          "ROI D30": 0.05,
          Action: "Decrease bid 15%",
          "Recommended bid": 0.85,
          "Daily Cap Suggestion": null,
        },
        {
          Key: "Bravo_2",
          campaignName: "Bravo",
          siteId: 2,
          spend: "$1,500",
          "ROI D7": 0,
          "ROI D30": 0,
          Action: "Decrease bid 30%",
          "Recommended bid": 0.7,
          "Daily Cap Suggestion": "Suggest pause",
        },
      ]);
      expect(report.kpiLabels).toEqual(labels);
      expect(report.metadata).toEqual({
        optimizationType: "Scale",
        reportDuration: "Last 30 days",
      });
    });
  });

  describe("annotateReport", () => {
    it("セグメント色を付け、除外行は KPI・Action セルを着色しない", () => {
      const annotations = annotateReport([
        createEvaluated({ key: "A_1", segment: "green" }),
        createEvaluated({ key: "B_2", segment: "green", discard: true, action: null }),
        createEvaluated({ key: "C_3", segment: "orange", dailyCapSuggestion: "Add daily cap $25.00" }),
      ]);

      expect(annotations).toEqual([
        {
          key: "A_1",
          segment: "green",
          discard: false,
          kpiFill: "C6EFCE",
          actionFill: "C6EFCE",
          dailyCapFill: null,
        },
        {
          key: "B_2",
          segment: "green",
          discard: true,
          kpiFill: null,
          actionFill: null,
          dailyCapFill: null,
        },
        {
          key: "C_3",
          segment: "orange",
          discard: false,
          kpiFill: "FFCC99",
          actionFill: "FFCC99",
          dailyCapFill: "DAE3F3",
        },
      ]);
    });

    it("アクションのない行は Action セルを着色しない", () => {
      const [annotation] = annotateReport([
        createEvaluated({
          key: "E_5",
          segment: "orange",
          atFloor: true,
          action: null,
          recommendedBid: null,
          ruleId: "AT_FLOOR",
          dailyCapSuggestion: "Add daily cap $25.00",
        }),
      ]);

      expect(annotation).toEqual({
        key: "E_5",
        segment: "orange",
        discard: false,
        kpiFill: "FFCC99",
        actionFill: null,
        dailyCapFill: "DAE3F3",
      });
    });

    it("配色を差し替えられる", () => {
      const palette = {
        segments: { ...DEFAULT_SEGMENT_FILLS, red: "FF0000" },
        dailyCap: "0000FF",
      };

      const [annotation] = annotateReport(
        [createEvaluated({ segment: "red", dailyCapSuggestion: "Suggest pause" })],
        palette
      );

      expect(annotation.kpiFill).toBe("FF0000");
      expect(annotation.dailyCapFill).toBe("0000FF");
    });

    it("既定の配色は変更できない", () => {
      expect(Object.isFrozen(DEFAULT_SEGMENT_FILLS)).toBe(true);
    });
  });

  describe("toCsvField", () => {
    it("カンマ・ダブルクォート・改行を含む値をクォートする", () => {
      expect(toCsvField("a,b")).toBe('"a,b"');
      expect(toCsvField('say "hi"')).toBe('"say ""hi"""');
      expect(toCsvField("line\nbreak")).toBe('"line\nbreak"');
    });

    it("null は空セル、その他は文字列化する", () => {
      expect(toCsvField(null)).toBe("");
      expect(toCsvField(undefined)).toBe("");
      expect(toCsvField(1.5)).toBe("1.5");
      expect(toCsvField(true)).toBe("true");
      expect(toCsvField("plain")).toBe("plain");
    });
  });

  describe("exportReportToCsv", () => {
    it("ヘッダー行と各行を出力する", () => {
      const report: ReportArtifact = {
        columns: ["Key", "Action", "Recommended bid"],
        rows: [
          { Key: "A_1", Action: "Decrease bid 30%", "Recommended bid": 0.7 },
          { Key: "B, Inc_2", Action: null, "Recommended bid": null },
        ],
        kpiLabels: labels,
        metadata: {},
      };

      expect(exportReportToCsv(report)).toBe(
        'Key,Action,Recommended bid\nA_1,Decrease bid 30%,0.7\n"B, Inc_2",,\n'
      );
    });

    it("メタデータをヘッダー前のコメント行として出力する", () => {
      const report: ReportArtifact = {
        columns: ["Key", "Action"],
        rows: [{ Key: "A_1", Action: "Decrease bid 30%" }],
        kpiLabels: labels,
        metadata: {
          optimizationType: "Scale",
          reportDuration: "Last 30 days",
          notes: "Q3 review\nsecond line",
        },
      };

      expect(exportReportToCsv(report)).toBe(
        "# Optimization Type: Scale\n" +
          "# Report Duration: Last 30 days\n" +
          "# Notes: Q3 review second line\n" +
          "Key,Action\n" +
          "A_1,Decrease bid 30%\n"
      );
    });
  });

  describe("formatMetadataPreamble", () => {
    it("未指定・空の項目は出力しない", () => {
      expect(formatMetadataPreamble({})).toEqual([]);
      expect(formatMetadataPreamble({ optimizationType: "Performance", notes: "  " })).toEqual([
        "# Optimization Type: Performance",
      ]);
    });
  });
});
