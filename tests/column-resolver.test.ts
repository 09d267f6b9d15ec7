/**
 * 列解決のテスト
 */

import {
  resolveExternalKeyColumns,
  resolveKpiColumn,
  columnLetterToIndex,
  suggestKpiColumns,
} from "../src/merge";
import { ColumnResolutionError, ConfigurationError } from "../src/errors";

describe("column-resolver", () => {
  describe("resolveExternalKeyColumns", () => {
    it("キャンペーン名列とサイトID列を特定する", () => {
      expect(resolveExternalKeyColumns(["Campaign Name", "Site ID", "ROAS D7"])).toEqual({
        ok: true,
        campaignColumn: "Campaign Name",
        siteIdColumn: "Site ID",
      });
    });

    it("\"campaign\" と \"name\" を両方含む列を優先する", () => {
      expect(resolveExternalKeyColumns(["Campaign", "Campaign Name", "site_id"])).toEqual({
        ok: true,
        campaignColumn: "Campaign Name",
        siteIdColumn: "site_id",
      });
    });

    it("\"name\" を含む列がなければ \"campaign\" を含む列を使う", () => {
      expect(resolveExternalKeyColumns(["campaign", "siteId"])).toEqual({
        ok: true,
        campaignColumn: "campaign",
        siteIdColumn: "siteId",
      });
    });

    it("特定できない列を missing で返す", () => {
      expect(resolveExternalKeyColumns(["Name", "Revenue"])).toEqual({
        ok: false,
        missing: ["campaign name", "site id"],
      });
      expect(resolveExternalKeyColumns(["Campaign Name", "Revenue"])).toEqual({
        ok: false,
        missing: ["site id"],
      });
    });

    it("呼び出し側で列名を明示できる", () => {
      expect(
        resolveExternalKeyColumns(["A", "B"], { campaignColumn: "A", siteIdColumn: "B" })
      ).toEqual({ ok: true, campaignColumn: "A", siteIdColumn: "B" });
    });
  });

  describe("resolveKpiColumn", () => {
    it("列番号から列名を返す", () => {
      expect(resolveKpiColumn(["a", "b"], 1)).toBe("b");
    });

    it("範囲外の列番号は ColumnResolutionError", () => {
      expect(() => resolveKpiColumn(["a", "b"], 2)).toThrow(ColumnResolutionError);
      expect(() => resolveKpiColumn(["a", "b"], 2)).toThrow(
        "KPI column index 2 is out of range (external dataset has 2 columns)"
      );
    });

    it("整数でない列番号は ColumnResolutionError", () => {
      expect(() => resolveKpiColumn(["a", "b"], 0.5)).toThrow(ColumnResolutionError);
    });
  });

  describe("columnLetterToIndex", () => {
    it("列記号を0始まりの列番号に変換する", () => {
      expect(columnLetterToIndex("A")).toBe(0);
      expect(columnLetterToIndex("I")).toBe(8);
      expect(columnLetterToIndex("K")).toBe(10);
      expect(columnLetterToIndex("Z")).toBe(25);
      expect(columnLetterToIndex("AA")).toBe(26);
    });

    it("小文字・前後の空白を許容する", () => {
      expect(columnLetterToIndex("ab")).toBe(27);
      expect(columnLetterToIndex(" k ")).toBe(10);
    });

    it("不正な列記号は ConfigurationError", () => {
      expect(() => columnLetterToIndex("1")).toThrow(ConfigurationError);
      expect(() => columnLetterToIndex("")).toThrow(ConfigurationError);
      expect(() => columnLetterToIndex("A1")).toThrow('Invalid column letter: "A1"');
    });
  });

  describe("suggestKpiColumns", () => {
    it("D7 系と D30 系の列を推定する", () => {
      expect(
        suggestKpiColumns(["Campaign Name", "Site ID", "ROAS D7", "ROAS D30"])
      ).toEqual({ primaryColumnIndex: 2, secondaryColumnIndex: 3 });
    });

    it("D14 系も副KPIの候補にする", () => {
      expect(
        suggestKpiColumns(["Campaign Name", "Site ID", "Full ROAS D14", "ROAS D7"])
      ).toEqual({ primaryColumnIndex: 3, secondaryColumnIndex: 2 });
    });

    it("該当がなければ先頭2列", () => {
      expect(suggestKpiColumns(["Campaign", "Site Id", "Revenue"])).toEqual({
        primaryColumnIndex: 0,
        secondaryColumnIndex: 1,
      });
    });

    it("副KPIが主KPIと重なった場合は次の列", () => {
      expect(suggestKpiColumns(["ROAS D7/D30", "Revenue"])).toEqual({
        primaryColumnIndex: 0,
        secondaryColumnIndex: 1,
      });
    });
  });
});
