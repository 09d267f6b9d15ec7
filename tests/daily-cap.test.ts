/**
 * 日予算キャップ提案・金額ユーティリティのテスト
 */

import {
  isAtBidFloor,
  calculateDailyCap,
  suggestDailyCap,
  DailyCapInput,
} from "../daily-cap";
import { roundToCents, formatCurrency } from "../money";

describe("daily-cap", () => {
  const createInput = (overrides: Partial<DailyCapInput> = {}): DailyCapInput => ({
    spend: 1500,
    bidRate: 0.5,
    effectiveBidFloor: 0.5,
    kpiPrimary: 0.02,
    kpiSecondary: 0,
    ...overrides,
  });

  describe("isAtBidFloor", () => {
    it("入札額がフロア以下なら true", () => {
      expect(isAtBidFloor(0.5, 0.5)).toBe(true);
      expect(isAtBidFloor(0.49, 0.5)).toBe(true);
    });

    it("フロアより高い、またはフロア未設定なら false", () => {
      expect(isAtBidFloor(0.51, 0.5)).toBe(false);
      expect(isAtBidFloor(0.5, null)).toBe(false);
    });
  });

  describe("calculateDailyCap", () => {
    it("30日平均の50%を小数第2位に丸める", () => {
      expect(calculateDailyCap(1500)).toBe(25);
      // 1234 / 30 * 0.5 = 20.5666...
      expect(calculateDailyCap(1234)).toBe(20.57);
    });
  });

  describe("suggestDailyCap", () => {
    it("Scenario E: フロア張り付きで成果あり → 日予算キャップ提案", () => {
      expect(suggestDailyCap(createInput())).toBe("Add daily cap $25.00");
    });

    it("spend が 1000 以下なら提案なし", () => {
      expect(suggestDailyCap(createInput({ spend: 1000 }))).toBeNull();
    });

    it("両KPIが0なら停止提案（フロアに関係なく）", () => {
      expect(
        suggestDailyCap(createInput({ spend: 2000, bidRate: 1.2, kpiPrimary: 0, kpiSecondary: 0 }))
      ).toBe("Suggest pause");
    });

    it("フロアに張り付いていなければ提案なし", () => {
      expect(suggestDailyCap(createInput({ bidRate: 0.6 }))).toBeNull();
      expect(suggestDailyCap(createInput({ effectiveBidFloor: null }))).toBeNull();
    });

    it("いずれのKPIも正でなければ提案なし", () => {
      expect(suggestDailyCap(createInput({ kpiPrimary: -0.01, kpiSecondary: 0 }))).toBeNull();
    });

    it("副KPIのみ正でも提案する", () => {
      expect(
        suggestDailyCap(createInput({ spend: 3000, kpiPrimary: 0, kpiSecondary: 0.03 }))
      ).toBe("Add daily cap $50.00");
    });
  });
});

describe("money", () => {
  it("roundToCents: 小数第2位に四捨五入する", () => {
    expect(roundToCents(1.234)).toBe(1.23);
    expect(roundToCents(1.236)).toBe(1.24);
    expect(roundToCents(0.125)).toBe(0.13);
    expect(roundToCents(1.15)).toBe(1.15);
  });

  it("roundToCents: 負の値は絶対値で丸める", () => {
    expect(roundToCents(-1.236)).toBe(-1.24);
    expect(roundToCents(-0.125)).toBe(-0.13);
  });

  it("formatCurrency: $ と小数2桁", () => {
    expect(formatCurrency(25)).toBe("$25.00");
    expect(formatCurrency(20.566)).toBe("$20.57");
    expect(formatCurrency(1234.5)).toBe("$1234.50");
  });
});
