/**
 * キャンペーン入札最適化エンジン - 金額ユーティリティ
 */

/**
 * 小数第2位に四捨五入（half-up）
 *
 * 浮動小数点誤差（1.15 * 100 = 114.99999999999999 等）を EPSILON で補正する
 */
export function roundToCents(value: number): number {
  const sign = value < 0 ? -1 : 1;
  return (sign * Math.round((Math.abs(value) + Number.EPSILON) * 100)) / 100;
}

/**
 * 通貨表記（"$" + 小数2桁、桁区切りなし）
 */
export function formatCurrency(value: number): `$${string}` {
  return `$${roundToCents(value).toFixed(2)}`;
}
