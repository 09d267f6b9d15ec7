/**
 * レポート配色
 */

import { ReportPalette, SegmentFillMap } from "./types";

export const DEFAULT_SEGMENT_FILLS: SegmentFillMap = Object.freeze({
  green: "C6EFCE",
  yellow: "FFEB9C",
  orange: "FFCC99",
  red: "FFC7CE",
});

export const DEFAULT_PALETTE: Readonly<ReportPalette> = Object.freeze({
  segments: DEFAULT_SEGMENT_FILLS,
  dailyCap: "DAE3F3",
});
