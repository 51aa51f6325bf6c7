/**
 * Unit conversions from configuration units to OOXML units.
 *
 *   twip       = 1/20 pt = 1/1440 inch
 *   half-point = font size unit for w:sz
 *   line       = 240ths of a single line for auto spacing
 */

import type { LineSpacing } from "../style/schema.js";

const TWIPS_PER_INCH = 1440;
const CM_PER_INCH = 2.54;
const TWIPS_PER_POINT = 20;
const SINGLE_LINE = 240;

/** Exact line height used for "fixed" spacing when none is configured (GB/T 9704: 28pt). */
export const DEFAULT_FIXED_LINE_PT = 28;

export function cmToTwips(cm: number): number {
  return Math.round((cm / CM_PER_INCH) * TWIPS_PER_INCH);
}

export function pointsToHalfPoints(pt: number): number {
  return Math.round(pt * 2);
}

/** First-line indent of `chars` character widths at the given font size. */
export function indentCharsToTwips(chars: number, fontSizePt: number): number {
  return Math.round(chars * fontSizePt * TWIPS_PER_POINT);
}

export interface LineSpacingTwips {
  line: number;
  exact: boolean;
}

export function lineSpacingToTwips(
  spacing: LineSpacing,
  fixedPt: number | undefined,
): LineSpacingTwips {
  if (spacing === "fixed") {
    return {
      line: Math.round((fixedPt ?? DEFAULT_FIXED_LINE_PT) * TWIPS_PER_POINT),
      exact: true,
    };
  }
  return { line: Math.round(spacing * SINGLE_LINE), exact: false };
}
