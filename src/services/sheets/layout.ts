// Box positions on a rendered sheet. Sheet geometry is in PDF points with the
// origin at the bottom left; regions come back in image pixels, top left origin.

import { getSheetDpi } from '@/lib/config';

export interface PageImage {
  width: number;
  height: number;
  /** Render resolution; SHEET_DPI when omitted. */
  dpi?: number;
}

export interface BoxRegion {
  left: number;
  upper: number;
  right: number;
  lower: number;
}

export const SHEET_GEOMETRY = {
  marginPts: 72,
  topMarginPts: 36,
  titleBandPts: 28,
  textToBoxGapPts: 8,
  boxHeightPts: 37,
  boxToNextGapPts: 18,
} as const;

export function computeBoxRegions(count: number, page: PageImage): BoxRegion[] {
  const g = SHEET_GEOMETRY;
  const scale = (page.dpi ?? getSheetDpi()) / 72;
  const pageHeightPts = page.height / scale;
  const regions: BoxRegion[] = [];

  let y = pageHeightPts - g.topMarginPts - g.titleBandPts;
  for (let i = 0; i < count; i++) {
    const boxTop = y - g.textToBoxGapPts;
    const boxBottom = boxTop - g.boxHeightPts;
    regions.push({
      left: Math.trunc(g.marginPts * scale),
      upper: Math.trunc(page.height - boxTop * scale),
      right: Math.trunc(page.width - g.marginPts * scale),
      lower: Math.trunc(page.height - boxBottom * scale),
    });
    y = boxBottom - g.boxToNextGapPts;
  }
  return regions;
}
