export type PageSizeName = 'LETTER' | 'A4';

export interface PageMargins {
  top: number;
  right: number;
  bottom: number;
  left: number;
}

export interface PageGeometry {
  width: number;
  height: number;
  margins: PageMargins;
}

export const POINTS_PER_INCH = 72;

export const PAGE_SIZES: Record<PageSizeName, { width: number; height: number }> = {
  LETTER: { width: 612, height: 792 },
  A4: { width: 595.28, height: 841.89 }
};

// Clears the masthead and left-hand sidebar of the usual printed letterhead
export const LETTERHEAD_MARGINS: PageMargins = {
  top: 2 * POINTS_PER_INCH,
  right: 1 * POINTS_PER_INCH,
  bottom: 1 * POINTS_PER_INCH,
  left: 2 * POINTS_PER_INCH
};

export const PLAIN_MARGINS: PageMargins = {
  top: 1 * POINTS_PER_INCH,
  right: 1 * POINTS_PER_INCH,
  bottom: 1 * POINTS_PER_INCH,
  left: 1 * POINTS_PER_INCH
};

export function resolvePageGeometry(size: PageSizeName, margins: PageMargins): PageGeometry {
  const dims = PAGE_SIZES[size];
  return { width: dims.width, height: dims.height, margins: { ...margins } };
}

export function contentBox(geometry: PageGeometry): { width: number; height: number } {
  const { width, height, margins } = geometry;
  return {
    width: width - margins.left - margins.right,
    height: height - margins.top - margins.bottom
  };
}
