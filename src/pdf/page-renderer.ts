import { PDFDocument, rgb } from 'pdf-lib';
import type { PDFPage, RGB } from 'pdf-lib';
import { pickFont } from '../fonts/font-set.js';
import type { FontSet } from '../fonts/font-set.js';
import type { PageGeometry } from '../core/layout/geometry.js';
import type { LayoutResult } from '../types/receipt.js';

export interface ContentSurface {
  document: PDFDocument;
  page: PDFPage;
  geometry: PageGeometry;
}

export interface RenderStyle {
  fontSize: number;
  /** Hex colour, with or without the leading # */
  color: string;
}

export function hexToRgb(hex: string): RGB {
  const value = hex.replace(/^#/, '');
  if (!/^[0-9a-fA-F]{6}$/.test(value)) {
    throw new Error(`Invalid colour "${hex}"`);
  }
  const n = parseInt(value, 16);
  return rgb(((n >> 16) & 0xff) / 255, ((n >> 8) & 0xff) / 255, (n & 0xff) / 255);
}

export async function createContentSurface(geometry: PageGeometry): Promise<ContentSurface> {
  const document = await PDFDocument.create();
  document.setCreator('receipt-compositor');
  document.setProducer('receipt-compositor');
  const page = document.addPage([geometry.width, geometry.height]);
  return { document, page, geometry };
}

/**
 * Draws laid-out lines onto the surface page. PDF y grows upwards, so each
 * baseline sits one font size below the top of its line box.
 */
export function renderLayout(surface: ContentSurface, layout: LayoutResult, fonts: FontSet, style: RenderStyle): void {
  const { page, geometry } = surface;
  const color = hexToRgb(style.color);
  const top = geometry.height - geometry.margins.top;

  for (const line of layout.lines) {
    const baseline = top - line.y - style.fontSize;
    for (const run of line.runs) {
      if (run.text.trim().length === 0) continue;
      page.drawText(run.text, {
        x: geometry.margins.left + line.indent + run.x,
        y: baseline,
        size: style.fontSize,
        font: pickFont(fonts, run),
        color
      });
    }
  }
}

export async function saveSurface(surface: ContentSurface): Promise<Uint8Array> {
  return surface.document.save();
}
