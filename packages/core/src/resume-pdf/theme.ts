/**
 * Resume PDF theme. Geometry is in millimetres (A4, top-left origin) and
 * converted to PDF points when drawn.
 */

export type Rgb = readonly [number, number, number];

export const PRIMARY_COLOR: Rgb = [22, 27, 34]; // dark charcoal
export const ACCENT_COLOR: Rgb = [99, 102, 241]; // indigo
export const SECONDARY_COLOR: Rgb = [74, 85, 104]; // cool gray

export const PAGE_WIDTH_MM = 210;
export const PAGE_HEIGHT_MM = 297;
export const MARGIN_MM = 10;
export const BOTTOM_MARGIN_MM = 20;
export const CONTENT_WIDTH_MM = PAGE_WIDTH_MM - 2 * MARGIN_MM;
export const SECTION_RULE_MM = 180;

export const PHOTO = { x: 15, y: 20, size: 40 } as const;
export const HEADER_TEXT_X_WITH_PHOTO = 65;
export const HEADER_TOP_MM = 25;

const POINTS_PER_MM = 72 / 25.4;

/** Millimetres to PDF points. */
export function mm(value: number): number {
  return value * POINTS_PER_MM;
}

/** Font size in points to its height in millimetres. */
export function ptToMm(size: number): number {
  return size / POINTS_PER_MM;
}
