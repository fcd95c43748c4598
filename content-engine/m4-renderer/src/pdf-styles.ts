import { ParagraphStyleName } from './types.js';

export const INCH = 72;

export const PAGE = {
  width: 612,
  height: 792,
  marginTop: 0.8 * INCH,
  marginBottom: 0.8 * INCH,
  marginLeft: 0.9 * INCH,
  marginRight: 0.9 * INCH
} as const;

export const CONTENT_WIDTH = PAGE.width - PAGE.marginLeft - PAGE.marginRight;

export interface ParagraphStyle {
  fontSize: number;
  fontStyle: 'normal' | 'bold';
  color: string;
  align: 'left' | 'center' | 'justify';
  leading: number;
  spaceBefore: number;
  spaceAfter: number;
}

export const PARAGRAPH_STYLES: Record<ParagraphStyleName, ParagraphStyle> = {
  title: { fontSize: 26, fontStyle: 'bold', color: '#1a2384', align: 'center', leading: 31.2, spaceBefore: 0, spaceAfter: 10 },
  subtitle: { fontSize: 12, fontStyle: 'bold', color: '#000000', align: 'center', leading: 14.4, spaceBefore: 0, spaceAfter: 14 },
  mainHeading: { fontSize: 14, fontStyle: 'bold', color: '#000000', align: 'left', leading: 16.8, spaceBefore: 16, spaceAfter: 10 },
  subheading: { fontSize: 12, fontStyle: 'bold', color: '#0a0a0a', align: 'left', leading: 14.4, spaceBefore: 12, spaceAfter: 6 },
  question: { fontSize: 11, fontStyle: 'bold', color: '#1565c0', align: 'left', leading: 13.2, spaceBefore: 10, spaceAfter: 6 },
  body: { fontSize: 11, fontStyle: 'normal', color: '#2c3e50', align: 'justify', leading: 16, spaceBefore: 0, spaceAfter: 8 },
  small: { fontSize: 9, fontStyle: 'normal', color: '#020202', align: 'left', leading: 12, spaceBefore: 0, spaceAfter: 0 }
};

export const INFO_TABLE_STYLE = {
  columnWidths: [2.0 * INCH, 4.8 * INCH],
  fontSize: 10,
  leading: 12,
  textColor: '#2c3e50',
  labelBackground: '#e8f0fe',
  gridColor: '#b8d4f1',
  gridWidth: 0.5,
  paddingVertical: 8,
  paddingHorizontal: 6
} as const;

export const FOOTER_STYLE = {
  textRightX: 7.5 * INCH,
  textBottomOffset: 0.55 * INCH,
  fontSize: 9,
  textColor: '#6b7280',
  ruleStartX: 0.9 * INCH,
  ruleEndX: 7.6 * INCH,
  ruleBottomOffset: 0.65 * INCH,
  ruleColor: '#d1d5db',
  ruleWidth: 0.5
} as const;

export const SECTION_IMAGE = {
  width: 5 * INCH,
  height: 3 * INCH,
  spacing: 0.15 * INCH
} as const;
