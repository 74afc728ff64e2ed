export type FontVariant = 'regular' | 'bold' | 'italic' | 'boldItalic';

export type FontFamilyName = 'Helvetica' | 'Times-Roman' | 'Courier';

export interface FontFiles {
  regular: string;
  bold?: string;
  italic?: string;
  boldItalic?: string;
}
