export type DonorValue = string | number | boolean | null | undefined;

/**
 * One spreadsheet row. Field order follows the source columns.
 */
export type DonorRecord = Readonly<Record<string, DonorValue>>;

export interface FormattingSegment {
  readonly text: string;
  readonly bold: boolean;
  readonly italic: boolean;
}

export interface PlacedRun extends FormattingSegment {
  /** Offset from the line's left edge (after indent), in points */
  readonly x: number;
  readonly width: number;
}

export interface LaidOutLine {
  readonly runs: readonly PlacedRun[];
  /** Sum of run widths */
  readonly width: number;
  readonly indent: number;
  /** Distance from the top of the content box to the top of the line */
  readonly y: number;
  readonly paragraphStart: boolean;
}

export interface LayoutResult {
  readonly lines: readonly LaidOutLine[];
  readonly contentHeight: number;
  readonly overflowed: boolean;
}

export type StrategyName = 'primary' | 'secondary' | 'bare';

export type ReceiptWarning =
  | { kind: 'SubstitutionWarning'; placeholders: string[] }
  | { kind: 'MarkupAmbiguity'; details: string[] }
  | { kind: 'LetterheadMissing'; candidates: string[] }
  | { kind: 'LayoutOverflow'; contentHeight: number; availableHeight: number };
