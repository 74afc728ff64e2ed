import type { TextMeasurer } from '../../fonts/text-measurer.js';
import type { FormattingSegment, LaidOutLine, LayoutResult, PlacedRun } from '../../types/receipt.js';

export interface LineLayoutOptions {
  contentWidth: number;
  contentHeight: number;
  lineHeight: number;
  paragraphGap: number;
  listIndent: number;
}

type BreakKind = 'none' | 'line' | 'paragraph';

interface Block {
  breakBefore: BreakKind;
  pieces: FormattingSegment[];
}

interface Token {
  kind: 'word' | 'space';
  runs: FormattingSegment[];
}

interface LineState {
  runs: PlacedRun[];
  width: number;
}

const LIST_MARKER = /^(?:[•*-]|\d+[.)])\s/;

// Widths are sums of floats; allow for rounding at the right edge
const EPSILON = 1e-6;

/**
 * Groups segments into blocks separated by newline runs. Newlines split across
 * segments still count as one run.
 */
function splitBlocks(segments: readonly FormattingSegment[]): Block[] {
  const blocks: Block[] = [];
  let current: Block = { breakBefore: 'none', pieces: [] };
  let pendingNewlines = 0;

  for (const segment of segments) {
    for (const part of segment.text.split(/(\n+)/)) {
      if (part.length === 0) continue;
      if (part.startsWith('\n')) {
        pendingNewlines += part.length;
        continue;
      }
      if (pendingNewlines > 0) {
        blocks.push(current);
        current = { breakBefore: pendingNewlines >= 2 ? 'paragraph' : 'line', pieces: [] };
        pendingNewlines = 0;
      }
      current.pieces.push({ text: part, bold: segment.bold, italic: segment.italic });
    }
  }
  blocks.push(current);

  return blocks.filter((b) => b.pieces.some((p) => p.text.trim().length > 0));
}

function tokenize(pieces: readonly FormattingSegment[]): Token[] {
  const tokens: Token[] = [];
  for (const piece of pieces) {
    for (const part of piece.text.split(/([ \t]+)/)) {
      if (part.length === 0) continue;
      const kind = /^[ \t]+$/.test(part) ? 'space' : 'word';
      const run: FormattingSegment = { text: kind === 'space' ? part.replace(/\t/g, ' ') : part, bold: piece.bold, italic: piece.italic };
      const last = tokens[tokens.length - 1];
      // A word continues across a style change when no space separates it
      if (last && last.kind === kind) {
        last.runs.push(run);
      } else {
        tokens.push({ kind, runs: [run] });
      }
    }
  }
  return tokens;
}

function isListBlock(block: Block): boolean {
  const text = block.pieces.map((p) => p.text).join('').trimStart();
  return LIST_MARKER.test(text);
}

function runsWidth(runs: readonly FormattingSegment[], measurer: TextMeasurer): number {
  return runs.reduce((sum, run) => sum + measurer.widthOf(run.text, run), 0);
}

function appendRun(line: LineState, run: FormattingSegment, width: number): void {
  const last = line.runs[line.runs.length - 1];
  if (last && last.bold === run.bold && last.italic === run.italic) {
    line.runs[line.runs.length - 1] = { ...last, text: last.text + run.text, width: last.width + width };
  } else {
    line.runs.push({ text: run.text, bold: run.bold, italic: run.italic, x: line.width, width });
  }
  line.width += width;
}

/**
 * Wraps one block into lines. Returns the lines with their vertical offsets
 * and the cursor after the last one.
 */
function layoutBlock(
  block: Block,
  cursorY: number,
  isFirstLine: boolean,
  options: LineLayoutOptions,
  measurer: TextMeasurer
): { lines: LaidOutLine[]; cursorY: number } {
  const indent = isListBlock(block) ? options.listIndent : 0;
  const available = Math.max(0, options.contentWidth - indent);
  const lines: LaidOutLine[] = [];
  let y = cursorY;
  if (block.breakBefore === 'paragraph' && !isFirstLine) y += options.paragraphGap;
  const paragraphStart = block.breakBefore !== 'line';

  let line: LineState = { runs: [], width: 0 };
  let pendingSpace: Token | null = null;

  const flush = (): void => {
    if (line.runs.length === 0) return;
    lines.push({ runs: line.runs, width: line.width, indent, y, paragraphStart: paragraphStart && lines.length === 0 });
    y += options.lineHeight;
    line = { runs: [], width: 0 };
  };

  const placeByCharacters = (runs: readonly FormattingSegment[]): void => {
    for (const run of runs) {
      for (const ch of run.text) {
        const piece: FormattingSegment = { text: ch, bold: run.bold, italic: run.italic };
        const w = measurer.widthOf(ch, run);
        // At least one character per line so the loop always advances
        if (line.runs.length > 0 && line.width + w > available + EPSILON) flush();
        appendRun(line, piece, w);
      }
    }
  };

  for (const token of tokenize(block.pieces)) {
    if (token.kind === 'space') {
      if (line.runs.length > 0) pendingSpace = token;
      continue;
    }

    const wordWidth = runsWidth(token.runs, measurer);
    const spaceWidth = pendingSpace ? runsWidth(pendingSpace.runs, measurer) : 0;

    if (line.runs.length > 0 && line.width + spaceWidth + wordWidth <= available + EPSILON) {
      if (pendingSpace) {
        for (const run of pendingSpace.runs) appendRun(line, run, measurer.widthOf(run.text, run));
      }
    } else {
      flush();
    }
    pendingSpace = null;

    if (line.width + wordWidth <= available + EPSILON) {
      for (const run of token.runs) appendRun(line, run, measurer.widthOf(run.text, run));
    } else {
      placeByCharacters(token.runs);
    }
  }
  flush();

  return { lines, cursorY: y };
}

export function layoutSegments(
  segments: readonly FormattingSegment[],
  options: LineLayoutOptions,
  measurer: TextMeasurer
): LayoutResult {
  const lines: LaidOutLine[] = [];
  let cursorY = 0;

  for (const block of splitBlocks(segments)) {
    const placed = layoutBlock(block, cursorY, lines.length === 0, options, measurer);
    lines.push(...placed.lines);
    cursorY = placed.cursorY;
  }

  return {
    lines,
    contentHeight: cursorY,
    overflowed: cursorY > options.contentHeight + EPSILON
  };
}
