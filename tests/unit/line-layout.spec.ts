import { describe, it, expect } from 'vitest';
import { layoutSegments } from '../../src/core/layout/line-layout.js';
import type { LineLayoutOptions } from '../../src/core/layout/line-layout.js';
import type { TextMeasurer } from '../../src/fonts/text-measurer.js';
import type { FormattingSegment, LaidOutLine } from '../../src/types/receipt.js';

// Every character is 10pt wide
const fixedMeasurer: TextMeasurer = {
  widthOf: (text) => text.length * 10
};

const options: LineLayoutOptions = {
  contentWidth: 100,
  contentHeight: 1000,
  lineHeight: 18,
  paragraphGap: 18,
  listIndent: 20
};

function plain(text: string): FormattingSegment[] {
  return [{ text, bold: false, italic: false }];
}

function lineText(line: LaidOutLine): string {
  return line.runs.map((r) => r.text).join('');
}

function mulberry32(seed: number): () => number {
  let a = seed;
  return () => {
    a |= 0;
    a = (a + 0x6d2b79f5) | 0;
    let t = Math.imul(a ^ (a >>> 15), 1 | a);
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

describe('layoutSegments', () => {
  it('wraps greedily and drops the space at the break', () => {
    const result = layoutSegments(plain('aaa bbb ccc'), options, fixedMeasurer);
    expect(result.lines.map(lineText)).toEqual(['aaa bbb', 'ccc']);
    expect(result.lines[0]?.width).toBe(70);
    expect(result.lines.map((l) => l.y)).toEqual([0, 18]);
    expect(result.contentHeight).toBe(36);
    expect(result.overflowed).toBe(false);
  });

  it('adds the paragraph gap after a blank line', () => {
    const result = layoutSegments(plain('ab\n\ncd'), options, fixedMeasurer);
    expect(result.lines.map(lineText)).toEqual(['ab', 'cd']);
    expect(result.lines.map((l) => l.y)).toEqual([0, 36]);
    expect(result.lines.map((l) => l.paragraphStart)).toEqual([true, true]);
    expect(result.contentHeight).toBe(54);
  });

  it('breaks without a gap on a single newline', () => {
    const result = layoutSegments(plain('ab\ncd'), options, fixedMeasurer);
    expect(result.lines.map((l) => l.y)).toEqual([0, 18]);
    expect(result.lines.map((l) => l.paragraphStart)).toEqual([true, false]);
  });

  it('counts newlines split across segments as one run', () => {
    const segments: FormattingSegment[] = [
      { text: 'ab\n', bold: false, italic: false },
      { text: '\ncd', bold: true, italic: false }
    ];
    const result = layoutSegments(segments, options, fixedMeasurer);
    expect(result.lines.map((l) => l.y)).toEqual([0, 36]);
  });

  it('splits a word wider than the line by characters', () => {
    const result = layoutSegments(plain('abcdefghijklmno'), options, fixedMeasurer);
    expect(result.lines.map(lineText)).toEqual(['abcdefghij', 'klmno']);
  });

  it('indents every line of a list item', () => {
    const result = layoutSegments(plain('• one two three four'), options, fixedMeasurer);
    expect(result.lines.length).toBeGreaterThan(1);
    for (const line of result.lines) {
      expect(line.indent).toBe(20);
      expect(line.width).toBeLessThanOrEqual(80);
    }
    expect(result.lines.map(lineText)[0]).toBe('• one');
  });

  it('keeps a word together across a style change', () => {
    const segments: FormattingSegment[] = [
      { text: 'Hel', bold: true, italic: false },
      { text: 'lo world', bold: false, italic: false }
    ];
    const result = layoutSegments(segments, options, fixedMeasurer);
    expect(result.lines.map(lineText)).toEqual(['Hello', 'world']);
    expect(result.lines[0]?.runs).toEqual([
      { text: 'Hel', bold: true, italic: false, x: 0, width: 30 },
      { text: 'lo', bold: false, italic: false, x: 30, width: 20 }
    ]);
  });

  it('drops leading and trailing spaces', () => {
    const result = layoutSegments(plain('  hi  '), options, fixedMeasurer);
    expect(result.lines.map(lineText)).toEqual(['hi']);
    expect(result.lines[0]?.width).toBe(20);
  });

  it('flags content taller than the box', () => {
    const result = layoutSegments(plain('a\nb\nc'), { ...options, contentHeight: 30 }, fixedMeasurer);
    expect(result.contentHeight).toBe(54);
    expect(result.overflowed).toBe(true);
  });

  it('forces paragraph breaks at any width', () => {
    for (const contentWidth of [15, 50, 1000]) {
      const result = layoutSegments(plain('a\n\nb'), { ...options, contentWidth }, fixedMeasurer);
      expect(result.lines.map(lineText)).toEqual(['a', 'b']);
      expect(result.lines[1]?.y).toBe(options.lineHeight + options.paragraphGap);
    }
  });

  it('never places a line past the right edge', () => {
    const random = mulberry32(20261018);
    const measurer: TextMeasurer = {
      widthOf: (text, style) => {
        let w = 0;
        for (const ch of text) w += 5 + (ch.charCodeAt(0) % 7) + (style.bold ? 1 : 0);
        return w;
      }
    };
    const alphabet = 'abcdefghijklmnopqrstuvwxyz';

    for (let round = 0; round < 50; round++) {
      const words: string[] = [];
      const count = 1 + Math.floor(random() * 40);
      for (let i = 0; i < count; i++) {
        const length = 1 + Math.floor(random() * 15);
        let word = '';
        for (let j = 0; j < length; j++) word += alphabet[Math.floor(random() * alphabet.length)] ?? 'a';
        words.push(word);
      }
      const text = words.join(' ');
      const contentWidth = 40 + Math.floor(random() * 260);
      const segments: FormattingSegment[] = [
        { text: text.slice(0, text.length >> 1), bold: true, italic: false },
        { text: text.slice(text.length >> 1), bold: false, italic: true }
      ];

      const result = layoutSegments(segments, { ...options, contentWidth }, measurer);
      for (const line of result.lines) {
        expect(line.indent + line.width).toBeLessThanOrEqual(contentWidth + 1e-6);
      }
      const laidOut = result.lines.map(lineText).join('').replace(/ /g, '');
      expect(laidOut).toBe(text.replace(/ /g, ''));
    }
  });
});
