import { describe, it, expect } from 'vitest';
import {
  buildSystemValues,
  findUnresolvedPlaceholders,
  substituteVariables
} from '../../src/core/substitution.js';

const now = new Date(2026, 9, 18, 14, 30, 0);

describe('substituteVariables', () => {
  it('replaces single-brace placeholders with donor values', () => {
    const result = substituteVariables(
      'Dear {First Name} {Last Name},',
      { 'First Name': 'Jane', 'Last Name': 'Doe' },
      { now }
    );
    expect(result.text).toBe('Dear Jane Doe,');
    expect(result.unresolved).toEqual([]);
  });

  it('accepts the double-brace spelling', () => {
    const result = substituteVariables('Hi {{First Name}}!', { 'First Name': 'Jane' }, { now });
    expect(result.text).toBe('Hi Jane!');
  });

  it('formats amount fields with two decimals', () => {
    const result = substituteVariables(
      '{Donation Amount} / {Amount} / {Value of Item}',
      { 'Donation Amount': 250, Amount: '12.5', 'Value of Item': '$40' },
      { now }
    );
    expect(result.text).toBe('250.00 / 12.50 / $40');
  });

  it('leaves unknown placeholders and reports them once, in order', () => {
    const result = substituteVariables('{Nickname} {Title} {Nickname}', {}, { now });
    expect(result.text).toBe('{Nickname} {Title} {Nickname}');
    expect(result.unresolved).toEqual(['Nickname', 'Title']);
  });

  it('fills the date placeholders from the clock', () => {
    const result = substituteVariables('{Date} | {Current Year} | {Year}', {}, { now });
    expect(result.text).toBe('October 18, 2026 | 2026 | 2026');
  });

  it('lets a donor column override a system value', () => {
    const result = substituteVariables('{Year}', { Year: '2024' }, { now });
    expect(result.text).toBe('2024');
  });

  it('does not rescan inserted values', () => {
    const result = substituteVariables('{A}', { A: '{B}', B: 'x' }, { now });
    expect(result.text).toBe('{B}');
  });

  it('prints null and undefined as empty text', () => {
    const result = substituteVariables('[{Company}][{Notes}]', { Company: null, Notes: undefined }, { now });
    expect(result.text).toBe('[][]');
  });

  it('returns the template unchanged when no field matches', () => {
    const template = 'Thank you for <strong>{Gift}</strong>.';
    const result = substituteVariables(template, { Unrelated: 'value' }, { now });
    expect(result.text).toBe(template);
  });
});

describe('buildSystemValues', () => {
  it('uses the long date format', () => {
    expect(buildSystemValues(new Date(2025, 0, 2))).toEqual({
      Date: 'January 2, 2025',
      'Current Year': '2025',
      Year: '2025'
    });
  });
});

describe('findUnresolvedPlaceholders', () => {
  it('ignores blank braces', () => {
    expect(findUnresolvedPlaceholders('{ } and {Name}')).toEqual(['Name']);
  });
});
