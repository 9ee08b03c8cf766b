import { describe, it, expect } from 'vitest';
import { parseCSVResults, recordsToCSV } from '../index.js';

describe('recordsToCSV', () => {
  it('writes a header and one line per row with a trailing newline', () => {
    expect(
      recordsToCSV([
        { Name: 'Acme', Employees: 12 },
        { Name: 'Globex', Employees: 40 },
      ])
    ).toBe('Name,Employees\nAcme,12\nGlobex,40\n');
  });

  it('orders columns by first appearance and leaves missing cells empty', () => {
    expect(recordsToCSV([{ Name: 'Acme' }, { Phone: '555-0100', Name: 'Globex' }])).toBe(
      'Name,Phone\nAcme,\nGlobex,555-0100\n'
    );
  });

  it('quotes cells with delimiters, quotes and line breaks', () => {
    expect(recordsToCSV([{ Name: 'Acme, Inc', Note: 'say "hi"', Address: 'line 1\nline 2' }])).toBe(
      'Name,Note,Address\n"Acme, Inc","say ""hi""","line 1\nline 2"\n'
    );
  });

  it('writes null and undefined as empty cells', () => {
    expect(recordsToCSV([{ A: null, B: undefined, C: false }])).toBe('A,B,C\n,,false\n');
  });

  it('writes dates as ISO timestamps', () => {
    expect(recordsToCSV([{ CloseDate: new Date('2024-01-02T03:04:05.000Z') }])).toBe(
      'CloseDate\n2024-01-02T03:04:05.000Z\n'
    );
  });

  it('returns an empty string for no rows', () => {
    expect(recordsToCSV([])).toBe('');
  });
});

describe('parseCSVResults', () => {
  it('parses rows keyed by header and converts literals', () => {
    const csv = 'Id,Count,Active,Amount,Note\r\n001A,3,true,12.50,\r\n\r\n001B,-7,false,0.5,"multi\nline"\r\n';

    expect(parseCSVResults(csv)).toEqual([
      { Id: '001A', Count: 3, Active: true, Amount: 12.5, Note: null },
      { Id: '001B', Count: -7, Active: false, Amount: 0.5, Note: 'multi\nline' },
    ]);
  });

  it('unescapes quoted cells', () => {
    expect(parseCSVResults('Name,Note\n"Acme, Inc","say ""hi"""\n')).toEqual([
      { Name: 'Acme, Inc', Note: 'say "hi"' },
    ]);
  });

  it('keeps integers beyond the safe range as text', () => {
    expect(parseCSVResults('Big\n12345678901234567890\n')).toEqual([{ Big: '12345678901234567890' }]);
  });

  it('parses a last row without a trailing newline', () => {
    expect(parseCSVResults('Id\n001A')).toEqual([{ Id: '001A' }]);
  });

  it('fills short rows with null', () => {
    expect(parseCSVResults('A,B\n1\n')).toEqual([{ A: 1, B: null }]);
  });

  it('returns no rows for empty input or a header only', () => {
    expect(parseCSVResults('')).toEqual([]);
    expect(parseCSVResults('Id,Name\n')).toEqual([]);
  });

  it('reads back what recordsToCSV writes', () => {
    const rows = [
      { Name: 'Acme, Inc', Note: 'say "hi"' },
      { Name: 'Globex', Note: 'two\nlines' },
    ];
    expect(parseCSVResults(recordsToCSV(rows))).toEqual(rows);
  });
});
