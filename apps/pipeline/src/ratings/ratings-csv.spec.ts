import { parseCsv, parseCsvRecords } from './ratings-csv';

describe('ratings-csv', () => {
  it('parses quoted fields, escaped quotes and CRLF line ends', () => {
    const text = 'a,b,c\r\n"x, y","say ""hi""",3\r\n';
    expect(parseCsvRecords(text)).toEqual([
      ['a', 'b', 'c'],
      ['x, y', 'say "hi"', '3'],
    ]);
  });

  it('keeps newlines inside quoted fields', () => {
    expect(parseCsvRecords('t\n"line one\nline two"\n')).toEqual([
      ['t'],
      ['line one\nline two'],
    ]);
  });

  it('strips a BOM and skips blank lines', () => {
    const rows = parseCsv('\uFEFFConst,Title\n\ntt0111161,The Shawshank Redemption\n');
    expect(rows).toEqual([{ Const: 'tt0111161', Title: 'The Shawshank Redemption' }]);
  });

  it('handles a missing trailing newline and short rows', () => {
    expect(parseCsv('Const,Title,Year\ntt1,Solo')).toEqual([
      { Const: 'tt1', Title: 'Solo', Year: '' },
    ]);
  });

  it('returns no rows for empty input', () => {
    expect(parseCsv('')).toEqual([]);
  });
});
