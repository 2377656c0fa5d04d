export type CsvRow = Record<string, string>;

/**
 * Minimal RFC 4180 reader: quoted fields, doubled quotes, CRLF/LF line ends,
 * embedded newlines inside quotes, leading BOM.
 */
export function parseCsvRecords(text: string): string[][] {
  const src = text.startsWith('\uFEFF') ? text.slice(1) : text;
  const records: string[][] = [];
  let record: string[] = [];
  let field = '';
  let inQuotes = false;
  let i = 0;

  const endField = () => {
    record.push(field);
    field = '';
  };
  const endRecord = () => {
    endField();
    // skip blank lines
    if (!(record.length === 1 && record[0] === '')) records.push(record);
    record = [];
  };

  while (i < src.length) {
    const ch = src[i];
    if (inQuotes) {
      if (ch === '"') {
        if (src[i + 1] === '"') {
          field += '"';
          i += 2;
          continue;
        }
        inQuotes = false;
        i += 1;
        continue;
      }
      field += ch;
      i += 1;
      continue;
    }

    if (ch === '"' && field === '') {
      inQuotes = true;
    } else if (ch === ',') {
      endField();
    } else if (ch === '\r' && src[i + 1] === '\n') {
      endRecord();
      i += 1;
    } else if (ch === '\n' || ch === '\r') {
      endRecord();
    } else {
      field += ch;
    }
    i += 1;
  }

  if (field !== '' || record.length) endRecord();
  return records;
}

/** First record is the header; cells and header names are trimmed. */
export function parseCsv(text: string): CsvRow[] {
  const [header, ...body] = parseCsvRecords(text);
  if (!header) return [];
  const keys = header.map((h) => h.trim());
  return body.map((cells) => {
    const row: CsvRow = {};
    keys.forEach((key, idx) => {
      if (!key) return;
      row[key] = (cells[idx] ?? '').trim();
    });
    return row;
  });
}
