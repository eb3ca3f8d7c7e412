import { CsvColumn, toCsv } from '../src/utils/csv';

type Row = { name: string; note: string | null; amount: number };

const COLUMNS: CsvColumn<Row>[] = [
  { header: 'Name', value: r => r.name },
  { header: 'Note', value: r => r.note },
  { header: 'Amount', value: r => r.amount },
];

describe('toCsv', () => {
  it('writes a header and CRLF-terminated rows', () => {
    expect(toCsv(COLUMNS, [{ name: 'Ada', note: null, amount: 12.5 }])).toBe('Name,Note,Amount\r\nAda,,12.5\r\n');
  });

  it('quotes commas, quotes and line breaks', () => {
    const text = toCsv(COLUMNS, [{ name: 'Byron, Ada', note: 'said "hi"\nthen left', amount: 0 }]);
    expect(text).toBe('Name,Note,Amount\r\n"Byron, Ada","said ""hi""\nthen left",0\r\n');
  });

  it('writes only the header for no rows', () => {
    expect(toCsv(COLUMNS, [])).toBe('Name,Note,Amount\r\n');
  });
});
