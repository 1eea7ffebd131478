import { describe, expect, it } from 'vitest';
import { parseCsvRecords, parseHostList, parseLinkCsv, rowsFromInput } from '../utils/input';

describe('parseCsvRecords', () => {
  it('handles quoted fields with commas, escaped quotes and CRLF line endings', () => {
    expect(parseCsvRecords('a,"b,c","say ""hi"""\r\nd,e')).toEqual([
      ['a', 'b,c', 'say "hi"'],
      ['d', 'e'],
    ]);
  });
});

describe('parseLinkCsv', () => {
  it('numbers rows by record position and drops incomplete ones', () => {
    const csv = [
      'example.com,https://partner.com/page,Partner',
      '',
      'only-one-column',
      'blog.example.com,,Missing link',
      '"http://shop.example.com","https://partner.com/?a=1,2"',
    ].join('\n');

    expect(parseLinkCsv(csv)).toEqual([
      { rowNum: 1, site: 'https://example.com', link: 'https://partner.com/page', anchor: 'Partner' },
      { rowNum: 5, site: 'http://shop.example.com', link: 'https://partner.com/?a=1,2', anchor: '' },
    ]);
  });

  it('returns nothing for blank input', () => {
    expect(parseLinkCsv('  \n ')).toEqual([]);
  });
});

describe('rowsFromInput', () => {
  it('keeps positions from the submitted array', () => {
    expect(
      rowsFromInput([
        { site: 'a.com', link: 'https://x.com' },
        { site: '', link: 'https://y.com' },
        { site: 'https://c.com', link: ' https://z.com ', anchor: ' Hi ' },
      ]),
    ).toEqual([
      { rowNum: 1, site: 'https://a.com', link: 'https://x.com', anchor: '' },
      { rowNum: 3, site: 'https://c.com', link: 'https://z.com', anchor: 'Hi' },
    ]);
  });
});

describe('parseHostList', () => {
  it('splits on newlines and commas and reduces entries to bare hosts', () => {
    expect(parseHostList('https://www.A.com/\nb.com, c.com\n\n')).toEqual(['a.com', 'b.com', 'c.com']);
    expect(parseHostList(['x.com,y.com', 'http://z.com/'])).toEqual(['x.com', 'y.com', 'z.com']);
  });
});
