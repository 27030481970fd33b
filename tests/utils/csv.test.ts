import { describe, it, expect } from 'vitest';
import { formatCsvTable, getCell, parseCsvRecords, parseCsvTable, stripBom } from '../../src/utils/csv.js';

describe('parseCsvTable', () => {
  it('splits the header from the records and keeps header order', () => {
    const table = parseCsvTable(
      'feature_name,feature_description,owner\nAlpha,"Adds a banner, then a modal",team-a\nBeta,,team-b\n'
    );

    expect(table.fields).toEqual(['feature_name', 'feature_description', 'owner']);
    expect(table.records).toEqual([
      ['Alpha', 'Adds a banner, then a modal', 'team-a'],
      ['Beta', '', 'team-b'],
    ]);
  });

  it('fills cells missing from short rows with empty strings', () => {
    const table = parseCsvTable('feature_name,feature_description\nGamma\n');
    expect(table.records).toEqual([['Gamma', '']]);
  });

  it('keeps duplicated header names as separate columns', () => {
    const table = parseCsvTable('feature_name,feature_description,tag,tag\nA,b,x,y\n');
    expect(table.fields).toEqual(['feature_name', 'feature_description', 'tag', 'tag']);
    expect(table.records).toEqual([['A', 'b', 'x', 'y']]);
  });

  it('keeps multi-line quoted cells', () => {
    const table = parseCsvTable('feature_name,feature_description\nDelta,"line one\nline two"\n');
    expect(table.records[0][1]).toBe('line one\nline two');
  });
});

describe('getCell', () => {
  it('reads the first column with the given name', () => {
    const table = parseCsvTable('tag,feature_name,tag\nx,Alpha,y\n');
    expect(getCell(table, table.records[0], 'feature_name')).toBe('Alpha');
    expect(getCell(table, table.records[0], 'tag')).toBe('x');
  });

  it('returns an empty string for an absent column', () => {
    const table = parseCsvTable('feature_name\nAlpha\n');
    expect(getCell(table, table.records[0], 'feature_description')).toBe('');
  });
});

describe('parseCsvRecords', () => {
  it('returns raw records including the header', () => {
    expect(parseCsvRecords('term,definition\nGH,Geo-handler\n')).toEqual([
      ['term', 'definition'],
      ['GH', 'Geo-handler'],
    ]);
  });
});

describe('formatCsvTable', () => {
  it('quotes cells containing delimiters and quotes', () => {
    const csv = formatCsvTable(['a', 'b'], [['x, y', 'say "hi"']]);
    expect(csv).toBe('a,b\n"x, y","say ""hi"""');
  });

  it('writes a repeated header name as written', () => {
    expect(formatCsvTable(['tag', 'tag'], [['x', 'y']])).toBe('tag,tag\nx,y');
  });

  it('writes missing cells as empty', () => {
    expect(formatCsvTable(['a', 'b'], [['1']])).toBe('a,b\n1,');
  });
});

describe('stripBom', () => {
  it('removes a leading byte order mark only', () => {
    expect(stripBom('\uFEFFterm,definition')).toBe('term,definition');
    expect(stripBom('term,definition')).toBe('term,definition');
  });
});
