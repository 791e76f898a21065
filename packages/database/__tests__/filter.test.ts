import { buildWhereClause } from '../documents/filter';
import { sanitizeFtsQuery } from '../sql-utils';

interface Row {
  id: string;
  author: string;
  isActive: boolean;
  rank: number;
}

describe('buildWhereClause', () => {
  it('should produce no clause for an empty filter', () => {
    expect(buildWhereClause<Row>({})).toEqual({ sql: '', params: [] });
  });

  it('should compare values as JSONB', () => {
    expect(buildWhereClause<Row>({ id: 'a', isActive: true, rank: 3 })).toEqual({
      sql: "WHERE doc->'id' = $1::jsonb AND doc->'isActive' = $2::jsonb AND doc->'rank' = $3::jsonb",
      params: ['"a"', 'true', '3'],
    });
  });

  it('should translate $in into ANY over a JSONB array', () => {
    expect(buildWhereClause<Row>({ author: { $in: ['p1', 'p2'] } })).toEqual({
      sql: "WHERE doc->'author' = ANY($1::jsonb[])",
      params: [['"p1"', '"p2"']],
    });
  });

  it('should start numbering at the given placeholder', () => {
    expect(buildWhereClause<Row>({ id: 'a' }, 2).sql).toBe("WHERE doc->'id' = $2::jsonb");
  });

  it('should skip undefined conditions', () => {
    expect(buildWhereClause<Row>({ id: undefined, author: 'p1' })).toEqual({
      sql: "WHERE doc->'author' = $1::jsonb",
      params: ['"p1"'],
    });
  });

  it('should reject field names that are not plain identifiers', () => {
    expect(() => buildWhereClause<Record<string, unknown>>({ "id' OR '1'='1": 'x' }))
      .toThrow(/Unsafe SQL identifier/);
  });
});

describe('sanitizeFtsQuery', () => {
  it('should strip operator characters and collapse whitespace', () => {
    expect(sanitizeFtsQuery('  "ocean" & (tides) ')).toBe('ocean tides');
  });

  it('should truncate before stripping', () => {
    expect(sanitizeFtsQuery('abcdef', 3)).toBe('abc');
  });

  it('should return an empty string when only operators remain', () => {
    expect(sanitizeFtsQuery('*** !!')).toBe('');
  });
});
