import { PgDialect } from 'drizzle-orm/pg-core';
import { buildSubmissionFilter, escapeLikePattern } from './drizzle-submissions.repository';

const dialect = new PgDialect();

function paramsOf(filters: Parameters<typeof buildSubmissionFilter>[0]): unknown[] {
  const where = buildSubmissionFilter(filters);
  return where ? dialect.sqlToQuery(where).params : [];
}

describe('escapeLikePattern', () => {
  it('escapes wildcards and the escape character', () => {
    expect(escapeLikePattern('50%_off\\')).toBe('50\\%\\_off\\\\');
  });

  it('leaves plain text alone', () => {
    expect(escapeLikePattern('salary')).toBe('salary');
  });
});

describe('buildSubmissionFilter', () => {
  it('always excludes deleted rows', () => {
    expect(paramsOf({})).toEqual([false]);
  });

  it('binds every filter as a parameter', () => {
    expect(paramsOf({ status: 'new', category: 'idea', tag: 'Sal', search: '50%' })).toEqual([
      false,
      'new',
      'idea',
      '%Sal%',
      '%50\\%%',
      '%50\\%%',
      '%50\\%%',
      '%50\\%%',
      '%50\\%%',
    ]);
  });
});
