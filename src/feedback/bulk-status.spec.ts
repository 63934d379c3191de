import { parseBulkStatusRequest, parseId } from './bulk-status';

describe('parseId', () => {
  it('accepts integers and integer strings', () => {
    expect(parseId(5)).toBe(5);
    expect(parseId(' 12 ')).toBe(12);
    expect(parseId('+7')).toBe(7);
    expect(parseId('-3')).toBe(-3);
  });

  it('rejects anything else', () => {
    expect(parseId(1.5)).toBeNull();
    expect(parseId('1.5')).toBeNull();
    expect(parseId('abc')).toBeNull();
    expect(parseId('')).toBeNull();
    expect(parseId(true)).toBeNull();
    expect(parseId(null)).toBeNull();
  });
});

describe('parseBulkStatusRequest', () => {
  it('checks the status first', () => {
    expect(() => parseBulkStatusRequest(['abc'], 'archived')).toThrow('Invalid status');
  });

  it('requires a non-empty id list', () => {
    expect(() => parseBulkStatusRequest([], 'read')).toThrow('No IDs provided');
    expect(() => parseBulkStatusRequest(undefined, 'read')).toThrow('No IDs provided');
    expect(() => parseBulkStatusRequest('1,2', 'read')).toThrow('No IDs provided');
  });

  it('rejects the whole request when any id is malformed', () => {
    expect(() => parseBulkStatusRequest(['1', 'abc'], 'read')).toThrow('Invalid ID format');
  });

  it('deduplicates ids and drops ids outside the column range', () => {
    expect(parseBulkStatusRequest(['1', 2, ' 2 ', '99999999999'], 'resolved')).toEqual({
      ids: [1, 2],
      status: 'resolved',
    });
  });
});
