import { backoffDelay, DEFAULT_RETRY_POLICY, isTransientDbError, retryIdempotent } from './db-utils';

describe('isTransientDbError', () => {
  it('matches transport failures by message and code', () => {
    expect(isTransientDbError(new Error('TypeError: fetch failed'))).toBe(true);
    expect(isTransientDbError(Object.assign(new Error('boom'), { code: 'ECONNRESET' }))).toBe(true);
  });

  it('ignores statement errors and non-errors', () => {
    expect(isTransientDbError(new Error('duplicate key value'))).toBe(false);
    expect(isTransientDbError('ECONNRESET')).toBe(false);
  });
});

describe('backoffDelay', () => {
  it('doubles per attempt up to the cap', () => {
    expect(backoffDelay(1, DEFAULT_RETRY_POLICY)).toBe(1000);
    expect(backoffDelay(3, DEFAULT_RETRY_POLICY)).toBe(4000);
    expect(backoffDelay(6, DEFAULT_RETRY_POLICY)).toBe(10000);
  });
});

describe('retryIdempotent', () => {
  it('retries transient failures', async () => {
    const statement = jest
      .fn<Promise<string>, []>()
      .mockRejectedValueOnce(new Error('fetch failed'))
      .mockResolvedValueOnce('ok');

    await expect(retryIdempotent('Load row', statement, { baseDelayMs: 1 })).resolves.toBe('ok');
    expect(statement).toHaveBeenCalledTimes(2);
  });

  it('rethrows statement errors immediately', async () => {
    const statement = jest.fn<Promise<string>, []>().mockRejectedValue(new Error('syntax error'));

    await expect(retryIdempotent('Load row', statement, { baseDelayMs: 1 })).rejects.toThrow(
      'syntax error',
    );
    expect(statement).toHaveBeenCalledTimes(1);
  });

  it('gives up after the last attempt', async () => {
    const statement = jest.fn<Promise<string>, []>().mockRejectedValue(new Error('ECONNREFUSED'));

    await expect(
      retryIdempotent('Load row', statement, { attempts: 2, baseDelayMs: 1 }),
    ).rejects.toThrow('ECONNREFUSED');
    expect(statement).toHaveBeenCalledTimes(2);
  });
});
