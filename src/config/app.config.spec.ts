import { buildAppConfig, resolveLogLevels } from './app.config';

const SECRET = 'test-secret-test-secret-test-secret';

function configFrom(env: Record<string, string>) {
  return buildAppConfig((key) => env[key]);
}

describe('buildAppConfig', () => {
  it('applies defaults', () => {
    const config = configFrom({ SECRET_KEY: SECRET });

    expect(config.env).toBe('development');
    expect(config.isProduction).toBe(false);
    expect(config.http.port).toBe(3000);
    expect(config.http.corsOrigins).toEqual(['*']);
    expect(config.auth.tokenTtlMinutes).toBe(480);
    expect(config.auth.cookieName).toBe('access_token');
    expect(config.rateLimit.maxSubmissions).toBe(10);
    expect(config.rateLimit.windowMs).toBe(24 * 60 * 60 * 1000);
    expect(config.rateLimit.fingerprintSalt).toBe(SECRET.slice(0, 16));
    expect(config.submission.maxMessageLength).toBe(1000);
    expect(config.submission.codePrefix).toBe('FB');
    expect(config.uploads.maxFileSize).toBe(5 * 1024 * 1024);
    expect(config.uploads.allowedExtensions).toEqual(['jpg', 'jpeg', 'png']);
    expect(config.enrichment.groqApiKey).toBeNull();
    expect(config.seed.adminEmail).toBeNull();
  });

  it('reads overrides', () => {
    const config = configFrom({
      SECRET_KEY: SECRET,
      PORT: '8080',
      RATE_LIMIT_MAX: '3',
      RATE_LIMIT_WINDOW_HOURS: '2',
      ALLOWED_EXTENSIONS: ' PNG , jpg ',
      CORS_ORIGINS: 'https://a.example,https://b.example',
      GROQ_API_KEY: 'test-key',
    });

    expect(config.http.port).toBe(8080);
    expect(config.rateLimit.maxSubmissions).toBe(3);
    expect(config.rateLimit.windowMs).toBe(2 * 60 * 60 * 1000);
    expect(config.uploads.allowedExtensions).toEqual(['png', 'jpg']);
    expect(config.http.corsOrigins).toEqual(['https://a.example', 'https://b.example']);
    expect(config.enrichment.groqApiKey).toBe('test-key');
  });

  it('generates a secret outside production', () => {
    const config = configFrom({});
    expect(config.auth.secretKey).toMatch(/^[0-9a-f]{64}$/);
  });

  it('requires a secret in production', () => {
    expect(() => configFrom({ NODE_ENV: 'production' })).toThrow('SECRET_KEY must be set in production');
  });

  it('rejects a short secret', () => {
    expect(() => configFrom({ SECRET_KEY: 'short' })).toThrow(
      'SECRET_KEY must be at least 32 characters long (current: 5)',
    );
  });

  it('rejects malformed integers', () => {
    expect(() => configFrom({ SECRET_KEY: SECRET, PORT: 'abc' })).toThrow(
      'PORT must be an integer (got "abc")',
    );
    expect(() => configFrom({ SECRET_KEY: SECRET, RATE_LIMIT_MAX: '0' })).toThrow(
      'RATE_LIMIT_MAX must be at least 1 (got 0)',
    );
  });

  it('is frozen', () => {
    const config = configFrom({ SECRET_KEY: SECRET });
    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.rateLimit)).toBe(true);
  });
});

describe('resolveLogLevels', () => {
  it('defaults by environment', () => {
    expect(resolveLogLevels(undefined, true)).toEqual(['fatal', 'error', 'warn', 'log']);
    expect(resolveLogLevels(undefined, false)).toContain('debug');
  });

  it('rejects unknown levels', () => {
    expect(() => resolveLogLevels('loud', false)).toThrow(/^LOG_LEVEL must be one of/);
  });
});
