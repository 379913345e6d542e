import optimizerConfig, { validateEnv } from './config';

describe('validateEnv', () => {
  it('accepts a complete environment', () => {
    const env = {
      PORT: '5000',
      SUGGESTED_TAG_COUNT: '7',
      EXPOSE_ERROR_DETAILS: 'false',
      SITE_URL: 'https://blog.example.com',
    };
    expect(validateEnv(env)).toBe(env);
  });

  it('rejects a non-numeric port', () => {
    expect(() => validateEnv({ PORT: 'abc' })).toThrow('PORT must be a number, got "abc"');
  });

  it('rejects a tag count outside 5-10', () => {
    expect(() => validateEnv({ SUGGESTED_TAG_COUNT: '12' })).toThrow(
      'SUGGESTED_TAG_COUNT must be an integer between 5 and 10',
    );
  });

  it('rejects a non-boolean error flag', () => {
    expect(() => validateEnv({ EXPOSE_ERROR_DETAILS: 'yes' })).toThrow(
      'EXPOSE_ERROR_DETAILS must be "true" or "false"',
    );
  });

  it('rejects a site URL without scheme', () => {
    expect(() => validateEnv({ SITE_URL: 'example.com' })).toThrow('SITE_URL must be an http(s) URL');
  });
});

describe('optimizerConfig', () => {
  const saved = { ...process.env };

  afterEach(() => {
    process.env = { ...saved };
  });

  it('reads settings from the environment', () => {
    process.env.SITE_URL = 'https://blog.example.com/';
    process.env.AUTHOR_NAME = 'Ayşe';
    process.env.SUGGESTED_TAG_COUNT = '6';
    process.env.EXPOSE_ERROR_DETAILS = 'false';
    delete process.env.PUBLISHER_NAME;
    delete process.env.PUBLISHER_LOGO;

    expect(optimizerConfig()).toEqual({
      siteUrl: 'https://blog.example.com',
      authorName: 'Ayşe',
      publisherName: 'Blog',
      publisherLogo: 'https://blog.example.com/logo.png',
      suggestedTagCount: 6,
      exposeErrorDetails: false,
    });
  });

  it('hides error details in production by default', () => {
    delete process.env.EXPOSE_ERROR_DETAILS;
    process.env.NODE_ENV = 'production';
    expect(optimizerConfig().exposeErrorDetails).toBe(false);
  });

  it('falls back to defaults', () => {
    delete process.env.SITE_URL;
    delete process.env.SUGGESTED_TAG_COUNT;
    delete process.env.PUBLISHER_LOGO;
    const config = optimizerConfig();
    expect(config.siteUrl).toBe('https://example.com');
    expect(config.publisherLogo).toBe('https://example.com/logo.png');
    expect(config.suggestedTagCount).toBeUndefined();
  });
});
