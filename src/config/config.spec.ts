import { loadAppConfig, resolveLogLevels } from './app.config';
import { isSmtpConfigured, loadEmailConfig } from './email.config';
import { isLlmConfigured, loadLlmConfig } from './llm.config';

describe('config loaders', () => {
  describe('loadAppConfig', () => {
    it('uses defaults when nothing is set', () => {
      expect(loadAppConfig({})).toEqual({
        port: 8000,
        corsOrigins: [],
        jsonBodyLimit: '2mb',
        maxTranscriptChars: 200_000,
        maxUploadBytes: 1024 * 1024,
      });
    });

    it('falls back on malformed numbers and splits origin lists', () => {
      const config = loadAppConfig({
        PORT: 'eighty',
        CORS_ORIGINS: ' http://a.test , ,http://b.test',
        MAX_UPLOAD_BYTES: '2048',
      });

      expect(config.port).toBe(8000);
      expect(config.corsOrigins).toEqual(['http://a.test', 'http://b.test']);
      expect(config.maxUploadBytes).toBe(2048);
    });
  });

  describe('resolveLogLevels', () => {
    it('defaults to debug', () => {
      expect(resolveLogLevels({})).toEqual(['error', 'warn', 'log', 'debug']);
    });

    it('includes every level up to the requested one', () => {
      expect(resolveLogLevels({ LOG_LEVEL: 'WARN' })).toEqual(['error', 'warn']);
      expect(resolveLogLevels({ LOG_LEVEL: 'verbose' })).toEqual(['error', 'warn', 'log', 'debug', 'verbose']);
    });

    it('ignores unknown levels', () => {
      expect(resolveLogLevels({ LOG_LEVEL: 'loud' })).toEqual(['error', 'warn', 'log', 'debug']);
    });
  });

  describe('loadLlmConfig', () => {
    it('collects every configured Gemini key in order', () => {
      const config = loadLlmConfig({
        GEMINI_API_KEY: 'key-1',
        GEMINI_API_KEY_3: 'key-3',
        GEMINI_API_URL: 'http://llm.test/v1beta/',
      });

      expect(config).toEqual({
        apiKeys: ['key-1', 'key-3'],
        apiBaseUrl: 'http://llm.test/v1beta',
        model: 'gemini-2.0-flash-lite',
        temperature: 0.7,
        maxOutputTokens: 2048,
        requestTimeoutMs: 60_000,
      });
      expect(isLlmConfigured(config)).toBe(true);
    });

    it('accepts a zero temperature', () => {
      expect(loadLlmConfig({ LLM_TEMPERATURE: '0' }).temperature).toBe(0);
    });

    it('is not configured without keys', () => {
      expect(isLlmConfigured(loadLlmConfig({}))).toBe(false);
    });
  });

  describe('loadEmailConfig', () => {
    it('sends from the SMTP user when no sender address is given', () => {
      const config = loadEmailConfig({ SMTP_USER: 'bot@team.test', SMTP_PASS: 'test-secret' });

      expect(config.smtp).toEqual({
        host: 'smtp.gmail.com',
        port: 587,
        secure: false,
        auth: { user: 'bot@team.test', pass: 'test-secret' },
        timeoutMs: 30_000,
      });
      expect(config.from).toEqual({ name: 'Meeting Summarizer', email: 'bot@team.test' });
      expect(config.defaultSubject).toBe('Meeting Summary');
      expect(isSmtpConfigured(config)).toBe(true);
    });

    it('prefers EMAIL_FROM_EMAIL over FROM_EMAIL', () => {
      const config = loadEmailConfig({
        SMTP_USER: 'bot@team.test',
        FROM_EMAIL: 'legacy@team.test',
        EMAIL_FROM_EMAIL: 'minutes@team.test',
        SMTP_SECURE: 'true',
        SMTP_PORT: '465',
      });

      expect(config.from.email).toBe('minutes@team.test');
      expect(config.smtp.secure).toBe(true);
      expect(config.smtp.port).toBe(465);
    });

    it('is not configured without credentials', () => {
      expect(isSmtpConfigured(loadEmailConfig({}))).toBe(false);
      expect(isSmtpConfigured(loadEmailConfig({ SMTP_USER: 'bot@team.test' }))).toBe(false);
    });
  });
});
