import { loadScorerConfig, maskSecret, DEFAULT_MODEL } from '../../config/scorer';
import { ConfigMissingError } from '../../models/errors';

describe('loadScorerConfig', () => {
  it('should apply defaults when only the API key is set', () => {
    const config = loadScorerConfig({ OPENAI_API_KEY: 'test-api-key' });

    expect(config).toEqual({
      openaiApiKey: 'test-api-key',
      model: DEFAULT_MODEL,
      weights: { rule: 0.3, ai: 0.7 },
      transport: {
        httpProxy: undefined,
        httpsProxy: undefined,
        timeoutMs: 60000,
        maxRetries: 0
      },
      batchDelayMs: 1000
    });
  });

  it('should throw ConfigMissingError without an API key', () => {
    expect(() => loadScorerConfig({})).toThrow(ConfigMissingError);
    expect(() => loadScorerConfig({})).toThrow('"OPENAI_API_KEY" is required');
  });

  it('should throw ConfigMissingError for a blank API key', () => {
    expect(() => loadScorerConfig({ OPENAI_API_KEY: '  ' })).toThrow(ConfigMissingError);
  });

  it('should read overrides from the environment', () => {
    const config = loadScorerConfig({
      OPENAI_API_KEY: 'test-api-key',
      OPENAI_MODEL: 'gpt-4o',
      HTTP_PROXY: 'http://proxy.internal:8080',
      HTTPS_PROXY: 'http://secure-proxy.internal:8443',
      OPENAI_TIMEOUT_MS: '15000',
      OPENAI_MAX_RETRIES: '2',
      RULE_WEIGHT: '0.5',
      AI_WEIGHT: '0.5',
      BATCH_DELAY_MS: '0'
    });

    expect(config.model).toBe('gpt-4o');
    expect(config.weights).toEqual({ rule: 0.5, ai: 0.5 });
    expect(config.transport).toEqual({
      httpProxy: 'http://proxy.internal:8080',
      httpsProxy: 'http://secure-proxy.internal:8443',
      timeoutMs: 15000,
      maxRetries: 2
    });
    expect(config.batchDelayMs).toBe(0);
  });

  it('should treat empty values as unset', () => {
    const config = loadScorerConfig({
      OPENAI_API_KEY: 'test-api-key',
      OPENAI_MODEL: '',
      HTTP_PROXY: '',
      RULE_WEIGHT: ''
    });

    expect(config.model).toBe('gpt-4');
    expect(config.transport.httpProxy).toBeUndefined();
    expect(config.weights.rule).toBe(0.3);
  });

  it('should reject invalid values', () => {
    expect(() => loadScorerConfig({ OPENAI_API_KEY: 'test-api-key', HTTPS_PROXY: 'not a url' }))
      .toThrow(ConfigMissingError);
    expect(() => loadScorerConfig({ OPENAI_API_KEY: 'test-api-key', AI_WEIGHT: '-1' }))
      .toThrow(ConfigMissingError);
    expect(() => loadScorerConfig({ OPENAI_API_KEY: 'test-api-key', OPENAI_TIMEOUT_MS: 'soon' }))
      .toThrow(ConfigMissingError);
  });

  it('should reject weights that could push the combined risk above 1', () => {
    expect(() => loadScorerConfig({ OPENAI_API_KEY: 'test-api-key', RULE_WEIGHT: '1.5', AI_WEIGHT: '0' }))
      .toThrow('"RULE_WEIGHT" must be less than or equal to 1');
    expect(() => loadScorerConfig({ OPENAI_API_KEY: 'test-api-key', RULE_WEIGHT: '0.6', AI_WEIGHT: '0.7' }))
      .toThrow('RULE_WEIGHT + AI_WEIGHT must not exceed 1');
  });
});

describe('maskSecret', () => {
  it('should keep only the first five characters', () => {
    expect(maskSecret('test-api-key')).toBe('test-...');
  });
});
