import { describe, it, expect } from 'vitest';

import { ConfigurationError, loadConfig } from '../config';

describe('loadConfig', () => {
  it('applies defaults when only the credential is set', () => {
    const config = loadConfig({ AWS_BEARER_TOKEN_BEDROCK: 'test-token' });
    expect(config).toEqual({
      region: 'us-east-1',
      modelId: 'meta.llama3-8b-instruct-v1:0',
      maxTokens: 512,
      temperature: 0.5,
      systemPrompt: 'You are a helpful assistant.',
      catalog: { bucket: undefined, key: 'products.json', fixturePath: undefined }
    });
  });

  it('reads overrides from the environment', () => {
    const config = loadConfig({
      AWS_BEARER_TOKEN_BEDROCK: 'test-token',
      AWS_REGION: 'us-west-2',
      RECOMMEND_MAX_TOKENS: '256',
      CATALOG_BUCKET_NAME: 'catalog-bucket',
      CATALOG_KEY: 'catalog/products.json'
    });
    expect(config.region).toBe('us-west-2');
    expect(config.maxTokens).toBe(256);
    expect(config.catalog).toEqual({ bucket: 'catalog-bucket', key: 'catalog/products.json', fixturePath: undefined });
  });

  it('fails when the credential is missing', () => {
    expect(() => loadConfig({})).toThrow(ConfigurationError);
  });

  it('fails when the credential is blank', () => {
    try {
      loadConfig({ AWS_BEARER_TOKEN_BEDROCK: '   ' });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigurationError);
      if (error instanceof ConfigurationError) {
        expect(error.issues).toEqual(['AWS_BEARER_TOKEN_BEDROCK: is required']);
      }
    }
  });

  it('rejects a non-numeric token cap', () => {
    expect(() => loadConfig({ AWS_BEARER_TOKEN_BEDROCK: 'test-token', RECOMMEND_MAX_TOKENS: 'lots' })).toThrow(
      /RECOMMEND_MAX_TOKENS/
    );
  });
});
