import { z } from 'zod';

const EnvSchema = z.object({
  // Bedrock API key; the AWS SDK picks it up from the environment itself
  AWS_BEARER_TOKEN_BEDROCK: z.string().trim().min(1, 'is required'),
  AWS_REGION: z.string().min(1).default('us-east-1'),
  BEDROCK_MODEL_LLAMA: z.string().min(1).default('meta.llama3-8b-instruct-v1:0'),
  RECOMMEND_MAX_TOKENS: z.coerce.number().int().positive().default(512),
  RECOMMEND_TEMPERATURE: z.coerce.number().min(0).max(1).default(0.5),
  RECOMMEND_SYSTEM_PROMPT: z.string().default('You are a helpful assistant.'),
  CATALOG_BUCKET_NAME: z.string().min(1).optional(),
  CATALOG_KEY: z.string().min(1).default('products.json'),
  CATALOG_FIXTURE_PATH: z.string().min(1).optional()
});

export interface AppConfig {
  region: string;
  modelId: string;
  maxTokens: number;
  temperature: number;
  systemPrompt: string;
  catalog: {
    bucket?: string;
    key: string;
    fixturePath?: string;
  };
}

export class ConfigurationError extends Error {
  constructor(message: string, readonly issues: string[] = []) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/**
 * Reads the process configuration. Throws when the Bedrock credential is
 * missing or any value is malformed; callers are expected to let that
 * stop the process.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigurationError(`Invalid configuration (${issues.join('; ')})`, issues);
  }

  const values = parsed.data;
  return {
    region: values.AWS_REGION,
    modelId: values.BEDROCK_MODEL_LLAMA,
    maxTokens: values.RECOMMEND_MAX_TOKENS,
    temperature: values.RECOMMEND_TEMPERATURE,
    systemPrompt: values.RECOMMEND_SYSTEM_PROMPT,
    catalog: {
      bucket: values.CATALOG_BUCKET_NAME,
      key: values.CATALOG_KEY,
      fixturePath: values.CATALOG_FIXTURE_PATH
    }
  };
}
