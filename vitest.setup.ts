import { fileURLToPath } from 'url';

process.env.AWS_BEARER_TOKEN_BEDROCK = 'test-token';
process.env.AWS_REGION = 'us-east-1';
process.env.CATALOG_FIXTURE_PATH = fileURLToPath(new URL('./data/fixtures/products.sample.json', import.meta.url));
delete process.env.CATALOG_BUCKET_NAME;
