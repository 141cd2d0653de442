export * from './config';
export * from './bedrock';
