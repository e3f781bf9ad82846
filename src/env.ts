// Environment configuration for the Course Assistant API
// Model client credentials and orchestration settings come from environment variables

const strEnv = (value: string | undefined, fallback = '') => (value ?? fallback).trim();

function parsePort(value: string | undefined, defaultPort: number): number {
  if (!value) return defaultPort;
  const parsed = parseInt(value, 10);
  if (isNaN(parsed) || parsed < 1 || parsed > 65535) {
    console.error(`Invalid PORT "${value}", using default ${defaultPort}`);
    return defaultPort;
  }
  return parsed;
}

function parsePositiveInt(value: string | undefined, defaultValue: number, name: string): number {
  if (!value) return defaultValue;
  const parsed = parseInt(value, 10);
  if (isNaN(parsed) || parsed < 1) {
    console.error(`Invalid ${name} "${value}", using default ${defaultValue}`);
    return defaultValue;
  }
  return parsed;
}

function parseTemperature(value: string | undefined, defaultValue: number): number {
  if (!value) return defaultValue;
  const parsed = parseFloat(value);
  if (isNaN(parsed) || parsed < 0 || parsed > 1) {
    console.error(`Invalid MODEL_TEMPERATURE "${value}", using default ${defaultValue}`);
    return defaultValue;
  }
  return parsed;
}

const DEFAULT_CORS_ORIGINS = [
  'http://localhost:8000',
  'http://127.0.0.1:8000',
  'http://localhost:3000',
  'http://127.0.0.1:3000',
];

export const env = {
  // Server
  PORT: parsePort(process.env.PORT, 3737),
  HOST: process.env.HOST || '127.0.0.1',
  NODE_ENV: process.env.NODE_ENV || 'development',
  CORS_ORIGINS: process.env.CORS_ORIGINS
    ? process.env.CORS_ORIGINS.split(',').map(s => s.trim()).filter(Boolean)
    : DEFAULT_CORS_ORIGINS,

  // Which model client answers queries: 'anthropic' or 'bedrock'
  MODEL_PROVIDER: strEnv(process.env.MODEL_PROVIDER, 'anthropic').toLowerCase(),

  // Anthropic Messages API
  ANTHROPIC_API_KEY: strEnv(process.env.ANTHROPIC_API_KEY),
  ANTHROPIC_BASE_URL: strEnv(process.env.ANTHROPIC_BASE_URL, 'https://api.anthropic.com'),
  ANTHROPIC_MODEL: strEnv(process.env.ANTHROPIC_MODEL, 'claude-sonnet-4-20250514'),
  ANTHROPIC_VERSION: strEnv(process.env.ANTHROPIC_VERSION, '2023-06-01'),

  // AWS Bedrock (Anthropic models)
  AWS_ACCESS_KEY_ID: strEnv(process.env.AWS_ACCESS_KEY_ID),
  AWS_SECRET_ACCESS_KEY: strEnv(process.env.AWS_SECRET_ACCESS_KEY),
  BEDROCK_REGION: strEnv(process.env.BEDROCK_REGION || process.env.AWS_REGION, 'us-east-1'),
  BEDROCK_MODEL_ID: strEnv(process.env.BEDROCK_MODEL_ID, 'anthropic.claude-3-5-sonnet-20240620-v1:0'),

  // Generation
  MODEL_MAX_TOKENS: parsePositiveInt(process.env.MODEL_MAX_TOKENS, 800, 'MODEL_MAX_TOKENS'),
  MODEL_TEMPERATURE: parseTemperature(process.env.MODEL_TEMPERATURE, 0),
  MAX_TOOL_ROUNDS: parsePositiveInt(process.env.MAX_TOOL_ROUNDS, 2, 'MAX_TOOL_ROUNDS'),

  // Tools
  TOOLS_ENABLED: process.env.TOOLS_ENABLED !== 'false', // Default true
  TOOL_TIMEOUT_MS: parsePositiveInt(process.env.TOOL_TIMEOUT_MS, 30000, 'TOOL_TIMEOUT_MS'),
  COURSE_CATALOG_PATH: strEnv(process.env.COURSE_CATALOG_PATH, './data/courses.json'),

  // Logging
  LOG_LEVEL: process.env.LOG_LEVEL || 'info',
};

export function isProviderConfigured(provider: string): boolean {
  switch (provider) {
    case 'anthropic':
      return !!env.ANTHROPIC_API_KEY;
    case 'bedrock':
      return !!env.AWS_ACCESS_KEY_ID && !!env.AWS_SECRET_ACCESS_KEY;
    default:
      return false;
  }
}

export function listConfiguredProviders(): string[] {
  const providers = ['anthropic', 'bedrock'];
  return providers.filter(isProviderConfigured);
}

export function describeConfiguration(): Record<string, unknown> {
  return {
    environment: env.NODE_ENV,
    server: `${env.HOST}:${env.PORT}`,
    modelProvider: env.MODEL_PROVIDER,
    configuredProviders: listConfiguredProviders(),
    model: env.MODEL_PROVIDER === 'bedrock' ? env.BEDROCK_MODEL_ID : env.ANTHROPIC_MODEL,
    maxToolRounds: env.MAX_TOOL_ROUNDS,
    toolsEnabled: env.TOOLS_ENABLED,
    courseCatalog: env.COURSE_CATALOG_PATH,
  };
}
