import { join } from 'path';

// Load environment variables
function getEnv(key: string, defaultValue?: string): string {
  const value = process.env[key];
  if (value === undefined) {
    if (defaultValue !== undefined) {
      return defaultValue;
    }
    throw new Error(`Missing required environment variable: ${key}`);
  }
  return value;
}

function getEnvNumber(key: string, defaultValue: number): number {
  const value = process.env[key];
  if (value === undefined || value === '') {
    return defaultValue;
  }
  const parsed = Number(value);
  if (isNaN(parsed)) {
    throw new Error(`Invalid number for environment variable: ${key}`);
  }
  return parsed;
}

export type AIProvider = 'anthropic' | 'gemini';

function getProvider(): AIProvider {
  const value = getEnv('AI_PROVIDER', 'anthropic').toLowerCase();
  if (value !== 'anthropic' && value !== 'gemini') {
    throw new Error(`Invalid AI_PROVIDER: ${value} (expected "anthropic" or "gemini")`);
  }
  return value;
}

export const config = {
  // Database
  database: {
    url: getEnv('DATABASE_URL', './data/content-studio.db'),
  },

  // API Keys
  apiKeys: {
    anthropic: getEnv('ANTHROPIC_API_KEY', ''),
    googleAi: getEnv('GOOGLE_AI_API_KEY', ''),
  },

  // Server
  server: {
    port: getEnvNumber('PORT', 3001),
    host: getEnv('HOST', '0.0.0.0'),
    nodeEnv: getEnv('NODE_ENV', 'development'),
  },

  // AI Model Configuration
  ai: {
    provider: getProvider(),
    claude: {
      model: getEnv('CLAUDE_MODEL', 'claude-3-5-haiku-latest'),
    },
    gemini: {
      model: getEnv('GEMINI_MODEL', 'gemini-2.0-flash'),
    },
    temperature: 0.3,
    maxTokens: 512,
    maxAttempts: getEnvNumber('AI_MAX_ATTEMPTS', 3),
    backoffMs: getEnvNumber('AI_BACKOFF_MS', 1000),
    timeoutMs: getEnvNumber('AI_TIMEOUT_MS', 60000),
    requestsPerMinute: getEnvNumber('AI_REQUESTS_PER_MINUTE', 0),
  },

  // Generation Settings
  generation: {
    concurrency: getEnvNumber('GENERATION_CONCURRENCY', 1),
    defaultPlatform: getEnv('DEFAULT_PLATFORM', 'Instagram'),
    defaultVariations: 3,
    maxVariations: 5,
  },

  // Paths
  paths: {
    templates: join(process.cwd(), 'templates'),
  },
};

// Validate configuration
export function validateConfig(): void {
  const warnings: string[] = [];
  const errors: string[] = [];

  if (config.ai.provider === 'anthropic' && !config.apiKeys.anthropic) {
    warnings.push('ANTHROPIC_API_KEY not set - every generation will fail until it is provided');
  }

  if (config.ai.provider === 'gemini' && !config.apiKeys.googleAi) {
    warnings.push('GOOGLE_AI_API_KEY not set - every generation will fail until it is provided');
  }

  if (config.ai.maxAttempts < 1) {
    errors.push('AI_MAX_ATTEMPTS must be at least 1');
  }

  if (config.generation.concurrency < 1) {
    errors.push('GENERATION_CONCURRENCY must be at least 1');
  }

  if (errors.length > 0) {
    throw new Error(`Configuration errors:\n${errors.join('\n')}`);
  }

  if (warnings.length > 0 && config.server.nodeEnv !== 'test') {
    console.warn('Configuration warnings:');
    warnings.forEach(w => console.warn(`  - ${w}`));
  }
}

export default config;
