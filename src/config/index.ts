/**
 * Application configuration
 *
 * Read once from the environment at the entry points and handed to each
 * collaborator explicitly. Nothing else in the tree reads process.env.
 */

import { z } from 'zod';

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  PORT: z.coerce.number().int().positive().default(3000),
  CORS_ORIGIN: z.string().default('*'),

  ANTHROPIC_API_KEY: z.string().optional(),
  CLAUDE_MODEL: z.string().min(1).default('claude-3-5-haiku-20241022'),

  SERPAPI_API_KEY: z.string().optional(),
  SEARCH_RESULTS_PER_QUERY: z.coerce.number().int().min(1).max(100).default(5),

  SOURCING_TOP_N: z.coerce.number().int().min(1).max(50).default(5),
  SOURCING_RESOLVE_DELAY_MS: z.coerce.number().int().min(0).default(1000),
});

export interface AppConfig {
  nodeEnv: 'development' | 'test' | 'production';
  port: number;
  corsOrigin: string;
  llm: {
    apiKey: string | undefined;
    model: string;
  };
  search: {
    apiKey: string | undefined;
    resultsPerQuery: number;
  };
  sourcing: {
    topN: number;
    resolveDelayMs: number;
  };
}

export class ConfigError extends Error {
  constructor(
    message: string,
    public issues: string[]
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);

  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigError(`Invalid environment configuration: ${issues.join('; ')}`, issues);
  }

  const vars = parsed.data;
  return {
    nodeEnv: vars.NODE_ENV,
    port: vars.PORT,
    corsOrigin: vars.CORS_ORIGIN,
    llm: {
      apiKey: vars.ANTHROPIC_API_KEY || undefined,
      model: vars.CLAUDE_MODEL,
    },
    search: {
      apiKey: vars.SERPAPI_API_KEY || undefined,
      resultsPerQuery: vars.SEARCH_RESULTS_PER_QUERY,
    },
    sourcing: {
      topN: vars.SOURCING_TOP_N,
      resolveDelayMs: vars.SOURCING_RESOLVE_DELAY_MS,
    },
  };
}
