import { z } from 'zod';
import { config as loadEnv } from 'dotenv';

loadEnv();

// z.coerce.boolean() treats any non-empty string as true, so "false" needs explicit handling
const booleanFlag = (fallback: boolean) =>
  z
    .union([z.boolean(), z.string()])
    .optional()
    .transform((value) => {
      if (value === undefined || value === '') {
        return fallback;
      }
      if (typeof value === 'boolean') {
        return value;
      }
      return ['1', 'true', 'yes', 'on'].includes(value.trim().toLowerCase());
    });

const envSchema = z.object({
  PROJECT_NAME: z.string().default('production-line-agent'),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace']).default('info'),

  OPENAI_API_KEY: z.string().optional(),
  OPENAI_BASE_URL: z.string().url().optional(),
  OPENAI_MODEL: z.string().default('gpt-4o'),
  LLM_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.2),

  MEMORY_DB_PATH: z.string().default('./data/memory.sqlite'),
  MEMORY_SUMMARY_INTERVAL: z.coerce.number().int().positive().default(12),
  MEMORY_CONTEXT_LIMIT: z.coerce.number().int().positive().default(8),

  REACT_ENABLED: booleanFlag(true),
  REACT_MAX_ITERATIONS: z.coerce.number().int().positive().default(5),
  TOOL_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),

  MCP_TRANSPORT: z.enum(['stdio', 'http']).default('stdio'),
  MCP_SERVER_COMMAND: z.string().default('production-line-mcp'),
  // Whitespace-separated argument list for the stdio server command
  MCP_SERVER_ARGS: z.string().default(''),
  MCP_SERVER_URL: z.string().url().default('http://localhost:8001/mcp'),
  MCP_CONNECT_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),

  PROMPTS_DIR: z.string().default('./backend/prompts'),

  ENABLE_TRACING: booleanFlag(false),
  OTEL_SERVICE_NAME: z.string().default('production-line-agent'),
  OTEL_EXPORTER_OTLP_ENDPOINT: z.string().url().optional()
});

export type AppConfig = z.infer<typeof envSchema>;

export const config = envSchema.parse({ ...process.env });
export const isDevelopment = config.NODE_ENV === 'development';
export const isProduction = config.NODE_ENV === 'production';
export const isTest = config.NODE_ENV === 'test';
