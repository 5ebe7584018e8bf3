import { config } from 'dotenv';
import { z } from 'zod';

// Load environment variables from .env file
config();

const booleanFlag = z
  .string()
  .default('false')
  .transform((val) => val === 'true');

// Define environment variable schema with Zod for type-safe validation
const envSchema = z.object({
  // Node environment
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

  // Server configuration
  PORT: z.string().default('3000').transform(Number),

  // Supabase configuration (required)
  SUPABASE_URL: z.string().url('Invalid Supabase URL'),
  SUPABASE_SERVICE_ROLE_KEY: z.string().min(1, 'Supabase service role key is required'),

  // Authentication
  TOKEN_TTL_MINUTES: z.string().default('60').transform(Number),
  BCRYPT_ROUNDS: z.string().default('10').transform(Number),

  // Rate limiting (off unless explicitly enabled)
  RATE_LIMIT_ENABLED: booleanFlag,
  RATE_LIMIT_WINDOW_MS: z.string().default('60000').transform(Number),
  RATE_LIMIT_MAX: z.string().default('100').transform(Number),

  // Logging configuration
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'debug']).default('info'),
  LOG_DIR: z.string().default('logs'),

  // CORS configuration, comma separated or '*'
  ALLOWED_ORIGINS: z.string().default('*'),
});

// Parse and validate environment variables
const parsed = envSchema.safeParse(process.env);

if (!parsed.success) {
  const errorMessage = `❌ Invalid environment variables: ${JSON.stringify(parsed.error.format(), null, 2)}`;
  console.error(errorMessage);
  throw new Error(errorMessage);
}

// Export validated environment variables
export const env = parsed.data;

export const TOKEN_TTL_MS = env.TOKEN_TTL_MINUTES * 60 * 1000;

export const allowedOrigins = (): string[] | '*' => {
  if (env.ALLOWED_ORIGINS.trim() === '*') return '*';
  return env.ALLOWED_ORIGINS.split(',')
    .map((origin) => origin.trim())
    .filter((origin) => origin.length > 0);
};

// Log environment on startup
if (env.NODE_ENV !== 'test') {
  console.log('✅ Environment variables validated successfully');
  console.log(`📝 Environment: ${env.NODE_ENV}`);
  console.log(`🚀 Port: ${env.PORT}`);
  console.log(`🔑 Session lifetime: ${env.TOKEN_TTL_MINUTES} minutes`);
  console.log(`🚦 Rate limiting: ${env.RATE_LIMIT_ENABLED ? 'enabled' : 'disabled'}`);
}
