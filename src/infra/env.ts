import { z, ZodError } from 'zod';

/**
 * Environment variable schema with strict validation
 */
const envSchema = z
  .object({
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
    HOST: z.string().default('0.0.0.0'),
    PORT: z.coerce.number().int().default(8080),

    // Persistence
    STORAGE_BACKEND: z.enum(['sqlite', 'memory']).default('sqlite'),
    SQLITE_DB_PATH: z.string().default('./data/soundwatch.db'),

    // Logging
    LOG_LEVEL: z.enum(['error', 'warn', 'info', 'debug']).default('info'),
    LOG_FILE: z.string().optional(),

    // Live feed
    BROADCAST_QUEUE_CAPACITY: z.coerce
      .number()
      .int()
      .min(1, { message: 'BROADCAST_QUEUE_CAPACITY must be at least 1' })
      .default(32),
    SSE_HEARTBEAT_MS: z.coerce.number().int().min(1000).default(30000),

    // Reading source
    SOURCE: z.enum(['none', 'serial', 'simulator']).default('none'),
    SERIAL_PORT: z.string().optional(),
    SERIAL_BAUD: z.coerce.number().int().default(9600),
    SERIAL_PATIENT_ID: z.string().min(1).default('demo-patient-1'),
    SERIAL_DEVICE_ID: z.string().optional(),
    SERIAL_UNIT: z.string().min(1).default('raw'),
    SOURCE_BACKOFF_INITIAL_MS: z.coerce.number().int().min(1).default(250),
    SOURCE_BACKOFF_MAX_MS: z.coerce.number().int().min(1).default(5000),
    SIMULATOR_INTERVAL_MS: z.coerce.number().int().min(10).default(300),
    SIMULATOR_PATIENT_ID: z.string().min(1).default('demo-patient-1'),

    // ML collaborator (unset disables the /api/ml routes)
    ML_SERVICE_URL: z.string().url().optional(),
    ML_SERVICE_TIMEOUT_MS: z.coerce.number().int().min(100).default(10000),

    // Periodic operational stats (0 disables)
    STATS_INTERVAL_MINUTES: z.coerce.number().int().min(0).default(0),
  })
  .superRefine((env, ctx) => {
    if (env.SOURCE === 'serial' && !env.SERIAL_PORT) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['SERIAL_PORT'],
        message: 'SERIAL_PORT is required when SOURCE=serial',
      });
    }
    if (env.SOURCE_BACKOFF_MAX_MS < env.SOURCE_BACKOFF_INITIAL_MS) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['SOURCE_BACKOFF_MAX_MS'],
        message: 'SOURCE_BACKOFF_MAX_MS must be >= SOURCE_BACKOFF_INITIAL_MS',
      });
    }
  });

export type Env = z.infer<typeof envSchema>;

/**
 * Parses environment variables, throwing ZodError on invalid input
 */
export function parseEnv(source: NodeJS.ProcessEnv): Env {
  return envSchema.parse(source);
}

/**
 * Validates and parses environment variables
 * Exits process with code 1 if validation fails (fail-fast principle)
 */
export function validateEnv(): Env {
  try {
    return parseEnv(process.env);
  } catch (error) {
    if (error instanceof ZodError) {
      console.error('❌ Environment validation failed:');
      error.issues.forEach((err) => {
        console.error(`  - ${err.path.join('.')}: ${err.message}`);
      });
      console.error('\nCheck .env.example for required variables');
      process.exit(1);
    }
    throw error;
  }
}
