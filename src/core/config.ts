import { z } from 'zod';

function tryJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

// An executable path (spaces allowed, nothing is split), or a JSON array of
// the executable followed by its leading arguments.
const CommandSchema = z
  .string()
  .min(1)
  .transform((value, ctx): string[] => {
    if (!value.trimStart().startsWith('[')) return [value];
    const argv = z.array(z.string().min(1)).min(1).safeParse(tryJson(value));
    if (!argv.success) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'expected an executable path or a JSON array of strings' });
      return z.NEVER;
    }
    return argv.data;
  });

const EnvSchema = z.object({
  GANTRY_PORT: z.coerce.number().int().positive().default(4188),
  GANTRY_BIND: z.string().default('127.0.0.1'),
  GANTRY_DB_PATH: z.string().default('.gantry/gantry.sqlite'),
  GANTRY_RATE_LIMIT_RPM: z.coerce.number().int().positive().default(300),
  GANTRY_LOG_LEVEL: z
    .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
    .default('info'),
  GANTRY_POLL_INTERVAL_MS: z.coerce.number().int().positive().default(5000),
  GANTRY_QUEUE_POLL_INTERVAL_MS: z.coerce.number().int().positive().default(1000),
  GANTRY_MAX_CHUNK_ATTEMPTS: z.coerce.number().int().min(1).default(3),
  GANTRY_PROGRESS_QUEUE_SIZE: z.coerce.number().int().min(1).default(1000),
  GANTRY_WORKER_ID: z.string().min(1).default('chunk-worker'),
  GANTRY_PLANNER_CMD: CommandSchema.optional(),
  GANTRY_GENERATOR_CMD: CommandSchema.optional(),
  GANTRY_INTEGRATOR_CMD: CommandSchema.optional(),
  GANTRY_COLLABORATOR_TIMEOUT_MS: z.coerce.number().int().positive().default(600_000)
});

export type GantryConfig = z.infer<typeof EnvSchema>;

export function loadConfig(env: NodeJS.ProcessEnv): GantryConfig {
  // If you use dotenv, load it before calling this function.
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const msg = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('\n');
    throw new Error(`Invalid configuration:\n${msg}`);
  }
  return parsed.data;
}
