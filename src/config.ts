import "dotenv/config";
import { z } from "zod";

const envSchema = z.object({
  DATABASE_PATH: z.string().min(1).default("./data/trip-ledger.db"),
  PORT: z.coerce.number().int().positive().default(3000),
  EXTREME_PERCENT_THRESHOLD: z.coerce.number().positive().default(50),
  TRANSFER_STRATEGY: z.enum(["pairwise", "greedy"]).default("pairwise"),
});

export type AppConfig = z.infer<typeof envSchema>;

/**
 * Read configuration from the environment (.env is loaded first)
 * @throws Error listing every invalid variable
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new Error(`Invalid configuration: ${problems.join(", ")}`);
  }
  return parsed.data;
}
