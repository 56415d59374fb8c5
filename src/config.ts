import "dotenv/config";
import { z } from "zod";

const Env = z.object({
  DB_FILE: z.string().min(1).default("./data/smartnus.sqlite"),
  SEED_FILE: z.string().min(1).default("./data/sample-questions.json"),
  LOG_LEVEL: z
    .enum(["error", "warn", "info", "http", "verbose", "debug", "silly"])
    .optional(),
  NODE_ENV: z.string().optional(),
});

export type AppConfig = z.infer<typeof Env>;

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return Env.parse(env);
}
