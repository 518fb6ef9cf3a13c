import dotenv from "dotenv";
import { z } from "zod";

dotenv.config();

const sharedEnvSchema = z.object({
  OUTPUT_DIR: z.string().min(1).default("./attachments"),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace"])
    .default("info"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),
});

type SharedEnv = z.infer<typeof sharedEnvSchema>;

export type SharedConfig = {
  env: SharedEnv["NODE_ENV"];
  logLevel: SharedEnv["LOG_LEVEL"];
  output: { dir: SharedEnv["OUTPUT_DIR"] };
};

let cachedSharedConfig: SharedConfig | undefined;

export function loadSharedConfig(): SharedConfig {
  if (cachedSharedConfig) {
    return cachedSharedConfig;
  }

  const parsed = sharedEnvSchema.safeParse(process.env);

  if (!parsed.success) {
    console.error("❌ Invalid environment variables:");
    console.error(parsed.error.flatten().fieldErrors);
    process.exit(1);
  }

  const env = parsed.data;

  cachedSharedConfig = {
    env: env.NODE_ENV,
    logLevel: env.LOG_LEVEL,
    output: {
      dir: env.OUTPUT_DIR,
    },
  };

  return cachedSharedConfig;
}
