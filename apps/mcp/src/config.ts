import { z } from "zod";

const EnvSchema = z.object({
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error", "silent"]).default("info"),
  SCORELINE_MAX_GOALS: z.coerce.number().int().min(0).max(50).default(5),
  SCORELINE_TOP_K: z.coerce.number().int().min(0).default(5),
  SCORELINE_OU_LINE: z.coerce.number().finite().min(0).default(2.5),
  SCORELINE_TRUNCATION: z.enum(["discard", "renormalize"]).default("discard"),
});

export type AppConfig = {
  logLevel: z.infer<typeof EnvSchema>["LOG_LEVEL"];
  maxGoals: number;
  topK: number;
  line: number;
  truncation: z.infer<typeof EnvSchema>["SCORELINE_TRUNCATION"];
};

export function loadConfig(env: Record<string, string | undefined> = process.env): AppConfig {
  // blank values count as unset
  const present = Object.fromEntries(Object.entries(env).filter(([, v]) => v !== undefined && v !== ""));
  const parsed = EnvSchema.safeParse(present);
  if (!parsed.success) {
    const detail = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new Error(`Invalid configuration: ${detail}`);
  }

  const e = parsed.data;
  return {
    logLevel: e.LOG_LEVEL,
    maxGoals: e.SCORELINE_MAX_GOALS,
    topK: e.SCORELINE_TOP_K,
    line: e.SCORELINE_OU_LINE,
    truncation: e.SCORELINE_TRUNCATION,
  };
}
