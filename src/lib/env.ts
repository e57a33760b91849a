import { z } from "zod";

const EnvSchema = z.object({
  ARTIFACTS_BUCKET: z.string().optional(),
  AWS_REGION: z.string().optional(),
  OPENAI_API_KEY: z.string().optional(),
  OPENAI_MODEL: z.string().optional().default("gpt-4.1"),
  ENRICHMENT_ENABLED: z
    .enum(["true", "false"])
    .optional()
    .default("false")
    .transform((value) => value === "true"),
  DESCRIPTION_EXPANSION_ENABLED: z
    .enum(["true", "false"])
    .optional()
    .default("true")
    .transform((value) => value === "true"),
  ENRICHMENT_BATCH_SIZE: z.coerce.number().int().positive().optional().default(5),
  LOG_LEVEL: z.string().optional().default("info"),
});

type EnvConfig = z.infer<typeof EnvSchema>;

let cached: EnvConfig | null = null;

export function getEnv(): EnvConfig {
  if (!cached) {
    cached = EnvSchema.parse(process.env);
  }
  return cached;
}

export function resetEnvCache() {
  cached = null;
}
