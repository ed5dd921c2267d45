import path from "node:path";
import { fileURLToPath } from "node:url";
import { z } from "zod";
import { ConfigurationError } from "./core/errors.js";
import type { LogLevel } from "./core/log.js";

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

const settingsSchema = z.object({
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error", "silent"]).default("info"),
  // Contracts live at the repo root unless deployed elsewhere
  CONTRACTS_DIR: z.string().min(1).optional(),
  WATERFALL_VERIFY: z
    .enum(["true", "false"])
    .default("true")
    .transform((value) => value === "true"),
  // Annual rate for LLCR and PLCR
  WATERFALL_DISCOUNT_RATE: z.coerce.number().min(0).default(0.052),
});

export interface EngineSettings {
  logLevel: LogLevel;
  contractsDir: string;
  verify: boolean;
  discountRate: number;
}

export function loadSettings(env: NodeJS.ProcessEnv = process.env): EngineSettings {
  const parsed = settingsSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigurationError(
      parsed.error.issues.map((issue) => ({
        path: `env.${issue.path.join(".")}`,
        message: issue.message,
      })),
    );
  }

  return {
    logLevel: parsed.data.LOG_LEVEL,
    contractsDir: parsed.data.CONTRACTS_DIR ?? path.resolve(__dirname, "..", "..", "..", "contracts"),
    verify: parsed.data.WATERFALL_VERIFY,
    discountRate: parsed.data.WATERFALL_DISCOUNT_RATE,
  };
}

export function contractSchemaPath(settings: Pick<EngineSettings, "contractsDir">): string {
  return path.join(settings.contractsDir, "waterfall_engine_v1.schema.json");
}
