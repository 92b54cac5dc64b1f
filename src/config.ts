import type { LevelWithSilent } from "pino";
import * as v from "valibot";
import { ConfigError } from "./core/errors";
import type { ProtocolConfig } from "./core/types";
import { asSeconds } from "./types/brands";
import { isHex, type Hex } from "./utils/bytes";

const LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;

const seconds = v.pipe(
  v.string(),
  v.regex(/^\d+$/, "expected a non-negative integer number of seconds"),
  v.transform((s) => asSeconds(BigInt(s))),
);

const envSchema = v.object({
  PAYROLL_INSTANCE_ID: v.custom<Hex>((s) => isHex(s, 32), "expected a 32-byte 0x-prefixed hex string"),
  PAYROLL_SUBMISSION_COOLDOWN: v.optional(seconds, "60"),
  PAYROLL_DECRYPTION_COOLDOWN: v.optional(seconds, "60"),
  LOG_LEVEL: v.optional(v.picklist(LEVELS), "info"),
});

export type AppConfig = {
  protocol: ProtocolConfig;
  logLevel: LevelWithSilent;
};

export const loadConfig = (env: Record<string, string | undefined> = process.env): AppConfig => {
  const res = v.safeParse(envSchema, env);
  if (!res.success)
    throw new ConfigError(res.issues.map((i) => `${v.getDotPath(i) ?? "env"}: ${i.message}`));
  const o = res.output;
  return {
    protocol: {
      instanceId: o.PAYROLL_INSTANCE_ID,
      submissionCooldown: o.PAYROLL_SUBMISSION_COOLDOWN,
      decryptionCooldown: o.PAYROLL_DECRYPTION_COOLDOWN,
    },
    logLevel: o.LOG_LEVEL,
  };
};
