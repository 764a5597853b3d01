// Morse Tree Codec: Environment Configuration

import { z } from "zod";
import { ConfigError } from "./errors.js";
import { LOG_LEVELS } from "./util/logger.js";

const signal = (fallback: string) =>
  z
    .string()
    .length(1, "must be a single character")
    .refine((s) => s !== "\0" && s.charCodeAt(0) <= 0xff, "must be a character between 0x01 and 0xff")
    .default(fallback);

const ConfigSchema = z
  .object({
    MORSE_LOG_LEVEL: z.enum(LOG_LEVELS).default("warn"),
    MORSE_DOT: signal("."),
    MORSE_DASH: signal("-"),
    NO_COLOR: z.string().optional(),
  })
  .refine((env) => env.MORSE_DOT !== env.MORSE_DASH, {
    message: "must differ from MORSE_DOT",
    path: ["MORSE_DASH"],
  });

export interface MorseConfig {
  logLevel: z.infer<typeof ConfigSchema>["MORSE_LOG_LEVEL"];
  dot: string;
  dash: string;
  color: boolean;
}

/** Read and validate the `MORSE_*` variables. Empty values count as unset. */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): MorseConfig {
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== ""),
  );
  const parsed = ConfigSchema.safeParse(present);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`);
    throw new ConfigError(`Invalid configuration: ${issues.join("; ")}`, issues);
  }

  const cfg = parsed.data;
  return {
    logLevel: cfg.MORSE_LOG_LEVEL,
    dot: cfg.MORSE_DOT,
    dash: cfg.MORSE_DASH,
    color: cfg.NO_COLOR === undefined,
  };
}
