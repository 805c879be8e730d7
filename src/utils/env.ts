import dotenv from "dotenv";
import type { ClientOptions } from "../client";
import { isLogLevel, logger } from "./logger";
import { Infer, v } from "./validator";

export const envSchema = v.object({
  GUILDED_TOKEN: v.string().isNotEmpty(),
  GUILDED_MODE: v.string().enum(["bot", "userbot"] as const).optional(),
  GUILDED_MAX_MESSAGES: v
    .string()
    .custom((value) => value === "none" || /^[0-9]+$/.test(value))
    .optional(),
  GUILDED_GATEWAY_URL: v.string().url().optional(),
  GUILDED_REST_URL: v.string().url().optional(),
  LOG_LEVEL: v.string().custom(isLogLevel).optional(),
});

export type Env = Infer<typeof envSchema>;

/** Reads `.env` into `process.env` and validates it */
export const loadEnv = (): Env => {
  dotenv.config();
  return envSchema.parse(process.env);
};

/** `GUILDED_MAX_MESSAGES=none` turns the message cache off */
const parseMaxMessages = (value: string | undefined) => {
  if (value === undefined) return undefined;
  return value === "none" ? null : Number(value);
};

export const clientOptionsFromEnv = (env: Env = loadEnv()): ClientOptions => {
  if (isLogLevel(env.LOG_LEVEL)) {
    logger.setLevel(env.LOG_LEVEL);
  }

  return {
    token: env.GUILDED_TOKEN,
    mode: env.GUILDED_MODE,
    maxMessages: parseMaxMessages(env.GUILDED_MAX_MESSAGES),
    gatewayUrl: env.GUILDED_GATEWAY_URL,
    restUrl: env.GUILDED_REST_URL,
  };
};
