export { setTimeout as sleep } from "node:timers/promises";

export const toError = (value: unknown): Error =>
  value instanceof Error ? value : new Error(String(value));

export const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);
