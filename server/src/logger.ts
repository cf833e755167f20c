import { pino } from "pino";
import type { Logger } from "pino";
import { APP_NAME_SLUG, LOGGER, LOG_LEVEL } from "./config.js";

/** Process-wide logger. Fastify uses it as its instance logger; services get it by injection. */
export const logger: Logger = pino({
  name: APP_NAME_SLUG,
  level: LOG_LEVEL,
  enabled: LOGGER,
});

/** Redact email for logging (avoid logging the address in plain text). */
export function redactEmail(email: string): string {
  const s = email.trim();
  if (!s || !s.includes("@")) return "(invalid)";
  const [local, domain] = s.split("@");
  if (!domain) return "(invalid)";
  const showLocal = local.length <= 2 ? "**" : local.slice(0, 1) + "***";
  return `${showLocal}@${domain}`;
}
