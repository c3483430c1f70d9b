import { randomUUID } from "node:crypto";
import type { CorrelationId } from "./types.js";

const UUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

export function asCorrelationId(value: string): CorrelationId {
  return value as CorrelationId;
}

export function newCorrelationId(): CorrelationId {
  return asCorrelationId(randomUUID());
}

/**
 * Reuses a well-formed id carried by a job payload, otherwise mints a new one.
 */
export function resolveCorrelationId(value: unknown): CorrelationId {
  if (typeof value === "string" && UUID_PATTERN.test(value.trim())) {
    return asCorrelationId(value.trim());
  }
  return newCorrelationId();
}
