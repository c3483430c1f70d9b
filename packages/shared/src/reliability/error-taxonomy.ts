export enum ErrorClass {
  TRANSIENT = "TRANSIENT",
  PERMANENT = "PERMANENT",
  IGNORE = "IGNORE"
}

export type ClassifiedError = {
  class: ErrorClass;
  reason: string;
  code?: string;
};

const NODE_TRANSIENT_CODES = new Set([
  "ECONNRESET",
  "ETIMEDOUT",
  "EAI_AGAIN",
  "ECONNREFUSED",
  "EPIPE",
  "ENOTFOUND"
]);

// serialization_failure, deadlock_detected, too_many_connections,
// admin_shutdown, crash_shutdown, cannot_connect_now
const POSTGRES_TRANSIENT_SQLSTATE = new Set(["40001", "40P01", "53300", "57P01", "57P02", "57P03"]);

// Class 08: connection exception
const POSTGRES_CONNECTION_CLASS = "08";

// Class 42: syntax error or access rule violation (usually a missing migration)
const POSTGRES_SCHEMA_CLASS = "42";

const TRANSIENT_MESSAGE_PATTERNS = [
  /connection terminated/i,
  /connection is closed/i,
  /timeout exceeded when trying to connect/i
];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

function readString(value: unknown, key: string): string | undefined {
  if (!isRecord(value)) {
    return undefined;
  }
  const candidate = value[key];
  return typeof candidate === "string" ? candidate : undefined;
}

function extractCode(value: unknown): string | undefined {
  const code = readString(value, "code") ?? readString(value, "errno");
  return code?.toUpperCase();
}

function extractMessage(value: unknown): string | undefined {
  if (value instanceof Error) {
    return value.message;
  }
  return readString(value, "message");
}

function isSqlState(code: string | undefined): code is string {
  return typeof code === "string" && /^[0-9A-Z]{5}$/.test(code) && !code.startsWith("E");
}

export function classifyError(err: unknown): ClassifiedError {
  try {
    const code = extractCode(err);
    const message = extractMessage(err);

    if (code === "23505") {
      return { class: ErrorClass.IGNORE, reason: "duplicate_key", code };
    }

    if (code && NODE_TRANSIENT_CODES.has(code)) {
      return { class: ErrorClass.TRANSIENT, reason: "network_code", code };
    }

    if (isSqlState(code)) {
      if (POSTGRES_TRANSIENT_SQLSTATE.has(code) || code.startsWith(POSTGRES_CONNECTION_CLASS)) {
        return { class: ErrorClass.TRANSIENT, reason: "postgres_transient_sqlstate", code };
      }
      if (code.startsWith(POSTGRES_SCHEMA_CLASS)) {
        return { class: ErrorClass.PERMANENT, reason: "postgres_schema_error", code };
      }
      return { class: ErrorClass.PERMANENT, reason: "postgres_sqlstate", code };
    }

    if (message && TRANSIENT_MESSAGE_PATTERNS.some((pattern) => pattern.test(message))) {
      return { class: ErrorClass.TRANSIENT, reason: "connection_message", code };
    }

    return { class: ErrorClass.PERMANENT, reason: "default_permanent", code };
  } catch {
    return { class: ErrorClass.PERMANENT, reason: "classification_fallback" };
  }
}
