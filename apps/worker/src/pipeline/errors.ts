import { ZodError } from "zod";
import { ErrorClass, classifyError } from "@list-archive/shared";
import { ArchiveFileError, ConfigError } from "../errors.js";

const MAX_MESSAGE_CHARS = 500;
const MAX_STACK_CHARS = 2000;

export type SerializedError = {
  name: string;
  message: string;
  code?: string;
  stack?: string;
};

function truncate(value: string | undefined, maxChars: number): string | undefined {
  if (!value) {
    return undefined;
  }
  return value.length > maxChars ? `${value.slice(0, maxChars)}…` : value;
}

export function serializeError(error: unknown): SerializedError {
  if (error instanceof Error) {
    const code = "code" in error ? error.code : undefined;
    return {
      name: error.name,
      message: truncate(error.message, MAX_MESSAGE_CHARS) ?? "Unknown error",
      code: typeof code === "string" ? code : undefined,
      stack: truncate(error.stack, MAX_STACK_CHARS)
    };
  }

  return {
    name: "UnknownError",
    message: truncate(String(error), MAX_MESSAGE_CHARS) ?? "Unknown error"
  };
}

const PERMANENT_STORE_REASONS = new Set(["postgres_schema_error", "postgres_sqlstate"]);

function hasPermanentFlag(error: unknown): boolean {
  return typeof error === "object" && error !== null && "permanent" in error && error.permanent === true;
}

/**
 * A permanent error fails the same way on every attempt: broken export files,
 * bad configuration, schema errors in the store and programming errors.
 */
export function isPermanentError(error: unknown): boolean {
  if (error instanceof ArchiveFileError || error instanceof ConfigError || error instanceof ZodError) {
    return true;
  }

  if (hasPermanentFlag(error)) {
    return true;
  }

  if (error instanceof TypeError || error instanceof SyntaxError || error instanceof RangeError) {
    return true;
  }

  const classified = classifyError(error);
  return classified.class === ErrorClass.PERMANENT && PERMANENT_STORE_REASONS.has(classified.reason);
}
