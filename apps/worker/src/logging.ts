import { pino, type DestinationStream, type Logger } from "pino";
import type { CorrelationId, NormalizationDiagnostic } from "@list-archive/shared";
import type { LogLevel } from "./config.js";

export type { Logger };

export type LogDestination = DestinationStream;

export type StructuredLogContext = {
  mailingList?: string;
  uidvalidity?: number;
  uid?: number;
  stage?: string;
  queueName?: string;
  jobId?: string;
  correlationId?: CorrelationId;
};

export type StructuredLogEvent = StructuredLogContext & {
  event: string;
  elapsedMs?: number;
  startedAt?: string;
  attempt?: number;
  maxAttempts?: number;
  messageCount?: number;
  errorClass?: string;
  errorCode?: string;
  errorMessage?: string;
  errorStack?: string;
};

export function createLogger(
  input: { level: LogLevel; name: string },
  destination?: LogDestination
): Logger {
  const options = {
    name: input.name,
    level: input.level,
    timestamp: pino.stdTimeFunctions.isoTime,
    base: { pid: process.pid }
  };
  return destination ? pino(options, destination) : pino(options);
}

export function toStructuredLogContext(context: StructuredLogContext): StructuredLogContext {
  return {
    mailingList: context.mailingList,
    uidvalidity: context.uidvalidity,
    uid: context.uid,
    stage: context.stage,
    queueName: context.queueName,
    jobId: context.jobId,
    correlationId: context.correlationId
  };
}

export function toStructuredLogEvent(
  context: StructuredLogContext,
  event: string,
  extra?: Omit<StructuredLogEvent, keyof StructuredLogContext | "event">
): StructuredLogEvent {
  return {
    ...toStructuredLogContext(context),
    event,
    elapsedMs: extra?.elapsedMs,
    startedAt: extra?.startedAt,
    attempt: extra?.attempt,
    maxAttempts: extra?.maxAttempts,
    messageCount: extra?.messageCount,
    errorClass: extra?.errorClass,
    errorCode: extra?.errorCode,
    errorMessage: extra?.errorMessage,
    errorStack: extra?.errorStack
  };
}

export function toLogError(error: unknown): { message: string; stack?: string; code?: string } {
  if (error instanceof Error) {
    const code = "code" in error ? error.code : undefined;
    return {
      message: error.message,
      stack: error.stack,
      code: typeof code === "string" ? code : undefined
    };
  }

  return {
    message: String(error)
  };
}

export function logDiagnostics(
  logger: Logger,
  context: StructuredLogContext,
  diagnostics: readonly NormalizationDiagnostic[]
): void {
  for (const diagnostic of diagnostics) {
    logger.debug(
      { ...toStructuredLogContext(context), field: diagnostic.field, code: diagnostic.code, detail: diagnostic.detail },
      "message.diagnostic"
    );
  }
}
