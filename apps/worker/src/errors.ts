export class ArchiveFileError extends Error {
  readonly path: string;
  readonly permanent = true;

  constructor(input: { path: string; reason: string; cause?: unknown }) {
    super(`Cannot read archive file ${input.path}: ${input.reason}`, { cause: input.cause });
    this.name = "ArchiveFileError";
    this.path = input.path;
  }
}

export class ConfigError extends Error {
  readonly issues: string[];
  readonly permanent = true;

  constructor(input: { issues: string[] }) {
    super(`Invalid worker configuration: ${input.issues.join("; ")}`);
    this.name = "ConfigError";
    this.issues = input.issues;
  }
}
