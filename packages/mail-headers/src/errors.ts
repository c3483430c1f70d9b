export class HeaderParseError extends Error {
  readonly value: string;
  readonly position: number;

  constructor(input: { value: string; position: number; message: string }) {
    super(`${input.message} at offset ${input.position}`);
    this.name = "HeaderParseError";
    this.value = input.value;
    this.position = input.position;
  }
}
