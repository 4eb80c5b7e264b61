import type { ZodError } from "zod";

export class SnapshotFormatError extends Error {
  constructor(message: string, cause?: ZodError | SyntaxError) {
    super(message, { cause });
    this.name = "SnapshotFormatError";
  }
}
