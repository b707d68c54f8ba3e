import { Data } from "effect";

// Input file could not be read or structurally parsed
export class ParseError extends Data.TaggedError("ParseError")<{
  readonly message: string;
  readonly path: string;
  readonly cause?: unknown;
}> {}

// Parsed message has no usable Date
export class MissingDateError extends Data.TaggedError("MissingDateError")<{
  readonly message: string;
  readonly path: string;
  readonly dateRaw: string;
}> {}

// Shared rendering session could not be started
export class BrowserUnavailableError extends Data.TaggedError(
  "BrowserUnavailableError",
)<{
  readonly message: string;
  readonly renderer: string;
  readonly cause?: unknown;
}> {}

// HTML-to-PDF render failed for one document
export class RenderError extends Data.TaggedError("RenderError")<{
  readonly message: string;
  readonly cause?: unknown;
}> {}

// PDF bytes could not be written, even as a placeholder document
export class WriteError extends Data.TaggedError("WriteError")<{
  readonly message: string;
  readonly path: string;
  readonly cause?: unknown;
}> {}

// Output directory could not be created; aborts the batch
export class OutputDirectoryError extends Data.TaggedError(
  "OutputDirectoryError",
)<{
  readonly message: string;
  readonly path: string;
  readonly cause?: unknown;
}> {}

// Errors that end a single file's conversion
export type FileConversionError = ParseError | MissingDateError | WriteError;

export type AppError =
  | FileConversionError
  | BrowserUnavailableError
  | RenderError
  | OutputDirectoryError;
