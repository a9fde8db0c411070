export type ParseErrorKind = "MissingDelimiter" | "InvalidTimestamp";

export class AnnotationParseError extends Error {
  readonly kind: ParseErrorKind;
  readonly line: string;

  constructor(kind: ParseErrorKind, line: string) {
    super(
      kind === "MissingDelimiter"
        ? `Missing the space after the timestamp in "${line}"`
        : `Invalid timestamp in "${line}"`
    );
    this.name = "AnnotationParseError";
    this.kind = kind;
    this.line = line;
  }
}

/**
 * Raised when a line of the annotations file cannot be parsed. Loading stops at the
 * first such line; nothing is skipped.
 */
export class CorruptStoreError extends Error {
  readonly filePath: string;
  readonly lineNumber: number;

  constructor(filePath: string, lineNumber: number, cause: AnnotationParseError) {
    super(`Corrupt annotations file ${filePath} at line ${lineNumber}: ${cause.message}`, { cause });
    this.name = "CorruptStoreError";
    this.filePath = filePath;
    this.lineNumber = lineNumber;
  }
}

export class FutureTimestampError extends Error {
  readonly createdAt: number;
  readonly now: number;

  constructor(createdAt: number, now: number) {
    super(`Annotation timestamp ${createdAt} is in the future (now is ${now})`);
    this.name = "FutureTimestampError";
    this.createdAt = createdAt;
    this.now = now;
  }
}

export class HomeDirectoryError extends Error {
  constructor() {
    super("Failed to get the home directory: HOME is not set");
    this.name = "HomeDirectoryError";
  }
}

export class AnnotationContentError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "AnnotationContentError";
  }
}

export class SessionStateError extends Error {
  readonly state: string;
  readonly event: string;

  constructor(state: string, event: string) {
    super(`Cannot handle "${event}" while ${state}`);
    this.name = "SessionStateError";
    this.state = state;
    this.event = event;
  }
}

