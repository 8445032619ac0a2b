export class AssistError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "AssistError";
  }
}

/** Missing or unusable configuration, such as an absent API key or an empty default model. */
export class ConfigurationError extends AssistError {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

export class ServiceError extends AssistError {
  constructor(
    readonly status: number,
    readonly body: string,
  ) {
    super(`Chat completion request failed (${status}): ${body}`);
    this.name = "ServiceError";
  }
}

export class TransportError extends AssistError {
  constructor(
    message: string,
    readonly code?: string,
  ) {
    super(message);
    this.name = "TransportError";
  }
}

export class FrameDecodeError extends AssistError {
  constructor(
    readonly line: string,
    reason: string,
  ) {
    super(`Failed to decode stream frame: ${reason}`);
    this.name = "FrameDecodeError";
  }
}

export class SerializationError extends AssistError {
  constructor(message: string) {
    super(message);
    this.name = "SerializationError";
  }
}

export class InvalidSelectionError extends AssistError {
  constructor(message: string) {
    super(message);
    this.name = "InvalidSelectionError";
  }
}

export function toErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function errorCode(error: unknown): string | undefined {
  if (
    typeof error === "object" &&
    error !== null &&
    "code" in error &&
    typeof error.code === "string"
  ) {
    return error.code;
  }
  return undefined;
}
