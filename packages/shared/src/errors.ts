export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

/** The camera's event subscription or pull loop broke; the supervisor restarts it. */
export class SourceUnavailable extends Error {
  constructor(
    readonly camera: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(`${camera}: event source unavailable: ${message}`, options);
    this.name = "SourceUnavailable";
  }
}

export class CaptureFailed extends Error {
  constructor(
    readonly reason: string,
    options?: { cause?: unknown }
  ) {
    super(`capture failed: ${reason}`, options);
    this.name = "CaptureFailed";
  }
}

export class DeliveryFailed extends Error {
  constructor(
    readonly reason: string,
    options?: { cause?: unknown }
  ) {
    super(`delivery failed: ${reason}`, options);
    this.name = "DeliveryFailed";
  }
}

export class ConfigurationError extends Error {
  constructor(readonly issues: string[]) {
    super(`invalid configuration: ${issues.join("; ")}`);
    this.name = "ConfigurationError";
  }
}
