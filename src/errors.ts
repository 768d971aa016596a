export type ServiceErrorKind = "timeout" | "quota" | "malformed-response" | "unavailable";

export class ChannelError extends Error {
  override readonly name = "ChannelError";

  constructor(readonly channelId: string, message: string, options?: ErrorOptions) {
    super(message, options);
  }
}

export class ServiceError extends Error {
  override readonly name = "ServiceError";

  constructor(readonly kind: ServiceErrorKind, message: string, options?: ErrorOptions) {
    super(message, options);
  }
}

export class DeliveryError extends Error {
  override readonly name = "DeliveryError";

  constructor(readonly recipientId: string, message: string, options?: ErrorOptions) {
    super(message, options);
  }
}

/** Anything that escaped a scheduled run. The run counts as fired anyway. */
export class SchedulerFault extends Error {
  override readonly name = "SchedulerFault";

  constructor(readonly date: string, options?: ErrorOptions) {
    super(`Scheduled run for ${date} failed: ${describeError(options?.cause)}`, options);
  }
}

export class RunTimeoutError extends Error {
  override readonly name = "RunTimeoutError";

  constructor(readonly timeoutMs: number) {
    super(`Run exceeded ${timeoutMs}ms`);
  }
}

export class SchedulerBusyError extends Error {
  override readonly name = "SchedulerBusyError";

  constructor() {
    super("A digest run is already in progress");
  }
}

export class ConfigError extends Error {
  override readonly name = "ConfigError";

  constructor(readonly issues: string[]) {
    super(`Invalid configuration:\n  ${issues.join("\n  ")}`);
  }
}

export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
