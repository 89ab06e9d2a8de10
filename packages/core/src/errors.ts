export class BackendError extends Error {
  readonly status: number;
  readonly body: string;

  constructor(message: string, status: number, body: string) {
    super(message);
    this.name = "BackendError";
    this.status = status;
    this.body = body;
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

function errorName(value: unknown): string {
  if (value && typeof value === "object" && "name" in value && typeof value.name === "string") {
    return value.name;
  }
  return "";
}

/**
 * True for errors produced by an aborted or timed-out signal. Supersession and
 * deadline expiry are reported the same way, and neither is shown to the user.
 */
export function isAbortError(error: unknown): boolean {
  let current: unknown = error;
  for (let depth = 0; depth < 5 && current; depth += 1) {
    const name = errorName(current);
    if (name === "AbortError" || name === "TimeoutError") return true;
    current = current instanceof Error ? current.cause : undefined;
  }
  return false;
}

/** True only when the deadline expired, as opposed to a cancellation. */
export function isTimeoutError(error: unknown): boolean {
  return errorName(error) === "TimeoutError";
}

export function toError(value: unknown): Error {
  if (value instanceof Error) return value;
  if (typeof value === "string") return new Error(value);
  try {
    return new Error(JSON.stringify(value));
  } catch {
    return new Error(String(value));
  }
}

export function formatError(error: Error): string {
  const lines = [error.message];
  if (error instanceof BackendError && error.body.trim()) {
    lines.push("", `HTTP ${error.status}`, error.body.trim());
  }
  let cause = error.cause;
  while (cause instanceof Error) {
    lines.push(`caused by: ${cause.message}`);
    cause = cause.cause;
  }
  return lines.join("\n");
}
