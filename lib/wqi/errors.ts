// lib/wqi/errors.ts

export type ParameterName =
  | "ph"
  | "bod"
  | "dissolvedOxygen"
  | "fecalColiform"
  | "waterTemperature";

// "reading" when the input as a whole is unusable
export type ErrorSubject = ParameterName | "reading";

export class InvalidParameterError extends Error {
  readonly parameter: ErrorSubject;
  readonly value: unknown;

  constructor(parameter: ErrorSubject, value: unknown, reason: string) {
    super(`Invalid ${parameter}: ${reason}`);
    this.name = "InvalidParameterError";
    this.parameter = parameter;
    this.value = value;
  }
}

export function isInvalidParameterError(
  err: unknown
): err is InvalidParameterError {
  return err instanceof InvalidParameterError;
}
