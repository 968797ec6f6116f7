/**
 * Raised synchronously whenever a model input would make the arithmetic
 * meaningless (zero field of view, empty constellation, NaN coordinates).
 */
export class InvalidParameterError extends Error {
  readonly parameter: string;
  readonly value: unknown;

  constructor(parameter: string, value: unknown, reason: string) {
    super(`Invalid ${parameter} (${String(value)}): ${reason}`);
    this.name = 'InvalidParameterError';
    this.parameter = parameter;
    this.value = value;
  }
}
