import { isAxiosError } from "axios";

/** Stops a stage before any processing; the CLI exits nonzero. */
export class FatalError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class ConfigError extends FatalError {}

export class InputError extends FatalError {}

export function errorMessage(err: unknown): string {
  if (isAxiosError(err)) {
    const status = err.response?.status;
    return status ? `HTTP ${status}: ${err.message}` : err.message;
  }
  if (err instanceof Error) return err.message;
  return String(err);
}
