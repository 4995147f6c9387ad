import {
  EXIT_AUTH,
  EXIT_CONFIG,
  EXIT_INPUT,
  EXIT_OPENAI,
  EXIT_OUTPUT,
  EXIT_RATE_LIMIT,
} from "../constants";
import { CliError } from "./cli-error";

/** Missing default input files or required settings. */
export class ConfigurationError extends CliError {
  constructor(message: string) {
    super(message, EXIT_CONFIG);
    this.name = "ConfigurationError";
  }
}

/** An input file that cannot be read, decoded or parsed. */
export class InputError extends CliError {
  constructor(message: string) {
    super(message, EXIT_INPUT);
    this.name = "InputError";
  }
}

export class AuthenticationError extends CliError {
  constructor(message: string) {
    super(message, EXIT_AUTH);
    this.name = "AuthenticationError";
  }
}

export class RateLimitError extends CliError {
  readonly retryAfter?: string;

  constructor(message: string, retryAfter?: string) {
    super(message, EXIT_RATE_LIMIT);
    this.name = "RateLimitError";
    this.retryAfter = retryAfter;
  }
}

/** Any other failure of the remote text-generation service. */
export class RemoteServiceError extends CliError {
  readonly status?: number;

  constructor(message: string, status?: number) {
    super(message, EXIT_OPENAI);
    this.name = "RemoteServiceError";
    this.status = status;
  }
}

export class OutputError extends CliError {
  constructor(message: string) {
    super(message, EXIT_OUTPUT);
    this.name = "OutputError";
  }
}
