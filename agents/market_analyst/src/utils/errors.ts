import axios from "axios";

export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

export class GeminiServiceError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "GeminiServiceError";
  }
}

export function describeError(error: unknown): string {
  let message = error instanceof Error ? error.message : String(error);
  if (axios.isAxiosError(error) && error.response?.data) {
    message = `${message} | API: ${JSON.stringify(error.response.data)}`;
  }
  return message;
}

export class ResponseDecodeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ResponseDecodeError";
  }
}
