export function formatError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class SourceFileError extends Error {
  constructor(public file: string, cause?: unknown) {
    super(`Source file ${file} not found or not readable${cause ? `: ${formatError(cause)}` : ''}`);
    this.name = 'SourceFileError';
  }
}

export class ConfigError extends Error {
  constructor(message: string, public variable: string) {
    super(`[Config] ${variable}: ${message}`);
    this.name = 'ConfigError';
  }
}
