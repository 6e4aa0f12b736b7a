export class InvalidPortError extends Error {
  port: unknown;

  constructor(port: unknown) {
    super(`Invalid port: ${String(port)} (expected an integer between 1 and 65535)`);
    this.name = 'InvalidPortError';
    this.port = port;
  }
}

export class PortReclamationError extends Error {
  port: number;

  constructor(port: number, message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'PortReclamationError';
    this.port = port;
  }
}

export class BindError extends Error {
  port: number;
  code?: string;

  constructor(port: number, code?: string, detail?: string) {
    super(`Failed to bind port ${port}: ${code ?? 'unknown error'}${detail ? ` (${detail})` : ''}`);
    this.name = 'BindError';
    this.port = port;
    this.code = code;
  }
}

export class DirectoryUnreadableError extends Error {
  rootDirectory: string;
  code?: string;

  constructor(rootDirectory: string, code?: string) {
    super(`Content root is not a readable directory: ${rootDirectory}${code ? ` (${code})` : ''}`);
    this.name = 'DirectoryUnreadableError';
    this.rootDirectory = rootDirectory;
    this.code = code;
  }
}

export class ConfigError extends Error {
  issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

export function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
