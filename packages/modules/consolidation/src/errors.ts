import { AppError } from '@unitecon/shared';

export class InvalidConfigError extends AppError {
  constructor(reason: string) {
    super('INVALID_CONFIG', `Invalid configuration: ${reason}`, 400);
  }
}

export class ConfigFileNotFoundError extends AppError {
  constructor(filePath: string) {
    super('CONFIG_FILE_NOT_FOUND', `Configuration file ${filePath} not found`, 404);
  }
}

export class CliUsageError extends AppError {
  constructor(message: string) {
    super('CLI_USAGE', message, 400);
  }
}
