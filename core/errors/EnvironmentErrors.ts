import { ModEnvError, ErrorSeverity } from './ModEnvError';

/**
 * Thrown when an environment (or a package inside one) does not exist.
 */
export class EnvironmentNotFoundError extends ModEnvError {
  constructor(
    public readonly subject: string,
    kind: 'environment' | 'package' = 'environment'
  ) {
    super(`${kind === 'environment' ? 'Environment' : 'Package'} '${subject}' not found`, {
      code: 'NOT_FOUND',
      severity: ErrorSeverity.Fatal,
      details: { subject, kind }
    });
  }
}

export class EnvironmentExistsError extends ModEnvError {
  constructor(
    public readonly environmentName: string,
    message = `Environment '${environmentName}' already exists. Use --force to replace it.`
  ) {
    super(message, {
      code: 'ALREADY_EXISTS',
      severity: ErrorSeverity.Fatal,
      details: { environmentName }
    });
  }
}

/**
 * Registry entry present but its directory is missing or unreadable.
 */
export class EnvironmentCorruptedError extends ModEnvError {
  constructor(
    public readonly environmentName: string,
    public readonly environmentPath: string,
    cause?: unknown
  ) {
    super(`Environment '${environmentName}' is corrupted: ${environmentPath} is missing or unreadable`, {
      code: 'CORRUPTED',
      severity: ErrorSeverity.Fatal,
      details: { environmentName, environmentPath },
      cause
    });
  }
}

export class ActiveEnvironmentConflictError extends ModEnvError {
  constructor(message: string, public readonly environmentName?: string) {
    super(message, {
      code: 'ACTIVE_ENVIRONMENT_CONFLICT',
      severity: ErrorSeverity.Fatal,
      details: environmentName ? { environmentName } : undefined
    });
  }
}

export class InvalidEnvironmentNameError extends ModEnvError {
  constructor(public readonly environmentName: string) {
    super(
      `Invalid environment name '${environmentName}': use 1-50 letters, digits, '-' or '_'`,
      {
        code: 'INVALID_NAME',
        severity: ErrorSeverity.Fatal,
        details: { environmentName }
      }
    );
  }
}
