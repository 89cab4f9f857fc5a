import { ModEnvError, ErrorSeverity } from './ModEnvError';
import type { AssemblyConflict, ConflictRemediation } from '@core/isolation/types';

/**
 * Native assembly version or identity mismatch. Never resolved automatically;
 * callers receive the conflicts and the remediation hints.
 */
export class DependencyConflictError extends ModEnvError {
  constructor(
    public readonly packageName: string,
    public readonly conflicts: AssemblyConflict[],
    public readonly remediation: ConflictRemediation
  ) {
    super(
      `Cannot load '${packageName}': ${conflicts.length} assembly conflict${conflicts.length === 1 ? '' : 's'}`,
      {
        code: 'DEPENDENCY_CONFLICT',
        severity: ErrorSeverity.Fatal,
        details: { packageName, conflicts, remediation }
      }
    );
  }

  getFormattedMessage(): string {
    const lines: string[] = [this.message];

    for (const conflict of this.conflicts) {
      lines.push(
        `  ${conflict.assemblyName}: loaded ${conflict.loadedVersion} (${conflict.loadedLocation}), ` +
        `'${conflict.requiredBy}' requires ${conflict.requiredVersion} [${conflict.conflictType}]`
      );
    }

    if (this.remediation.removeFromSession.length > 0) {
      lines.push('');
      lines.push(`Remove from the session: ${this.remediation.removeFromSession.join(', ')}`);
    }

    if (this.remediation.installExact.length > 0) {
      lines.push('');
      lines.push('Align assembly versions:');
      for (const hint of this.remediation.installExact) {
        lines.push(`  ${hint.assemblyName} ${hint.version}`);
      }
    }

    return lines.join('\n');
  }
}

/**
 * Diagnostic only: the system search path stayed exposed longer than allowed.
 */
export class IsolationTimeoutError extends ModEnvError {
  constructor(public readonly operation: string, public readonly elapsedMs: number) {
    super(`System search path exposed for ${elapsedMs}ms during ${operation}`, {
      code: 'ISOLATION_TIMEOUT',
      severity: ErrorSeverity.Warning,
      details: { operation, elapsedMs }
    });
  }
}

/**
 * Wraps a repository, install or save failure.
 */
export class ExternalOperationError extends ModEnvError {
  constructor(
    message: string,
    public readonly operation: string,
    cause?: unknown,
    details: Record<string, unknown> = {}
  ) {
    super(message, {
      code: 'EXTERNAL_OPERATION_FAILURE',
      severity: ErrorSeverity.Fatal,
      details: { operation, ...details },
      cause
    });
  }
}

export type IsolatedImportStage = 'spawn' | 'exit' | 'output';

export class IsolatedImportError extends ExternalOperationError {
  constructor(
    public readonly stage: IsolatedImportStage,
    public readonly packageName: string,
    message: string,
    cause?: unknown,
    public readonly stderr?: string
  ) {
    super(message, 'isolated-import', cause, { stage, packageName });
  }
}
