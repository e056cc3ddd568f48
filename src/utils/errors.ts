import { FailureKind } from '../types/Service';

export class StackupError extends Error {
  readonly code: string;

  constructor(code: string, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

export class CyclicDependencyError extends StackupError {
  readonly cycle: string[];

  constructor(cycle: string[]) {
    super('DEPENDENCY_CYCLE', `Circular dependency detected: ${cycle.join(' → ')}`);
    this.cycle = cycle;
  }
}

export class UnknownDependencyError extends StackupError {
  readonly service: string;
  readonly dependency: string;

  constructor(service: string, dependency: string) {
    super(
      'UNKNOWN_DEPENDENCY',
      `Service '${service}' depends on unknown service '${dependency}'`
    );
    this.service = service;
    this.dependency = dependency;
  }
}

export class DuplicateServiceError extends StackupError {
  constructor(readonly service: string) {
    super('DUPLICATE_SERVICE', `Service '${service}' is declared more than once`);
  }
}

export class ManifestError extends StackupError {
  readonly problems: string[];

  constructor(path: string, problems: string[]) {
    super(
      'INVALID_MANIFEST',
      `Invalid manifest ${path}:\n${problems.map(p => `  • ${p}`).join('\n')}`
    );
    this.problems = problems;
  }
}

export class StartFailureError extends StackupError {
  readonly kind: FailureKind;

  constructor(service: string, kind: FailureKind, detail: string) {
    super('START_FAILURE', `Failed to start ${service}: ${detail}`);
    this.kind = kind;
  }
}

export class ProbeError extends StackupError {
  readonly kind: FailureKind;

  constructor(kind: FailureKind, message: string) {
    super('PROBE_FAILURE', message);
    this.kind = kind;
  }
}

export class CancellationRequestedError extends StackupError {
  constructor(message = 'Deployment cancelled') {
    super('CANCELLED', message);
  }
}

export class IllegalTransitionError extends StackupError {
  constructor(service: string, from: string, to: string) {
    super('ILLEGAL_TRANSITION', `Service '${service}' cannot move from ${from} to ${to}`);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}

export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}
