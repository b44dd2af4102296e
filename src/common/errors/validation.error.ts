import { BadRequestException } from '@nestjs/common';
import type { ValidationError as ConstraintFailure } from 'class-validator';

export type ViolationKind = 'missing' | 'invalid' | 'unknown';

export interface FieldViolation {
  field: string;
  kind: ViolationKind;
  value: unknown;
  messages: string[];
}

/**
 * Raised when a payload does not satisfy a shape. Carries every violating
 * field so a caller can report all problems in one response.
 */
export class ValidationError extends Error {
  readonly name = 'ValidationError';

  constructor(
    readonly shape: string,
    readonly violations: readonly FieldViolation[],
  ) {
    super(`Invalid ${shape} payload: ${violations.flatMap((violation) => violation.messages).join('; ')}`);
  }

  static fromConstraintFailures(shape: string, failures: ConstraintFailure[]): ValidationError {
    return new ValidationError(shape, failures.map(toFieldViolation));
  }

  get fields(): string[] {
    return this.violations.map((violation) => violation.field);
  }

  get messages(): string[] {
    return this.violations.flatMap((violation) => violation.messages);
  }

  toBadRequest(): BadRequestException {
    return new BadRequestException(this.messages);
  }
}

function toFieldViolation(failure: ConstraintFailure): FieldViolation {
  const constraints = failure.constraints ?? {};
  const base = { field: failure.property, value: failure.value };

  if (constraints.whitelistValidation !== undefined) {
    return { ...base, kind: 'unknown', messages: [constraints.whitelistValidation] };
  }
  // A missing field also fails its type checks; only the first message is useful.
  if (constraints.isDefined !== undefined) {
    return { ...base, kind: 'missing', messages: [constraints.isDefined] };
  }

  return { ...base, kind: 'invalid', messages: Object.values(constraints) };
}
