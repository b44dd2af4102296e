import { instanceToPlain, plainToInstance } from 'class-transformer';
import { validateSync } from 'class-validator';
import { ValidationError } from '../../common/errors/validation.error';
import { BookShapeName, BookShapeRecords, shapeClassFor } from './book-shapes';

export interface RecordValidationOptions {
  /** Report fields the shape does not declare instead of dropping them. */
  forbidUnknownFields?: boolean;
  /** Check BookCreate's `isbn` as an ISBN-10/13. */
  strictIsbn?: boolean;
}

export type BookRecord<N extends BookShapeName> = Readonly<BookShapeRecords[N]>;

/**
 * Builds a frozen record of the given shape from an untyped mapping,
 * coercing field values on the way. Throws a ValidationError that lists
 * every violating field.
 */
export function constructAndValidate<N extends BookShapeName>(
  shape: N,
  raw: unknown,
  options: RecordValidationOptions = {},
): BookRecord<N> {
  if (!isPlainMapping(raw)) {
    throw new ValidationError(shape, [
      { field: 'payload', kind: 'invalid', value: raw, messages: ['payload must be an object'] },
    ]);
  }

  const record = plainToInstance(shapeClassFor(shape, options.strictIsbn), raw);
  const failures = validateSync(record, {
    whitelist: true,
    forbidNonWhitelisted: options.forbidUnknownFields ?? false,
    validationError: { target: false, value: true },
  });

  if (failures.length > 0) {
    throw ValidationError.fromConstraintFailures(shape, failures);
  }

  return Object.freeze(record);
}

/** Plain mapping of a record, with date-times as ISO-8601 strings. */
export function serializeRecord(record: object): Record<string, unknown> {
  return instanceToPlain(record);
}

function isPlainMapping(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
