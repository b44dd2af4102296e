import { IsDefined, ValidateBy, ValidationOptions } from 'class-validator';

/** Presence check shared by every field; `null` counts as missing. */
export const Required = (): PropertyDecorator => IsDefined({ message: '$property is required' });

/**
 * Rejects integers a `number` cannot hold exactly. Other values pass so that
 * `@IsInt()` reports them.
 */
export const IsSafeInteger = (validationOptions?: ValidationOptions): PropertyDecorator =>
  ValidateBy(
    {
      name: 'isSafeInteger',
      validator: {
        validate: (value: unknown): boolean =>
          typeof value !== 'number' || !Number.isInteger(value) || Number.isSafeInteger(value),
        defaultMessage: () => '$property must be within the safe integer range',
      },
    },
    validationOptions,
  );
