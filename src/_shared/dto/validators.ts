import { ValidateBy, ValidationOptions, buildMessage } from 'class-validator';
import { isUtcTimestamp } from '../../core/utils';

export const E164_PATTERN = /^\+\d+$/;

export const MAX_TEXT_CODE_POINTS = 4096;

/**
 * Checks for a fixed-width `YYYY-MM-DDTHH:MM:SSZ` timestamp naming a real instant
 */
export function IsUtcTimestamp(
  validationOptions?: ValidationOptions,
): PropertyDecorator {
  return ValidateBy(
    {
      name: 'isUtcTimestamp',
      validator: {
        validate: (value): boolean => isUtcTimestamp(value),
        defaultMessage: buildMessage(
          (eachPrefix) =>
            `${eachPrefix}$property must be an ISO-8601 UTC timestamp in whole seconds (YYYY-MM-DDTHH:MM:SSZ)`,
          validationOptions,
        ),
      },
    },
    validationOptions,
  );
}

/**
 * Like MaxLength, but counts Unicode code points instead of UTF-16 units
 */
export function MaxCodePoints(
  max: number,
  validationOptions?: ValidationOptions,
): PropertyDecorator {
  return ValidateBy(
    {
      name: 'maxCodePoints',
      constraints: [max],
      validator: {
        validate: (value): boolean =>
          typeof value === 'string' && Array.from(value).length <= max,
        defaultMessage: buildMessage(
          (eachPrefix) =>
            `${eachPrefix}$property must be at most $constraint1 characters`,
          validationOptions,
        ),
      },
    },
    validationOptions,
  );
}
