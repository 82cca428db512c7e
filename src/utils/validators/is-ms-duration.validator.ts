import { ValidateBy, ValidationOptions, buildMessage } from 'class-validator';
import ms from 'ms';

export const IS_MS_DURATION = 'isMsDuration';

/**
 * True for a positive duration `ms` can read, such as "15m", "1d" or
 * "3600000".
 */
export function isMsDuration(value: unknown): boolean {
  // ms throws on an empty string
  if (typeof value !== 'string' || value.trim() === '') {
    return false;
  }
  const duration: unknown = ms(value);
  return typeof duration === 'number' && Number.isFinite(duration) && duration > 0;
}

export function IsMsDuration(
  validationOptions?: ValidationOptions,
): PropertyDecorator {
  return ValidateBy(
    {
      name: IS_MS_DURATION,
      validator: {
        validate: (value): boolean => isMsDuration(value),
        defaultMessage: buildMessage(
          (eachPrefix) =>
            eachPrefix + '$property must be a positive duration such as 15m or 1d',
          validationOptions,
        ),
      },
    },
    validationOptions,
  );
}
