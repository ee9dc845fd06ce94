import {
  ValidationArguments,
  ValidationOptions,
  registerDecorator,
} from 'class-validator';
import {
  DEFAULT_PROVIDER_PRIORITY,
  PanoramaProviderId,
  isSupportedProvider,
} from '../../integrations/panorama/constants/panorama.constants';

/**
 * Strict upper bound (`@Max` is inclusive).
 */
export function IsBelow(limit: number, validationOptions?: ValidationOptions) {
  return function (object: object, propertyName: string) {
    registerDecorator({
      name: 'isBelow',
      target: object.constructor,
      propertyName,
      constraints: [limit],
      options: validationOptions,
      validator: {
        validate(value: unknown, args: ValidationArguments) {
          const [max] = args.constraints;
          return typeof value === 'number' && value < max;
        },
        defaultMessage(args: ValidationArguments) {
          return `${args.property} must be less than ${args.constraints[0]}`;
        },
      },
    });
  };
}

/**
 * Lower-case, drop unsupported names and duplicates, keep the caller's
 * order. A missing or null list means the default order; anything else
 * that is not an array is passed through for `@IsArray` to reject.
 */
export function normalizeProviderPriority(value: unknown): unknown {
  if (value === null || value === undefined) {
    return [...DEFAULT_PROVIDER_PRIORITY];
  }

  if (!Array.isArray(value)) {
    return value;
  }

  const normalized: PanoramaProviderId[] = [];
  for (const entry of value) {
    if (typeof entry !== 'string') {
      continue;
    }
    const provider = entry.trim().toLowerCase();
    if (isSupportedProvider(provider) && !normalized.includes(provider)) {
      normalized.push(provider);
    }
  }
  return normalized;
}
