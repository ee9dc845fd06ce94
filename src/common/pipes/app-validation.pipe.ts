import { ValidationPipe } from '@nestjs/common';

/**
 * Global request validation. Unknown fields are rejected, and payloads are
 * turned into their DTO classes with implicit type conversion.
 */
export function createValidationPipe(): ValidationPipe {
  return new ValidationPipe({
    whitelist: true,
    forbidNonWhitelisted: true,
    transform: true,
    transformOptions: {
      enableImplicitConversion: true,
    },
  });
}
