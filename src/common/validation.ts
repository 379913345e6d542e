import { BadRequestException, ValidationPipe } from '@nestjs/common';
import { ValidationError } from 'class-validator';

function firstMessage(error: ValidationError): string | undefined {
  if (error.value === undefined || error.value === null) {
    return `Missing required field: ${error.property}`;
  }
  const messages = Object.values(error.constraints ?? {});
  if (messages.length > 0) return messages[0];
  for (const child of error.children ?? []) {
    const nested = firstMessage(child);
    if (nested) return nested;
  }
  return undefined;
}

export function validationExceptionFactory(errors: ValidationError[]): BadRequestException {
  for (const error of errors) {
    const message = firstMessage(error);
    if (message) return new BadRequestException(message);
  }
  return new BadRequestException('Invalid request body');
}

export function createValidationPipe(): ValidationPipe {
  return new ValidationPipe({
    transform: true,
    whitelist: true,
    transformOptions: {
      enableImplicitConversion: true,
    },
    exceptionFactory: validationExceptionFactory,
  });
}
