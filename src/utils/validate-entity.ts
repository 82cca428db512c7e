import { BadRequestException, HttpStatus } from '@nestjs/common';
import { ClassConstructor, plainToClass } from 'class-transformer';
import { validateSync } from 'class-validator';
import { generateErrors } from './validation-options';

/**
 * Structural validation of a domain candidate before business rules run.
 *
 * Field-level constraints live on the candidate class as class-validator
 * decorators; failures surface in the same shape as the global ValidationPipe.
 */
export function validateEntity<T extends object>(
  candidateClass: ClassConstructor<T>,
  plain: object,
): T {
  const candidate = plainToClass(candidateClass, plain);
  const errors = validateSync(candidate, {
    skipMissingProperties: false,
  });

  if (errors.length > 0) {
    throw new BadRequestException({
      status: HttpStatus.BAD_REQUEST,
      errors: generateErrors(errors),
    });
  }

  return candidate;
}
