import { HttpStatus, UnprocessableEntityException } from '@nestjs/common';

export class ImmutableFieldViolationException extends UnprocessableEntityException {
  readonly field: string;

  constructor(field: string, message: string) {
    super({
      status: HttpStatus.UNPROCESSABLE_ENTITY,
      errors: {
        [field]: 'immutable',
      },
      message,
    });
    this.field = field;
    this.name = 'ImmutableFieldViolationException';
    Object.setPrototypeOf(this, ImmutableFieldViolationException.prototype);
  }
}
