import { HttpStatus, UnprocessableEntityException } from '@nestjs/common';

export class WeakCredentialException extends UnprocessableEntityException {
  constructor(message: string) {
    super({
      status: HttpStatus.UNPROCESSABLE_ENTITY,
      errors: {
        password: 'weakPassword',
      },
      message,
    });
    this.name = 'WeakCredentialException';
    Object.setPrototypeOf(this, WeakCredentialException.prototype);
  }
}
