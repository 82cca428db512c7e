import { InternalServerErrorException } from '@nestjs/common';

export class TransactionRequiredException extends InternalServerErrorException {
  constructor(operation: string) {
    super(`${operation} requires a transactional store`);
    this.name = 'TransactionRequiredException';
    Object.setPrototypeOf(this, TransactionRequiredException.prototype);
  }
}
