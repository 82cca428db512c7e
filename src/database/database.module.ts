import { Module } from '@nestjs/common';
import { UnitOfWork } from './unit-of-work/unit-of-work';
import { TypeOrmUnitOfWork } from './unit-of-work/typeorm-unit-of-work';

@Module({
  providers: [
    {
      provide: UnitOfWork,
      useClass: TypeOrmUnitOfWork,
    },
  ],
  exports: [UnitOfWork],
})
export class DatabaseModule {}
