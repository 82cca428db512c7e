import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { TypeOrmModule } from '@nestjs/typeorm';
import { DataSource, DataSourceOptions } from 'typeorm';
import appConfig from '../../config/app.config';
import authConfig from '../../auth/config/auth.config';
import databaseConfig from '../config/database.config';
import { TypeOrmConfigService } from '../typeorm-config.service';
import { AdminSeedModule } from './admin/admin-seed.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      load: [appConfig, databaseConfig, authConfig],
      envFilePath: ['.env'],
    }),
    TypeOrmModule.forRootAsync({
      useClass: TypeOrmConfigService,
      dataSourceFactory: async (options?: DataSourceOptions) => {
        if (!options) {
          throw new Error('Missing TypeORM data source options');
        }
        return new DataSource(options).initialize();
      },
    }),
    AdminSeedModule,
  ],
})
export class SeedModule {}
