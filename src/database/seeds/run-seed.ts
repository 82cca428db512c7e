import 'dotenv/config';
import { NestFactory } from '@nestjs/core';
import { SeedModule } from './seed.module';
import { AdminSeedService } from './admin/admin-seed.service';

const runSeed = async () => {
  const app = await NestFactory.createApplicationContext(SeedModule);

  try {
    await app.get(AdminSeedService).run();
  } finally {
    await app.close();
  }
};

void runSeed();
