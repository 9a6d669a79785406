// cutshift/backend/src/app.module.ts
import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { ThrottlerModule } from '@nestjs/throttler';
import { AppController } from './app.controller';
import { CutsModule } from './cuts/cuts.module';
import { environment } from './config/environment';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      load: [() => environment],
    }),
    ThrottlerModule.forRoot([
      {
        name: 'default',
        ttl: environment.rateLimit.ttl,
        limit: environment.rateLimit.limit,
      },
    ]),
    CutsModule,
  ],
  controllers: [AppController],
})
export class AppModule {}
