import { Module } from '@nestjs/common';
import { APP_GUARD } from '@nestjs/core';
import { ScheduleModule } from '@nestjs/schedule';
import { AppConfigModule } from './config/app-config.module';
import { DatabaseModule } from './database/database.module';
import { PermissionsGuard } from './auth/permissions.guard';
import { CrmFeaturesModule } from './crm-features.module';

@Module({
  imports: [AppConfigModule, DatabaseModule, ScheduleModule.forRoot(), CrmFeaturesModule],
  providers: [{ provide: APP_GUARD, useClass: PermissionsGuard }],
})
export class AppModule {}
