// src/database/database.module.ts
import { Global, Module } from '@nestjs/common';
import { TypeOrmModule, TypeOrmModuleOptions } from '@nestjs/typeorm';
import { APP_CONFIG, AppConfig } from 'src/config/app.config';
import { AppConfigModule } from 'src/config/app-config.module';
import { ENTITIES } from './entities';

export function buildTypeOrmOptions(config: AppConfig): TypeOrmModuleOptions {
  const { database } = config;
  if (database.type === 'sqlite') {
    return {
      type: 'better-sqlite3',
      database: database.database,
      entities: ENTITIES,
      synchronize: database.synchronize,
      logging: database.logging,
    };
  }
  return {
    type: 'postgres',
    url: database.url,
    entities: ENTITIES,
    synchronize: database.synchronize,
    logging: database.logging,
  };
}

/**
 * Global persistence module: the DataSource is injectable everywhere, the same
 * way a shared database client is.
 */
@Global()
@Module({
  imports: [
    TypeOrmModule.forRootAsync({
      imports: [AppConfigModule],
      inject: [APP_CONFIG],
      useFactory: (config: AppConfig) => buildTypeOrmOptions(config),
    }),
    TypeOrmModule.forFeature(ENTITIES),
  ],
  exports: [TypeOrmModule],
})
export class DatabaseModule {}
