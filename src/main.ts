import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { Logger } from '@nestjs/common';
import { DocumentBuilder, SwaggerModule } from '@nestjs/swagger';
import { AppModule } from './app.module';
import { APP_CONFIG, AppConfig } from './config/app.config';
import { CrmExceptionFilter } from './common/filters/crm-exception.filter';

async function bootstrap() {
  const app = await NestFactory.create(AppModule);
  const config = app.get<AppConfig>(APP_CONFIG);

  app.enableCors({
    origin: config.corsOrigin,
    methods: 'GET,HEAD,PUT,PATCH,POST,DELETE',
    credentials: true,
  });

  // Domain errors -> 400/403/404/409
  app.useGlobalFilters(new CrmExceptionFilter());

  const docs = new DocumentBuilder()
    .setTitle('Campaign CRM API')
    .setDescription('Campaigns, audiences, execution, metrics and prospects')
    .setVersion('1.0')
    .addApiKey({ type: 'apiKey', in: 'header', name: 'x-user-id' }, 'x-user-id')
    .addApiKey({ type: 'apiKey', in: 'header', name: 'x-user-role' }, 'x-user-role')
    .build();
  SwaggerModule.setup('docs', app, SwaggerModule.createDocument(app, docs));

  await app.listen(config.port);
  Logger.log(`listening on :${config.port}`, 'Bootstrap');
}
bootstrap().catch((err: unknown) => {
  Logger.error(err instanceof Error ? err.stack ?? err.message : String(err), 'Bootstrap');
  process.exit(1);
});
