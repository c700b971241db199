#!/usr/bin/env node
import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import { config } from './config';
import { MenuService } from './menu/menu.service';

async function bootstrap(): Promise<void> {
  config.validateConfig();
  const app = await NestFactory.createApplicationContext(AppModule, {
    logger: config.logLevels()
  });
  await app.get(MenuService).run();
  await app.close();
}

bootstrap().catch(error => {
  new Logger('Bootstrap').error(`Eco Consumption Tracker failed to start: ${String(error)}`);
  process.exit(1);
});
