import { Module } from '@nestjs/common';
import { MenuModule } from './menu/menu.module';
import { AnalyticsModule } from './analytics/analytics.module';
import { ConsumptionModule } from './consumption/consumption.module';
import { StorageModule } from './storage/storage.module';
import { HelperModule } from './helper/helper.module';

@Module({
  imports: [MenuModule, AnalyticsModule, ConsumptionModule, StorageModule, HelperModule],
})
export class AppModule {}
