import { Module } from '@nestjs/common';
import { AnalyticsService } from './analytics.service';
import { ConsumptionModule } from '../consumption/consumption.module';
import { HelperModule } from '../helper/helper.module';

@Module({
  imports : [HelperModule, ConsumptionModule],
  providers: [AnalyticsService],
  exports: [AnalyticsService]
})
export class AnalyticsModule {}
