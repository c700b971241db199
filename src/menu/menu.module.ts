import { Module } from '@nestjs/common';
import { MenuService } from './menu.service';
import { ConsumptionModule } from '../consumption/consumption.module';
import { AnalyticsModule } from '../analytics/analytics.module';
import { HelperModule } from '../helper/helper.module';
import { ReadlineTerminal, TERMINAL } from './terminal';

@Module({
  imports: [ConsumptionModule, AnalyticsModule, HelperModule],
  providers: [
    MenuService,
    { provide: TERMINAL, useFactory: () => new ReadlineTerminal() }
  ],
  exports: [MenuService]
})
export class MenuModule {}
