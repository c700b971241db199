import { Module } from '@nestjs/common';
import { ConsumptionService } from './consumption.service';
import { StorageModule } from '../storage/storage.module';
import { HelperModule } from '../helper/helper.module';

@Module({
  imports: [StorageModule, HelperModule],
  providers: [ConsumptionService],
  exports: [ConsumptionService]
})
export class ConsumptionModule {}
