import { Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { StorageService } from '../storage/storage.service';
import { HelperService } from '../helper/helper.service';
import {
  CategoryTotal,
  ConsumptionRecord,
  Dataset,
  LoadOutcome,
  RecordResult,
  SaveResult,
  createEmptyDataset
} from './dto/consumption.dto';

/**
 * Owns the in-memory dataset for the lifetime of the application context.
 * Records are only ever appended; the file is rewritten as a whole on save.
 */
@Injectable()
export class ConsumptionService implements OnModuleInit {
  private readonly logger = new Logger(ConsumptionService.name);

  private data: Dataset = createEmptyDataset();

  constructor(private readonly storageService: StorageService,
              private readonly helper: HelperService) { }

  onModuleInit(): void {
    this.load();
  }

  load(): LoadOutcome {
    const result = this.storageService.readDataset();
    switch (result.status) {
      case 'loaded':
        this.data = result.data;
        this.logger.log('Data loaded successfully.');
        break;
      case 'missing':
        this.data = createEmptyDataset();
        this.logger.log('No existing data found, starting with an empty dataset.');
        break;
      case 'malformed':
        this.data = createEmptyDataset();
        this.logger.error(`Error decoding data file (${result.reason}), starting with an empty dataset.`);
        break;
    }
    return result.status;
  }

  record(category: string, amount: number): RecordResult {
    if (!Object.prototype.hasOwnProperty.call(this.data, category)) {
      this.logger.warn(`Resource type '${category}' is not recognized.`);
      return { ok: false, reason: 'unknown-category' };
    }

    const record: ConsumptionRecord = {
      date: this.helper.formatDate(new Date()),
      amount
    };
    this.data[category].push(record);
    this.logger.log(`${this.helper.capitalize(category)} consumption logged: ${amount}`);
    return { ok: true, category, record };
  }

  totals(): CategoryTotal[] {
    return Object.entries(this.data).map(([category, records]) => ({
      category,
      total: records.reduce((sum, record) => sum + record.amount, 0)
    }));
  }

  categories(): string[] {
    return Object.keys(this.data);
  }

  // Copy of the current dataset; mutating it does not touch the store
  snapshot(): Dataset {
    const copy: Dataset = {};
    for (const [category, records] of Object.entries(this.data)) {
      copy[category] = records.map(record => ({ ...record }));
    }
    return copy;
  }

  save(): SaveResult {
    const result = this.storageService.writeDataset(this.data);
    if (!result.ok) {
      this.logger.error(`An error occurred while saving data: ${result.reason}`);
      return result;
    }
    this.logger.log('Data saved successfully.');
    return { ok: true, path: this.storageService.dataFilePath };
  }
}
