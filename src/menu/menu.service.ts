import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConsumptionService } from '../consumption/consumption.service';
import { AnalyticsService } from '../analytics/analytics.service';
import { HelperService } from '../helper/helper.service';
import { Category } from '../consumption/dto/consumption.dto';
import { TERMINAL, Terminal } from './terminal';

// Menu choice -> category and the prompt asking for its amount
const LOG_OPTIONS: { [choice: string]: { category: Category; prompt: string } } = {
  '1': { category: 'energy', prompt: 'Enter energy consumption (kWh): ' },
  '2': { category: 'water', prompt: 'Enter water usage (liters): ' },
  '3': { category: 'waste', prompt: 'Enter waste production (kg): ' }
};

const MENU_LINES = [
  '',
  '1. Log Energy Consumption',
  '2. Log Water Consumption',
  '3. Log Waste Production',
  '4. Generate Report',
  '5. Exit'
];

@Injectable()
export class MenuService {
  private readonly logger = new Logger(MenuService.name);

  constructor(private readonly consumptionService: ConsumptionService,
              private readonly analyticsService: AnalyticsService,
              private readonly helper: HelperService,
              @Inject(TERMINAL) private readonly terminal: Terminal) { }

  async run(): Promise<void> {
    try {
      let running = true;
      while (running) {
        running = await this.step();
      }
      this.consumptionService.save();
      this.terminal.print('Exiting Eco Consumption Tracker.');
    } finally {
      this.terminal.close();
    }
  }

  // Handles one menu choice; false once the loop should stop
  private async step(): Promise<boolean> {
    MENU_LINES.forEach(line => this.terminal.print(line));
    const answer = await this.terminal.ask('Select an option: ');
    if (answer === null) {
      this.logger.debug('Input closed');
      return false;
    }

    const choice = answer.trim();
    const logOption = Object.prototype.hasOwnProperty.call(LOG_OPTIONS, choice) ? LOG_OPTIONS[choice] : undefined;
    if (logOption) {
      return this.logAmount(logOption.category, logOption.prompt);
    }

    switch (choice) {
      case '4':
        this.terminal.print('');
        this.analyticsService.generateReport().forEach(line => this.terminal.print(line));
        return true;
      case '5':
        return false;
      default:
        this.terminal.print('Invalid option. Please try again.');
        return true;
    }
  }

  private async logAmount(category: Category, prompt: string): Promise<boolean> {
    const answer = await this.terminal.ask(prompt);
    if (answer === null) {
      return false;
    }
    const parsed = this.helper.parseAmount(answer);
    if (!parsed.ok) {
      this.logger.debug(`Rejected amount "${answer}": ${parsed.reason}`);
      this.terminal.print('Invalid input. Please enter a numeric value.');
      return true;
    }
    this.consumptionService.record(category, parsed.value);
    return true;
  }
}
