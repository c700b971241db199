import { Injectable } from '@nestjs/common';
import { ConsumptionService } from '../consumption/consumption.service';
import { HelperService } from '../helper/helper.service';
import { Recommendation } from '../consumption/dto/consumption.dto';

// Same boundary for every category, whatever its unit
export const RECOMMENDATION_THRESHOLD = 100;

const ADVICE: { [category: string]: string } = {
  energy: 'Consider using energy-efficient appliances or LED lighting.',
  water: 'Consider shorter showers or fixing leaks.',
  waste: 'Improve recycling efforts or compost organic waste.'
};

export const NO_RECOMMENDATION = 'No recommendation available.';

@Injectable()
export class AnalyticsService {

    constructor(private readonly consumptionService: ConsumptionService, private readonly helper: HelperService) { }

    recommend(category: string, total: number): Recommendation {
        if (total > RECOMMENDATION_THRESHOLD) {
            const advice = Object.prototype.hasOwnProperty.call(ADVICE, category) ? ADVICE[category] : NO_RECOMMENDATION;
            return { kind: 'advisory', category, total, advice };
        }
        return { kind: 'within-limits', category, total };
    }

    formatRecommendation(recommendation: Recommendation): string {
        if (recommendation.kind === 'advisory') {
            return `Recommendation for ${recommendation.category}: ${recommendation.advice}`;
        }
        return `${this.helper.capitalize(recommendation.category)} consumption is within acceptable limits.`;
    }

    generateReport(): string[] {
        const lines = ['--- Consumption Report ---'];
        for (const { category, total } of this.consumptionService.totals()) {
            lines.push(`${this.helper.capitalize(category)}: Total consumption = ${total}`);
            lines.push(this.formatRecommendation(this.recommend(category, total)));
        }
        return lines;
    }
}
