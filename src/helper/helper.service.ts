import { Injectable } from '@nestjs/common';
import { ParseAmountResult } from '../consumption/dto/consumption.dto';

// Optional sign, digits with an optional fraction (or a bare fraction), optional exponent
const AMOUNT_PATTERN = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;

@Injectable()
export class HelperService {

    // Local calendar date as YYYY-MM-DD
    formatDate(date: Date): string {
        const month = String(date.getMonth() + 1).padStart(2, '0');
        const day = String(date.getDate()).padStart(2, '0');
        return `${date.getFullYear()}-${month}-${day}`;
    }

    capitalize(text: string): string {
        return text.charAt(0).toUpperCase() + text.slice(1).toLowerCase();
    }

    parseAmount(text: string): ParseAmountResult {
        const trimmed = text.trim();
        if (!AMOUNT_PATTERN.test(trimmed)) {
            return { ok: false, reason: 'not-a-number' };
        }
        const value = Number(trimmed);
        if (!Number.isFinite(value)) {
            return { ok: false, reason: 'not-finite' };
        }
        return { ok: true, value };
    }
}
