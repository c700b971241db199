import { Test } from '@nestjs/testing';
import { HelperService } from './helper.service';

describe('HelperService', () => {
  let helper: HelperService;

  beforeEach(async () => {
    const moduleRef = await Test.createTestingModule({
      providers: [HelperService],
    }).compile();
    helper = moduleRef.get(HelperService);
  });

  describe('formatDate', () => {
    it('pads month and day', () => {
      expect(helper.formatDate(new Date(2026, 0, 5))).toBe('2026-01-05');
    });

    it('uses the local calendar date', () => {
      expect(helper.formatDate(new Date(2026, 11, 31, 23, 59))).toBe('2026-12-31');
    });
  });

  describe('capitalize', () => {
    it('upper-cases the first letter and lower-cases the rest', () => {
      expect(helper.capitalize('energy')).toBe('Energy');
      expect(helper.capitalize('WATER')).toBe('Water');
    });

    it('leaves an empty string empty', () => {
      expect(helper.capitalize('')).toBe('');
    });
  });

  describe('parseAmount', () => {
    it.each([
      ['40', 40],
      [' 12.5 ', 12.5],
      ['-3', -3],
      ['+7', 7],
      ['.5', 0.5],
      ['5.', 5],
      ['1e3', 1000],
      ['0', 0],
    ])('parses %p', (text, value) => {
      expect(helper.parseAmount(text)).toEqual({ ok: true, value });
    });

    it.each(['', 'abc', '12kg', '0x10', 'Infinity', 'NaN', '1,5', '--1'])('rejects %p as not a number', text => {
      expect(helper.parseAmount(text)).toEqual({ ok: false, reason: 'not-a-number' });
    });

    it('rejects values that overflow to infinity', () => {
      expect(helper.parseAmount('1e400')).toEqual({ ok: false, reason: 'not-finite' });
    });
  });
});
