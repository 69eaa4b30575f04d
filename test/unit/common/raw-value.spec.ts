import { toDate, toNumber } from '@common/typeorm-manager/raw-value';

describe('raw-value', () => {
  describe('toDate', () => {
    it('SQLite 의 UTC 문자열을 Date 로 변환한다', () => {
      expect(toDate('2024-03-01 09:30:15.123').toISOString()).toBe(
        '2024-03-01T09:30:15.123Z',
      );
    });

    it('ISO 문자열과 Date 는 그대로 해석한다', () => {
      const date = new Date('2024-03-01T00:00:00.000Z');

      expect(toDate(date)).toBe(date);
      expect(toDate('2024-03-01T00:00:00.000Z').getTime()).toBe(date.getTime());
      expect(toDate('2024-03-01T09:00:00+09:00').getTime()).toBe(date.getTime());
    });
  });

  describe('toNumber', () => {
    it('문자열 숫자를 number 로 변환한다', () => {
      expect(toNumber('42')).toBe(42);
      expect(toNumber(7)).toBe(7);
    });
  });
});
