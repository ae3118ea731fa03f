import { describe, it, expect } from 'vitest';
import type { EconomicEvent } from '../src/types';
import {
  CalendarService,
  buildCalendarWeek,
  calculateThresholds,
  calendarRange,
  scoreEvent,
  volatilityFor,
} from '../src/services/calendar.service';
import { FakeCalendar } from './fakes';

const TODAY = new Date('2026-03-10T15:00:00Z');

const EVENTS: EconomicEvent[] = [
  { date: '2026-03-10 12:30:00', country: 'US', event: 'CPI m/m', currency: 'USD', impact: 'High' },
  { date: '2026-03-10 14:00:00', country: 'US', event: 'Crude Oil Inventories', currency: 'USD', impact: 'Low' },
  { date: '2026-03-11 08:00:00', country: 'EU', event: 'ECB Press Conference', currency: 'EUR', impact: 'Medium' },
  { date: '2026-03-09 09:00:00', country: 'JP', event: 'Bank Holiday', currency: 'JPY', impact: 'None' },
  { date: '2026-03-20 12:30:00', country: 'US', event: 'Retail Sales', currency: 'USD', impact: 'High' },
];

describe('calendar scoring', () => {
  it('scores by impact, averaged with a known country weight', () => {
    const countries = { US: { name: 'United States', score: 3 } };
    expect(scoreEvent(EVENTS[0], countries)).toBe(3.5);
    expect(scoreEvent(EVENTS[2], countries)).toBe(2.5);
    expect(scoreEvent(EVENTS[3], countries)).toBe(0);
  });

  it('computes percentile and deviation thresholds', () => {
    expect(calculateThresholds([])).toEqual({ low: 0, medium: 0, high: 0 });
    const t = calculateThresholds([4, 1, 3, 2]);
    expect(t.low).toBe(2);
    expect(t.medium).toBe(3);
    expect(t.high).toBeCloseTo(2.5 + 1.25 * Math.sqrt(1.25), 10);
  });

  it('maps scores onto volatility bands', () => {
    const t = { low: 1, medium: 2, high: 4 };
    expect(volatilityFor(1, t)).toBe('none');
    expect(volatilityFor(1.5, t)).toBe('low');
    expect(volatilityFor(2, t)).toBe('medium');
    expect(volatilityFor(4, t)).toBe('high');
  });

  it('requests two extra days either side of the week', () => {
    expect(calendarRange(TODAY)).toEqual({ from: '2026-03-05', to: '2026-03-15' });
  });
});

describe('buildCalendarWeek', () => {
  const week = buildCalendarWeek(EVENTS, TODAY, {});

  it('covers today plus three days either side', () => {
    expect(week.currentDate).toBe('2026-03-10');
    expect(week.days.map((d) => d.date)).toEqual([
      '2026-03-07',
      '2026-03-08',
      '2026-03-09',
      '2026-03-10',
      '2026-03-11',
      '2026-03-12',
      '2026-03-13',
    ]);
    expect(week.days.filter((d) => d.isToday).map((d) => d.date)).toEqual(['2026-03-10']);
  });

  it('spreads neighbouring days into the display score', () => {
    expect(week.days.map((d) => d.volatilityScore)).toEqual([0, 0.625, 1.5625, 5.625, 3.75, 1.25, 0.3125]);
  });

  it('derives thresholds over the scored range', () => {
    expect(week.thresholds.low).toBe(0);
    expect(week.thresholds.medium).toBe(0.3125);
    expect(week.thresholds.high).toBeCloseTo(3.408, 3);
    expect(week.days.map((d) => d.volatility)).toEqual(['none', 'medium', 'medium', 'high', 'high', 'medium', 'medium']);
  });

  it('lists events by score with their count', () => {
    const today = week.days[3];
    expect(today.numberOfEvents).toBe(2);
    expect(today.topEvents).toEqual([
      { name: 'CPI m/m', country: 'US', currency: 'USD', impact: 'High' },
      { name: 'Crude Oil Inventories', country: 'US', currency: 'USD', impact: 'Low' },
    ]);
    expect(week.days[2].numberOfEvents).toBe(1);
  });

  it('uses country names from the table', () => {
    const named = buildCalendarWeek(EVENTS, TODAY, { EU: { name: 'Euro Area', score: 3.5 } });
    expect(named.days[4].topEvents[0].country).toBe('Euro Area');
  });
});

describe('CalendarService', () => {
  it('caches the week for the same range', async () => {
    const provider = new FakeCalendar(EVENTS);
    const service = new CalendarService(provider, { timeoutMs: 50, now: () => TODAY });

    const first = await service.week();
    const second = await service.week();
    expect(second).toBe(first);
    expect(provider.calls).toEqual([{ from: '2026-03-05', to: '2026-03-15' }]);
  });

  it('reports nothing when there are no events', async () => {
    const service = new CalendarService(new FakeCalendar([]), { timeoutMs: 50, now: () => TODAY });
    expect(await service.week()).toBeUndefined();
  });
});
