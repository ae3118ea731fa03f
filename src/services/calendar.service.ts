import type {
  CalendarDay,
  CalendarThresholds,
  CalendarVolatility,
  CalendarWeek,
  EconomicEvent,
  EventImpact,
} from '../types';
import type { CalendarProvider } from '../providers/types';
import { TtlCache } from '../lib/cache';
import { guardCall } from '../lib/result';
import { createLogger } from '../lib/serverLogs';
import countryTable from '../../data/countries.json';

const log = createLogger('calendar');

const DAY_MS = 24 * 60 * 60 * 1000;

/** Days either side of today shown in the week. */
export const WEEK_RADIUS = 3;
/** Neighbouring days that bleed into a day's display score. */
const NEIGHBOUR_WEIGHTS: ReadonlyArray<[offset: number, weight: number]> = [
  [1, 0.25],
  [2, 0.125],
];
const SCORE_RADIUS = 2;
const TOP_EVENTS = 10;

export type CountryInfo = { name: string; score: number };

const IMPACT_SCORE: Record<EventImpact, number> = { Low: 1.0, Medium: 2.5, High: 4.0, None: 0 };

export function isoDay(d: Date): string {
  return d.toISOString().slice(0, 10);
}

function addDays(day: string, offset: number): string {
  return isoDay(new Date(Date.parse(`${day}T00:00:00Z`) + offset * DAY_MS));
}

/** Date range to request so every week day has both neighbours on each side. */
export function calendarRange(today: Date): { from: string; to: string } {
  const d = isoDay(today);
  const radius = WEEK_RADIUS + SCORE_RADIUS;
  return { from: addDays(d, -radius), to: addDays(d, radius) };
}

export function scoreEvent(event: EconomicEvent, countries: Readonly<Record<string, CountryInfo>>): number {
  const base = IMPACT_SCORE[event.impact];
  if (base === 0) return 0;
  const country = countries[event.country]?.score ?? 0;
  return country === 0 ? base : (base + country) / 2;
}

export function calculateThresholds(values: readonly number[]): CalendarThresholds {
  if (values.length === 0) return { low: 0, medium: 0, high: 0 };
  const mean = values.reduce((s, v) => s + v, 0) / values.length;
  const std = Math.sqrt(values.reduce((s, v) => s + (v - mean) ** 2, 0) / values.length);
  const sorted = [...values].sort((a, b) => a - b);
  return {
    low: sorted[Math.floor(values.length * 0.25)],
    medium: sorted[Math.floor(values.length * 0.5)],
    high: mean + 1.25 * std,
  };
}

export function volatilityFor(score: number, t: CalendarThresholds): CalendarVolatility {
  if (score >= t.high) return 'high';
  if (score >= t.medium) return 'medium';
  if (score > t.low) return 'low';
  return 'none';
}

type Slot = {
  events: Array<EconomicEvent & { score: number }>;
  base: number;
};

/**
 * Builds the seven-day view centred on `today`. Days outside the week but within
 * two days of it only feed their neighbours' display scores and the thresholds.
 */
export function buildCalendarWeek(
  events: readonly EconomicEvent[],
  today: Date,
  countries: Readonly<Record<string, CountryInfo>> = countryTable
): CalendarWeek {
  const todayKey = isoDay(today);
  const { from, to } = calendarRange(today);

  const slots = new Map<string, Slot>();
  for (let day = from; day <= to; day = addDays(day, 1)) slots.set(day, { events: [], base: 0 });

  for (const e of events) {
    const slot = slots.get(e.date.slice(0, 10));
    if (!slot) continue;
    const score = scoreEvent(e, countries);
    slot.events.push({ ...e, score });
    slot.base += score;
  }

  const display = new Map<string, number>();
  for (const [day, slot] of slots) {
    let score = slot.base;
    for (const [offset, weight] of NEIGHBOUR_WEIGHTS) {
      score += (slots.get(addDays(day, offset))?.base ?? 0) * weight;
      score += (slots.get(addDays(day, -offset))?.base ?? 0) * weight;
    }
    display.set(day, score);
  }

  const thresholds = calculateThresholds([...display.values()]);

  const days: CalendarDay[] = [];
  for (let offset = -WEEK_RADIUS; offset <= WEEK_RADIUS; offset += 1) {
    const date = addDays(todayKey, offset);
    const slot = slots.get(date) ?? { events: [], base: 0 };
    const volatilityScore = display.get(date) ?? 0;
    const ranked = [...slot.events].sort((a, b) => b.score - a.score);
    days.push({
      date,
      isToday: date === todayKey,
      volatilityScore,
      volatility: volatilityFor(volatilityScore, thresholds),
      numberOfEvents: slot.events.length,
      topEvents: ranked.slice(0, TOP_EVENTS).map((e) => ({
        name: e.event,
        country: countries[e.country]?.name ?? e.country,
        currency: e.currency,
        impact: e.impact,
      })),
    });
  }

  return { currentDate: todayKey, days, thresholds };
}

export type CalendarServiceOptions = {
  timeoutMs: number;
  cacheTtlMs?: number;
  now?: () => Date;
  cache?: TtlCache<CalendarWeek>;
};

export class CalendarService {
  private readonly cache: TtlCache<CalendarWeek>;
  private readonly now: () => Date;

  constructor(
    private readonly provider: CalendarProvider,
    private readonly opts: CalendarServiceOptions
  ) {
    this.cache = opts.cache ?? new TtlCache<CalendarWeek>(opts.cacheTtlMs ?? 60 * 60 * 1000);
    this.now = opts.now ?? (() => new Date());
  }

  /** The current week, or `undefined` when there is nothing to report. */
  async week(): Promise<CalendarWeek | undefined> {
    const today = this.now();
    const { from, to } = calendarRange(today);
    const key = `calendar:${from}:${to}`;

    const cached = this.cache.get(key);
    if (cached) return cached;

    const res = await guardCall('calendar', this.opts.timeoutMs, () => this.provider.fetchEvents(from, to));
    if (!res.ok) {
      log.warn(res.error.message);
      return undefined;
    }
    if (res.value.length === 0) return undefined;

    const week = buildCalendarWeek(res.value, today);
    this.cache.set(key, week, this.opts.cacheTtlMs);
    return week;
  }
}
