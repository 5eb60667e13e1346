import { addMonths, eachDayOfInterval, format, isWeekend, parseISO, startOfMonth } from 'date-fns';

export interface DailyUsage {
  date: string; // YYYY-MM-DD
  creditsUsed: number;
  cumulative: number;
}

/**
 * Sample daily credit usage between two ISO dates (inclusive): a 30-day sawtooth,
 * damped on weekends and growing towards the end of the window.
 */
export function buildDailyUsage(start: string, end: string): DailyUsage[] {
  const days = eachDayOfInterval({ start: parseISO(start), end: parseISO(end) });
  let cumulative = 0;
  return days.map((day, i) => {
    const baseUsage = 200 + (i % 30) * 15;
    const weekendFactor = isWeekend(day) ? 0.6 : 1.0;
    const seasonalFactor = 1 + 0.3 * (i / days.length);
    const creditsUsed = Math.trunc(baseUsage * weekendFactor * seasonalFactor);
    cumulative += creditsUsed;
    return { date: format(day, 'yyyy-MM-dd'), creditsUsed, cumulative };
  });
}

export function nextBillDate(now: Date): string {
  return format(startOfMonth(addMonths(now, 1)), 'MMM d, yyyy');
}
