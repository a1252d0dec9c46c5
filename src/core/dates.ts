export type DatePeriod = 'this_week' | 'last_week' | 'this_month' | 'last_month';

export interface DateRange {
  from: string;
  to: string;
}

/** Calendar range for a period shortcut, Monday-based weeks, local time. */
export function resolveDatePeriod(period: DatePeriod, now: Date = new Date()): DateRange {
  const today = new Date(now.getFullYear(), now.getMonth(), now.getDate());
  // Monday = 0 ... Sunday = 6
  const weekday = (today.getDay() + 6) % 7;

  switch (period) {
    case 'this_week': {
      const start = addDays(today, -weekday);
      return { from: formatDate(start), to: formatDate(addDays(start, 6)) };
    }
    case 'last_week': {
      const start = addDays(today, -weekday - 7);
      return { from: formatDate(start), to: formatDate(addDays(start, 6)) };
    }
    case 'this_month':
      return {
        from: formatDate(new Date(today.getFullYear(), today.getMonth(), 1)),
        to: formatDate(new Date(today.getFullYear(), today.getMonth() + 1, 0))
      };
    case 'last_month':
      return {
        from: formatDate(new Date(today.getFullYear(), today.getMonth() - 1, 1)),
        to: formatDate(new Date(today.getFullYear(), today.getMonth(), 0))
      };
  }
}

/**
 * Redmine date filter from optional bounds: `>=a`, `<=b` or `><a|b`.
 */
export function dateFilter(after?: string, before?: string): string | undefined {
  if (after && before) return `><${after}|${before}`;
  if (after) return `>=${after}`;
  if (before) return `<=${before}`;
  return undefined;
}

export function formatDate(date: Date): string {
  const y = date.getFullYear();
  const m = String(date.getMonth() + 1).padStart(2, '0');
  const d = String(date.getDate()).padStart(2, '0');
  return `${y}-${m}-${d}`;
}

function addDays(date: Date, days: number): Date {
  return new Date(date.getFullYear(), date.getMonth(), date.getDate() + days);
}
