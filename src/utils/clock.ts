export interface LocalTime {
  /** YYYY-MM-DD in the target timezone. */
  date: string;
  hour: number;
  minute: number;
}

const formatters = new Map<string, Intl.DateTimeFormat>();

function formatterFor(timeZone: string): Intl.DateTimeFormat {
  let fmt = formatters.get(timeZone);
  if (!fmt) {
    fmt = new Intl.DateTimeFormat('en-US', {
      timeZone,
      hourCycle: 'h23',
      year: 'numeric',
      month: '2-digit',
      day: '2-digit',
      hour: '2-digit',
      minute: '2-digit',
      second: '2-digit',
    });
    formatters.set(timeZone, fmt);
  }
  return fmt;
}

function parts(now: Date, timeZone: string): Record<string, number> {
  const out: Record<string, number> = {};
  for (const p of formatterFor(timeZone).formatToParts(now)) {
    if (p.type !== 'literal') out[p.type] = Number(p.value);
  }
  return out;
}

function pad(n: number): string {
  return String(n).padStart(2, '0');
}

export function localTime(now: Date, timeZone: string): LocalTime {
  const p = parts(now, timeZone);
  return {
    date: `${p.year}-${pad(p.month)}-${pad(p.day)}`,
    hour: p.hour,
    minute: p.minute,
  };
}

/** UTC instant of local midnight for the day containing `now`. */
export function startOfLocalDay(now: Date, timeZone: string): Date {
  const p = parts(now, timeZone);
  const wallClockAsUtc = Date.UTC(p.year, p.month - 1, p.day, p.hour, p.minute, p.second);
  const offsetMs = wallClockAsUtc - Math.floor(now.getTime() / 1000) * 1000;
  return new Date(Date.UTC(p.year, p.month - 1, p.day) - offsetMs);
}

export function previousDate(date: string): string {
  const [y, m, d] = date.split('-').map(Number);
  return new Date(Date.UTC(y, m - 1, d - 1)).toISOString().slice(0, 10);
}

/** The (date, hour) slot immediately before the given one; hour 0 rolls back a day. */
export function previousHourSlot(date: string, hour: number): { date: string; hour: number } {
  return hour > 0 ? { date, hour: hour - 1 } : { date: previousDate(date), hour: 23 };
}
