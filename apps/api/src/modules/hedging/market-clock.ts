const ET_FORMAT = new Intl.DateTimeFormat("en-US", {
  timeZone: "America/New_York",
  year: "numeric",
  month: "2-digit",
  day: "2-digit",
  weekday: "short",
  hour: "2-digit",
  minute: "2-digit",
  hourCycle: "h23"
});

const RTH_OPEN_MINUTE = 9 * 60 + 30;
const RTH_CLOSE_MINUTE = 16 * 60;
const DAY_MS = 24 * 60 * 60 * 1000;

export type EtClock = {
  /** Calendar day in New York, YYYY-MM-DD. */
  date: string;
  weekday: string;
  minuteOfDay: number;
};

export function getEtClock(nowMs: number): EtClock {
  const parts = new Map(ET_FORMAT.formatToParts(new Date(nowMs)).map((p) => [p.type, p.value]));
  const hour = Number(parts.get("hour") ?? "0");
  const minute = Number(parts.get("minute") ?? "0");
  return {
    date: `${parts.get("year") ?? ""}-${parts.get("month") ?? ""}-${parts.get("day") ?? ""}`,
    weekday: parts.get("weekday") ?? "",
    minuteOfDay: hour * 60 + minute
  };
}

/** Regular session: 09:30 to 16:00 New York time, Monday to Friday. */
export function isRegularTradingHours(nowMs: number): boolean {
  const clock = getEtClock(nowMs);
  if (clock.weekday === "Sat" || clock.weekday === "Sun") return false;
  return clock.minuteOfDay >= RTH_OPEN_MINUTE && clock.minuteOfDay < RTH_CLOSE_MINUTE;
}

function dayNumber(isoDate: string): number {
  return Math.floor(Date.parse(`${isoDate}T00:00:00Z`) / DAY_MS);
}

export function isInEarningsBlackout(nowMs: number, earningsDates: readonly string[], daysBefore: number, daysAfter: number): boolean {
  const today = dayNumber(getEtClock(nowMs).date);
  return earningsDates.some((date) => {
    const earnings = dayNumber(date);
    if (!Number.isFinite(earnings)) return false;
    return today >= earnings - daysBefore && today <= earnings + daysAfter;
  });
}
