const CALENDAR_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;

/** Local calendar date as "YYYY-MM-DD" */
export function toCalendarDate(date: Date): string {
  const yyyy = date.getFullYear();
  const mm = String(date.getMonth() + 1).padStart(2, "0");
  const dd = String(date.getDate()).padStart(2, "0");
  return `${yyyy}-${mm}-${dd}`;
}

/**
 * Returns the input when it is a real "YYYY-MM-DD" date, else null.
 * "2026-02-30" and "yesterday" are both null.
 */
export function parseCalendarDate(value: string | null | undefined): string | null {
  if (!value) return null;
  const match = CALENDAR_DATE.exec(value);
  if (!match) return null;

  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  const probe = new Date(year, month - 1, day);
  if (
    probe.getFullYear() !== year ||
    probe.getMonth() !== month - 1 ||
    probe.getDate() !== day
  ) {
    return null;
  }
  return value;
}
