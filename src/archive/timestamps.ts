const WEEKDAYS = ["monday", "tuesday", "wednesday", "thursday", "friday", "saturday", "sunday"]

const MONTHS = [
  "january",
  "february",
  "march",
  "april",
  "may",
  "june",
  "july",
  "august",
  "september",
  "october",
  "november",
  "december",
]

// "Monday, 3 June 2024 at 14:05:09 UTC"
const TAKEOUT_DATE = /^([A-Za-z]+), (\d{1,2}) ([A-Za-z]+) (\d{4}) at (\d{1,2}):(\d{1,2}):(\d{1,2}) UTC$/

const MONTH_DAYS = [31, 28, 31, 30, 31, 30, 31, 31, 30, 31, 30, 31]

const isLeapYear = (year: number): boolean => (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0

const daysInMonth = (year: number, monthIndex: number): number =>
  monthIndex === 1 && isLeapYear(year) ? 29 : MONTH_DAYS[monthIndex]

const twoDigits = (value: number): string => String(value).padStart(2, "0")

export interface TakeoutDate {
  readonly year: number
  readonly month: number
  readonly day: number
  readonly hour: number
  readonly minute: number
  readonly second: number
}

export const parseTakeoutDate = (raw: string): TakeoutDate | null => {
  const match = TAKEOUT_DATE.exec(raw)
  if (!match) return null
  const [, weekday, dayText, monthName, yearText, hourText, minuteText, secondText] = match
  if (!WEEKDAYS.includes(weekday.toLowerCase())) return null
  const monthIndex = MONTHS.indexOf(monthName.toLowerCase())
  if (monthIndex < 0) return null
  const year = Number(yearText)
  const day = Number(dayText)
  const hour = Number(hourText)
  const minute = Number(minuteText)
  const second = Number(secondText)
  if (day < 1 || day > daysInMonth(year, monthIndex)) return null
  if (hour > 23 || minute > 59 || second > 59) return null
  return { year, month: monthIndex + 1, day, hour, minute, second }
}

/** `YYYY-MM-DD HH:MM` for a takeout date string; any other input comes back unchanged. */
export const normalizeTimestamp = (raw: string): string => {
  const parsed = parseTakeoutDate(raw)
  if (!parsed) return raw
  const { year, month, day, hour, minute } = parsed
  return `${String(year).padStart(4, "0")}-${twoDigits(month)}-${twoDigits(day)} ${twoDigits(hour)}:${twoDigits(minute)}`
}
