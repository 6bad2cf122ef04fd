import type { TimeBucket } from '../models/incident'

export const MINUTES_PER_DAY = 24 * 60

const NIGHT_START = 22 * 60
const NIGHT_END = 6 * 60
const AFTERNOON_START = 12 * 60
const EVENING_START = 18 * 60

const CLOCK_PATTERN = /^([01]?\d|2[0-3]):([0-5]\d)$/
const DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/

export const TIME_BUCKETS: TimeBucket[] = ['night', 'morning', 'afternoon', 'evening']

// Clock used when a record is derived from a bucket alone.
export const BUCKET_REPRESENTATIVE_MINUTES: Record<TimeBucket, number> = {
  night: 2 * 60,
  morning: 9 * 60,
  afternoon: 15 * 60,
  evening: 20 * 60,
}

export function parseClock(value: string): number | null {
  const match = CLOCK_PATTERN.exec(value.trim())
  if (!match) return null
  return Number(match[1]) * 60 + Number(match[2])
}

export function formatClock(minutes: number): string {
  const normalized = ((minutes % MINUTES_PER_DAY) + MINUTES_PER_DAY) % MINUTES_PER_DAY
  const hour = Math.floor(normalized / 60)
  const minute = normalized % 60
  return `${String(hour).padStart(2, '0')}:${String(minute).padStart(2, '0')}`
}

/** Night is 22:00 through 06:00, both ends included. */
export function isNightMinutes(minutes: number): boolean {
  return minutes >= NIGHT_START || minutes <= NIGHT_END
}

export function timeBucketOf(minutes: number): TimeBucket {
  if (isNightMinutes(minutes)) return 'night'
  if (minutes < AFTERNOON_START) return 'morning'
  if (minutes < EVENING_START) return 'afternoon'
  return 'evening'
}

export function clockDistance(a: number, b: number): number {
  const diff = Math.abs(a - b) % MINUTES_PER_DAY
  return Math.min(diff, MINUTES_PER_DAY - diff)
}

export interface CalendarParts {
  dayOfWeek: number
  month: number
  day: number
  isWeekend: boolean
}

// Monday = 0, matching the encoder the training corpus was built with.
export const DEFAULT_CALENDAR: CalendarParts = { dayOfWeek: 0, month: 1, day: 1, isWeekend: false }

function mondayFirst(utcDay: number): number {
  return (utcDay + 6) % 7
}

export function parseCalendarDate(value: string): CalendarParts | null {
  const match = DATE_PATTERN.exec(value)
  if (!match) return null
  const ts = Date.UTC(Number(match[1]), Number(match[2]) - 1, Number(match[3]))
  const date = new Date(ts)
  if (date.getUTCMonth() !== Number(match[2]) - 1 || date.getUTCDate() !== Number(match[3])) return null
  const dayOfWeek = mondayFirst(date.getUTCDay())
  return { dayOfWeek, month: date.getUTCMonth() + 1, day: date.getUTCDate(), isWeekend: dayOfWeek >= 5 }
}

export interface LocalMoment {
  minutes: number
  clock: string
  date: string
  calendar: CalendarParts
}

/** Splits an epoch timestamp into the region's wall-clock time. */
export function toLocalMoment(ts: number, offsetMinutes: number): LocalMoment {
  const shifted = new Date(ts + offsetMinutes * 60_000)
  const minutes = shifted.getUTCHours() * 60 + shifted.getUTCMinutes()
  const dayOfWeek = mondayFirst(shifted.getUTCDay())
  return {
    minutes,
    clock: formatClock(minutes),
    date: shifted.toISOString().slice(0, 10),
    calendar: {
      dayOfWeek,
      month: shifted.getUTCMonth() + 1,
      day: shifted.getUTCDate(),
      isWeekend: dayOfWeek >= 5,
    },
  }
}

/** Epoch ms of a regional wall-clock date and time. */
export function localTimestamp(date: string, minutes: number, offsetMinutes: number): number | null {
  const match = DATE_PATTERN.exec(date)
  if (!match || !parseCalendarDate(date)) return null
  return Date.UTC(Number(match[1]), Number(match[2]) - 1, Number(match[3])) + (minutes - offsetMinutes) * 60_000
}
