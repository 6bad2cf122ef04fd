import { z } from 'zod'
import { InvalidInputError } from '../errors'
import { parseCalendarDate, parseClock } from '../utils/clock'

const latitude = z.number().finite().min(-90).max(90)
const longitude = z.number().finite().min(-180).max(180)
const clock = z.string().refine((value) => parseClock(value) !== null, 'expected HH:MM (00:00-23:59)')
const calendarDate = z.string().refine((value) => parseCalendarDate(value) !== null, 'expected a real YYYY-MM-DD date')

export const assessmentRequestSchema = z.object({
  latitude,
  longitude,
  time: clock,
  severity: z.number().int().min(1).max(5).optional(),
  crime_type: z.string().trim().min(1).optional(),
  date: calendarDate.optional(),
})

export type AssessmentRequest = z.infer<typeof assessmentRequestSchema>

export function batchRequestSchema(limit: number) {
  return z.object({
    locations: z.array(assessmentRequestSchema).min(1).max(limit, `at most ${limit} locations per batch`),
  })
}

export type BatchRequest = z.infer<ReturnType<typeof batchRequestSchema>>

const timestamp = z.union([
  z.number().int().nonnegative(),
  z.string().datetime({ offset: true }).transform((value) => Date.parse(value)),
])

export const journeyRequestSchema = z.object({
  user_id: z.string().trim().min(1),
  points: z.array(z.object({ latitude, longitude, timestamp })).min(1),
})

export type JourneyRequest = z.infer<typeof journeyRequestSchema>

export const feedbackEventSchema = z.object({
  id: z.string().trim().min(1),
  feedback: z.enum(['Good', 'Bad']),
  suggestion: z.string().default(''),
  lat: latitude,
  lon: longitude,
  time: clock,
  crime_type: z.string().default(''),
  police_station: z.string().optional(),
  date: calendarDate.optional(),
})

export const nearbyRequestSchema = z.object({
  latitude,
  longitude,
  radius_km: z.number().positive().max(50).optional(),
})

export type NearbyRequest = z.infer<typeof nearbyRequestSchema>

/** Parses an external payload or throws `InvalidInputError` with every issue found. */
export function parseRequest<T extends z.ZodTypeAny>(schema: T, payload: unknown, what: string): z.output<T> {
  const parsed = schema.safeParse(payload)
  if (!parsed.success) throw InvalidInputError.fromZod(`Invalid ${what}`, parsed.error)
  return parsed.data
}
