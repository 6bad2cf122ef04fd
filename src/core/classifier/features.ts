import type { FeatureEncoder } from '../models/classifier'
import type { CorpusRecord, TimeBucket } from '../models/incident'
import { DEFAULT_CALENDAR, TIME_BUCKETS, timeBucketOf, toLocalMoment, type CalendarParts } from '../utils/clock'

export const FEATURE_SCHEMA_VERSION = 1

export interface FeatureInput {
  latitude: number
  longitude: number
  severity: number
  minutes: number
  calendar: CalendarParts
  crimeType: string
  policeStation: string
}

const NUMERIC_FEATURES = ['latitude', 'longitude', 'severity', 'hour', 'minute', 'dayOfWeek', 'month', 'day'] as const

function numericValues(input: FeatureInput): number[] {
  return [
    input.latitude,
    input.longitude,
    input.severity,
    Math.floor(input.minutes / 60),
    input.minutes % 60,
    input.calendar.dayOfWeek,
    input.calendar.month,
    input.calendar.day,
  ]
}

export function featureInputFromRecord(record: CorpusRecord, timezoneOffsetMinutes: number): FeatureInput {
  const moment = toLocalMoment(record.ts, timezoneOffsetMinutes)
  return {
    latitude: record.latitude,
    longitude: record.longitude,
    severity: record.severity,
    minutes: moment.minutes,
    calendar: moment.calendar,
    crimeType: record.crimeType,
    policeStation: record.policeStation,
  }
}

export function featureInputFor(params: Omit<FeatureInput, 'calendar'> & { calendar?: CalendarParts | null }): FeatureInput {
  return { ...params, calendar: params.calendar ?? DEFAULT_CALENDAR }
}

function uniqueSorted(values: string[]): string[] {
  return [...new Set(values)].sort((a, b) => a.localeCompare(b))
}

function extendCategories(existing: readonly string[], seen: string[]): string[] {
  const known = new Set(existing)
  return [...existing, ...uniqueSorted(seen.filter((value) => !known.has(value)))]
}

/**
 * Fits category codes and the numeric scaler on a corpus. With a previous
 * encoder, existing codes keep their positions and new categories are appended.
 */
export function fitEncoder(inputs: FeatureInput[], previous?: FeatureEncoder): FeatureEncoder {
  const crimeTypes = previous ? extendCategories(previous.crimeTypes, inputs.map((item) => item.crimeType)) : uniqueSorted(inputs.map((item) => item.crimeType))
  const policeStations = previous
    ? extendCategories(previous.policeStations, inputs.map((item) => item.policeStation))
    : uniqueSorted(inputs.map((item) => item.policeStation))

  const rows = inputs.map(numericValues)
  const mean = NUMERIC_FEATURES.map((_, column) => (rows.length ? rows.reduce((sum, row) => sum + row[column], 0) / rows.length : 0))
  const std = NUMERIC_FEATURES.map((_, column) => {
    if (!rows.length) return 1
    const variance = rows.reduce((sum, row) => sum + (row[column] - mean[column]) ** 2, 0) / rows.length
    const deviation = Math.sqrt(variance)
    return deviation > 0 ? deviation : 1
  })

  return { schemaVersion: FEATURE_SCHEMA_VERSION, crimeTypes, policeStations, scaler: { mean, std } }
}

export function featureLength(encoder: FeatureEncoder): number {
  return NUMERIC_FEATURES.length + TIME_BUCKETS.length + 1 + encoder.crimeTypes.length + 1 + encoder.policeStations.length + 1
}

function oneHot(size: number, index: number): number[] {
  return Array.from({ length: size }, (_, position) => (position === index ? 1 : 0))
}

// Code 0 is reserved for categories the encoder has never seen.
export function categoryCode(categories: readonly string[], value: string): number {
  const index = categories.indexOf(value)
  return index === -1 ? 0 : index + 1
}

export function encodeFeatures(encoder: FeatureEncoder, input: FeatureInput): number[] {
  const scaled = numericValues(input).map((value, column) => (value - encoder.scaler.mean[column]) / encoder.scaler.std[column])
  const bucket: TimeBucket = timeBucketOf(input.minutes)

  return [
    ...scaled,
    ...oneHot(TIME_BUCKETS.length, TIME_BUCKETS.indexOf(bucket)),
    input.calendar.isWeekend ? 1 : 0,
    ...oneHot(encoder.crimeTypes.length + 1, categoryCode(encoder.crimeTypes, input.crimeType)),
    ...oneHot(encoder.policeStations.length + 1, categoryCode(encoder.policeStations, input.policeStation)),
  ]
}

export function preservesCodes(previous: FeatureEncoder, next: FeatureEncoder): boolean {
  if (previous.schemaVersion !== next.schemaVersion) return false
  const samePrefix = (before: readonly string[], after: readonly string[]) => before.every((value, index) => after[index] === value)
  return samePrefix(previous.crimeTypes, next.crimeTypes) && samePrefix(previous.policeStations, next.policeStations)
}
