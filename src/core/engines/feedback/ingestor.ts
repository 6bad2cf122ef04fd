import { BackpressureError, InvalidInputError } from '../../errors'
import type { Logger } from '../../logger'
import type { FeedbackEvent, FeedbackLogRecord, IngestOutcome } from '../../models/feedback'
import type { SynthesizedRecord, TimeBucket } from '../../models/incident'
import { BUCKET_REPRESENTATIVE_MINUTES, formatClock, localTimestamp, parseClock, timeBucketOf, toLocalMoment } from '../../utils/clock'
import { DEFAULT_CRIME_TYPE, UNKNOWN_STATION, type Vocabulary } from '../../vocabulary'
import { canonicalCategory, parseSuggestion, type ParsedSuggestion } from './extract'

/** Durable record of which feedback events were already handled. */
export interface FeedbackLedger {
  isProcessed(eventId: string): Promise<boolean>
  markProcessed(entry: FeedbackLogRecord): Promise<void>
}

export interface FeedbackIngestorOptions {
  vocabulary: Vocabulary
  ledger: FeedbackLedger
  logger: Logger
  severity: number
  timezoneOffsetMinutes: number
  queueLimit: number
  now?: () => number
  onRecords?: (records: SynthesizedRecord[]) => void
}

interface ResolvedEntities {
  crimeTypes: string[]
  station: string
  bucket: TimeBucket
  minutes: number
  issues: string[]
}

function resolveEntities(event: FeedbackEvent, parsed: ParsedSuggestion, vocabulary: Vocabulary, reportedMinutes: number): ResolvedEntities {
  const issues: string[] = []

  let crimeTypes = parsed.crimeTypes
  if (!crimeTypes.length) {
    const reported = event.crime_type.trim()
    crimeTypes = [reported ? canonicalCategory(reported, vocabulary.crimeTypes) : DEFAULT_CRIME_TYPE]
    issues.push(`no crime type in suggestion; used "${crimeTypes[0]}"`)
  }

  const fallbackStation = event.police_station?.trim() || UNKNOWN_STATION
  let station = parsed.stations.stations[0] ?? fallbackStation
  if (parsed.stations.stations.length > 1) {
    issues.push(`conflicting stations ${parsed.stations.stations.join(', ')}; used ${station}`)
  } else if (parsed.stations.unmatched.length) {
    if (!parsed.stations.stations.length) station = fallbackStation
    issues.push(`unknown station "${parsed.stations.unmatched.join(', ')}"`)
  } else if (!parsed.stations.stations.length) {
    issues.push(`no station in suggestion; used "${station}"`)
  }

  const { time } = parsed
  let bucket = timeBucketOf(reportedMinutes)
  let minutes: number | null = reportedMinutes
  if (time.kind === 'none') {
    issues.push(`no time in suggestion; used reported ${formatClock(reportedMinutes)}`)
  } else {
    bucket = time.bucket
    minutes = time.minutes
    if (time.kind === 'nearest') issues.push(time.reason)
  }
  if (minutes === null) minutes = timeBucketOf(reportedMinutes) === bucket ? reportedMinutes : BUCKET_REPRESENTATIVE_MINUTES[bucket]

  return { crimeTypes, station, bucket, minutes, issues }
}

/**
 * Turns user feedback into synthesized incident records. Events are handled
 * one at a time in arrival order, and each event id is handled at most once.
 */
export class FeedbackIngestor {
  private readonly options: FeedbackIngestorOptions
  private readonly logger: Logger
  private readonly now: () => number
  private tail: Promise<void> = Promise.resolve()
  private pending = 0

  constructor(options: FeedbackIngestorOptions) {
    this.options = options
    this.logger = options.logger.child({ component: 'feedback-ingestor' })
    this.now = options.now ?? Date.now
  }

  get queued(): number {
    return this.pending
  }

  ingest(event: FeedbackEvent): Promise<IngestOutcome> {
    if (this.pending >= this.options.queueLimit) {
      this.logger.warn({ eventId: event.id, limit: this.options.queueLimit }, 'feedback rejected, queue full')
      return Promise.reject(new BackpressureError(this.options.queueLimit))
    }
    this.pending += 1
    const run = this.tail.then(() => this.process(event))
    // The caller observes failures through `run`; the chain only needs ordering.
    this.tail = run.then(
      () => undefined,
      () => undefined,
    )
    return run.finally(() => {
      this.pending -= 1
    })
  }

  private async process(event: FeedbackEvent): Promise<IngestOutcome> {
    const log = this.logger.child({ eventId: event.id })

    if (await this.options.ledger.isProcessed(event.id)) {
      log.debug('feedback already processed')
      return { kind: 'no_op', reason: 'already_processed' }
    }

    if (event.feedback === 'Good') {
      await this.record(event, { kind: 'no_op', reason: 'positive_feedback' }, 'positive feedback')
      log.debug('positive feedback, nothing to record')
      return { kind: 'no_op', reason: 'positive_feedback' }
    }

    const reportedMinutes = parseClock(event.time)
    if (reportedMinutes === null) throw new InvalidInputError(`Invalid feedback time "${event.time}"`, ['time: expected HH:MM'])

    const parsed = parseSuggestion(event.suggestion, this.options.vocabulary, reportedMinutes)
    if (!parsed.recognized) {
      await this.record(event, { kind: 'no_op', reason: 'no_entities' }, 'no recognizable entity')
      log.warn({ suggestion: event.suggestion }, 'feedback had no recognizable entity')
      return { kind: 'no_op', reason: 'no_entities' }
    }

    const entities = resolveEntities(event, parsed, this.options.vocabulary, reportedMinutes)
    const records = this.buildRecords(event, entities)
    const outcome: IngestOutcome = entities.issues.length
      ? { kind: 'ambiguous', records, issues: entities.issues }
      : { kind: 'applied', records }

    await this.record(event, outcome, entities.issues.join('; ') || 'clean')
    if (outcome.kind === 'ambiguous') {
      log.warn({ issues: entities.issues, records: records.length }, 'feedback recorded with low confidence')
    } else {
      log.info({ records: records.length, bucket: entities.bucket }, 'feedback recorded')
    }

    this.options.onRecords?.(records)
    return outcome
  }

  private buildRecords(event: FeedbackEvent, entities: ResolvedEntities): SynthesizedRecord[] {
    const { timezoneOffsetMinutes } = this.options
    const date = event.date ?? toLocalMoment(this.now(), timezoneOffsetMinutes).date
    const ts = localTimestamp(date, entities.minutes, timezoneOffsetMinutes)
    if (ts === null) throw new InvalidInputError(`Invalid feedback date "${date}"`, ['date: expected YYYY-MM-DD'])

    const confidence = entities.issues.length ? 'low' : 'high'
    return entities.crimeTypes.map((crimeType, index) => ({
      id: `feedback:${event.id}:${index}`,
      crimeType,
      latitude: event.lat,
      longitude: event.lon,
      ts,
      severity: this.options.severity,
      policeStation: entities.station,
      provenance: 'feedback',
      sourceEventId: event.id,
      time: formatClock(entities.minutes),
      timeBucket: entities.bucket,
      confidence,
      batch: confidence === 'high' ? 'immediate' : 'next_batch',
    }))
  }

  private record(event: FeedbackEvent, outcome: IngestOutcome, detail: string): Promise<void> {
    return this.options.ledger.markProcessed({
      eventId: event.id,
      processedAt: this.now(),
      outcome: outcome.kind,
      detail,
      recordIds: outcome.kind === 'no_op' ? [] : outcome.records.map((record) => record.id),
    })
  }
}
