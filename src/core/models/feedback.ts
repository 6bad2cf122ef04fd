import type { SynthesizedRecord } from './incident'

export type FeedbackPolarity = 'Good' | 'Bad'

export interface FeedbackEvent {
  id: string
  feedback: FeedbackPolarity
  suggestion: string
  lat: number
  lon: number
  time: string
  crime_type: string
  police_station?: string
  date?: string
}

export type NoOpReason = 'positive_feedback' | 'no_entities' | 'already_processed'

export type IngestOutcome =
  | { kind: 'applied'; records: SynthesizedRecord[] }
  | { kind: 'no_op'; reason: NoOpReason }
  | { kind: 'ambiguous'; records: SynthesizedRecord[]; issues: string[] }

export interface FeedbackLogRecord {
  eventId: string
  processedAt: number
  outcome: IngestOutcome['kind']
  detail: string
  recordIds: string[]
}

export type RetrainRejectReason =
  | 'insufficient_data'
  | 'validation_regression'
  | 'encoder_mismatch'
  | 'timeout'
  | 'publish_failed'

export type RetrainOutcome =
  | { status: 'success'; version: number; validationAccuracy: number }
  | { status: 'rejected'; reason: RetrainRejectReason; detail: string }
