export type TimeBucket = 'night' | 'morning' | 'afternoon' | 'evening'

export interface Incident {
  id: string
  crimeType: string
  latitude: number
  longitude: number
  ts: number
  severity: number
  policeStation: string
}

export type RecordConfidence = 'high' | 'low'

export interface SynthesizedRecord extends Incident {
  provenance: 'feedback'
  sourceEventId: string
  time: string
  timeBucket: TimeBucket
  confidence: RecordConfidence
  batch: 'immediate' | 'next_batch'
}

export type CorpusRecord = Incident | SynthesizedRecord

export function isSynthesized(record: CorpusRecord): record is SynthesizedRecord {
  return 'provenance' in record && record.provenance === 'feedback'
}
