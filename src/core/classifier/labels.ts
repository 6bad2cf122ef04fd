import { isSynthesized, type CorpusRecord } from '../models/incident'

export type BinaryLabel = 0 | 1

/** Bad feedback always marks its record risky; incidents by severity or crime type. */
export function riskLabelFor(record: CorpusRecord, highRiskCrimes: readonly string[]): BinaryLabel {
  if (isSynthesized(record)) return 1
  return record.severity >= 4 || highRiskCrimes.includes(record.crimeType) ? 1 : 0
}
