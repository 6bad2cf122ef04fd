import type { TimeBucket } from '../../models/incident'
import type { Vocabulary } from '../../vocabulary'
import { clockDistance, timeBucketOf } from '../../utils/clock'

interface TextMatch {
  value: string
  start: number
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&')
}

function phrasePattern(phrase: string): RegExp {
  const body = phrase.trim().split(/\s+/).map(escapeRegExp).join('\\s+')
  return new RegExp(`\\b${body}\\b`, 'gi')
}

// Consumed text is blanked with a non-word, non-space character so later
// patterns cannot bridge across it.
function mask(text: string, start: number, length: number): string {
  return text.slice(0, start) + '#'.repeat(length) + text.slice(start + length)
}

/** Finds vocabulary phrases, longest first, so a shorter entry never matches inside a longer one. */
function matchVocabulary(text: string, entries: readonly string[]): { matches: TextMatch[]; rest: string } {
  let rest = text
  const matches: TextMatch[] = []
  const ordered = [...entries].sort((a, b) => (b.length - a.length) || a.localeCompare(b))

  ordered.forEach((entry) => {
    const pattern = phrasePattern(entry)
    let found = pattern.exec(rest)
    while (found) {
      matches.push({ value: entry, start: found.index })
      rest = mask(rest, found.index, found[0].length)
      pattern.lastIndex = found.index + found[0].length
      found = pattern.exec(rest)
    }
  })

  return { matches: matches.sort((a, b) => a.start - b.start), rest }
}

function distinctInOrder(matches: TextMatch[]): string[] {
  return [...new Set(matches.map((match) => match.value))]
}

export function canonicalCategory(value: string, entries: readonly string[]): string {
  const trimmed = value.trim()
  return entries.find((entry) => entry.toLowerCase() === trimmed.toLowerCase()) ?? trimmed
}

export interface CrimeTypeExtraction {
  crimeTypes: string[]
}

export function extractCrimeTypes(text: string, vocabulary: Vocabulary): CrimeTypeExtraction {
  return { crimeTypes: distinctInOrder(matchVocabulary(text, vocabulary.crimeTypes).matches) }
}

export interface StationExtraction {
  stations: string[]
  unmatched: string[]
}

const STATION_SUFFIX = /\b([a-z][\w.-]*)\s+(?:ps|police\s+station)\b/gi

export function extractStations(text: string, vocabulary: Vocabulary): StationExtraction {
  const { matches, rest } = matchVocabulary(text, vocabulary.policeStations)
  const unmatched: string[] = []
  let found = STATION_SUFFIX.exec(rest)
  while (found) {
    unmatched.push(found[1])
    found = STATION_SUFFIX.exec(rest)
  }
  STATION_SUFFIX.lastIndex = 0
  return { stations: distinctInOrder(matches), unmatched }
}

interface TimeCandidate {
  bucket: TimeBucket
  minutes: number | null
}

export interface TimeMention {
  text: string
  candidates: TimeCandidate[]
  partial: boolean
}

const TWELVE_HOUR = /\b(1[0-2]|0?[1-9])(?::([0-5]\d))?\s*(a\.?m\.?|p\.?m\.?)(?![a-z])/gi
const TWENTY_FOUR_HOUR = /\b([01]?\d|2[0-3]):([0-5]\d)\b/g
const BARE_HOUR = /\b(?:at|around|about|after|before|by|till|until)\s+(1[0-2]|0?[1-9])\b/gi

const EXACT_WORDS: Array<{ pattern: RegExp; minutes: number }> = [
  { pattern: /\bmidnight\b/gi, minutes: 0 },
  { pattern: /\bnoon\b/gi, minutes: 12 * 60 },
]

const APPROXIMATE_WORDS: Array<{ pattern: RegExp; minutes: number }> = [
  { pattern: /\bdawn\b/gi, minutes: 5 * 60 + 30 },
  { pattern: /\bdusk\b/gi, minutes: 18 * 60 + 30 },
]

const PERIOD_WORDS: Array<{ pattern: RegExp; bucket: TimeBucket }> = [
  { pattern: /\b(?:late\s+night|night\s*time|nights?|tonight|overnight)\b/gi, bucket: 'night' },
  { pattern: /\bmornings?\b/gi, bucket: 'morning' },
  { pattern: /\bafternoons?\b/gi, bucket: 'afternoon' },
  { pattern: /\bevenings?\b/gi, bucket: 'evening' },
]

function exactCandidate(minutes: number): TimeCandidate {
  return { bucket: timeBucketOf(minutes), minutes }
}

function collect(text: string, pattern: RegExp, build: (match: RegExpExecArray) => TimeMention): { mentions: Array<TimeMention & { start: number }>; rest: string } {
  let rest = text
  const mentions: Array<TimeMention & { start: number }> = []
  pattern.lastIndex = 0
  let found = pattern.exec(rest)
  while (found) {
    mentions.push({ ...build(found), start: found.index })
    rest = mask(rest, found.index, found[0].length)
    found = pattern.exec(rest)
  }
  pattern.lastIndex = 0
  return { mentions, rest }
}

/** Lists every time expression in the text, in reading order. */
export function extractTimeMentions(text: string): TimeMention[] {
  let rest = text
  const all: Array<TimeMention & { start: number }> = []
  const run = (pattern: RegExp, build: (match: RegExpExecArray) => TimeMention) => {
    const result = collect(rest, pattern, build)
    all.push(...result.mentions)
    rest = result.rest
  }

  run(TWELVE_HOUR, (match) => {
    const hour = Number(match[1]) % 12 + (match[3].toLowerCase().startsWith('p') ? 12 : 0)
    return { text: match[0], candidates: [exactCandidate(hour * 60 + Number(match[2] ?? 0))], partial: false }
  })
  run(TWENTY_FOUR_HOUR, (match) => ({ text: match[0], candidates: [exactCandidate(Number(match[1]) * 60 + Number(match[2]))], partial: false }))
  run(BARE_HOUR, (match) => {
    const hour = Number(match[1]) % 12
    return { text: match[0], candidates: [exactCandidate(hour * 60), exactCandidate((hour + 12) * 60)], partial: true }
  })
  EXACT_WORDS.forEach(({ pattern, minutes }) => run(pattern, (match) => ({ text: match[0], candidates: [exactCandidate(minutes)], partial: false })))
  APPROXIMATE_WORDS.forEach(({ pattern, minutes }) => run(pattern, (match) => ({ text: match[0], candidates: [exactCandidate(minutes)], partial: true })))
  PERIOD_WORDS.forEach(({ pattern, bucket }) => run(pattern, (match) => ({ text: match[0], candidates: [{ bucket, minutes: null }], partial: false })))

  return all.sort((a, b) => a.start - b.start).map(({ text: phrase, candidates, partial }) => ({ text: phrase, candidates, partial }))
}

const BUCKET_EDGES: Record<TimeBucket, [number, number]> = {
  night: [22 * 60, 6 * 60],
  morning: [6 * 60 + 1, 12 * 60 - 1],
  afternoon: [12 * 60, 18 * 60 - 1],
  evening: [18 * 60, 22 * 60 - 1],
}

function distanceToCandidate(candidate: TimeCandidate, reported: number): number {
  if (candidate.minutes !== null) return clockDistance(candidate.minutes, reported)
  if (timeBucketOf(reported) === candidate.bucket) return 0
  const [from, to] = BUCKET_EDGES[candidate.bucket]
  return Math.min(clockDistance(reported, from), clockDistance(reported, to))
}

export type TimeResolution =
  | { kind: 'none' }
  | { kind: 'clean'; bucket: TimeBucket; minutes: number | null }
  | { kind: 'nearest'; bucket: TimeBucket; minutes: number | null; reason: string }

/**
 * Settles the mentions on one bucket. When they disagree or are partial, the
 * candidate closest to the reported time wins and an exact tie falls back to
 * the reported time's own bucket.
 */
export function resolveTimeBucket(mentions: TimeMention[], reportedMinutes: number): TimeResolution {
  if (!mentions.length) return { kind: 'none' }

  const candidates = mentions.flatMap((mention) => mention.candidates)
  const buckets = new Set(candidates.map((candidate) => candidate.bucket))
  const partial = mentions.some((mention) => mention.partial)

  if (buckets.size === 1) {
    const bucket = candidates[0].bucket
    const minutes = candidates.find((candidate) => candidate.minutes !== null)?.minutes ?? null
    if (!partial) return { kind: 'clean', bucket, minutes }
    return { kind: 'nearest', bucket, minutes, reason: `approximate time "${mentions.map((item) => item.text).join(', ')}"` }
  }

  const ranked = candidates
    .map((candidate) => ({ candidate, distance: distanceToCandidate(candidate, reportedMinutes) }))
    .sort((a, b) => a.distance - b.distance)
  const best = ranked[0]
  const tied = ranked.filter((item) => item.distance === best.distance)
  const tiedBuckets = new Set(tied.map((item) => item.candidate.bucket))
  const reason = `conflicting or partial time "${mentions.map((item) => item.text).join(', ')}"`

  if (tiedBuckets.size > 1) {
    const bucket = timeBucketOf(reportedMinutes)
    return { kind: 'nearest', bucket, minutes: reportedMinutes, reason: `${reason}; tie resolved to reported time` }
  }
  return { kind: 'nearest', bucket: best.candidate.bucket, minutes: best.candidate.minutes, reason }
}

export interface ParsedSuggestion {
  crimeTypes: string[]
  stations: StationExtraction
  time: TimeResolution
  recognized: boolean
}

export function parseSuggestion(text: string, vocabulary: Vocabulary, reportedMinutes: number): ParsedSuggestion {
  const crime = extractCrimeTypes(text, vocabulary)
  const stations = extractStations(text, vocabulary)
  const time = resolveTimeBucket(extractTimeMentions(text), reportedMinutes)

  return {
    crimeTypes: crime.crimeTypes,
    stations,
    time,
    recognized: crime.crimeTypes.length > 0 || stations.stations.length > 0 || time.kind !== 'none',
  }
}
