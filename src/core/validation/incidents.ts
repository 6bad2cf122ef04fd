import { readFile } from 'node:fs/promises'
import { z } from 'zod'
import { InvalidInputError } from '../errors'
import type { Incident } from '../models/incident'
import { localTimestamp, parseClock } from '../utils/clock'
import { UNKNOWN_STATION } from '../vocabulary'

const severity = z.coerce.number().int().min(1).max(5)

const incidentSchema = z.object({
  id: z.string().min(1),
  crimeType: z.string().trim().min(1),
  latitude: z.number().finite().min(-90).max(90),
  longitude: z.number().finite().min(-180).max(180),
  ts: z.number().int().nonnegative(),
  severity,
  policeStation: z.string().trim().min(1).default(UNKNOWN_STATION),
})

// Column names used by the exported incident sheets.
const tabularIncidentSchema = z.object({
  Crime_ID: z.union([z.string().min(1), z.number().int()]).transform(String),
  Crime_Type: z.string().trim().min(1),
  Latitude: z.coerce.number().finite().min(-90).max(90),
  Longitude: z.coerce.number().finite().min(-180).max(180),
  Date: z.string().regex(/^\d{4}-\d{2}-\d{2}$/),
  Time: z.string().refine((value) => parseClock(value.slice(0, 5)) !== null, 'expected HH:MM'),
  Severity: severity,
  Police_Station: z.string().trim().min(1).default(UNKNOWN_STATION),
})

type TabularIncident = z.infer<typeof tabularIncidentSchema>

function fromTabular(row: TabularIncident, timezoneOffsetMinutes: number): Incident | string {
  const minutes = parseClock(row.Time.slice(0, 5))
  const ts = minutes === null ? null : localTimestamp(row.Date, minutes, timezoneOffsetMinutes)
  if (ts === null) return `invalid date/time "${row.Date} ${row.Time}"`
  return {
    id: row.Crime_ID,
    crimeType: row.Crime_Type,
    latitude: row.Latitude,
    longitude: row.Longitude,
    ts,
    severity: row.Severity,
    policeStation: row.Police_Station,
  }
}

/**
 * Validates incident rows in either the canonical shape or the tabular export
 * shape. Every invalid row is reported; duplicate ids are rejected.
 */
export function parseIncidentRows(rows: unknown, timezoneOffsetMinutes: number): Incident[] {
  const list = z.array(z.unknown()).safeParse(rows)
  if (!list.success) throw InvalidInputError.fromZod('Incident data must be an array', list.error)

  const issues: string[] = []
  const incidents: Incident[] = []
  const seen = new Set<string>()

  list.data.forEach((row, index) => {
    const canonical = incidentSchema.safeParse(row)
    let incident: Incident | string
    if (canonical.success) {
      incident = canonical.data
    } else {
      const tabular = tabularIncidentSchema.safeParse(row)
      incident = tabular.success
        ? fromTabular(tabular.data, timezoneOffsetMinutes)
        : canonical.error.issues.map((issue) => `${issue.path.join('.') || '(row)'}: ${issue.message}`).join(', ')
    }

    if (typeof incident === 'string') {
      issues.push(`row ${index}: ${incident}`)
      return
    }
    if (seen.has(incident.id)) {
      issues.push(`row ${index}: duplicate id "${incident.id}"`)
      return
    }
    seen.add(incident.id)
    incidents.push(incident)
  })

  if (issues.length) throw new InvalidInputError(`Invalid incident data (${issues.length} rows)`, issues)
  return incidents
}

export async function loadIncidentFile(path: string, timezoneOffsetMinutes: number): Promise<Incident[]> {
  const text = await readFile(path, 'utf8')
  let rows: unknown
  try {
    rows = JSON.parse(text)
  } catch (error) {
    throw new InvalidInputError(`Incident file ${path} is not valid JSON`, [String(error)])
  }
  return parseIncidentRows(rows, timezoneOffsetMinutes)
}
