import type { Incident } from '../models/incident'
import type { CellLookup, GridCell, GridRiskLabel, GridSnapshot, GridSnapshotRecord, GridSummary, GridThresholds, NearbyCell } from '../models/grid'
import { isNightMinutes, toLocalMoment } from '../utils/clock'
import { haversineKm, KM_PER_DEGREE } from '../utils/geo'
import { round } from '../utils/hash'

export interface GridBuildOptions {
  version: number
  builtAt: number
  resolution: number
  nightWeight: number
  thresholds: GridThresholds
  decayHalfLifeDays: number | null
  decayReferenceTs: number | null
  timezoneOffsetMinutes: number
}

export const GRID_LABEL_RANK: Record<GridRiskLabel, number> = { low: 0, medium: 1, high: 2 }

// Absorbs float error such as 10.95 / 0.01 = 1094.9999999.
const TRUNCATION_EPSILON = 1e-9
const DAY_MS = 24 * 60 * 60 * 1000

export function cellIndex(value: number, resolution: number): number {
  return Math.floor(value / resolution + TRUNCATION_EPSILON)
}

export function cellIdFor(latitude: number, longitude: number, resolution: number): string {
  return `${cellIndex(latitude, resolution)}:${cellIndex(longitude, resolution)}`
}

export function classifyCell(incidentCount: number, severityScore: number, thresholds: GridThresholds): GridRiskLabel {
  if (incidentCount >= thresholds.highCount || severityScore >= thresholds.highScore) return 'high'
  if (incidentCount >= thresholds.mediumCount || severityScore >= thresholds.mediumScore) return 'medium'
  return 'low'
}

function incidentWeight(incident: Incident, options: GridBuildOptions): number {
  const night = isNightMinutes(toLocalMoment(incident.ts, options.timezoneOffsetMinutes).minutes)
  let weight = incident.severity * (night ? options.nightWeight : 1)
  if (options.decayHalfLifeDays !== null && options.decayReferenceTs !== null) {
    const ageDays = Math.max(0, (options.decayReferenceTs - incident.ts) / DAY_MS)
    weight *= 0.5 ** (ageDays / options.decayHalfLifeDays)
  }
  return weight
}

interface CellAccumulator {
  row: number
  col: number
  count: number
  score: number
  severitySum: number
  maxSeverity: number
  crimeTypes: Map<string, number>
}

function dominantTypes(counts: Map<string, number>): string[] {
  return [...counts.entries()]
    .sort((a, b) => (b[1] - a[1]) || a[0].localeCompare(b[0]))
    .slice(0, 3)
    .map(([type]) => type)
}

function toCell(id: string, acc: CellAccumulator, options: GridBuildOptions): GridCell {
  const { resolution } = options
  const minLat = round(acc.row * resolution, 6)
  const minLon = round(acc.col * resolution, 6)
  const maxLat = round((acc.row + 1) * resolution, 6)
  const maxLon = round((acc.col + 1) * resolution, 6)
  const severityScore = round(acc.score, 4)

  return Object.freeze({
    id,
    row: acc.row,
    col: acc.col,
    bounds: Object.freeze({ minLat, maxLat, minLon, maxLon }),
    center: Object.freeze({ latitude: round((minLat + maxLat) / 2, 6), longitude: round((minLon + maxLon) / 2, 6) }),
    incidentCount: acc.count,
    severityScore,
    avgSeverity: round(acc.severitySum / acc.count, 3),
    maxSeverity: acc.maxSeverity,
    dominantCrimeTypes: dominantTypes(acc.crimeTypes),
    riskLabel: classifyCell(acc.count, severityScore, options.thresholds),
  })
}

/**
 * Aggregates incidents into a new frozen snapshot. Incidents are visited in id
 * order, so the same set always yields the same scores and labels.
 */
export function rebuildGrid(incidents: readonly Incident[], options: GridBuildOptions): GridSnapshot {
  const ordered = [...incidents].sort((a, b) => (a.id < b.id ? -1 : a.id > b.id ? 1 : 0))
  const accumulators = new Map<string, CellAccumulator>()

  ordered.forEach((incident) => {
    const row = cellIndex(incident.latitude, options.resolution)
    const col = cellIndex(incident.longitude, options.resolution)
    const id = `${row}:${col}`
    const acc = accumulators.get(id) ?? { row, col, count: 0, score: 0, severitySum: 0, maxSeverity: 0, crimeTypes: new Map<string, number>() }
    acc.count += 1
    acc.score += incidentWeight(incident, options)
    acc.severitySum += incident.severity
    acc.maxSeverity = Math.max(acc.maxSeverity, incident.severity)
    acc.crimeTypes.set(incident.crimeType, (acc.crimeTypes.get(incident.crimeType) ?? 0) + 1)
    accumulators.set(id, acc)
  })

  const cells = new Map<string, GridCell>()
  ;[...accumulators.entries()]
    .sort((a, b) => (a[1].row - b[1].row) || (a[1].col - b[1].col))
    .forEach(([id, acc]) => cells.set(id, toCell(id, acc, options)))

  return Object.freeze({
    version: options.version,
    builtAt: options.builtAt,
    resolution: options.resolution,
    thresholds: Object.freeze({ ...options.thresholds }),
    cells,
  })
}

export function emptyGrid(options: Pick<GridBuildOptions, 'resolution' | 'thresholds'>): GridSnapshot {
  return Object.freeze({ version: 0, builtAt: 0, resolution: options.resolution, thresholds: { ...options.thresholds }, cells: new Map<string, GridCell>() })
}

export function classifyPoint(snapshot: GridSnapshot, latitude: number, longitude: number): CellLookup {
  const cellId = cellIdFor(latitude, longitude, snapshot.resolution)
  const cell = snapshot.cells.get(cellId) ?? null
  return { cellId, cell, riskLabel: cell?.riskLabel ?? 'low' }
}

export function nearbyCells(snapshot: GridSnapshot, latitude: number, longitude: number, radiusKm: number): NearbyCell[] {
  const found: NearbyCell[] = []
  snapshot.cells.forEach((cell) => {
    const distanceKm = haversineKm(latitude, longitude, cell.center.latitude, cell.center.longitude)
    if (distanceKm <= radiusKm) found.push({ cell, distanceKm: round(distanceKm, 4), riskLabel: cell.riskLabel })
  })
  return found.sort((a, b) => (a.distanceKm - b.distanceKm) || (a.cell.row - b.cell.row) || (a.cell.col - b.cell.col))
}

export function summarizeGrid(snapshot: GridSnapshot): GridSummary {
  const counts: Record<GridRiskLabel, number> = { low: 0, medium: 0, high: 0 }
  snapshot.cells.forEach((cell) => {
    counts[cell.riskLabel] += 1
  })
  return {
    version: snapshot.version,
    totalCells: snapshot.cells.size,
    highCells: counts.high,
    mediumCells: counts.medium,
    lowCells: counts.low,
    cellSizeKm: round(snapshot.resolution * KM_PER_DEGREE, 3),
  }
}

export function toGridRecord(snapshot: GridSnapshot): GridSnapshotRecord {
  return {
    version: snapshot.version,
    builtAt: snapshot.builtAt,
    resolution: snapshot.resolution,
    thresholds: { ...snapshot.thresholds },
    cells: [...snapshot.cells.values()].map((cell) => ({ ...cell, bounds: { ...cell.bounds }, center: { ...cell.center }, dominantCrimeTypes: [...cell.dominantCrimeTypes] })),
  }
}

export function fromGridRecord(record: GridSnapshotRecord): GridSnapshot {
  const cells = new Map<string, GridCell>()
  record.cells.forEach((cell) => cells.set(cell.id, Object.freeze({ ...cell })))
  return Object.freeze({
    version: record.version,
    builtAt: record.builtAt,
    resolution: record.resolution,
    thresholds: Object.freeze({ ...record.thresholds }),
    cells,
  })
}
