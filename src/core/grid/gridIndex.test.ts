import { describe, expect, it } from 'vitest'
import { DEFAULT_ENGINE_CONFIG } from '../config'
import type { Incident } from '../models/incident'
import { GRID_LABEL_RANK, cellIdFor, classifyCell, classifyPoint, emptyGrid, fromGridRecord, nearbyCells, rebuildGrid, summarizeGrid, toGridRecord, type GridBuildOptions } from './gridIndex'

const thresholds = DEFAULT_ENGINE_CONFIG.grid.thresholds

const options: GridBuildOptions = {
  version: 1,
  builtAt: 0,
  resolution: 0.01,
  nightWeight: 1.5,
  thresholds,
  decayHalfLifeDays: null,
  decayReferenceTs: null,
  timezoneOffsetMinutes: 330,
}

function at(clock: string, date = '2024-01-10'): number {
  return Date.parse(`${date}T${clock}:00+05:30`)
}

function makeIncident(id: string, patch: Partial<Incident> = {}): Incident {
  return {
    id,
    crimeType: 'Theft',
    latitude: 10.9467,
    longitude: 76.8653,
    ts: at('13:00'),
    severity: 3,
    policeStation: 'Madukkarai',
    ...patch,
  }
}

describe('grid index', () => {
  it('truncates coordinates to a cell id', () => {
    expect(cellIdFor(10.9467, 76.8653, 0.01)).toBe('1094:7686')
    expect(cellIdFor(10.95, 76.87, 0.01)).toBe('1095:7687')
  })

  it('aggregates incidents in one cell', () => {
    const snapshot = rebuildGrid([
      makeIncident('a', { severity: 3 }),
      makeIncident('b', { severity: 5, crimeType: 'Robbery' }),
      makeIncident('c', { severity: 4, ts: at('23:00') }),
    ], options)

    const cell = snapshot.cells.get('1094:7686')
    expect(cell).toBeDefined()
    expect(cell?.incidentCount).toBe(3)
    expect(cell?.severityScore).toBe(14)
    expect(cell?.avgSeverity).toBe(4)
    expect(cell?.maxSeverity).toBe(5)
    expect(cell?.dominantCrimeTypes).toEqual(['Theft', 'Robbery'])
    expect(cell?.riskLabel).toBe('medium')
    expect(cell?.bounds).toEqual({ minLat: 10.94, maxLat: 10.95, minLon: 76.86, maxLon: 76.87 })
    expect(cell?.center).toEqual({ latitude: 10.945, longitude: 76.865 })
  })

  it('labels at or above thresholds', () => {
    expect(classifyCell(2, 9.9, thresholds)).toBe('low')
    expect(classifyCell(3, 0, thresholds)).toBe('medium')
    expect(classifyCell(0, 10, thresholds)).toBe('medium')
    expect(classifyCell(8, 0, thresholds)).toBe('high')
    expect(classifyCell(1, 25, thresholds)).toBe('high')
  })

  it('never lowers the label when count or score grows', () => {
    for (let count = 0; count <= 12; count += 1) {
      for (let score = 0; score <= 40; score += 0.5) {
        const base = GRID_LABEL_RANK[classifyCell(count, score, thresholds)]
        expect(GRID_LABEL_RANK[classifyCell(count + 1, score, thresholds)]).toBeGreaterThanOrEqual(base)
        expect(GRID_LABEL_RANK[classifyCell(count, score + 0.5, thresholds)]).toBeGreaterThanOrEqual(base)
      }
    }
  })

  it('gives identical snapshots regardless of insertion order', () => {
    const incidents = Array.from({ length: 30 }, (_, index) => makeIncident(`inc-${index}`, {
      latitude: 10.9 + (index % 5) * 0.013,
      longitude: 76.9 + (index % 3) * 0.021,
      severity: (index % 5) + 1,
      ts: at(index % 2 ? '23:30' : '10:15'),
    }))
    const shuffled = [...incidents].reverse()
    expect(toGridRecord(rebuildGrid(shuffled, options))).toEqual(toGridRecord(rebuildGrid(incidents, options)))
  })

  it('decays old incidents by half-life', () => {
    const ts = at('13:00')
    const snapshot = rebuildGrid([makeIncident('a', { severity: 4, ts })], {
      ...options,
      decayHalfLifeDays: 1,
      decayReferenceTs: ts + 24 * 60 * 60 * 1000,
    })
    expect(snapshot.cells.get('1094:7686')?.severityScore).toBe(2)
  })

  it('classifies an empty cell as low', () => {
    const lookup = classifyPoint(emptyGrid(options), 10.9467, 76.8653)
    expect(lookup).toEqual({ cellId: '1094:7686', cell: null, riskLabel: 'low' })
  })

  it('classifies a point by its cell', () => {
    const snapshot = rebuildGrid(Array.from({ length: 8 }, (_, index) => makeIncident(`h-${index}`)), options)
    expect(classifyPoint(snapshot, 10.9467, 76.8653).riskLabel).toBe('high')
    expect(classifyPoint(snapshot, 10.9567, 76.8653).riskLabel).toBe('low')
  })

  it('orders nearby cells by distance and drops far ones', () => {
    const snapshot = rebuildGrid([
      makeIncident('near', { latitude: 10.9467, longitude: 76.8653 }),
      makeIncident('north', { latitude: 10.9567, longitude: 76.8653 }),
      makeIncident('far', { latitude: 11.5, longitude: 77.5 }),
    ], options)

    const found = nearbyCells(snapshot, 10.9467, 76.8653, 2)
    expect(found.map((item) => item.cell.id)).toEqual(['1094:7686', '1095:7686'])
    expect(found[0].distanceKm).toBeLessThan(found[1].distanceKm)
    expect(found[1].distanceKm).toBeLessThanOrEqual(2)
  })

  it('breaks equal distances by row, then column', () => {
    const built = rebuildGrid([
      makeIncident('north', { latitude: 11.015, longitude: 77.005 }),
      makeIncident('south', { latitude: 10.995, longitude: 77.005 }),
      makeIncident('east', { latitude: 11.005, longitude: 77.015 }),
      makeIncident('west', { latitude: 11.005, longitude: 76.995 }),
    ], options)
    const record = toGridRecord(built)
    const reversed = fromGridRecord({ ...record, cells: [...record.cells].reverse() })

    const found = nearbyCells(reversed, 11.005, 77.005, 1.5)
    expect(found.map((item) => item.cell.id)).toEqual(['1100:7699', '1100:7701', '1099:7700', '1101:7700'])
    expect(found.map((item) => item.distanceKm)).toEqual([1.0915, 1.0915, 1.1119, 1.1119])
  })

  it('summarizes label counts', () => {
    const snapshot = rebuildGrid([
      ...Array.from({ length: 8 }, (_, index) => makeIncident(`h-${index}`)),
      ...Array.from({ length: 3 }, (_, index) => makeIncident(`m-${index}`, { latitude: 10.98 })),
      makeIncident('l-0', { latitude: 11.2 }),
    ], options)

    expect(summarizeGrid(snapshot)).toEqual({ version: 1, totalCells: 3, highCells: 1, mediumCells: 1, lowCells: 1, cellSizeKm: 1.11 })
  })

  it('restores a stored snapshot', () => {
    const snapshot = rebuildGrid([makeIncident('a'), makeIncident('b', { latitude: 11 })], options)
    const restored = fromGridRecord(toGridRecord(snapshot))
    expect(restored.cells.size).toBe(2)
    expect(restored.cells.get('1094:7686')).toEqual(snapshot.cells.get('1094:7686'))
    expect(Object.isFrozen(restored)).toBe(true)
  })
})
