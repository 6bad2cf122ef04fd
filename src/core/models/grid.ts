export type GridRiskLabel = 'low' | 'medium' | 'high'

export interface GridThresholds {
  mediumCount: number
  highCount: number
  mediumScore: number
  highScore: number
}

export interface CellBounds {
  minLat: number
  maxLat: number
  minLon: number
  maxLon: number
}

export interface GridCell {
  id: string
  row: number
  col: number
  bounds: CellBounds
  center: { latitude: number; longitude: number }
  incidentCount: number
  severityScore: number
  avgSeverity: number
  maxSeverity: number
  dominantCrimeTypes: string[]
  riskLabel: GridRiskLabel
}

export interface GridSnapshot {
  version: number
  builtAt: number
  resolution: number
  thresholds: GridThresholds
  cells: ReadonlyMap<string, GridCell>
}

export interface GridSnapshotRecord {
  version: number
  builtAt: number
  resolution: number
  thresholds: GridThresholds
  cells: GridCell[]
}

export interface CellLookup {
  riskLabel: GridRiskLabel
  cell: GridCell | null
  cellId: string
}

export interface NearbyCell {
  cell: GridCell
  distanceKm: number
  riskLabel: GridRiskLabel
}

export interface GridSummary {
  version: number
  totalCells: number
  highCells: number
  mediumCells: number
  lowCells: number
  cellSizeKm: number
}
