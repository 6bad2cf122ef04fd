import type { ClassifierLabel } from './classifier'
import type { GridCell, GridRiskLabel } from './grid'
import type { TimeBucket } from './incident'

export type RiskLevel = 'low' | 'medium' | 'high' | 'critical'

export type AlertColor = 'green' | 'yellow' | 'orange' | 'red'

export const RISK_LEVEL_RANK: Record<RiskLevel, number> = {
  low: 0,
  medium: 1,
  high: 2,
  critical: 3,
}

export interface AssessmentInput {
  latitude: number
  longitude: number
  time: string
  date?: string
  severity?: number
  crimeType?: string
}

export interface ClassifierVerdict {
  label: ClassifierLabel
  confidence: number
  riskProbability: number
  version: number
}

export interface RiskAssessment {
  input: AssessmentInput
  gridLabel: GridRiskLabel
  cell: GridCell | null
  classifier: ClassifierVerdict | null
  isNight: boolean
  timeBucket: TimeBucket
  finalRiskLevel: RiskLevel
  message: string
  alertColor: AlertColor
  shouldNotify: boolean
  recommendations: string[]
  degraded: boolean
  gridVersion: number
}

export type JourneyTrend = 'escalating' | 'de-escalating' | 'stable'

export interface JourneyPoint {
  latitude: number
  longitude: number
  ts: number
}

export interface JourneyAlert {
  pointIndex: number
  level: RiskLevel
  message: string
}

export interface JourneyResult {
  userId: string
  assessments: RiskAssessment[]
  trend: JourneyTrend
  firstCriticalIndex: number | null
  summary: Record<RiskLevel, number>
  alerts: JourneyAlert[]
}
