import type { JourneyResult, RiskAssessment, RiskLevel } from '../models/assessment'
import type { ClassifierLabel } from '../models/classifier'
import type { GridRiskLabel } from '../models/grid'
import { round } from '../utils/hash'

export interface AssessmentResponse {
  prediction: ClassifierLabel
  confidence: number
  risk_score: number
  safe_score: number
  final_risk_level: RiskLevel
  recommendations: string[]
  message: string
  alert_color: RiskAssessment['alertColor']
  should_notify: boolean
  grid_risk: GridRiskLabel
  is_night: boolean
  degraded: boolean
  model_version: number | null
  grid_version: number
}

export interface JourneyResponse {
  user_id: string
  assessments: AssessmentResponse[]
  trend: JourneyResult['trend']
  first_critical_index: number | null
  summary: Record<RiskLevel, number>
  alerts: Array<{ point_index: number; level: RiskLevel; message: string }>
}

// Without a classifier the scores carry no information, so they are split evenly.
export function toAssessmentResponse(assessment: RiskAssessment): AssessmentResponse {
  const { classifier } = assessment
  const riskScore = classifier ? classifier.riskProbability : 0.5
  return {
    prediction: classifier ? classifier.label : assessment.gridLabel === 'high' ? 'risky' : 'safe',
    confidence: classifier ? classifier.confidence : 0,
    risk_score: riskScore,
    safe_score: round(1 - riskScore),
    final_risk_level: assessment.finalRiskLevel,
    recommendations: [...assessment.recommendations],
    message: assessment.message,
    alert_color: assessment.alertColor,
    should_notify: assessment.shouldNotify,
    grid_risk: assessment.gridLabel,
    is_night: assessment.isNight,
    degraded: assessment.degraded,
    model_version: classifier ? classifier.version : null,
    grid_version: assessment.gridVersion,
  }
}

export function toJourneyResponse(result: JourneyResult): JourneyResponse {
  return {
    user_id: result.userId,
    assessments: result.assessments.map(toAssessmentResponse),
    trend: result.trend,
    first_critical_index: result.firstCriticalIndex,
    summary: { ...result.summary },
    alerts: result.alerts.map((alert) => ({ point_index: alert.pointIndex, level: alert.level, message: alert.message })),
  }
}
