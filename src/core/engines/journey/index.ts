import { RISK_LEVEL_RANK, type JourneyAlert, type JourneyPoint, type JourneyResult, type JourneyTrend, type RiskLevel } from '../../models/assessment'
import type { ActiveSnapshots } from '../../runtime/snapshotRegistry'
import { toLocalMoment } from '../../utils/clock'
import { assessRisk } from '../fusion'

export function deriveTrend(levels: RiskLevel[]): JourneyTrend {
  if (levels.length < 2) return 'stable'
  const ranks = levels.map((level) => RISK_LEVEL_RANK[level])
  const steps = ranks.slice(1).map((rank, index) => rank - ranks[index])
  if (steps.every((step) => step > 0)) return 'escalating'
  if (steps.every((step) => step < 0)) return 'de-escalating'
  return 'stable'
}

export function trackJourney(snapshots: ActiveSnapshots, userId: string, points: JourneyPoint[], timezoneOffsetMinutes: number): JourneyResult {
  const assessments = points.map((point) => {
    const moment = toLocalMoment(point.ts, timezoneOffsetMinutes)
    return assessRisk(snapshots, { latitude: point.latitude, longitude: point.longitude, time: moment.clock, date: moment.date })
  })

  const levels = assessments.map((item) => item.finalRiskLevel)
  const firstCritical = levels.indexOf('critical')
  const summary: Record<RiskLevel, number> = { low: 0, medium: 0, high: 0, critical: 0 }
  levels.forEach((level) => {
    summary[level] += 1
  })

  const alerts: JourneyAlert[] = assessments
    .map((assessment, pointIndex) => ({ assessment, pointIndex }))
    .filter(({ assessment }) => assessment.shouldNotify)
    .map(({ assessment, pointIndex }) => ({
      pointIndex,
      level: assessment.finalRiskLevel,
      message: `${assessment.finalRiskLevel === 'critical' ? 'Critical' : 'High'} risk area detected at point ${pointIndex + 1}`,
    }))

  return {
    userId,
    assessments,
    trend: deriveTrend(levels),
    firstCriticalIndex: firstCritical === -1 ? null : firstCritical,
    summary,
    alerts,
  }
}
