import { featureInputFor } from '../../classifier/features'
import { predictWithSnapshot } from '../../classifier/logistic'
import { InvalidInputError } from '../../errors'
import { classifyPoint } from '../../grid/gridIndex'
import type { AssessmentInput, ClassifierVerdict, RiskAssessment, RiskLevel } from '../../models/assessment'
import type { ClassifierLabel } from '../../models/classifier'
import type { GridRiskLabel } from '../../models/grid'
import type { ActiveSnapshots } from '../../runtime/snapshotRegistry'
import { isNightMinutes, parseCalendarDate, parseClock, timeBucketOf } from '../../utils/clock'
import { DEFAULT_CRIME_TYPE, DEFAULT_SEVERITY, UNKNOWN_STATION } from '../../vocabulary'
import { describeRiskLevel } from './messages'

export function decideRiskLevel(classifierLabel: ClassifierLabel, gridLabel: GridRiskLabel, isNight: boolean): RiskLevel {
  const risky = classifierLabel === 'risky'
  if (risky && gridLabel === 'high' && isNight) return 'critical'
  if (risky && (gridLabel === 'high' || isNight)) return 'high'
  if (risky || gridLabel === 'medium') return 'medium'
  return 'low'
}

/** Reduced table used while no classifier snapshot is loaded. */
export function decideDegradedRiskLevel(gridLabel: GridRiskLabel, isNight: boolean): RiskLevel {
  if (gridLabel === 'high' && isNight) return 'high'
  if (gridLabel === 'high') return 'medium'
  return 'low'
}

/**
 * Fuses the grid label, the classifier verdict and the time of day. Reads only
 * the snapshot pair it is handed.
 */
export function assessRisk(snapshots: ActiveSnapshots, input: AssessmentInput): RiskAssessment {
  const minutes = parseClock(input.time)
  if (minutes === null) throw new InvalidInputError('Malformed time', [`time: expected HH:MM, got "${input.time}"`])
  const calendar = input.date === undefined ? null : parseCalendarDate(input.date)
  if (input.date !== undefined && calendar === null) throw new InvalidInputError('Malformed date', [`date: expected YYYY-MM-DD, got "${input.date}"`])

  const isNight = isNightMinutes(minutes)
  const lookup = classifyPoint(snapshots.grid, input.latitude, input.longitude)

  let classifier: ClassifierVerdict | null = null
  if (snapshots.classifier) {
    const prediction = predictWithSnapshot(snapshots.classifier, featureInputFor({
      latitude: input.latitude,
      longitude: input.longitude,
      severity: input.severity ?? DEFAULT_SEVERITY,
      minutes,
      calendar,
      crimeType: input.crimeType ?? DEFAULT_CRIME_TYPE,
      policeStation: UNKNOWN_STATION,
    }))
    classifier = { ...prediction, version: snapshots.classifier.version }
  }

  const finalRiskLevel = classifier
    ? decideRiskLevel(classifier.label, lookup.riskLabel, isNight)
    : decideDegradedRiskLevel(lookup.riskLabel, isNight)
  const template = describeRiskLevel(finalRiskLevel, isNight)

  return {
    input,
    gridLabel: lookup.riskLabel,
    cell: lookup.cell,
    classifier,
    isNight,
    timeBucket: timeBucketOf(minutes),
    finalRiskLevel,
    message: template.message,
    alertColor: template.alertColor,
    shouldNotify: finalRiskLevel === 'high' || finalRiskLevel === 'critical',
    recommendations: template.recommendations,
    degraded: classifier === null,
    gridVersion: snapshots.grid.version,
  }
}
