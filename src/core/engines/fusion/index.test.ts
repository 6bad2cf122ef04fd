import { describe, expect, it } from 'vitest'
import { DEFAULT_ENGINE_CONFIG } from '../../config'
import { InvalidInputError } from '../../errors'
import { emptyGrid, rebuildGrid } from '../../grid/gridIndex'
import type { ClassifierLabel, ClassifierSnapshot } from '../../models/classifier'
import type { GridRiskLabel } from '../../models/grid'
import type { RiskLevel } from '../../models/assessment'
import { assessRisk, decideDegradedRiskLevel, decideRiskLevel } from './index'

const gridOptions = {
  version: 3,
  builtAt: 0,
  resolution: 0.01,
  nightWeight: 1.5,
  thresholds: DEFAULT_ENGINE_CONFIG.grid.thresholds,
  decayHalfLifeDays: null,
  decayReferenceTs: null,
  timezoneOffsetMinutes: 330,
}

const point = { latitude: 10.9467, longitude: 76.8653 }

const highGrid = rebuildGrid(
  Array.from({ length: 8 }, (_, index) => ({
    id: `inc-${index}`,
    crimeType: 'Sexual Harassment',
    ...point,
    ts: Date.parse('2024-01-10T13:00:00+05:30'),
    severity: 4,
    policeStation: 'Madukkarai',
  })),
  gridOptions,
)

function biasOnlySnapshot(bias: number): ClassifierSnapshot {
  return {
    version: 7,
    parentVersion: 6,
    createdAt: 0,
    encoder: { schemaVersion: 1, crimeTypes: [], policeStations: [], scaler: { mean: Array.from({ length: 8 }, () => 0), std: Array.from({ length: 8 }, () => 1) } },
    parameters: { kind: 'logistic', weights: [], bias },
    validationAccuracy: 0.9,
    trainedOn: 100,
  }
}

describe('risk fusion', () => {
  it('flags a risky high cell at night as critical', () => {
    const assessment = assessRisk(
      { grid: highGrid, classifier: biasOnlySnapshot(5) },
      { ...point, time: '04:00', severity: 4, crimeType: 'Sexual Harassment' },
    )

    expect(assessment.gridLabel).toBe('high')
    expect(assessment.classifier).toEqual({ label: 'risky', confidence: 0.993, riskProbability: 0.993, version: 7 })
    expect(assessment.isNight).toBe(true)
    expect(assessment.finalRiskLevel).toBe('critical')
    expect(assessment.alertColor).toBe('red')
    expect(assessment.shouldNotify).toBe(true)
    expect(assessment.message).toBe('CRITICAL ALERT: You are in a high-risk area during night hours. Consider leaving immediately or finding a safe location.')
    expect(assessment.recommendations[3]).toBe('Leave the area immediately if possible')
    expect(assessment.degraded).toBe(false)
    expect(assessment.gridVersion).toBe(3)
  })

  it('reports a safe low cell by day as low', () => {
    const assessment = assessRisk(
      { grid: emptyGrid(gridOptions), classifier: biasOnlySnapshot(-5) },
      { ...point, time: '13:00', severity: 4, crimeType: 'Sexual Harassment' },
    )

    expect(assessment.gridLabel).toBe('low')
    expect(assessment.finalRiskLevel).toBe('low')
    expect(assessment.timeBucket).toBe('afternoon')
    expect(assessment.shouldNotify).toBe(false)
    expect(assessment.message).toBe('You are in a safe area. Enjoy your time!')
    expect(assessment.recommendations).toEqual(['Enjoy your time while staying aware', 'Standard safety practices apply'])
  })

  it('covers every combination with exactly one level', () => {
    const expected: Array<[ClassifierLabel, GridRiskLabel, boolean, RiskLevel]> = [
      ['risky', 'high', true, 'critical'],
      ['risky', 'high', false, 'high'],
      ['risky', 'medium', true, 'high'],
      ['risky', 'medium', false, 'medium'],
      ['risky', 'low', true, 'high'],
      ['risky', 'low', false, 'medium'],
      ['safe', 'high', true, 'low'],
      ['safe', 'high', false, 'low'],
      ['safe', 'medium', true, 'medium'],
      ['safe', 'medium', false, 'medium'],
      ['safe', 'low', true, 'low'],
      ['safe', 'low', false, 'low'],
    ]
    expected.forEach(([label, grid, night, level]) => {
      expect(decideRiskLevel(label, grid, night)).toBe(level)
    })
  })

  it('falls back to the grid when no classifier is loaded', () => {
    expect(decideDegradedRiskLevel('high', true)).toBe('high')
    expect(decideDegradedRiskLevel('high', false)).toBe('medium')
    expect(decideDegradedRiskLevel('medium', true)).toBe('low')

    const assessment = assessRisk({ grid: highGrid, classifier: null }, { ...point, time: '23:15' })
    expect(assessment.degraded).toBe(true)
    expect(assessment.classifier).toBeNull()
    expect(assessment.finalRiskLevel).toBe('high')
  })

  it('uses defaults for missing optional inputs', () => {
    const assessment = assessRisk({ grid: emptyGrid(gridOptions), classifier: biasOnlySnapshot(5) }, { ...point, time: '09:30' })
    expect(assessment.finalRiskLevel).toBe('medium')
    expect(assessment.message).toBe('ADVISORY: Moderate risk in this area. Stay aware of your surroundings.')
  })

  it('adds night precautions to a low night result', () => {
    const assessment = assessRisk({ grid: emptyGrid(gridOptions), classifier: biasOnlySnapshot(-5) }, { ...point, time: '22:00' })
    expect(assessment.finalRiskLevel).toBe('low')
    expect(assessment.recommendations.at(-1)).toBe('Take standard night-time precautions')
  })

  it('rejects malformed time and date', () => {
    const snapshots = { grid: emptyGrid(gridOptions), classifier: null }
    expect(() => assessRisk(snapshots, { ...point, time: '25:00' })).toThrow(InvalidInputError)
    expect(() => assessRisk(snapshots, { ...point, time: '10:00', date: '2024-13-01' })).toThrow(InvalidInputError)
  })
})
