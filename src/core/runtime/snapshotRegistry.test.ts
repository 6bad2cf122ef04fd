import { describe, expect, it } from 'vitest'
import { DEFAULT_ENGINE_CONFIG } from '../config'
import { emptyGrid, rebuildGrid } from '../grid/gridIndex'
import type { ClassifierSnapshot } from '../models/classifier'
import { SnapshotRegistry } from './snapshotRegistry'

function snapshot(version: number): ClassifierSnapshot {
  return {
    version,
    parentVersion: version > 1 ? version - 1 : null,
    createdAt: version,
    encoder: { schemaVersion: 1, crimeTypes: [], policeStations: [], scaler: { mean: [], std: [] } },
    parameters: { kind: 'logistic', weights: [], bias: 0 },
    validationAccuracy: 0.8,
    trainedOn: 10,
  }
}

describe('snapshot registry', () => {
  it('keeps a captured pair intact while a new one is published', () => {
    const registry = new SnapshotRegistry({ grid: emptyGrid(DEFAULT_ENGINE_CONFIG.grid), classifier: snapshot(1) })
    const captured = registry.read()

    registry.publishClassifier(snapshot(2))
    const grid = rebuildGrid([], { ...DEFAULT_ENGINE_CONFIG.grid, version: 5, builtAt: 0, timezoneOffsetMinutes: 330 })
    registry.publishGrid(grid)

    expect(captured.classifier?.version).toBe(1)
    expect(captured.grid.version).toBe(0)
    expect(registry.read().classifier?.version).toBe(2)
    expect(registry.read().grid).toBe(grid)
    expect(Object.isFrozen(registry.read())).toBe(true)
  })

  it('remembers every published classifier version', () => {
    const registry = new SnapshotRegistry({ grid: emptyGrid(DEFAULT_ENGINE_CONFIG.grid), classifier: null })
    registry.publishClassifier(snapshot(3))
    registry.publishClassifier(snapshot(1))
    expect(registry.classifierVersions()).toEqual([1, 3])
    expect(registry.getClassifier(3)?.parentVersion).toBe(2)
    expect(registry.getClassifier(2)).toBeUndefined()
  })
})
