import { describe, expect, it, vi } from 'vitest'
import { gradientDescentTrainer, type ClassifierTrainer } from '../../classifier/logistic'
import { DEFAULT_ENGINE_CONFIG } from '../../config'
import { TrainingCancelledError } from '../../errors'
import { emptyGrid } from '../../grid/gridIndex'
import { createLogger } from '../../logger'
import type { ClassifierSnapshot, LogisticParameters } from '../../models/classifier'
import type { Incident, SynthesizedRecord } from '../../models/incident'
import { SnapshotRegistry } from '../../runtime/snapshotRegistry'
import { IncrementalModelUpdater, isValidationRecord, type CorpusStore, type RetrainSettings } from './updater'

const base = Date.parse('2024-01-10T13:00:00+05:30')

function makeIncidents(count: number): Incident[] {
  return Array.from({ length: count }, (_, index) => ({
    id: `inc-${String(index).padStart(2, '0')}`,
    crimeType: 'Theft',
    latitude: 10.9 + (index % 7) * 0.01,
    longitude: 76.9 + (index % 4) * 0.01,
    ts: base + index * 3_600_000,
    severity: index % 2 ? 5 : 1,
    policeStation: index % 3 ? 'Podanur' : 'Perur',
  }))
}

function makeRecord(eventId: string): SynthesizedRecord {
  return {
    id: `feedback:${eventId}:0`,
    crimeType: 'Sexual Harassment',
    latitude: 10.9467,
    longitude: 76.8653,
    ts: Date.parse('2024-01-10T04:00:00+05:30'),
    severity: 4,
    policeStation: 'Madukkarai',
    provenance: 'feedback',
    sourceEventId: eventId,
    time: '04:00',
    timeBucket: 'night',
    confidence: 'high',
    batch: 'immediate',
  }
}

function memoryCorpus(): { accepted: SynthesizedRecord[]; corpus: CorpusStore } {
  const accepted: SynthesizedRecord[] = []
  return { accepted, corpus: { listAcceptedRecords: async () => [...accepted] } }
}

function fixedSnapshot(version: number, validationAccuracy: number, schemaVersion = 1): ClassifierSnapshot {
  return {
    version,
    parentVersion: null,
    createdAt: 0,
    encoder: { schemaVersion, crimeTypes: [], policeStations: [], scaler: { mean: Array.from({ length: 8 }, () => 0), std: Array.from({ length: 8 }, () => 1) } },
    parameters: { kind: 'logistic', weights: [], bias: 0 },
    validationAccuracy,
    trainedOn: 40,
  }
}

interface Setup {
  active?: ClassifierSnapshot
  incidents?: Incident[]
  trainer?: ClassifierTrainer
  settings?: Partial<RetrainSettings>
  persist?: (snapshot: ClassifierSnapshot) => Promise<void>
}

function setup(options: Setup = {}) {
  const registry = new SnapshotRegistry({ grid: emptyGrid(DEFAULT_ENGINE_CONFIG.grid), classifier: options.active ?? null })
  const { accepted, corpus } = memoryCorpus()
  const persist = vi.fn(async (snapshot: ClassifierSnapshot, records: SynthesizedRecord[]) => {
    await options.persist?.(snapshot)
    accepted.push(...records)
  })
  const incidents = options.incidents ?? makeIncidents(40)
  const updater = new IncrementalModelUpdater({
    registry,
    incidents: () => incidents,
    corpus,
    persist,
    settings: { ...DEFAULT_ENGINE_CONFIG.retrain, ...options.settings },
    timezoneOffsetMinutes: 330,
    highRiskCrimes: ['Sexual Harassment', 'Assault'],
    logger: createLogger('silent'),
    trainer: options.trainer,
    now: () => 1_700_000_000_000,
    latestVersion: options.active?.version,
  })
  return { registry, accepted, persist, updater }
}

const allSafeTrainer: ClassifierTrainer = {
  train: async () => ({ kind: 'logistic', weights: [], bias: -5 }),
}

describe('incremental model updater', () => {
  it('splits records by a stable hash of the id', () => {
    const validation = makeIncidents(40).filter((incident) => isValidationRecord(incident.id, 0.2)).map((incident) => incident.id)
    expect(validation).toEqual(['inc-06', 'inc-13', 'inc-14', 'inc-19', 'inc-23', 'inc-26', 'inc-28', 'inc-33', 'inc-38'])
    expect(isValidationRecord('feedback:evt-1:0', 0.2)).toBe(true)
    expect(isValidationRecord('feedback:evt-0:0', 0.2)).toBe(false)
  })

  it('bootstraps a first classifier from incidents', async () => {
    const { updater, registry, persist } = setup()
    const outcome = await updater.bootstrap()

    const active = registry.read().classifier
    expect(outcome).toEqual({ status: 'success', version: 1, validationAccuracy: active?.validationAccuracy })
    expect(active?.version).toBe(1)
    expect(active?.parentVersion).toBeNull()
    expect(active?.trainedOn).toBe(31)
    expect(active?.validationAccuracy).toBeGreaterThanOrEqual(0.8)
    expect(persist).toHaveBeenCalledWith(active, [])
    expect(Object.isFrozen(active)).toBe(true)
  })

  it('freezes the encoder and parameter arrays of a published snapshot', async () => {
    const { updater, registry } = setup()
    await updater.bootstrap()

    const active = registry.getClassifier(1)
    expect(Object.isFrozen(active?.parameters.weights)).toBe(true)
    expect(Object.isFrozen(active?.encoder.crimeTypes)).toBe(true)
    expect(Object.isFrozen(active?.encoder.policeStations)).toBe(true)
    expect(Object.isFrozen(active?.encoder.scaler.mean)).toBe(true)
    expect(Object.isFrozen(active?.encoder.scaler.std)).toBe(true)
  })

  it('rejects a candidate that regresses ten points and keeps the active version', async () => {
    const active = fixedSnapshot(4, 0.6)
    const { updater, registry, persist } = setup({ active, trainer: allSafeTrainer })

    const outcome = await updater.apply([makeRecord('evt-1')])

    expect(outcome).toMatchObject({ status: 'rejected', reason: 'validation_regression' })
    expect(registry.read().classifier).toBe(active)
    expect(persist).not.toHaveBeenCalled()
    expect(updater.carriedRecords).toBe(1)
  })

  it('accepts a candidate within tolerance of the active accuracy', async () => {
    const active = fixedSnapshot(4, 0.51)
    const { updater, registry, accepted, persist } = setup({ active, trainer: allSafeTrainer })

    const outcome = await updater.apply([makeRecord('evt-1')])
    expect(persist).toHaveBeenCalledWith(registry.read().classifier, [makeRecord('evt-1')])

    expect(outcome).toEqual({ status: 'success', version: 5, validationAccuracy: 0.5 })
    expect(registry.read().classifier?.parentVersion).toBe(4)
    expect(accepted.map((record) => record.id)).toEqual(['feedback:evt-1:0'])
  })

  it('rejects a corpus that is too small', async () => {
    const { updater, registry } = setup({ incidents: makeIncidents(10) })
    const outcome = await updater.apply([makeRecord('evt-0')])
    expect(outcome).toEqual({ status: 'rejected', reason: 'insufficient_data', detail: 'corpus has 11 records, needs 20' })
    expect(registry.read().classifier).toBeNull()
  })

  it('rejects a split with no validation records', async () => {
    const { updater } = setup({ incidents: makeIncidents(5), settings: { minCorpusSize: 5 } })
    const outcome = await updater.apply([])
    expect(outcome).toEqual({ status: 'rejected', reason: 'insufficient_data', detail: 'split left 5 training and 0 validation records' })
  })

  it('rejects an active encoder with another schema', async () => {
    const { updater } = setup({ active: fixedSnapshot(2, 0.5, 2) })
    const outcome = await updater.apply([makeRecord('evt-0')])
    expect(outcome).toMatchObject({ status: 'rejected', reason: 'encoder_mismatch' })
  })

  it('times out a slow training job', async () => {
    const slowTrainer: ClassifierTrainer = {
      train: (_samples, options) => new Promise<LogisticParameters>((_resolve, reject) => {
        options.signal?.addEventListener('abort', () => reject(new TrainingCancelledError()))
      }),
    }
    const { updater, registry } = setup({ trainer: slowTrainer, settings: { timeoutMs: 20 } })

    const outcome = await updater.apply([makeRecord('evt-0')])
    expect(outcome).toEqual({ status: 'rejected', reason: 'timeout', detail: 'training exceeded 20ms' })
    expect(registry.read().classifier).toBeNull()
  })

  it('leaves the pointer alone when the snapshot cannot be stored and retries the batch later', async () => {
    let failing = true
    const { updater, registry, accepted } = setup({
      persist: async () => {
        if (failing) throw new Error('disk full')
      },
    })

    const failed = await updater.apply([makeRecord('evt-0')])
    expect(failed).toEqual({ status: 'rejected', reason: 'publish_failed', detail: 'could not store classifier v1: disk full' })
    expect(registry.read().classifier).toBeNull()

    failing = false
    const retried = await updater.apply([makeRecord('evt-2')])
    expect(retried).toMatchObject({ status: 'success', version: 1 })
    expect(accepted.map((record) => record.id)).toEqual(['feedback:evt-0:0', 'feedback:evt-2:0'])
  })

  it('runs one job at a time and merges batches that arrive meanwhile', async () => {
    let release: () => void = () => undefined
    const gate = new Promise<void>((resolve) => {
      release = resolve
    })
    let calls = 0
    const gatedTrainer: ClassifierTrainer = {
      async train(samples, options) {
        calls += 1
        if (calls === 1) await gate
        return gradientDescentTrainer.train(samples, options)
      },
    }
    const { updater, accepted } = setup({ trainer: gatedTrainer, settings: { tolerance: 1 } })

    const first = updater.apply([makeRecord('evt-0')])
    await vi.waitFor(() => expect(calls).toBe(1))
    expect(updater.isRunning).toBe(true)
    const second = updater.apply([makeRecord('evt-2')])
    const third = updater.apply([makeRecord('evt-3')])
    release()

    const [a, b, c] = await Promise.all([first, second, third])
    expect(a).toMatchObject({ status: 'success', version: 1 })
    expect(b).toMatchObject({ status: 'success', version: 2 })
    expect(c).toEqual(b)
    expect(calls).toBe(2)
    expect(accepted.map((record) => record.id)).toEqual(['feedback:evt-0:0', 'feedback:evt-2:0', 'feedback:evt-3:0'])
    expect(updater.isRunning).toBe(false)
  })
})
