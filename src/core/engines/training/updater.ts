import { accuracyOf, freezeClassifierSnapshot, gradientDescentTrainer, type ClassifierTrainer, type LabeledVector } from '../../classifier/logistic'
import { encodeFeatures, FEATURE_SCHEMA_VERSION, featureInputFromRecord, fitEncoder, preservesCodes } from '../../classifier/features'
import { riskLabelFor } from '../../classifier/labels'
import { describeError, TrainingCancelledError } from '../../errors'
import type { Logger } from '../../logger'
import type { ClassifierSnapshot, LogisticParameters } from '../../models/classifier'
import type { RetrainOutcome, RetrainRejectReason } from '../../models/feedback'
import type { CorpusRecord, Incident, SynthesizedRecord } from '../../models/incident'
import type { SnapshotRegistry } from '../../runtime/snapshotRegistry'
import { fnv1a } from '../../utils/hash'

/** Synthesized records that made it into a published classifier. */
export interface CorpusStore {
  listAcceptedRecords(): Promise<SynthesizedRecord[]>
}

export interface RetrainSettings {
  tolerance: number
  minCorpusSize: number
  validationShare: number
  timeoutMs: number
  epochs: number
  learningRate: number
  l2: number
}

export interface IncrementalModelUpdaterOptions {
  registry: SnapshotRegistry
  incidents: () => readonly Incident[]
  corpus: CorpusStore
  /** Stores the snapshot, its accepted records and the active pointer together, or none of them. */
  persist: (snapshot: ClassifierSnapshot, records: SynthesizedRecord[]) => Promise<void>
  settings: RetrainSettings
  timezoneOffsetMinutes: number
  highRiskCrimes: readonly string[]
  logger: Logger
  trainer?: ClassifierTrainer
  now?: () => number
  latestVersion?: number
}

interface Waiter {
  resolve: (outcome: RetrainOutcome) => void
  reject: (error: unknown) => void
}

class Rejection extends Error {
  readonly reason: RetrainRejectReason

  constructor(reason: RetrainRejectReason, detail: string) {
    super(detail)
    this.reason = reason
  }
}

export function isValidationRecord(id: string, validationShare: number): boolean {
  return fnv1a(id) % 100 < Math.round(validationShare * 100)
}

function byId(a: CorpusRecord, b: CorpusRecord): number {
  return a.id < b.id ? -1 : a.id > b.id ? 1 : 0
}

/**
 * Retrains the classifier from feedback batches. One job runs at a time;
 * batches that arrive meanwhile are merged into the next job, and batches
 * from a rejected job are carried into the next attempt.
 */
export class IncrementalModelUpdater {
  private readonly options: IncrementalModelUpdaterOptions
  private readonly trainer: ClassifierTrainer
  private readonly logger: Logger
  private readonly now: () => number
  private queued: SynthesizedRecord[] = []
  private waiters: Waiter[] = []
  private carryOver: SynthesizedRecord[] = []
  private running: Promise<void> | null = null
  private highestVersion = 0

  constructor(options: IncrementalModelUpdaterOptions) {
    this.options = options
    this.trainer = options.trainer ?? gradientDescentTrainer
    this.logger = options.logger.child({ component: 'model-updater' })
    this.now = options.now ?? Date.now
    this.highestVersion = options.latestVersion ?? 0
  }

  get isRunning(): boolean {
    return this.running !== null
  }

  get carriedRecords(): number {
    return this.carryOver.length
  }

  /** Queues a batch and resolves with the outcome of the job that consumed it. */
  apply(batch: SynthesizedRecord[]): Promise<RetrainOutcome> {
    return new Promise<RetrainOutcome>((resolve, reject) => {
      this.queued.push(...batch)
      this.waiters.push({ resolve, reject })
      if (!this.running) this.running = this.drain()
    })
  }

  /** Trains a first classifier from the incident corpus alone. */
  bootstrap(): Promise<RetrainOutcome> {
    return this.apply([])
  }

  private async drain(): Promise<void> {
    try {
      while (this.waiters.length) {
        const batch = this.queued
        const waiters = this.waiters
        this.queued = []
        this.waiters = []
        try {
          const outcome = await this.runJob(batch)
          waiters.forEach((waiter) => waiter.resolve(outcome))
        } catch (error) {
          this.logger.error({ err: error }, 'retrain job failed')
          waiters.forEach((waiter) => waiter.reject(error))
        }
      }
    } finally {
      this.running = null
    }
  }

  private async runJob(batch: SynthesizedRecord[]): Promise<RetrainOutcome> {
    const records = [...this.carryOver, ...batch]
    const startedAt = this.now()
    try {
      const snapshot = await this.train(records)
      await this.publish(snapshot, records)
      this.carryOver = []
      this.logger.info(
        { version: snapshot.version, validationAccuracy: snapshot.validationAccuracy, records: records.length, ms: this.now() - startedAt },
        'classifier published',
      )
      return { status: 'success', version: snapshot.version, validationAccuracy: snapshot.validationAccuracy }
    } catch (error) {
      if (!(error instanceof Rejection)) throw error
      this.carryOver = records
      this.logger.warn({ reason: error.reason, detail: error.message, carried: records.length }, 'retrain rejected')
      return { status: 'rejected', reason: error.reason, detail: error.message }
    }
  }

  private async train(records: SynthesizedRecord[]): Promise<ClassifierSnapshot> {
    const { settings, registry, timezoneOffsetMinutes, highRiskCrimes } = this.options
    const active = registry.read().classifier

    if (active && active.encoder.schemaVersion !== FEATURE_SCHEMA_VERSION) {
      throw new Rejection('encoder_mismatch', `active encoder schema ${active.encoder.schemaVersion} differs from ${FEATURE_SCHEMA_VERSION}`)
    }

    const accepted = await this.options.corpus.listAcceptedRecords()
    const corpus: CorpusRecord[] = [...this.options.incidents(), ...accepted, ...records].sort(byId)
    if (corpus.length < settings.minCorpusSize) {
      throw new Rejection('insufficient_data', `corpus has ${corpus.length} records, needs ${settings.minCorpusSize}`)
    }

    const inputs = corpus.map((record) => featureInputFromRecord(record, timezoneOffsetMinutes))
    const encoder = fitEncoder(inputs, active?.encoder)
    if (active && !preservesCodes(active.encoder, encoder)) {
      throw new Rejection('encoder_mismatch', 'refitted encoder would renumber existing categories')
    }

    const training: LabeledVector[] = []
    const validation: LabeledVector[] = []
    corpus.forEach((record, index) => {
      const sample = { features: encodeFeatures(encoder, inputs[index]), label: riskLabelFor(record, highRiskCrimes) }
      if (isValidationRecord(record.id, settings.validationShare)) validation.push(sample)
      else training.push(sample)
    })
    if (!training.length || !validation.length) {
      throw new Rejection('insufficient_data', `split left ${training.length} training and ${validation.length} validation records`)
    }

    const parameters = await this.fit(training)
    const validationAccuracy = accuracyOf(parameters, validation)
    if (active && validationAccuracy < active.validationAccuracy - settings.tolerance) {
      throw new Rejection(
        'validation_regression',
        `validation accuracy ${validationAccuracy} is below ${active.validationAccuracy} minus tolerance ${settings.tolerance}`,
      )
    }

    const version = Math.max(this.highestVersion, ...registry.classifierVersions()) + 1
    return freezeClassifierSnapshot({
      version,
      parentVersion: active?.version ?? null,
      createdAt: this.now(),
      encoder,
      parameters,
      validationAccuracy,
      trainedOn: training.length,
    })
  }

  private async fit(training: LabeledVector[]): Promise<LogisticParameters> {
    const { settings } = this.options
    const controller = new AbortController()
    const timer = setTimeout(() => controller.abort(), settings.timeoutMs)
    try {
      return await this.trainer.train(training, {
        epochs: settings.epochs,
        learningRate: settings.learningRate,
        l2: settings.l2,
        signal: controller.signal,
      })
    } catch (error) {
      if (error instanceof TrainingCancelledError) throw new Rejection('timeout', `training exceeded ${settings.timeoutMs}ms`)
      throw error
    } finally {
      clearTimeout(timer)
    }
  }

  private async publish(snapshot: ClassifierSnapshot, records: SynthesizedRecord[]): Promise<void> {
    try {
      await this.options.persist(snapshot, records)
    } catch (error) {
      throw new Rejection('publish_failed', `could not store classifier v${snapshot.version}: ${describeError(error)}`)
    }
    this.highestVersion = snapshot.version
    this.options.registry.publishClassifier(snapshot)
  }
}
