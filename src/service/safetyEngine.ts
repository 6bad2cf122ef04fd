import type { EventEmitter } from 'node:events'
import type { ClassifierTrainer } from '../core/classifier/logistic'
import { loadEngineConfig, type EngineConfig } from '../core/config'
import { FeedbackIngestor, type FeedbackLedger } from '../core/engines/feedback/ingestor'
import { assessRisk } from '../core/engines/fusion'
import { trackJourney } from '../core/engines/journey'
import { IncrementalModelUpdater, type CorpusStore } from '../core/engines/training/updater'
import { SnapshotPublishError, describeError } from '../core/errors'
import { emptyGrid, nearbyCells, rebuildGrid, summarizeGrid, type GridBuildOptions } from '../core/grid/gridIndex'
import { createLogger, type Logger } from '../core/logger'
import type { RiskAssessment } from '../core/models/assessment'
import type { ClassifierSnapshot } from '../core/models/classifier'
import type { IngestOutcome, RetrainOutcome } from '../core/models/feedback'
import type { GridSnapshot, GridSummary, NearbyCell } from '../core/models/grid'
import type { Incident, SynthesizedRecord } from '../core/models/incident'
import { SnapshotRegistry, type ActiveSnapshots } from '../core/runtime/snapshotRegistry'
import {
  assessmentRequestSchema,
  batchRequestSchema,
  feedbackEventSchema,
  journeyRequestSchema,
  nearbyRequestSchema,
  parseRequest,
  type AssessmentRequest,
} from '../core/validation/requests'
import { toAssessmentResponse, toJourneyResponse, type AssessmentResponse, type JourneyResponse } from '../core/validation/responses'
import { DEFAULT_VOCABULARY, type Vocabulary } from '../core/vocabulary'
import { acceptedCorpus, feedbackLedger } from '../repo/feedbackRepo'
import {
  getActiveClassifierSnapshot,
  getActiveGridSnapshot,
  listClassifierVersions,
  publishClassifierSnapshot,
  saveGridSnapshot,
} from '../repo/snapshotRepo'

/** Where snapshots are kept between engine instances. */
export interface SnapshotStore {
  loadGrid(): Promise<GridSnapshot | undefined>
  saveGrid(snapshot: GridSnapshot): Promise<void>
  loadClassifier(): Promise<ClassifierSnapshot | undefined>
  /** Stores the snapshot with its accepted records and activates it, all or nothing. */
  publishClassifier(snapshot: ClassifierSnapshot, records: SynthesizedRecord[]): Promise<void>
  classifierVersions(): Promise<number[]>
}

export const dexieSnapshotStore: SnapshotStore = {
  loadGrid: getActiveGridSnapshot,
  saveGrid: saveGridSnapshot,
  loadClassifier: getActiveClassifierSnapshot,
  publishClassifier: publishClassifierSnapshot,
  classifierVersions: listClassifierVersions,
}

export interface SafetyEngineOptions {
  incidents: Incident[]
  config?: EngineConfig
  logger?: Logger
  vocabulary?: Vocabulary
  trainer?: ClassifierTrainer
  store?: SnapshotStore
  ledger?: FeedbackLedger
  corpus?: CorpusStore
  now?: () => number
  bootstrap?: boolean
}

export interface EngineHealth {
  gridVersion: number
  gridCells: number
  classifierVersion: number | null
  classifierVersions: number[]
  degraded: boolean
  retraining: boolean
  queuedFeedback: number
  pendingLowConfidence: number
  carriedRecords: number
  lastRetrain: RetrainOutcome | null
}

interface EngineParts {
  config: EngineConfig
  logger: Logger
  vocabulary: Vocabulary
  store: SnapshotStore
  registry: SnapshotRegistry
  incidents: Incident[]
  now: () => number
}

function toIncident(record: SynthesizedRecord): Incident {
  return {
    id: record.id,
    crimeType: record.crimeType,
    latitude: record.latitude,
    longitude: record.longitude,
    ts: record.ts,
    severity: record.severity,
    policeStation: record.policeStation,
  }
}

/**
 * Entry point a transport layer calls. Requests are validated here, read the
 * active snapshot pair once, and never wait on grid rebuilds or retraining.
 */
export class SafetyEngine {
  readonly config: EngineConfig
  private readonly logger: Logger
  private readonly store: SnapshotStore
  private readonly registry: SnapshotRegistry
  private readonly ingestor: FeedbackIngestor
  private readonly updater: IncrementalModelUpdater
  private readonly now: () => number
  private incidents: Incident[]
  private nextBatch: SynthesizedRecord[] = []
  private gridWrites: Promise<void> = Promise.resolve()
  private retrainJobs: Promise<void> = Promise.resolve()
  private lastRetrain: RetrainOutcome | null = null

  private constructor(parts: EngineParts, options: SafetyEngineOptions, latestVersion: number) {
    this.config = parts.config
    this.logger = parts.logger
    this.store = parts.store
    this.registry = parts.registry
    this.incidents = parts.incidents
    this.now = parts.now

    this.ingestor = new FeedbackIngestor({
      vocabulary: parts.vocabulary,
      ledger: options.ledger ?? feedbackLedger,
      logger: parts.logger,
      severity: parts.config.feedback.severity,
      timezoneOffsetMinutes: parts.config.timezoneOffsetMinutes,
      queueLimit: parts.config.feedback.queueLimit,
      now: parts.now,
      onRecords: (records) => this.scheduleRetrain(records),
    })

    this.updater = new IncrementalModelUpdater({
      registry: parts.registry,
      incidents: () => this.incidents,
      corpus: options.corpus ?? acceptedCorpus,
      persist: (snapshot, records) => this.store.publishClassifier(snapshot, records),
      settings: parts.config.retrain,
      timezoneOffsetMinutes: parts.config.timezoneOffsetMinutes,
      highRiskCrimes: parts.vocabulary.highRiskCrimes,
      logger: parts.logger,
      trainer: options.trainer,
      now: parts.now,
      latestVersion,
    })
  }

  /** Loads stored snapshots, building the grid and a first classifier when none exist. */
  static async open(options: SafetyEngineOptions): Promise<SafetyEngine> {
    const config = options.config ?? loadEngineConfig()
    const logger = options.logger ?? createLogger(config.logLevel)
    const store = options.store ?? dexieSnapshotStore
    const now = options.now ?? Date.now
    const vocabulary = options.vocabulary ?? DEFAULT_VOCABULARY

    const storedGrid = await store.loadGrid()
    const classifier = (await store.loadClassifier()) ?? null
    const versions = await store.classifierVersions()
    const registry = new SnapshotRegistry({ grid: storedGrid ?? emptyGrid(config.grid), classifier })

    const engine = new SafetyEngine(
      { config, logger, vocabulary, store, registry, incidents: [...options.incidents], now },
      options,
      Math.max(0, ...versions),
    )

    if (!storedGrid || storedGrid.resolution !== config.grid.resolution) {
      await engine.rebuildGrid()
    } else {
      logger.info({ version: storedGrid.version, cells: storedGrid.cells.size }, 'grid snapshot loaded')
    }

    if (classifier) {
      logger.info({ version: classifier.version }, 'classifier snapshot loaded')
    } else if (options.bootstrap !== false) {
      const outcome = await engine.updater.bootstrap()
      engine.lastRetrain = outcome
      if (outcome.status === 'rejected') logger.warn({ reason: outcome.reason, detail: outcome.detail }, 'no classifier available, assessments are degraded')
    }
    return engine
  }

  snapshots(): ActiveSnapshots {
    return this.registry.read()
  }

  assess(request: unknown): AssessmentResponse {
    const parsed = parseRequest(assessmentRequestSchema, request, 'assessment request')
    return toAssessmentResponse(this.assessWith(this.registry.read(), parsed))
  }

  assessBatch(request: unknown): AssessmentResponse[] {
    const { locations } = parseRequest(batchRequestSchema(this.config.batchLimit), request, 'batch request')
    const snapshots = this.registry.read()
    return locations.map((location) => toAssessmentResponse(this.assessWith(snapshots, location)))
  }

  trackJourney(request: unknown): JourneyResponse {
    const parsed = parseRequest(journeyRequestSchema, request, 'journey request')
    const snapshots = this.registry.read()
    if (!snapshots.classifier) this.logger.warn({ userId: parsed.user_id }, 'journey assessed without a classifier')
    const points = parsed.points.map((point) => ({ latitude: point.latitude, longitude: point.longitude, ts: point.timestamp }))
    return toJourneyResponse(trackJourney(snapshots, parsed.user_id, points, this.config.timezoneOffsetMinutes))
  }

  nearby(request: unknown): NearbyCell[] {
    const parsed = parseRequest(nearbyRequestSchema, request, 'nearby request')
    return nearbyCells(this.registry.read().grid, parsed.latitude, parsed.longitude, parsed.radius_km ?? this.config.grid.nearbyRadiusKm)
  }

  gridSummary(): GridSummary {
    return summarizeGrid(this.registry.read().grid)
  }

  async submitFeedback(event: unknown): Promise<IngestOutcome> {
    return this.ingestor.ingest(parseRequest(feedbackEventSchema, event, 'feedback event'))
  }

  /** Feeds every `eventName` payload emitted by `source` into the ingestor. */
  attachFeedbackSource(source: EventEmitter, eventName = 'feedback'): () => void {
    const listener = (payload: unknown) => {
      void this.submitFeedback(payload).catch((error: unknown) => {
        this.logger.error({ err: error, detail: describeError(error) }, 'feedback event from source failed')
      })
    }
    source.on(eventName, listener)
    return () => {
      source.off(eventName, listener)
    }
  }

  /** Retrains now with any low-confidence records still waiting for a batch. */
  retrain(): Promise<RetrainOutcome> {
    const batch = this.nextBatch
    this.nextBatch = []
    return this.updater.apply(batch).then((outcome) => {
      this.lastRetrain = outcome
      return outcome
    })
  }

  rebuildGrid(incidents?: Incident[]): Promise<GridSnapshot> {
    return this.enqueueGridWrite(() => incidents ?? this.incidents)
  }

  /** Adds high-confidence feedback records to the incident set and rebuilds the grid. */
  promoteRecords(records: SynthesizedRecord[]): Promise<GridSnapshot> {
    // The base set is read when this write's turn comes, after earlier writes published.
    return this.enqueueGridWrite(() => {
      const known = new Set(this.incidents.map((incident) => incident.id))
      const promoted = records.filter((record) => record.confidence === 'high' && !known.has(record.id)).map(toIncident)
      this.logger.info({ promoted: promoted.length, skipped: records.length - promoted.length }, 'promoting feedback records to grid')
      return [...this.incidents, ...promoted]
    })
  }

  async whenIdle(): Promise<void> {
    await this.retrainJobs
  }

  health(): EngineHealth {
    const { grid, classifier } = this.registry.read()
    return {
      gridVersion: grid.version,
      gridCells: grid.cells.size,
      classifierVersion: classifier?.version ?? null,
      classifierVersions: this.registry.classifierVersions(),
      degraded: classifier === null,
      retraining: this.updater.isRunning,
      queuedFeedback: this.ingestor.queued,
      pendingLowConfidence: this.nextBatch.length,
      carriedRecords: this.updater.carriedRecords,
      lastRetrain: this.lastRetrain,
    }
  }

  private assessWith(snapshots: ActiveSnapshots, request: AssessmentRequest): RiskAssessment {
    const assessment = assessRisk(snapshots, {
      latitude: request.latitude,
      longitude: request.longitude,
      time: request.time,
      date: request.date,
      severity: request.severity,
      crimeType: request.crime_type,
    })
    if (assessment.degraded) this.logger.warn({ gridVersion: assessment.gridVersion }, 'assessed without a classifier')
    return assessment
  }

  private scheduleRetrain(records: SynthesizedRecord[]): void {
    const immediate = records.filter((record) => record.batch === 'immediate')
    this.nextBatch.push(...records.filter((record) => record.batch === 'next_batch'))
    if (!immediate.length) return

    const batch = [...this.nextBatch, ...immediate]
    this.nextBatch = []
    const job = this.updater.apply(batch).then(
      (outcome) => {
        this.lastRetrain = outcome
      },
      (error: unknown) => {
        this.logger.error({ err: error }, 'feedback retrain failed')
      },
    )
    this.retrainJobs = Promise.all([this.retrainJobs, job]).then(() => undefined)
  }

  private enqueueGridWrite(selectIncidents: () => Incident[]): Promise<GridSnapshot> {
    const run = this.gridWrites.then(() => this.publishGrid(selectIncidents()))
    // Failures reach the caller through `run`; the chain only orders writers.
    this.gridWrites = run.then(
      () => undefined,
      () => undefined,
    )
    return run
  }

  private async publishGrid(incidents: Incident[]): Promise<GridSnapshot> {
    const current = this.registry.read().grid
    const options: GridBuildOptions = {
      ...this.config.grid,
      version: current.version + 1,
      builtAt: this.now(),
      timezoneOffsetMinutes: this.config.timezoneOffsetMinutes,
    }
    const snapshot = rebuildGrid(incidents, options)
    try {
      await this.store.saveGrid(snapshot)
    } catch (error) {
      this.logger.error({ err: error, version: snapshot.version }, 'grid snapshot not stored')
      throw new SnapshotPublishError(`Could not store grid snapshot v${snapshot.version}`, { cause: error })
    }
    this.incidents = [...incidents]
    this.registry.publishGrid(snapshot)
    this.logger.info({ version: snapshot.version, cells: snapshot.cells.size, incidents: incidents.length }, 'grid snapshot published')
    return snapshot
  }
}
