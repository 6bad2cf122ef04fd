export { SafetyEngine, dexieSnapshotStore, type EngineHealth, type SafetyEngineOptions, type SnapshotStore } from './service/safetyEngine'
export { loadEngineConfig, DEFAULT_ENGINE_CONFIG, type EngineConfig, type EngineConfigOverrides } from './core/config'
export { createLogger, type Logger } from './core/logger'
export {
  BackpressureError,
  ConfigError,
  InvalidInputError,
  SnapshotPublishError,
  TrainingCancelledError,
} from './core/errors'
export { rebuildGrid, classifyPoint, nearbyCells, summarizeGrid } from './core/grid/gridIndex'
export { assessRisk, decideRiskLevel, decideDegradedRiskLevel } from './core/engines/fusion'
export { trackJourney, deriveTrend } from './core/engines/journey'
export { FeedbackIngestor, type FeedbackLedger } from './core/engines/feedback/ingestor'
export { IncrementalModelUpdater, type CorpusStore } from './core/engines/training/updater'
export { gradientDescentTrainer, type ClassifierTrainer } from './core/classifier/logistic'
export { SnapshotRegistry, type ActiveSnapshots } from './core/runtime/snapshotRegistry'
export { loadIncidentFile, parseIncidentRows } from './core/validation/incidents'
export { exportState, importState, clearAllData } from './core/storage/repo'
export { listRecentFeedback, listAcceptedRecords } from './repo/feedbackRepo'
export type { AssessmentResponse, JourneyResponse } from './core/validation/responses'
export type { Incident, SynthesizedRecord } from './core/models/incident'
export type { FeedbackEvent, IngestOutcome, RetrainOutcome } from './core/models/feedback'
export type { GridSnapshot, GridSummary, NearbyCell } from './core/models/grid'
export type { ClassifierSnapshot } from './core/models/classifier'
export type { RiskAssessment, RiskLevel } from './core/models/assessment'
