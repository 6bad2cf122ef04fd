import { Dexie, type EntityTable } from 'dexie'
import type { ClassifierSnapshot } from '../models/classifier'
import type { FeedbackLogRecord } from '../models/feedback'
import type { GridSnapshotRecord } from '../models/grid'
import type { SynthesizedRecord } from '../models/incident'

export interface EngineSettingRecord {
  key: string
  value: unknown
  updatedAt: number
}

export interface AcceptedRecordRow {
  id: string
  sourceEventId: string
  acceptedAt: number
  record: SynthesizedRecord
}

export const schemaVersion = 1

// Opens on the host's IndexedDB. Under Node the host installs one first, such as
// `fake-indexeddb/auto` for an in-process store.
class SafetyDb extends Dexie {
  gridSnapshots!: EntityTable<GridSnapshotRecord, 'version'>
  classifierSnapshots!: EntityTable<ClassifierSnapshot, 'version'>
  settings!: EntityTable<EngineSettingRecord, 'key'>
  feedbackLog!: EntityTable<FeedbackLogRecord, 'eventId'>
  acceptedRecords!: EntityTable<AcceptedRecordRow, 'id'>

  constructor(name = 'safety-engine-db') {
    super(name)
    this.version(schemaVersion).stores({
      gridSnapshots: '&version,builtAt',
      classifierSnapshots: '&version,createdAt',
      settings: '&key,updatedAt',
      feedbackLog: '&eventId,processedAt,outcome',
      acceptedRecords: '&id,sourceEventId,acceptedAt',
    })
  }
}

export const db = new SafetyDb()
