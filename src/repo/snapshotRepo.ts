import { z } from 'zod'
import { freezeClassifierSnapshot } from '../core/classifier/logistic'
import { fromGridRecord, toGridRecord } from '../core/grid/gridIndex'
import type { ClassifierSnapshot } from '../core/models/classifier'
import type { GridSnapshot } from '../core/models/grid'
import type { SynthesizedRecord } from '../core/models/incident'
import { db } from '../core/storage/db'
import { getSetting } from '../core/storage/repo'
import { addAcceptedRecords } from './feedbackRepo'

const ACTIVE_CLASSIFIER_KEY = 'activeClassifierVersion'
const ACTIVE_GRID_KEY = 'activeGridVersion'

export async function saveGridSnapshot(snapshot: GridSnapshot): Promise<void> {
  const now = Date.now()
  await db.transaction('rw', db.gridSnapshots, db.settings, async () => {
    await db.gridSnapshots.put(toGridRecord(snapshot))
    await db.settings.put({ key: ACTIVE_GRID_KEY, value: snapshot.version, updatedAt: now })
  })
}

export async function getActiveGridSnapshot(): Promise<GridSnapshot | undefined> {
  const version = await getSetting(ACTIVE_GRID_KEY, z.number().int())
  const record = version === undefined ? await db.gridSnapshots.orderBy('version').last() : await db.gridSnapshots.get(version)
  return record ? fromGridRecord(record) : undefined
}

/**
 * Stores a classifier with the feedback records it was trained on and makes it
 * the active one. A failed write leaves the previous pointer in place.
 */
export async function publishClassifierSnapshot(snapshot: ClassifierSnapshot, records: SynthesizedRecord[] = []): Promise<void> {
  const now = Date.now()
  await db.transaction('rw', db.classifierSnapshots, db.acceptedRecords, db.settings, async () => {
    await db.classifierSnapshots.put(snapshot)
    if (records.length) await addAcceptedRecords(records, snapshot.createdAt)
    await db.settings.put({ key: ACTIVE_CLASSIFIER_KEY, value: snapshot.version, updatedAt: now })
  })
}

export async function getClassifierSnapshot(version: number): Promise<ClassifierSnapshot | undefined> {
  const snapshot = await db.classifierSnapshots.get(version)
  return snapshot ? freezeClassifierSnapshot(snapshot) : undefined
}

export async function getActiveClassifierSnapshot(): Promise<ClassifierSnapshot | undefined> {
  const version = await getSetting(ACTIVE_CLASSIFIER_KEY, z.number().int())
  if (version === undefined) return undefined
  return getClassifierSnapshot(version)
}

export async function listClassifierVersions(): Promise<number[]> {
  const versions = await db.classifierSnapshots.orderBy('version').primaryKeys()
  return versions.filter((key): key is number => typeof key === 'number')
}
