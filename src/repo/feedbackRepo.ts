import type { FeedbackLedger } from '../core/engines/feedback/ingestor'
import type { CorpusStore } from '../core/engines/training/updater'
import type { FeedbackLogRecord } from '../core/models/feedback'
import type { SynthesizedRecord } from '../core/models/incident'
import { db } from '../core/storage/db'

export const feedbackLedger: FeedbackLedger = {
  async isProcessed(eventId) {
    return (await db.feedbackLog.get(eventId)) !== undefined
  },
  async markProcessed(entry) {
    await db.feedbackLog.put(entry)
  },
}

export async function listRecentFeedback(limit: number): Promise<FeedbackLogRecord[]> {
  return db.feedbackLog.orderBy('processedAt').reverse().limit(limit).toArray()
}

export async function listAcceptedRecords(): Promise<SynthesizedRecord[]> {
  const rows = await db.acceptedRecords.orderBy('id').toArray()
  return rows.map((row) => row.record)
}

export async function addAcceptedRecords(records: SynthesizedRecord[], acceptedAt: number): Promise<void> {
  await db.acceptedRecords.bulkPut(records.map((record) => ({ id: record.id, sourceEventId: record.sourceEventId, acceptedAt, record })))
}

export const acceptedCorpus: CorpusStore = { listAcceptedRecords }
