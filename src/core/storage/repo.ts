import { z } from 'zod'
import { InvalidInputError } from '../errors'
import { db } from './db'

export async function getSetting<T>(key: string, schema: z.ZodType<T>): Promise<T | undefined> {
  const row = await db.settings.get(key)
  if (!row) return undefined
  const parsed = schema.safeParse(row.value)
  return parsed.success ? parsed.data : undefined
}

export async function setSetting(key: string, value: unknown): Promise<void> {
  await db.settings.put({ key, value, updatedAt: Date.now() })
}

export async function clearAllData(): Promise<void> {
  await db.delete()
  await db.open()
}

const stateDumpSchema = z.object({
  format: z.literal('safety-engine-state'),
  schemaVersion: z.number().int(),
  exportedAt: z.number(),
  tables: z.object({
    gridSnapshots: z.array(z.unknown()),
    classifierSnapshots: z.array(z.unknown()),
    settings: z.array(z.unknown()),
    feedbackLog: z.array(z.unknown()),
    acceptedRecords: z.array(z.unknown()),
  }),
})

export type StateDump = z.infer<typeof stateDumpSchema>

export async function exportState(): Promise<string> {
  const dump: StateDump = {
    format: 'safety-engine-state',
    schemaVersion: db.verno,
    exportedAt: Date.now(),
    tables: {
      gridSnapshots: await db.gridSnapshots.toArray(),
      classifierSnapshots: await db.classifierSnapshots.toArray(),
      settings: await db.settings.toArray(),
      feedbackLog: await db.feedbackLog.toArray(),
      acceptedRecords: await db.acceptedRecords.toArray(),
    },
  }
  return JSON.stringify(dump)
}

/** Replaces every table with the contents of an `exportState` dump. */
export async function importState(serialized: string): Promise<void> {
  let raw: unknown
  try {
    raw = JSON.parse(serialized)
  } catch (error) {
    throw new InvalidInputError('State dump is not valid JSON', [String(error)])
  }
  const parsed = stateDumpSchema.safeParse(raw)
  if (!parsed.success) throw InvalidInputError.fromZod('State dump has an unexpected shape', parsed.error)
  if (parsed.data.schemaVersion > db.verno) {
    throw new InvalidInputError(`State dump schema ${parsed.data.schemaVersion} is newer than ${db.verno}`)
  }

  const { tables } = parsed.data
  const all = [db.gridSnapshots, db.classifierSnapshots, db.settings, db.feedbackLog, db.acceptedRecords]
  await db.transaction('rw', all, async () => {
    await Promise.all(all.map((table) => table.clear()))
    await db.table('gridSnapshots').bulkPut(tables.gridSnapshots)
    await db.table('classifierSnapshots').bulkPut(tables.classifierSnapshots)
    await db.table('settings').bulkPut(tables.settings)
    await db.table('feedbackLog').bulkPut(tables.feedbackLog)
    await db.table('acceptedRecords').bulkPut(tables.acceptedRecords)
  })
}
