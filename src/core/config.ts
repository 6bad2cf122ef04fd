import { z } from 'zod'
import { ConfigError, formatIssues } from './errors'

const logLevelSchema = z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])

const thresholdsSchema = z
  .object({
    mediumCount: z.number().int().positive(),
    highCount: z.number().int().positive(),
    mediumScore: z.number().positive(),
    highScore: z.number().positive(),
  })
  .refine((value) => value.highCount >= value.mediumCount && value.highScore >= value.mediumScore, {
    message: 'high thresholds must not be below medium thresholds',
  })

export const engineConfigSchema = z.object({
  grid: z.object({
    resolution: z.number().positive().max(1),
    nightWeight: z.number().min(1),
    decayHalfLifeDays: z.number().positive().nullable(),
    decayReferenceTs: z.number().int().nonnegative().nullable(),
    thresholds: thresholdsSchema,
    nearbyRadiusKm: z.number().positive(),
  }),
  timezoneOffsetMinutes: z.number().int().min(-720).max(840),
  retrain: z.object({
    tolerance: z.number().min(0).max(1),
    minCorpusSize: z.number().int().positive(),
    validationShare: z.number().gt(0).lt(1),
    timeoutMs: z.number().int().positive(),
    epochs: z.number().int().positive(),
    learningRate: z.number().positive(),
    l2: z.number().min(0),
  }),
  feedback: z.object({
    queueLimit: z.number().int().positive(),
    severity: z.number().int().min(1).max(5),
  }),
  batchLimit: z.number().int().positive(),
  logLevel: logLevelSchema,
})

export type EngineConfig = z.infer<typeof engineConfigSchema>

export type EngineConfigOverrides = {
  [K in keyof EngineConfig]?: EngineConfig[K] extends Record<string, unknown> ? Partial<EngineConfig[K]> : EngineConfig[K]
}

export const DEFAULT_ENGINE_CONFIG: EngineConfig = {
  grid: {
    resolution: 0.01,
    nightWeight: 1.5,
    decayHalfLifeDays: null,
    decayReferenceTs: null,
    thresholds: { mediumCount: 3, highCount: 8, mediumScore: 10, highScore: 25 },
    nearbyRadiusKm: 2,
  },
  timezoneOffsetMinutes: 330,
  retrain: {
    tolerance: 0.02,
    minCorpusSize: 20,
    validationShare: 0.2,
    timeoutMs: 30_000,
    epochs: 300,
    learningRate: 0.3,
    l2: 0.001,
  },
  feedback: {
    queueLimit: 256,
    severity: 4,
  },
  batchLimit: 100,
  logLevel: 'info',
}

function readNumber(env: NodeJS.ProcessEnv, key: string): number | undefined {
  const raw = env[key]
  if (raw === undefined || raw.trim() === '') return undefined
  return Number(raw)
}

export function loadEngineConfig(env: NodeJS.ProcessEnv = process.env, overrides: EngineConfigOverrides = {}): EngineConfig {
  const base = DEFAULT_ENGINE_CONFIG
  const resolution = readNumber(env, 'SAFETY_GRID_RESOLUTION')
  const nightWeight = readNumber(env, 'SAFETY_NIGHT_WEIGHT')
  const timeoutMs = readNumber(env, 'SAFETY_RETRAIN_TIMEOUT_MS')
  const tolerance = readNumber(env, 'SAFETY_RETRAIN_TOLERANCE')
  const queueLimit = readNumber(env, 'SAFETY_FEEDBACK_QUEUE_LIMIT')
  const candidate = {
    grid: {
      ...base.grid,
      ...(resolution !== undefined ? { resolution } : {}),
      ...(nightWeight !== undefined ? { nightWeight } : {}),
      ...overrides.grid,
    },
    timezoneOffsetMinutes: overrides.timezoneOffsetMinutes ?? readNumber(env, 'SAFETY_TZ_OFFSET_MINUTES') ?? base.timezoneOffsetMinutes,
    retrain: {
      ...base.retrain,
      ...(timeoutMs !== undefined ? { timeoutMs } : {}),
      ...(tolerance !== undefined ? { tolerance } : {}),
      ...overrides.retrain,
    },
    feedback: {
      ...base.feedback,
      ...(queueLimit !== undefined ? { queueLimit } : {}),
      ...overrides.feedback,
    },
    batchLimit: overrides.batchLimit ?? base.batchLimit,
    logLevel: overrides.logLevel ?? env.SAFETY_LOG_LEVEL ?? base.logLevel,
  }

  const parsed = engineConfigSchema.safeParse(candidate)
  if (!parsed.success) throw new ConfigError(formatIssues(parsed.error))
  return parsed.data
}
