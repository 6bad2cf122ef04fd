import type { ZodError } from 'zod'

export function formatIssues(error: ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.length ? issue.path.join('.') : '(root)'}: ${issue.message}`)
}

export class InvalidInputError extends Error {
  readonly issues: string[]

  constructor(message: string, issues: string[] = []) {
    super(message)
    this.name = 'InvalidInputError'
    this.issues = issues
  }

  static fromZod(message: string, error: ZodError): InvalidInputError {
    return new InvalidInputError(message, formatIssues(error))
  }
}

export class ConfigError extends Error {
  readonly issues: string[]

  constructor(issues: string[]) {
    super(`Invalid engine configuration: ${issues.join('; ')}`)
    this.name = 'ConfigError'
    this.issues = issues
  }
}

export class SnapshotPublishError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'SnapshotPublishError'
  }
}

export class BackpressureError extends Error {
  readonly limit: number

  constructor(limit: number) {
    super(`Feedback queue is full (${limit} pending events)`)
    this.name = 'BackpressureError'
    this.limit = limit
  }
}

export class TrainingCancelledError extends Error {
  constructor() {
    super('Training cancelled before completion')
    this.name = 'TrainingCancelledError'
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}
