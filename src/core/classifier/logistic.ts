import { TrainingCancelledError } from '../errors'
import type { ClassifierPrediction, ClassifierSnapshot, LogisticParameters } from '../models/classifier'
import { round } from '../utils/hash'
import { encodeFeatures, type FeatureInput } from './features'
import type { BinaryLabel } from './labels'

export interface LabeledVector {
  features: number[]
  label: BinaryLabel
}

export interface TrainOptions {
  epochs: number
  learningRate: number
  l2: number
  signal?: AbortSignal
}

/** Fits classifier parameters on encoded samples. */
export interface ClassifierTrainer {
  train(samples: LabeledVector[], options: TrainOptions): Promise<LogisticParameters>
}

const YIELD_EVERY_EPOCHS = 25

export function sigmoid(value: number): number {
  if (value >= 0) return 1 / (1 + Math.exp(-value))
  const exp = Math.exp(value)
  return exp / (1 + exp)
}

export function predictProbability(parameters: LogisticParameters, features: number[]): number {
  let total = parameters.bias
  for (let index = 0; index < features.length; index += 1) {
    total += (parameters.weights[index] ?? 0) * features[index]
  }
  return sigmoid(total)
}

export function predictWithSnapshot(snapshot: ClassifierSnapshot, input: FeatureInput): ClassifierPrediction {
  const riskProbability = predictProbability(snapshot.parameters, encodeFeatures(snapshot.encoder, input))
  return {
    label: riskProbability >= 0.5 ? 'risky' : 'safe',
    confidence: round(Math.max(riskProbability, 1 - riskProbability)),
    riskProbability: round(riskProbability),
  }
}

/** Freezes a snapshot together with its encoder and parameter arrays. */
export function freezeClassifierSnapshot(snapshot: ClassifierSnapshot): ClassifierSnapshot {
  const { encoder, parameters } = snapshot
  return Object.freeze({
    ...snapshot,
    encoder: Object.freeze({
      schemaVersion: encoder.schemaVersion,
      crimeTypes: Object.freeze([...encoder.crimeTypes]),
      policeStations: Object.freeze([...encoder.policeStations]),
      scaler: Object.freeze({ mean: Object.freeze([...encoder.scaler.mean]), std: Object.freeze([...encoder.scaler.std]) }),
    }),
    parameters: Object.freeze({ kind: parameters.kind, weights: Object.freeze([...parameters.weights]), bias: parameters.bias }),
  })
}

export function accuracyOf(parameters: LogisticParameters, samples: LabeledVector[]): number {
  if (!samples.length) return 0
  const correct = samples.filter((sample) => (predictProbability(parameters, sample.features) >= 0.5 ? 1 : 0) === sample.label).length
  return round(correct / samples.length, 4)
}

function yieldToEventLoop(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve))
}

/**
 * Full-batch gradient descent from zero weights, so equal inputs give equal
 * parameters. Checks the abort signal between epochs.
 */
export const gradientDescentTrainer: ClassifierTrainer = {
  async train(samples, options) {
    const width = samples[0]?.features.length ?? 0
    const weights = Array.from({ length: width }, () => 0)
    let bias = 0

    for (let epoch = 0; epoch < options.epochs; epoch += 1) {
      if (options.signal?.aborted) throw new TrainingCancelledError()
      if (epoch > 0 && epoch % YIELD_EVERY_EPOCHS === 0) await yieldToEventLoop()

      const gradient = Array.from({ length: width }, () => 0)
      let biasGradient = 0
      samples.forEach((sample) => {
        const error = predictProbability({ kind: 'logistic', weights, bias }, sample.features) - sample.label
        for (let index = 0; index < width; index += 1) gradient[index] += error * sample.features[index]
        biasGradient += error
      })

      const scale = options.learningRate / Math.max(1, samples.length)
      for (let index = 0; index < width; index += 1) {
        weights[index] -= scale * gradient[index] + options.learningRate * options.l2 * weights[index]
      }
      bias -= scale * biasGradient
    }

    if (options.signal?.aborted) throw new TrainingCancelledError()
    return { kind: 'logistic', weights, bias }
  },
}
