export type ClassifierLabel = 'safe' | 'risky'

export interface FeatureScaler {
  readonly mean: readonly number[]
  readonly std: readonly number[]
}

export interface FeatureEncoder {
  schemaVersion: number
  crimeTypes: readonly string[]
  policeStations: readonly string[]
  scaler: FeatureScaler
}

export interface LogisticParameters {
  kind: 'logistic'
  weights: readonly number[]
  bias: number
}

export interface ClassifierSnapshot {
  version: number
  parentVersion: number | null
  createdAt: number
  encoder: FeatureEncoder
  parameters: LogisticParameters
  validationAccuracy: number
  trainedOn: number
}

export interface ClassifierPrediction {
  label: ClassifierLabel
  confidence: number
  riskProbability: number
}
