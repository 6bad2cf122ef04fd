import vocabulary from '../data/vocabulary.json'

export interface Vocabulary {
  crimeTypes: string[]
  highRiskCrimes: string[]
  policeStations: string[]
}

export const DEFAULT_VOCABULARY: Vocabulary = vocabulary

export const DEFAULT_CRIME_TYPE = 'General Safety'
export const UNKNOWN_STATION = 'Unknown PS'
export const DEFAULT_SEVERITY = 3
