import type { AlertColor, RiskLevel } from '../../models/assessment'

export interface RiskLevelTemplate {
  message: string
  alertColor: AlertColor
  recommendations: string[]
}

const BASE_RECOMMENDATIONS = [
  'Keep your phone charged and accessible',
  'Share your location with trusted contacts',
  'Stay in well-lit, populated areas',
]

const MESSAGES: Record<RiskLevel, { day: string; night: string }> = {
  critical: {
    day: 'HIGH RISK ZONE: You are in a dangerous area. Stay alert and move to a safer location.',
    night: 'CRITICAL ALERT: You are in a high-risk area during night hours. Consider leaving immediately or finding a safe location.',
  },
  high: {
    day: 'CAUTION: You are in an area with elevated safety concerns. Stay alert.',
    night: 'CAUTION: Elevated risk detected during night hours. Stay vigilant and avoid isolated areas.',
  },
  medium: {
    day: 'ADVISORY: Moderate risk in this area. Stay aware of your surroundings.',
    night: 'ADVISORY: Moderate risk area during night hours. Stay with groups if possible.',
  },
  low: {
    day: 'You are in a safe area. Enjoy your time!',
    night: 'Safe area, but take standard night-time precautions.',
  },
}

const COLORS: Record<RiskLevel, AlertColor> = {
  critical: 'red',
  high: 'orange',
  medium: 'yellow',
  low: 'green',
}

const LEVEL_RECOMMENDATIONS: Record<Exclude<RiskLevel, 'low'>, string[]> = {
  critical: [
    'Leave the area immediately if possible',
    'Call emergency services if you feel threatened',
    'Find the nearest police station or safe building',
    'Avoid walking alone',
  ],
  high: [
    'Consider changing your route',
    'Stay with groups if possible',
    'Avoid displaying valuables',
    'Trust your instincts',
  ],
  medium: [
    'Be extra vigilant',
    'Avoid shortcuts through isolated areas',
  ],
}

function recommendationsFor(level: RiskLevel, isNight: boolean): string[] {
  if (level !== 'low') return [...BASE_RECOMMENDATIONS, ...LEVEL_RECOMMENDATIONS[level]]
  if (isNight) return [...BASE_RECOMMENDATIONS, 'Take standard night-time precautions']
  return ['Enjoy your time while staying aware', 'Standard safety practices apply']
}

export function describeRiskLevel(level: RiskLevel, isNight: boolean): RiskLevelTemplate {
  return {
    message: isNight ? MESSAGES[level].night : MESSAGES[level].day,
    alertColor: COLORS[level],
    recommendations: recommendationsFor(level, isNight),
  }
}
