export interface ScoreBand {
  /** The band applies when the metric is strictly greater than this. */
  above: number
  label: string
  value: number
}

export interface FixedBand {
  label: string
  value: number
}

export interface ScoringPolicy {
  /** Column of the result artifact the score is read from. */
  metric: string
  bands: ScoreBand[]
  /** Below every band. */
  floor: FixedBand
  /** Missing artifact or unreadable metric. */
  crash: FixedBand
}

export interface Score {
  label: string
  value: number
  /** The metric reading, absent for a crash score. */
  metric?: number
  crash: boolean
}

export const DEFAULT_SCORING: ScoringPolicy = {
  metric: 'volts',
  bands: [
    { above: 1000, label: 'high', value: 10 },
    { above: 100, label: 'mid', value: 5 },
    { above: 10, label: 'low', value: 1 },
  ],
  floor: { label: 'min', value: 0.1 },
  crash: { label: 'crash', value: -1 },
}

/** Highest band whose threshold the metric exceeds, else the floor. */
export function scoreMetric(policy: ScoringPolicy, metric: number): Score {
  const bands = [...policy.bands].sort((a, b) => b.above - a.above)
  const band = bands.find((b) => metric > b.above) ?? policy.floor
  return { label: band.label, value: band.value, metric, crash: false }
}

export function crashScore(policy: ScoringPolicy): Score {
  return { label: policy.crash.label, value: policy.crash.value, crash: true }
}
