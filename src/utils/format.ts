export function formatDurationMs(durationMs: number): string {
  if (durationMs < 1000) return `${Math.round(durationMs)}ms`

  const totalSeconds = Math.round(durationMs / 1000)

  if (totalSeconds < 60) return `${totalSeconds}s`

  const minutes = Math.floor(totalSeconds / 60)
  const seconds = totalSeconds % 60

  return seconds === 0 ? `${minutes}m` : `${minutes}m ${seconds}s`
}

export function formatThousands(n: number): string {
  return n.toLocaleString('en-US')
}

export function formatScore(score: number): string {
  return score.toFixed(2)
}

export function pluralize(count: number, singular: string, plural = `${singular}s`): string {
  return `${formatThousands(count)} ${count === 1 ? singular : plural}`
}
