import { mkdir } from 'node:fs/promises'
import { join } from 'node:path'
import { OUTPUT_DIR } from '../constants.js'

export function generateRunId(now = new Date()): string {
  const pad = (number: number) => String(number).padStart(2, '0')

  const year = now.getFullYear()
  const month = pad(now.getMonth() + 1)
  const day = pad(now.getDate())
  const hours = pad(now.getHours())
  const minutes = pad(now.getMinutes())
  const seconds = pad(now.getSeconds())

  return `${year}-${month}-${day}_${hours}-${minutes}-${seconds}`
}

// One directory per run under output/, named by local start time.
export async function initRunDir(cwd = process.cwd(), now = new Date()): Promise<string> {
  const runDir = join(cwd, OUTPUT_DIR, generateRunId(now))

  await mkdir(runDir, { recursive: true })

  return runDir
}
