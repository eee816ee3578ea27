import { PassThrough } from 'stream'
import { vi } from 'vitest'
import type { FfmpegSubprocess } from '../../src/Core/FfmpegChild.js'

export interface FakeResult {
  exitCode?: number
  signal?: string
}

/** A stand-in for execa's subprocess: a promise of the result with piped stdio attached. */
export function fakeSubprocess(result: Promise<FakeResult> = Promise.resolve({ exitCode: 0 })) {
  const stdin = new PassThrough()
  const stdout = new PassThrough()
  const stderr = new PassThrough()
  const kill = vi.fn((_signal?: NodeJS.Signals) => true)
  const proc = Object.assign(result, { stdin, stdout, stderr, pid: 4321, kill })
  return { proc, subprocess: proc as unknown as FfmpegSubprocess, stdin, stdout, stderr, kill }
}
