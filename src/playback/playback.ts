/**
 * playback.ts — step-through over a finished search.
 *
 * The search core returns its whole trace eagerly; this module only decides
 * when each piece is shown. Frames come in two phases: every visited node in
 * pop order, then every edge of the path. After the last frame `step()` keeps
 * returning `{ phase: 'done' }`.
 */

import type { NodeId, SearchResult } from '../search/types.js'
import { formatNodeId } from '../node-id.js'

export type PlaybackFrame =
  | { readonly phase: 'visit'; readonly index: number; readonly total: number; readonly node: NodeId }
  | {
      readonly phase: 'path'
      readonly index: number
      readonly total: number
      readonly from: NodeId
      readonly to: NodeId
    }
  | { readonly phase: 'done' }

const DONE: PlaybackFrame = Object.freeze({ phase: 'done' })

export interface Playback {
  /** Returns the next frame and advances; `done` once exhausted. */
  step(): PlaybackFrame
  /** Rewinds to the first frame. */
  reset(): void
  /** Frames not yet returned by `step()`. */
  remaining(): number
  /** Every frame in order, excluding the terminal `done`. */
  frames(): readonly PlaybackFrame[]
}

export function buildFrames(trace: Pick<SearchResult, 'visitedOrder' | 'path'>): readonly PlaybackFrame[] {
  const frames: PlaybackFrame[] = []
  const visits = trace.visitedOrder
  visits.forEach((node, index) => {
    frames.push({ phase: 'visit', index, total: visits.length, node })
  })

  const edgeCount = Math.max(0, trace.path.length - 1)
  for (let index = 0; index < edgeCount; index++) {
    const from = trace.path[index]
    const to = trace.path[index + 1]
    if (from === undefined || to === undefined) break
    frames.push({ phase: 'path', index, total: edgeCount, from, to })
  }
  return Object.freeze(frames)
}

export function createPlayback(trace: Pick<SearchResult, 'visitedOrder' | 'path'>): Playback {
  const frames = buildFrames(trace)
  let cursor = 0

  return {
    step() {
      const frame = frames[cursor]
      if (frame === undefined) return DONE
      cursor++
      return frame
    },
    reset() {
      cursor = 0
    },
    remaining() {
      return frames.length - cursor
    },
    frames() {
      return frames
    },
  }
}

/** One-line description, e.g. `visit 2/5: (0, 1)` or `path 1/3: L0 -> R0`. */
export function describeFrame(frame: PlaybackFrame): string {
  switch (frame.phase) {
    case 'visit':
      return `visit ${frame.index + 1}/${frame.total}: ${formatNodeId(frame.node)}`
    case 'path':
      return `path ${frame.index + 1}/${frame.total}: ${formatNodeId(frame.from)} -> ${formatNodeId(frame.to)}`
    case 'done':
      return 'done'
  }
}

// ---------------------------------------------------------------------------
// Timed playback
// ---------------------------------------------------------------------------

export interface PlayOptions {
  /** Delay after each visit frame. */
  readonly visitIntervalMs: number
  /** Delay after each path frame. */
  readonly pathIntervalMs: number
  readonly onFrame: (frame: PlaybackFrame) => void
  /** Aborting rejects the pending `play` with `signal.reason`. */
  readonly signal?: AbortSignal
}

function delay(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason)
      return
    }
    const onAbort = (): void => {
      clearTimeout(timer)
      reject(signal?.reason)
    }
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort)
      resolve()
    }, ms)
    signal?.addEventListener('abort', onAbort, { once: true })
  })
}

/**
 * Emits the remaining frames of `playback` through `onFrame`, waiting the
 * phase's interval between consecutive frames (none after the last).
 * Resolves with the number of frames emitted.
 */
export async function play(playback: Playback, options: PlayOptions): Promise<number> {
  let emitted = 0
  while (playback.remaining() > 0) {
    if (options.signal?.aborted) throw options.signal.reason
    const frame = playback.step()
    options.onFrame(frame)
    emitted++
    if (playback.remaining() === 0) break
    const wait = frame.phase === 'path' ? options.pathIntervalMs : options.visitIntervalMs
    await delay(wait, options.signal)
  }
  return emitted
}
