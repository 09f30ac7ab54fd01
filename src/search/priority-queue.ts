/**
 * Binary min-heap used as the A* frontier.
 *
 * Entries are ordered by `(priority, value, sequence)`: equal priorities fall
 * back to `compareValues` when one is given, and values that still tie pop
 * in insertion order.
 */

interface HeapEntry<T> {
  readonly priority: number
  readonly sequence: number
  readonly value: T
}

export class PriorityQueue<T> {
  private readonly heap: HeapEntry<T>[] = []
  private nextSequence = 0
  private readonly compareValues: ((a: T, b: T) => number) | undefined

  constructor(compareValues?: (a: T, b: T) => number) {
    this.compareValues = compareValues
  }

  get size(): number {
    return this.heap.length
  }

  isEmpty(): boolean {
    return this.heap.length === 0
  }

  push(value: T, priority: number): void {
    this.heap.push({ priority, sequence: this.nextSequence++, value })
    this.bubbleUp(this.heap.length - 1)
  }

  /** Removes and returns the lowest-priority value, or undefined when empty. */
  pop(): T | undefined {
    const top = this.heap[0]
    if (top === undefined) return undefined

    const last = this.heap.pop()
    if (last !== undefined && this.heap.length > 0) {
      this.heap[0] = last
      this.bubbleDown(0)
    }
    return top.value
  }

  peek(): T | undefined {
    return this.heap[0]?.value
  }

  // ---------------------------------------------------------------------------
  // Heap maintenance
  // ---------------------------------------------------------------------------

  private less(i: number, j: number): boolean {
    const a = this.heap[i]
    const b = this.heap[j]
    if (a === undefined || b === undefined) return false
    if (a.priority !== b.priority) return a.priority < b.priority
    const byValue = this.compareValues?.(a.value, b.value) ?? 0
    if (byValue !== 0) return byValue < 0
    return a.sequence < b.sequence
  }

  private swap(i: number, j: number): void {
    const a = this.heap[i]
    const b = this.heap[j]
    if (a === undefined || b === undefined) return
    this.heap[i] = b
    this.heap[j] = a
  }

  private bubbleUp(index: number): void {
    let i = index
    while (i > 0) {
      const parent = (i - 1) >> 1
      if (!this.less(i, parent)) break
      this.swap(i, parent)
      i = parent
    }
  }

  private bubbleDown(index: number): void {
    const n = this.heap.length
    let i = index
    while (true) {
      const left = i * 2 + 1
      const right = left + 1
      let smallest = i
      if (left < n && this.less(left, smallest)) smallest = left
      if (right < n && this.less(right, smallest)) smallest = right
      if (smallest === i) break
      this.swap(i, smallest)
      i = smallest
    }
  }
}
