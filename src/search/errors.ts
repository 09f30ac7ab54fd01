/**
 * Typed errors raised at the search entry points.
 */

import type { NodeId } from './types.js'
import { formatNodeId } from '../node-id.js'

/** Which endpoint of the query was rejected. */
export type EndpointRole = 'start' | 'goal'

/**
 * Thrown when `start` or `goal` is not a key of the adjacency mapping.
 *
 * Every search function checks both endpoints before doing any work, start
 * first, so a query with two bad endpoints reports `role === 'start'`.
 */
export class InvalidNodeError extends Error {
  readonly role: EndpointRole
  readonly node: NodeId

  constructor(role: EndpointRole, node: NodeId) {
    super(`${role === 'start' ? 'Start' : 'Goal'} node ${formatNodeId(node)} is not in the graph`)
    this.name = 'InvalidNodeError'
    this.role = role
    this.node = node
    Object.setPrototypeOf(this, new.target.prototype)
  }
}
