#!/usr/bin/env node
import { createReferenceCatalog } from '../graph/catalog.js'
import { runCli } from './cli.js'

const controller = new AbortController()
process.once('SIGINT', () => controller.abort(new Error('interrupted')))

runCli(process.argv.slice(2), {
  catalog: createReferenceCatalog(),
  io: {
    stdout: (line) => process.stdout.write(`${line}\n`),
    stderr: (line) => process.stderr.write(`${line}\n`),
  },
  signal: controller.signal,
})
  .then((code) => {
    process.exitCode = code
  })
  .catch((err: unknown) => {
    console.error('[pathfinder] fatal:', err)
    process.exitCode = 1
  })
