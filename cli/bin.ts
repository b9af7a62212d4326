#!/usr/bin/env node
/**
 * rockyard executable
 *
 * The first SIGINT aborts running builds and lets the install report what
 * was cancelled; a second one exits at once.
 */

import { runCLI } from './index.js'

const controller = new AbortController()

process.on('SIGINT', () => {
  if (controller.signal.aborted) {
    process.exit(130)
  }
  controller.abort()
})

const result = await runCLI(process.argv.slice(2), {
  stdout: (text) => process.stdout.write(`${text}\n`),
  stderr: (text) => process.stderr.write(`${text}\n`),
  cwd: process.cwd(),
  env: process.env,
  signal: controller.signal,
})

process.exitCode = result.exitCode
