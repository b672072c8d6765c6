#!/usr/bin/env -S npx tsx
/**
 * CLI harness: process-level entry point.
 */

import { Fmt } from '@wl/core'
import { CLI } from './cli.js'

/** Write and wait for the flush, so piped output is not cut short on exit. */
function flushWrite(stream: NodeJS.WritableStream, data: string): Promise<void> {
  return new Promise((resolve, reject) => {
    stream.write(data, (err) => (err ? reject(err) : resolve()))
  })
}

export async function main(argv: readonly string[] = process.argv.slice(2)): Promise<number> {
  const cli = new CLI({ color: Fmt.detectColor() })
  const response = await cli.execute({ argv, cwd: process.cwd() })
  if (response.stdout) await flushWrite(process.stdout, response.stdout)
  if (response.stderr) await flushWrite(process.stderr, response.stderr)
  return response.exitCode
}

main().then(
  (code) => {
    process.exitCode = code
  },
  (err: unknown) => {
    console.error(err)
    process.exitCode = 1
  },
)
