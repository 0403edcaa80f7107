#!/usr/bin/env node
import { runCli } from './L7-app/cli.js'

// Route termination signals through a normal exit so pending staging and temp files are removed
process.once('SIGINT', () => process.exit(130))
process.once('SIGTERM', () => process.exit(143))

process.exitCode = await runCli(process.argv)
