#!/usr/bin/env node
import { runCli } from "./cli"

runCli({ argv: process.argv.slice(2), env: process.env })
  .then((code) => {
    process.exitCode = code
  })
  .catch((error: unknown) => {
    console.error(error)
    process.exitCode = 1
  })
