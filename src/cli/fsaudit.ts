#!/usr/bin/env node

import { run } from './runner'

// Only run if this is the main module
if (require.main === module) {
  run(process.argv.slice(2)).then(
    (code) => {
      process.exitCode = code
    },
    (error: unknown) => {
      console.error('fsaudit: failed to run:', error)
      process.exitCode = 2
    }
  )
}
