#!/usr/bin/env node
import { runWeatherFilterSafely } from './pipeline'
import { createProgram } from './program'
import { createConsoleReporter } from './reporter'

const reporter = createConsoleReporter()

const program = createProgram((config) => {
  process.exitCode = runWeatherFilterSafely(config, reporter)
})

program.parse(process.argv)
