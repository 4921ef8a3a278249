#!/usr/bin/env node
import { CommanderError } from 'commander'
import { parseArgs, type CommandAction } from './cli/args.js'
import { loadConfigWithEnv } from './config/config-loader.js'
import { runSetupWizard } from './config/setup-wizard.js'
import { summaryCommand, analyzeCommand, periodsCommand, forecastCommand } from './cli/commands/index.js'
import { createFormatter } from './cli/output.js'

const runCliCommand = async (action: CommandAction) => {
  if (action.command === 'setup') {
    await runSetupWizard(action.options.config)
    return
  }

  // Load config with env var support
  const { config, invalid } = await loadConfigWithEnv(action.options.config)

  const formatter = createFormatter(action.options.format, action.options.quiet)
  for (const name of invalid) {
    formatter.warn(`Ignoring invalid value in ${name}`)
  }

  // Execute the command
  switch (action.command) {
    case 'summary':
      await summaryCommand(action.file, action.options, config)
      break
    case 'analyze':
      await analyzeCommand(action.file, action.options, config)
      break
    case 'periods':
      await periodsCommand(action.file, action.options)
      break
    case 'forecast':
      await forecastCommand(action.file, action.options, config)
      break
  }
}

const main = async () => {
  try {
    // Parse command line arguments
    const action = parseArgs(process.argv)

    // If null, --help or --version was displayed
    if (!action) {
      process.exit(0)
    }

    await runCliCommand(action)
  } catch (error) {
    // Commander has already printed its own usage error
    if (error instanceof CommanderError) {
      process.exit(error.exitCode)
    }
    console.error('Error:', error instanceof Error ? error.message : error)
    process.exit(1)
  }
}

void main()
