#!/usr/bin/env node
/**
 * CLI runner
 *
 * Usage:
 *   tsx apps/cli/run.ts schedule:hourly
 *   tsx apps/cli/run.ts task fireworks:refresh
 *   tsx apps/cli/run.ts task fireworks:preview
 *   tsx apps/cli/run.ts list
 *   tsx apps/cli/run.ts watch
 */

import 'dotenv/config'
import { runSchedule, runTask, listTasks } from '../../packages/orchestrator/runner.js'
import { createCoordinator } from '../../packages/sources/fireworks/tasks.js'
import { loadConfig } from '../../config.js'
import { errorMessage } from '../../packages/core/errors.js'

const command = process.argv[2]
const arg = process.argv[3]

function usage(): void {
  console.error('Usage: tsx apps/cli/run.ts <command> [args]')
  console.error('')
  console.error('Commands:')
  console.error('  schedule:hourly  - Run hourly tasks (refresh events + calendar)')
  console.error('  task <id>        - Run specific task by ID')
  console.error('  list             - List all available tasks')
  console.error('  watch            - Keep refreshing on the configured interval')
}

/**
 * Long-running mode: refresh on an interval until SIGINT/SIGTERM
 */
async function watch(): Promise<void> {
  const config = loadConfig()
  const coordinator = createCoordinator(config)
  const intervalMs = config.refreshIntervalMinutes * 60_000

  console.log(`\n👀 Watching postcode ${config.postcode} every ${config.refreshIntervalMinutes} min (Ctrl+C to stop)\n`)
  coordinator.start(intervalMs)

  await new Promise<void>(resolve => {
    const shutdown = (): void => {
      console.log('\nStopping...')
      coordinator.stop().then(resolve, error => {
        console.error('Error while stopping:', errorMessage(error))
        resolve()
      })
    }
    process.once('SIGINT', shutdown)
    process.once('SIGTERM', shutdown)
  })
}

async function main(): Promise<void> {
  try {
    if (!command) {
      usage()
      process.exit(1)
    }

    if (command === 'schedule:hourly') {
      const result = await runSchedule('hourly')
      if (result.tasks?.some(task => !task.success)) {
        process.exitCode = 1
      }
    }

    else if (command === 'task') {
      if (!arg) {
        console.error('Error: task ID required')
        console.error('Usage: tsx apps/cli/run.ts task <task-id>')
        process.exit(1)
      }
      const result = await runTask(arg)
      if (!result.success) {
        process.exitCode = 1
      }
    }

    else if (command === 'list') {
      const tasks = await listTasks()

      console.log('\n📋 Available tasks:\n')

      tasks.forEach(task => {
        console.log(`  ${task.id}`)
        console.log(`    Schedule: ${task.schedule}`)
        console.log(`    ${task.description}`)
        console.log()
      })

      console.log(`Total: ${tasks.length} task(s)`)
    }

    else if (command === 'watch') {
      await watch()
    }

    else {
      console.error(`Unknown command: ${command}`)
      usage()
      process.exit(1)
    }

  } catch (error) {
    console.error('\n❌ Error:', errorMessage(error))
    if (error instanceof Error && error.stack) {
      console.error(error.stack)
    }
    process.exit(1)
  }
}

void main()
