/**
 * Task Orchestrator
 *
 * Generic runner that discovers and executes tasks from all event sources
 * by schedule name. Source-agnostic.
 */

import { glob } from 'glob'
import path from 'path'
import { fileURLToPath } from 'url'
import { errorMessage } from '../core/errors.js'

const __dirname = path.dirname(fileURLToPath(import.meta.url))

export type TaskOutput = Record<string, unknown> & { eventsProcessed?: number }

export interface Task {
  id: string
  schedule: string
  description?: string
  enabled?: boolean | (() => boolean)
  run: () => Promise<TaskOutput>
}

export interface TaskResult {
  taskId: string
  success: boolean
  eventsProcessed?: number
  duration: number
  result?: TaskOutput
  error?: string
  skipped?: boolean
  reason?: string
}

export interface ScheduleResult {
  schedule: string
  tasksRun: number
  eventsProcessed: number
  duration: number
  tasks?: TaskResult[]
}

export interface TaskMetadata {
  id: string
  schedule: string
  description: string
}

function isTask(value: unknown): value is Task {
  if (typeof value !== 'object' || value === null) return false
  return typeof Reflect.get(value, 'id') === 'string' &&
    typeof Reflect.get(value, 'schedule') === 'string' &&
    typeof Reflect.get(value, 'run') === 'function'
}

/**
 * Load all task definitions from all sources
 */
export async function loadAllTasks(sourcesDir: string = path.join(__dirname, '../sources')): Promise<Task[]> {
  const tasks: Task[] = []

  const taskFiles = await glob('*/tasks.{ts,js}', { cwd: sourcesDir, absolute: true })

  for (const taskFile of taskFiles.sort()) {
    try {
      const module: unknown = await import(taskFile)
      const exported: unknown = typeof module === 'object' && module !== null ? Reflect.get(module, 'default') : undefined
      const sourceTasks = Array.isArray(exported) ? exported.filter(isTask) : []

      tasks.push(...sourceTasks)
    } catch (error) {
      console.error(`Failed to load tasks from ${taskFile}:`, errorMessage(error))
    }
  }

  return tasks
}

function isEnabled(task: Task): boolean {
  if (task.enabled === undefined) return true
  return typeof task.enabled === 'function' ? task.enabled() : task.enabled
}

/**
 * Run all tasks matching a specific schedule
 * @param schedule - Schedule name ('hourly', 'manual')
 */
export async function runSchedule(schedule: string, tasks?: Task[]): Promise<ScheduleResult> {
  console.log(`\n🚀 Running schedule: ${schedule}\n`)

  const startTime = Date.now()
  const allTasks = tasks ?? await loadAllTasks()

  const matchingTasks = allTasks.filter(task => {
    if (task.schedule !== schedule) return false

    if (!isEnabled(task)) {
      console.log(`⏭️  Skipping disabled task: ${task.id}`)
      return false
    }

    return true
  })

  if (matchingTasks.length === 0) {
    console.log(`⚠️  No tasks found for schedule: ${schedule}`)
    return {
      schedule,
      tasksRun: 0,
      eventsProcessed: 0,
      duration: Date.now() - startTime
    }
  }

  console.log(`Found ${matchingTasks.length} task(s) to run:\n`)
  matchingTasks.forEach(task => {
    console.log(`  - ${task.id}: ${task.description || 'No description'}`)
  })
  console.log()

  let totalEventsProcessed = 0
  const taskResults: TaskResult[] = []

  for (const task of matchingTasks) {
    const taskResult = await executeTask(task)
    taskResults.push(taskResult)

    if (taskResult.eventsProcessed) {
      totalEventsProcessed += taskResult.eventsProcessed
    }
  }

  const duration = Date.now() - startTime

  console.log(`\n✨ Schedule complete in ${(duration / 1000).toFixed(1)}s`)
  console.log(`   Tasks run: ${matchingTasks.length}`)
  console.log(`   Events processed: ${totalEventsProcessed}`)

  return {
    schedule,
    tasksRun: matchingTasks.length,
    eventsProcessed: totalEventsProcessed,
    duration,
    tasks: taskResults
  }
}

/**
 * Execute a single task; failures are reported in the result, never thrown
 */
export async function executeTask(task: Task): Promise<TaskResult> {
  const startTime = Date.now()

  try {
    const result = await task.run()

    return {
      taskId: task.id,
      success: true,
      eventsProcessed: result.eventsProcessed,
      result,
      duration: Date.now() - startTime
    }
  } catch (error) {
    const message = errorMessage(error)
    console.error(`\n❌ Task ${task.id} failed:`, message)

    return {
      taskId: task.id,
      success: false,
      error: message,
      duration: Date.now() - startTime
    }
  }
}

/**
 * Run a specific task by ID
 * @param taskId - Task identifier (e.g., 'fireworks:refresh')
 */
export async function runTask(taskId: string, tasks?: Task[]): Promise<TaskResult> {
  console.log(`\n🎯 Running task: ${taskId}\n`)

  const allTasks = tasks ?? await loadAllTasks()
  const task = allTasks.find(t => t.id === taskId)

  if (!task) {
    throw new Error(`Task not found: ${taskId}`)
  }

  if (!isEnabled(task)) {
    console.log(`⏭️  Task is disabled: ${task.id}`)
    return {
      taskId: task.id,
      success: false,
      skipped: true,
      reason: 'Task is disabled via config',
      duration: 0
    }
  }

  return await executeTask(task)
}

/**
 * List all available tasks
 */
export async function listTasks(tasks?: Task[]): Promise<TaskMetadata[]> {
  const allTasks = tasks ?? await loadAllTasks()

  return allTasks.map(task => ({
    id: task.id,
    schedule: task.schedule,
    description: task.description || 'No description'
  }))
}
