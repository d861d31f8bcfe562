import { LoomworkError } from './errors'
import type { TaskDefinition } from './types'

export const TASK_DEFINITION: unique symbol = Symbol.for('loomwork:task')

/** A function carrying a task definition. Calling it calls the original function. */
export type DefinedTask<TArgs extends unknown[] = never, TResult = unknown> = ((...args: TArgs) => TResult) & {
	readonly [TASK_DEFINITION]: TaskDefinition
}

/**
 * Marks `fn` as a workflow task named `name`.
 *
 * Outside a workflow the task behaves like the plain function. Inside a workflow, an
 * executor backed by a durable runtime dispatches it as a remote activity under `name`.
 */
export function defineTask<TArgs extends unknown[], TResult>(
	name: string,
	fn: (...args: TArgs) => TResult,
	options: Omit<TaskDefinition, 'name'> = {},
): DefinedTask<TArgs, TResult> {
	if (!name) {
		throw new LoomworkError('Task name must be a non-empty string.')
	}
	if (options.timeoutSeconds !== undefined && !(options.timeoutSeconds > 0)) {
		throw new LoomworkError(`Task '${name}' must have a positive timeout, got ${options.timeoutSeconds}.`, { taskName: name })
	}
	const task = (...args: TArgs): TResult => fn(...args)
	Object.defineProperty(task, 'name', { value: name })
	return Object.assign(task, { [TASK_DEFINITION]: { ...options, name } })
}

function isTaskDefinition(value: unknown): value is TaskDefinition {
	return typeof value === 'object' && value !== null && 'name' in value && typeof value.name === 'string'
}

export function getTaskDefinition(value: unknown): TaskDefinition | undefined {
	if (typeof value !== 'function' || !(TASK_DEFINITION in value)) {
		return undefined
	}
	const definition = value[TASK_DEFINITION]
	return isTaskDefinition(definition) ? definition : undefined
}

export function isTask(value: unknown): value is DefinedTask {
	return getTaskDefinition(value) !== undefined
}
