import type { TaskRegistry } from 'loomwork/workflow'
import { LoomworkError } from 'loomwork/workflow'

export const ACTIVITY_DEFINITION: unique symbol = Symbol.for('loomwork:temporal-activity')

export interface ActivityDefinition {
	/** The activity type name the worker registers and workflows schedule. */
	name: string
}

/**
 * A function a Temporal worker can register as an activity. It always returns a
 * promise and carries its definition under `ACTIVITY_DEFINITION`.
 */
export type ActivityFunction<TArgs extends unknown[] = never, TResult = unknown> = ((
	...args: TArgs
) => Promise<Awaited<TResult>>) & {
	readonly [ACTIVITY_DEFINITION]: ActivityDefinition
}

/**
 * Tags `fn` as the activity `name`. This only attaches metadata: calling the result
 * calls `fn` in the current process.
 */
export function wrapAsActivity<TArgs extends unknown[], TResult>(
	name: string,
	fn: (...args: TArgs) => TResult,
): ActivityFunction<TArgs, TResult> {
	if (!name) {
		throw new LoomworkError('Activity name must be a non-empty string.')
	}
	const activity = async (...args: TArgs): Promise<Awaited<TResult>> => await fn(...args)
	Object.defineProperty(activity, 'name', { value: name })
	return Object.assign(activity, { [ACTIVITY_DEFINITION]: { name } })
}

export function getActivityDefinition(value: unknown): ActivityDefinition | undefined {
	if (typeof value !== 'function' || !(ACTIVITY_DEFINITION in value)) {
		return undefined
	}
	const definition = value[ACTIVITY_DEFINITION]
	if (typeof definition !== 'object' || definition === null || !('name' in definition)) {
		return undefined
	}
	return typeof definition.name === 'string' ? { name: definition.name } : undefined
}

export function isActivity(value: unknown): value is ActivityFunction {
	return getActivityDefinition(value) !== undefined
}

/** Wraps every registered task as an activity, keyed by task name, ready to hand to a worker. */
export function buildActivities(tasks: TaskRegistry): Record<string, ActivityFunction> {
	const activities: Record<string, ActivityFunction> = {}
	for (const [name, task] of tasks.entries()) {
		activities[name] = wrapAsActivity(name, task)
	}
	return activities
}
