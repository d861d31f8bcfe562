import { LoomworkError } from './errors'
import type { DefinedTask } from './task'
import { getTaskDefinition } from './task'
import type { WorkflowFunction } from './types'

/** Maps workflow type names to their entry points. */
export class WorkflowRegistry {
	private readonly workflows = new Map<string, WorkflowFunction>()

	register(name: string, workflow: WorkflowFunction): this {
		if (this.workflows.has(name)) {
			throw new LoomworkError(`Workflow '${name}' is already registered.`, { workflowType: name })
		}
		this.workflows.set(name, workflow)
		return this
	}

	get(name: string): WorkflowFunction | undefined {
		return this.workflows.get(name)
	}

	has(name: string): boolean {
		return this.workflows.has(name)
	}

	names(): string[] {
		return [...this.workflows.keys()]
	}
}

/** Holds the tasks created with `defineTask`, keyed by their task name. */
export class TaskRegistry {
	private readonly tasks = new Map<string, DefinedTask>()

	register(task: DefinedTask): this {
		const definition = getTaskDefinition(task)
		if (!definition) {
			throw new LoomworkError('Only functions created with defineTask can be registered as tasks.')
		}
		if (this.tasks.has(definition.name)) {
			throw new LoomworkError(`Task '${definition.name}' is already registered.`, { taskName: definition.name })
		}
		this.tasks.set(definition.name, task)
		return this
	}

	get(name: string): DefinedTask | undefined {
		return this.tasks.get(name)
	}

	has(name: string): boolean {
		return this.tasks.has(name)
	}

	names(): string[] {
		return [...this.tasks.keys()]
	}

	entries(): Array<[string, DefinedTask]> {
		return [...this.tasks.entries()]
	}
}
