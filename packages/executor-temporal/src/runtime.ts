import { inWorkflowContext, proxyActivities, uuid4 } from '@temporalio/workflow'
import type { RetryPolicy } from 'loomwork/workflow'

export interface ActivityExecutionOptions {
	taskQueue: string
	/** Milliseconds. */
	scheduleToCloseTimeout: number
	retry?: RetryPolicy
}

/**
 * The parts of the workflow SDK the executor depends on. Only meaningful while
 * running inside a workflow; `inWorkflow` tells the executor whether that is the case.
 */
export interface WorkflowRuntime {
	inWorkflow: () => boolean
	executeActivity: <TResult>(name: string, args: unknown[], options: ActivityExecutionOptions) => Promise<TResult>
	/** A replay-safe UUID. */
	uuid: () => string
}

export const temporalWorkflowRuntime: WorkflowRuntime = {
	inWorkflow: () => inWorkflowContext(),
	executeActivity: async (name, args, options) => {
		const activities = proxyActivities({
			taskQueue: options.taskQueue,
			scheduleToCloseTimeout: options.scheduleToCloseTimeout,
			retry: options.retry,
		})
		return activities[name](...args)
	},
	uuid: () => uuid4(),
}
