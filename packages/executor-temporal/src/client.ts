import type { WorkflowClient, WorkflowHandle } from '@temporalio/client'
import { Client, Connection } from '@temporalio/client'
import type { Workflow } from '@temporalio/common'
import type { TemporalSettings, WorkflowIdReusePolicy } from 'loomwork'

/** Options for starting one workflow execution. */
export interface WorkflowStartRequest {
	/** The workflow's input, one entry per workflow parameter. */
	args: unknown[]
	workflowId: string
	taskQueue: string
	memo?: Record<string, unknown>
	workflowIdReusePolicy?: WorkflowIdReusePolicy
}

/** A reference to a workflow execution. */
export interface WorkflowHandleLike {
	readonly workflowId: string
	readonly runId?: string
	result: () => Promise<unknown>
	terminate: (reason?: string) => Promise<unknown>
	cancel: () => Promise<unknown>
	signal: (signalName: string, ...args: unknown[]) => Promise<void>
}

/**
 * The client operations the executor forwards to. `TemporalClientAdapter` implements
 * it over `@temporalio/client`; tests substitute their own.
 */
export interface WorkflowClientLike {
	start: (workflowType: string, request: WorkflowStartRequest) => Promise<WorkflowHandleLike>
	getHandle: (workflowId: string, runId?: string) => WorkflowHandleLike
}

export type TemporalWorkflowService = Pick<WorkflowClient, 'start' | 'getHandle'>

function toHandle(handle: WorkflowHandle<Workflow>, runId?: string): WorkflowHandleLike {
	return {
		workflowId: handle.workflowId,
		runId,
		result: () => handle.result(),
		terminate: (reason) => handle.terminate(reason),
		cancel: () => handle.cancel(),
		signal: (signalName, ...args) => handle.signal(signalName, ...args),
	}
}

export class TemporalClientAdapter implements WorkflowClientLike {
	constructor(private readonly client: { readonly workflow: TemporalWorkflowService }) {}

	async start(workflowType: string, request: WorkflowStartRequest): Promise<WorkflowHandleLike> {
		const handle = await this.client.workflow.start<Workflow>(workflowType, {
			args: request.args,
			workflowId: request.workflowId,
			taskQueue: request.taskQueue,
			memo: request.memo,
			workflowIdReusePolicy: request.workflowIdReusePolicy,
		})
		return toHandle(handle, handle.firstExecutionRunId)
	}

	getHandle(workflowId: string, runId?: string): WorkflowHandleLike {
		return toHandle(this.client.workflow.getHandle<Workflow>(workflowId, runId), runId)
	}
}

/** Opens a connection to the configured Temporal frontend and wraps a client over it. */
export async function connectTemporalClient(settings: TemporalSettings): Promise<TemporalClientAdapter> {
	const connection = await Connection.connect({
		address: settings.host,
		tls: settings.tls,
		apiKey: settings.apiKey,
		metadata: settings.rpcMetadata,
	})
	return new TemporalClientAdapter(new Client({ connection, namespace: settings.namespace }))
}
