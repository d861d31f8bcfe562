import type { ExecutorContext, Task, TemporalSettings } from 'loomwork/workflow'
import { Executor, getTaskDefinition, LoomworkError } from 'loomwork/workflow'
import type { ActivityFunction } from './activity'
import { buildActivities, wrapAsActivity } from './activity'
import type { WorkflowClientLike, WorkflowHandleLike } from './client'
import type { WorkflowRuntime } from './runtime'
import { temporalWorkflowRuntime } from './runtime'

export type TemporalExecutorConfig = TemporalSettings

export interface TemporalExecutorOptions {
	context: ExecutorContext
	/** Defaults to `context.config.temporal`. */
	config?: TemporalExecutorConfig
	/** An already connected client. When omitted, `ensureClient` connects on first use. */
	client?: WorkflowClientLike
	runtime?: WorkflowRuntime
	connect?: (config: TemporalExecutorConfig) => Promise<WorkflowClientLike>
}

export interface StartWorkflowOptions {
	/** Used as is. Defaults to `<workflowType>-<uuid>`. */
	workflowId?: string
	/** Defaults to the configured task queue. */
	taskQueue?: string
	memo?: Record<string, unknown>
}

// The client pulls in gRPC and other Node-only modules, so it is only loaded when a
// connection is actually made, never from inside a workflow bundle.
async function connectLazily(config: TemporalExecutorConfig): Promise<WorkflowClientLike> {
	const { connectTemporalClient } = await import('./client')
	return connectTemporalClient(config)
}

/**
 * Turns the positional arguments of a workflow call into the single input the
 * workflow receives: nothing, the lone argument, or all of them as one array.
 */
export function packWorkflowArgs(args: readonly unknown[]): unknown[] {
	if (args.length === 0) return []
	if (args.length === 1) return [args[0]]
	return [[...args]]
}

/**
 * An executor that forwards workflows and activities to Temporal. It holds a client
 * it does not own and never retries, translates or suppresses what the client raises.
 */
export class TemporalExecutor extends Executor {
	public readonly engine = 'temporal' as const
	public readonly config: TemporalExecutorConfig
	public client?: WorkflowClientLike
	private readonly runtime: WorkflowRuntime
	private readonly connect: (config: TemporalExecutorConfig) => Promise<WorkflowClientLike>
	private connecting?: Promise<WorkflowClientLike>

	constructor(options: TemporalExecutorOptions) {
		super(options.context)
		this.config = options.config || options.context.config.temporal
		this.client = options.client
		this.runtime = options.runtime || temporalWorkflowRuntime
		this.connect = options.connect || connectLazily
	}

	/** Returns the current client, connecting first if there is none yet. */
	public async ensureClient(): Promise<WorkflowClientLike> {
		if (this.client) {
			return this.client
		}
		if (!this.connecting) {
			this.logger.info(`[TemporalExecutor] Connecting to Temporal at '${this.config.host}'.`, {
				namespace: this.config.namespace,
			})
			this.connecting = this.connect(this.config).finally(() => {
				this.connecting = undefined
			})
		}
		this.client = await this.connecting
		return this.client
	}

	public wrapAsActivity<TArgs extends unknown[], TResult>(
		name: string,
		fn: (...args: TArgs) => TResult,
	): ActivityFunction<TArgs, TResult> {
		return wrapAsActivity(name, fn)
	}

	/** The registered tasks as activities, for creating a worker on this executor's task queue. */
	public activities(): Record<string, ActivityFunction> {
		return buildActivities(this.context.tasks)
	}

	/**
	 * Outside a workflow, runs the task in this process. Inside one, a task made with
	 * `defineTask` is scheduled as an activity on the configured task queue; anything
	 * else runs inline.
	 */
	public async executeTask<TArgs extends unknown[], TResult>(
		task: Task<TArgs, TResult>,
		...args: TArgs
	): Promise<Awaited<TResult>> {
		if (!this.runtime.inWorkflow()) {
			return this.executeTaskAsAsync(task, ...args)
		}

		const definition = getTaskDefinition(task)
		if (!definition) {
			return this.executeTaskAsAsync(task, ...args)
		}
		if (!this.context.tasks.has(definition.name)) {
			throw new LoomworkError(`Activity '${definition.name}' is not registered in the task registry.`, {
				taskName: definition.name,
			})
		}

		const timeoutSeconds = definition.timeoutSeconds ?? this.config.timeoutSeconds
		return this.runtime.executeActivity<Awaited<TResult>>(definition.name, args, {
			taskQueue: this.config.taskQueue,
			scheduleToCloseTimeout: timeoutSeconds * 1000,
			retry: definition.retryPolicy,
		})
	}

	/**
	 * Starts the registered workflow `workflowType`. Resolves to its handle, or to the
	 * workflow's result when `waitForResult` is set.
	 */
	public async startWorkflow(
		workflowType: string,
		args?: readonly unknown[],
		options?: StartWorkflowOptions & { waitForResult?: false },
	): Promise<WorkflowHandleLike>
	public async startWorkflow(
		workflowType: string,
		args: readonly unknown[],
		options: StartWorkflowOptions & { waitForResult: true },
	): Promise<unknown>
	public async startWorkflow(
		workflowType: string,
		args?: readonly unknown[],
		options?: StartWorkflowOptions & { waitForResult?: boolean },
	): Promise<unknown>
	public async startWorkflow(
		workflowType: string,
		args: readonly unknown[] = [],
		options: StartWorkflowOptions & { waitForResult?: boolean } = {},
	): Promise<unknown> {
		const client = await this.ensureClient()

		if (!this.context.workflows.get(workflowType)) {
			throw new LoomworkError(`Workflow '${workflowType}' is not registered.`, { workflowType })
		}

		const workflowId = options.workflowId || `${workflowType}-${this.uuid()}`
		const taskQueue = options.taskQueue || this.config.taskQueue

		const handle = await client.start(workflowType, {
			args: packWorkflowArgs(args),
			workflowId,
			taskQueue,
			memo: options.memo,
			workflowIdReusePolicy: this.config.idReusePolicy,
		})
		this.logger.info(`[TemporalExecutor] Started workflow '${workflowType}'.`, {
			workflowId,
			runId: handle.runId,
			taskQueue,
		})

		if (options.waitForResult) {
			return handle.result()
		}
		return handle
	}

	/** Starts the workflow and resolves to its result. */
	public async executeWorkflow(
		workflowType: string,
		args: readonly unknown[] = [],
		options: StartWorkflowOptions = {},
	): Promise<unknown> {
		return this.startWorkflow(workflowType, args, { ...options, waitForResult: true })
	}

	public async getWorkflowResult(workflowId: string, runId?: string): Promise<unknown> {
		const client = await this.ensureClient()
		return client.getHandle(workflowId, runId).result()
	}

	public async signalWorkflow(workflowId: string, signalName: string, payload?: unknown, runId?: string): Promise<void> {
		const client = await this.ensureClient()
		const handle = client.getHandle(workflowId, runId)
		this.logger.debug(`[TemporalExecutor] Sending signal '${signalName}'.`, { workflowId, runId })
		if (payload === undefined) {
			await handle.signal(signalName)
		} else {
			await handle.signal(signalName, payload)
		}
	}

	public async cancelWorkflow(workflowId: string, runId?: string): Promise<void> {
		const client = await this.ensureClient()
		this.logger.info('[TemporalExecutor] Requesting workflow cancellation.', { workflowId, runId })
		await client.getHandle(workflowId, runId).cancel()
	}

	public async terminateWorkflow(workflowId: string, runId?: string, reason?: string): Promise<void> {
		const client = await this.ensureClient()
		const handle = client.getHandle(workflowId, runId)
		this.logger.info('[TemporalExecutor] Terminating workflow.', { workflowId, runId, reason })
		await handle.terminate(reason)
	}

	/** Inside a workflow the id comes from the runtime, so it is the same on replay. */
	public uuid(): string {
		return this.runtime.inWorkflow() ? this.runtime.uuid() : super.uuid()
	}
}
