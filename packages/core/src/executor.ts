import type { ExecutorContext } from './context'
import type { ExecutionEngine, ILogger, Task } from './types'

interface SettledTask<T> {
	index: number
	result: PromiseSettledResult<T>
}

/**
 * The base class for all executors. It knows how to run a task in the current
 * process and leaves the choice of where a task runs to subclasses.
 */
export abstract class Executor {
	public abstract readonly engine: ExecutionEngine
	protected readonly logger: ILogger

	constructor(public readonly context: ExecutorContext) {
		this.logger = context.logger
	}

	/**
	 * Runs a task and resolves to its result, whichever of `executeTaskAsAsync` or a
	 * remote dispatch the executor picks.
	 */
	public abstract executeTask<TArgs extends unknown[], TResult>(
		task: Task<TArgs, TResult>,
		...args: TArgs
	): Promise<Awaited<TResult>>

	/**
	 * Runs a task in the current process. A synchronous function's return value is
	 * returned as is, an asynchronous one is awaited, and a promise is awaited directly.
	 * Failures propagate to the caller.
	 */
	public async executeTaskAsAsync<TArgs extends unknown[], TResult>(
		task: Task<TArgs, TResult>,
		...args: TArgs
	): Promise<Awaited<TResult>> {
		if (typeof task === 'function') {
			return await task(...args)
		}
		return await task
	}

	/** Runs tasks concurrently and reports each outcome in input order. */
	public async executeMany<TResult>(tasks: ReadonlyArray<Task<[], TResult>>): Promise<PromiseSettledResult<Awaited<TResult>>[]> {
		return Promise.allSettled(tasks.map((task) => this.executeTask(task)))
	}

	/** Runs tasks concurrently and yields each outcome as soon as it settles. */
	public async *executeStreaming<TResult>(
		tasks: ReadonlyArray<Task<[], TResult>>,
	): AsyncGenerator<PromiseSettledResult<Awaited<TResult>>> {
		const pending = new Map<number, Promise<SettledTask<Awaited<TResult>>>>()
		tasks.forEach((task, index) => {
			pending.set(
				index,
				this.executeTask(task).then(
					(value): SettledTask<Awaited<TResult>> => ({ index, result: { status: 'fulfilled', value } }),
					(reason: unknown): SettledTask<Awaited<TResult>> => ({ index, result: { status: 'rejected', reason } }),
				),
			)
		})
		while (pending.size > 0) {
			const { index, result } = await Promise.race(pending.values())
			pending.delete(index)
			yield result
		}
	}

	public uuid(): string {
		return globalThis.crypto.randomUUID()
	}
}

/** Runs every task in the current process. */
export class LocalExecutor extends Executor {
	public readonly engine = 'local' as const

	public async executeTask<TArgs extends unknown[], TResult>(
		task: Task<TArgs, TResult>,
		...args: TArgs
	): Promise<Awaited<TResult>> {
		this.logger.debug('[LocalExecutor] Executing task in process.')
		return this.executeTaskAsAsync(task, ...args)
	}
}
