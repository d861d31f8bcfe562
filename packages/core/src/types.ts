/** Severity levels understood by the built-in loggers, lowest first. */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

/** Interface for pluggable loggers. */
export interface ILogger {
	debug: (message: string, meta?: Record<string, unknown>) => void
	info: (message: string, meta?: Record<string, unknown>) => void
	warn: (message: string, meta?: Record<string, unknown>) => void
	error: (message: string, meta?: Record<string, unknown>) => void
}

/** The runtime a context's executor should hand work to. */
export type ExecutionEngine = 'local' | 'temporal'

/** A function that can be dispatched by an executor. It may return a value or a promise of one. */
export type TaskFunction<TArgs extends unknown[] = never, TResult = unknown> = (...args: TArgs) => TResult | Promise<TResult>

/** Anything an executor accepts as a unit of work: a function to call, or a promise already in flight. */
export type Task<TArgs extends unknown[] = never, TResult = unknown> = TaskFunction<TArgs, TResult> | PromiseLike<TResult>

/** A registered workflow entry point. The runtime calls it with the workflow's input. */
export type WorkflowFunction = (...args: never) => Promise<unknown>

/**
 * Retry settings forwarded to the runtime when a task runs remotely.
 * Intervals are in milliseconds.
 */
export interface RetryPolicy {
	initialInterval?: number
	backoffCoefficient?: number
	maximumInterval?: number
	maximumAttempts?: number
	nonRetryableErrorTypes?: string[]
}

/** Metadata attached to a function by `defineTask`. */
export interface TaskDefinition {
	/** The name the task is registered and dispatched under. */
	name: string
	/** Overrides the configured schedule-to-close timeout for this task. */
	timeoutSeconds?: number
	retryPolicy?: RetryPolicy
}
