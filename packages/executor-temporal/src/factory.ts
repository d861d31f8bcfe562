import type { Executor, ExecutorContext } from 'loomwork'
import { LocalExecutor } from 'loomwork'
import type { TemporalExecutorOptions } from './executor'
import { TemporalExecutor } from './executor'

/** Builds the executor named by `context.config.executionEngine`. */
export function createExecutor(
	context: ExecutorContext,
	options: Omit<TemporalExecutorOptions, 'context'> = {},
): Executor {
	switch (context.config.executionEngine) {
		case 'temporal':
			return new TemporalExecutor({ ...options, context })
		case 'local':
			return new LocalExecutor(context)
	}
}
