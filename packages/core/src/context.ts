import type { LoomworkConfig } from './config'
import { resolveConfig } from './config'
import { ConsoleLogger } from './logger'
import { TaskRegistry, WorkflowRegistry } from './registry'
import type { ILogger } from './types'

/**
 * The application context shared by an executor and its callers.
 * Executors hold a reference to it and never replace its members.
 */
export interface ExecutorContext {
	readonly config: LoomworkConfig
	readonly workflows: WorkflowRegistry
	readonly tasks: TaskRegistry
	readonly logger: ILogger
}

export function createContext(config: LoomworkConfig = resolveConfig(), options: { logger?: ILogger } = {}): ExecutorContext {
	return {
		config,
		workflows: new WorkflowRegistry(),
		tasks: new TaskRegistry(),
		logger: options.logger || new ConsoleLogger(config.logger.level),
	}
}
