import { z } from 'zod'
import { LoomworkError } from './errors'

export type Environment = Record<string, string | undefined>

export const DEFAULT_TEMPORAL_SETTINGS = Object.freeze({
	host: 'localhost:7233',
	namespace: 'default',
	taskQueue: 'loomwork',
	timeoutSeconds: 60,
})

const temporalSchema = z
	.object({
		/** `host:port` of the Temporal frontend. */
		host: z.string().min(1).default(DEFAULT_TEMPORAL_SETTINGS.host),
		namespace: z.string().min(1).default(DEFAULT_TEMPORAL_SETTINGS.namespace),
		/** Default task queue for workflows and activities. */
		taskQueue: z.string().min(1).default(DEFAULT_TEMPORAL_SETTINGS.taskQueue),
		/** Default schedule-to-close timeout for activities. */
		timeoutSeconds: z.number().finite().positive().default(DEFAULT_TEMPORAL_SETTINGS.timeoutSeconds),
		apiKey: z.string().min(1).optional(),
		tls: z.boolean().optional(),
		/** Extra gRPC metadata sent with every request. */
		rpcMetadata: z.record(z.string()).optional(),
		idReusePolicy: z
			.enum(['ALLOW_DUPLICATE', 'ALLOW_DUPLICATE_FAILED_ONLY', 'REJECT_DUPLICATE', 'TERMINATE_IF_RUNNING'])
			.optional(),
	})
	.default({})

export const configSchema = z.object({
	executionEngine: z.enum(['local', 'temporal']).default('local'),
	logger: z
		.object({
			level: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
		})
		.default({}),
	temporal: temporalSchema,
})

export type LoomworkConfig = z.infer<typeof configSchema>
export type TemporalSettings = LoomworkConfig['temporal']
export type LoggerSettings = LoomworkConfig['logger']
/** Accepted workflow id reuse policies, named as the Temporal client names them. */
export type WorkflowIdReusePolicy = NonNullable<TemporalSettings['idReusePolicy']>

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/**
 * Lays the non-empty `overrides` over a config section. A section that is not a
 * mapping is left for the schema to report.
 */
function overlay(section: unknown, overrides: Environment): unknown {
	const defined = Object.entries(overrides).filter(([, value]) => value)
	if (defined.length === 0) return section
	if (section !== undefined && section !== null && !isRecord(section)) return section
	return { ...section, ...Object.fromEntries(defined) }
}

/**
 * Validates a raw configuration object (as parsed from a config file), fills in
 * defaults and applies environment overrides.
 * @param raw The parsed file contents, or `undefined` when there is no file.
 * @param env The environment to read overrides from.
 */
export function resolveConfig(raw: unknown = {}, env: Environment = {}): LoomworkConfig {
	const root = raw ?? {}
	const merged = isRecord(root)
		? {
				...root,
				...(env.LOOMWORK_EXECUTION_ENGINE ? { executionEngine: env.LOOMWORK_EXECUTION_ENGINE } : {}),
				logger: overlay(root.logger, { level: env.LOOMWORK_LOG_LEVEL }),
				temporal: overlay(root.temporal, {
					host: env.TEMPORAL_ADDRESS,
					namespace: env.TEMPORAL_NAMESPACE,
					taskQueue: env.TEMPORAL_TASK_QUEUE,
					apiKey: env.TEMPORAL_API_KEY,
				}),
			}
		: root

	const result = configSchema.safeParse(merged)
	if (!result.success) {
		const [issue] = result.error.issues
		const path = issue.path.length > 0 ? issue.path.join('.') : '(root)'
		throw new LoomworkError(`Invalid config: '${path}': ${issue.message}`, { cause: result.error })
	}
	return result.data
}
