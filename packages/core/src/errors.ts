/**
 * The error class raised by Loomwork itself.
 * Errors coming from a runtime client or from a task pass through untouched.
 */
export class LoomworkError extends Error {
	/** The workflow type a registry lookup failed for, if any. */
	public readonly workflowType?: string
	/** The task or activity name a registry lookup failed for, if any. */
	public readonly taskName?: string

	constructor(message: string, options: { cause?: unknown; workflowType?: string; taskName?: string } = {}) {
		super(message, { cause: options.cause })
		this.name = 'LoomworkError'
		this.workflowType = options.workflowType
		this.taskName = options.taskName
	}
}
