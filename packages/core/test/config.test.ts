import { mkdirSync, rmSync, writeFileSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { DEFAULT_TEMPORAL_SETTINGS, resolveConfig } from '../src/config'
import { findConfigFile, loadConfig } from '../src/config-loader'
import { LoomworkError } from '../src/errors'

describe('resolveConfig', () => {
	it('should apply defaults to an empty document', () => {
		expect(resolveConfig({}, {})).toEqual({
			executionEngine: 'local',
			logger: { level: 'info' },
			temporal: {
				host: 'localhost:7233',
				namespace: 'default',
				taskQueue: 'loomwork',
				timeoutSeconds: 60,
			},
		})
	})

	it('should treat a missing document as empty', () => {
		expect(resolveConfig(null, {}).temporal).toEqual(DEFAULT_TEMPORAL_SETTINGS)
	})

	it('should read every temporal setting', () => {
		const config = resolveConfig(
			{
				executionEngine: 'temporal',
				logger: { level: 'debug' },
				temporal: {
					host: 'temporal.internal:7233',
					namespace: 'payments',
					taskQueue: 'payments-queue',
					timeoutSeconds: 15,
					apiKey: 'test-api-key',
					tls: true,
					rpcMetadata: { 'x-tenant': 'acme' },
					idReusePolicy: 'TERMINATE_IF_RUNNING',
				},
			},
			{},
		)

		expect(config).toEqual({
			executionEngine: 'temporal',
			logger: { level: 'debug' },
			temporal: {
				host: 'temporal.internal:7233',
				namespace: 'payments',
				taskQueue: 'payments-queue',
				timeoutSeconds: 15,
				apiKey: 'test-api-key',
				tls: true,
				rpcMetadata: { 'x-tenant': 'acme' },
				idReusePolicy: 'TERMINATE_IF_RUNNING',
			},
		})
	})

	it('should let the environment override the document', () => {
		const config = resolveConfig(
			{ temporal: { host: 'file-host:7233', namespace: 'file-ns' } },
			{
				LOOMWORK_EXECUTION_ENGINE: 'temporal',
				LOOMWORK_LOG_LEVEL: 'error',
				TEMPORAL_ADDRESS: 'env-host:7233',
				TEMPORAL_TASK_QUEUE: 'env-queue',
				TEMPORAL_API_KEY: 'env-api-key',
			},
		)

		expect(config.executionEngine).toBe('temporal')
		expect(config.logger.level).toBe('error')
		expect(config.temporal.host).toBe('env-host:7233')
		expect(config.temporal.namespace).toBe('file-ns')
		expect(config.temporal.taskQueue).toBe('env-queue')
		expect(config.temporal.apiKey).toBe('env-api-key')
	})

	it('should reject an unknown execution engine', () => {
		expect(() => resolveConfig({ executionEngine: 'threads' }, {})).toThrow("Invalid config: 'executionEngine':")
	})

	it('should reject a non-positive timeout', () => {
		expect(() => resolveConfig({ temporal: { timeoutSeconds: -1 } }, {})).toThrow(
			"Invalid config: 'temporal.timeoutSeconds': Number must be greater than 0",
		)
	})

	it('should reject sections that are not mappings', () => {
		expect(() => resolveConfig({ temporal: 'localhost' }, {})).toThrow("Invalid config: 'temporal':")
		expect(() => resolveConfig(['temporal'], {})).toThrow("Invalid config: '(root)':")
	})

	it('should reject non-string rpc metadata values', () => {
		expect(() => resolveConfig({ temporal: { rpcMetadata: { retries: 3 } } }, {})).toThrow(
			"Invalid config: 'temporal.rpcMetadata.retries': Expected string, received number",
		)
	})

	it('should reject an unknown reuse policy', () => {
		expect(() => resolveConfig({ temporal: { idReusePolicy: 'SOMETIMES' } }, {})).toThrow(LoomworkError)
	})

	it('should reject empty strings in the document', () => {
		expect(() => resolveConfig({ temporal: { namespace: '' } }, {})).toThrow("Invalid config: 'temporal.namespace':")
	})

	it('should ignore empty environment overrides', () => {
		const config = resolveConfig({ temporal: { host: 'file-host:7233' } }, { TEMPORAL_ADDRESS: '', LOOMWORK_EXECUTION_ENGINE: '' })

		expect(config.temporal.host).toBe('file-host:7233')
		expect(config.executionEngine).toBe('local')
	})

	it('should reject an invalid engine named by the environment', () => {
		expect(() => resolveConfig({}, { LOOMWORK_EXECUTION_ENGINE: 'threads' })).toThrow("Invalid config: 'executionEngine':")
	})

	it('should keep the validation error as the cause', () => {
		let caught: unknown
		try {
			resolveConfig({ logger: { level: 'loud' } }, {})
		} catch (error) {
			caught = error
		}

		expect(caught).toBeInstanceOf(LoomworkError)
		expect(caught).toMatchObject({ cause: expect.objectContaining({ name: 'ZodError' }) })
	})
})

describe('loadConfig', () => {
	let tempDir: string
	let homeDir: string

	beforeEach(() => {
		tempDir = join(tmpdir(), `loomwork-test-${Math.random().toString(36).slice(2, 11)}`)
		homeDir = join(tempDir, 'home')
		mkdirSync(homeDir, { recursive: true })
	})

	afterEach(() => {
		rmSync(tempDir, { recursive: true, force: true })
	})

	it('should return null when no config file exists', () => {
		expect(findConfigFile(tempDir, {}, homeDir)).toBeNull()
	})

	it.each(['config.yaml', 'config.yml', 'config.json'])('should find %s in ~/.loomwork', (fileName) => {
		mkdirSync(join(homeDir, '.loomwork'))
		writeFileSync(join(homeDir, '.loomwork', fileName), fileName.endsWith('.json') ? '{}' : 'executionEngine: local')

		expect(findConfigFile(tempDir, {}, homeDir)).toBe(join(homeDir, '.loomwork', fileName))
	})

	it('should prefer the working directory over the home directory', () => {
		mkdirSync(join(homeDir, '.loomwork'))
		writeFileSync(join(homeDir, '.loomwork', 'config.json'), JSON.stringify({ executionEngine: 'local' }))
		writeFileSync(join(tempDir, 'loomwork.config.yml'), 'executionEngine: temporal')

		expect(loadConfig({ cwd: tempDir, env: {}, home: homeDir }).executionEngine).toBe('temporal')
	})

	it('should load a JSON config from the home directory', () => {
		mkdirSync(join(homeDir, '.loomwork'))
		writeFileSync(join(homeDir, '.loomwork', 'config.json'), JSON.stringify({ temporal: { namespace: 'home-ns' } }))

		expect(loadConfig({ cwd: tempDir, env: {}, home: homeDir }).temporal.namespace).toBe('home-ns')
	})

	it('should load a YAML config from the working directory', () => {
		writeFileSync(
			join(tempDir, 'loomwork.config.yaml'),
			['executionEngine: temporal', 'temporal:', '  namespace: test-namespace', '  taskQueue: test-queue', '  timeoutSeconds: 10'].join(
				'\n',
			),
		)

		const config = loadConfig({ cwd: tempDir, env: {}, home: homeDir })

		expect(config.executionEngine).toBe('temporal')
		expect(config.temporal).toEqual({
			host: 'localhost:7233',
			namespace: 'test-namespace',
			taskQueue: 'test-queue',
			timeoutSeconds: 10,
		})
	})

	it('should load the file named by LOOMWORK_CONFIG', () => {
		const configPath = join(tempDir, 'custom.json')
		writeFileSync(configPath, JSON.stringify({ logger: { level: 'warn' } }))

		const config = loadConfig({ cwd: tempDir, env: { LOOMWORK_CONFIG: configPath }, home: homeDir })

		expect(config.logger.level).toBe('warn')
	})

	it('should fail when LOOMWORK_CONFIG names a missing file', () => {
		const configPath = join(tempDir, 'absent.yaml')
		expect(() => findConfigFile(tempDir, { LOOMWORK_CONFIG: configPath })).toThrow(
			`Config file '${configPath}' named by LOOMWORK_CONFIG does not exist.`,
		)
	})

	it('should wrap parse failures', () => {
		writeFileSync(join(tempDir, 'loomwork.config.json'), '{ not json')

		expect(() => loadConfig({ cwd: tempDir, env: {}, home: homeDir })).toThrow(LoomworkError)
	})
})
