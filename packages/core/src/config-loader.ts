import { existsSync, readFileSync } from 'node:fs'
import { homedir } from 'node:os'
import { extname, join } from 'node:path'
import yaml from 'yaml'
import type { Environment, LoomworkConfig } from './config'
import { resolveConfig } from './config'
import { LoomworkError } from './errors'

const CONFIG_FILE_NAMES = ['loomwork.config.yaml', 'loomwork.config.yml', 'loomwork.config.json']
const HOME_CONFIG_FILE_NAMES = ['config.yaml', 'config.yml', 'config.json']

/**
 * Finds the config file to load: `LOOMWORK_CONFIG` first, then the working
 * directory, then `~/.loomwork/`.
 */
export function findConfigFile(
	cwd: string = process.cwd(),
	env: Environment = process.env,
	home: string = homedir(),
): string | null {
	if (env.LOOMWORK_CONFIG) {
		if (!existsSync(env.LOOMWORK_CONFIG)) {
			throw new LoomworkError(`Config file '${env.LOOMWORK_CONFIG}' named by LOOMWORK_CONFIG does not exist.`)
		}
		return env.LOOMWORK_CONFIG
	}
	const candidates = [
		...CONFIG_FILE_NAMES.map((name) => join(cwd, name)),
		...HOME_CONFIG_FILE_NAMES.map((name) => join(home, '.loomwork', name)),
	]
	return candidates.find((candidate) => existsSync(candidate)) ?? null
}

export function readConfigFile(path: string): unknown {
	const content = readFileSync(path, 'utf-8')
	try {
		return extname(path) === '.json' ? JSON.parse(content) : yaml.parse(content)
	} catch (error) {
		throw new LoomworkError(`Could not parse config file '${path}'.`, { cause: error })
	}
}

/** Loads and resolves the configuration. Falls back to defaults when no file is found. */
export function loadConfig(options: { cwd?: string; env?: Environment; home?: string } = {}): LoomworkConfig {
	const env = options.env ?? process.env
	const path = findConfigFile(options.cwd, env, options.home)
	return resolveConfig(path ? readConfigFile(path) : {}, env)
}
