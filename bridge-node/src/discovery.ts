/**
 * Server discovery: locate the build server's descriptor file.
 *
 * A running server writes `project/target/active.json` under its project
 * root. Starting from the working directory, each ancestor is checked in
 * turn and the first descriptor found wins.
 *
 * @module
 */
import { readFile, stat } from 'node:fs/promises'
import { dirname, join, resolve } from 'node:path'
import {
  ConfigNotFoundError,
  errorCode,
  errorMessage,
  IoFailureError,
  InvalidConfigError
} from './errors.js'

/** Descriptor location relative to a project root. */
export const ACTIVE_FILE_PATH = join('project', 'target', 'active.json')

/**
 * Decoded descriptor. The token fields travel together or not at all;
 * anything else in the file is ignored.
 */
export type ActiveDescriptor =
  | { readonly uri: string }
  | { readonly uri: string; readonly tokenfilePath: string; readonly tokenfileUri: string }

/**
 * Yield `start` and each of its ancestors, closest first.
 */
export function* ancestors(start: string): Generator<string, void, unknown> {
  let dir = resolve(start)
  while (true) {
    yield dir
    const parent = dirname(dir)
    if (parent === dir) return
    dir = parent
  }
}

/**
 * Find the nearest descriptor file at or above `cwd`.
 *
 * @returns Absolute path of the descriptor, or null if none exists
 */
export async function findActiveFile(cwd: string): Promise<string | null> {
  for (const dir of ancestors(cwd)) {
    const candidate = join(dir, ACTIVE_FILE_PATH)
    try {
      const info = await stat(candidate)
      if (info.isFile()) return candidate
    } catch (err) {
      const code = errorCode(err)
      if (code === 'ENOENT' || code === 'ENOTDIR') continue
      throw new IoFailureError(`could not inspect ${candidate}`, err)
    }
  }
  return null
}

/**
 * Decode descriptor text.
 *
 * @param text - Raw file contents
 * @param path - Used in error messages only
 * @throws InvalidConfigError if the text is not a JSON object with a string `uri`
 */
export function parseActive(text: string, path: string): ActiveDescriptor {
  let parsed: unknown
  try {
    parsed = JSON.parse(text)
  } catch (err) {
    throw new InvalidConfigError(path, `not valid JSON (${errorMessage(err)})`)
  }

  if (parsed === null || typeof parsed !== 'object' || Array.isArray(parsed)) {
    throw new InvalidConfigError(path, 'expected a JSON object')
  }

  const obj = parsed as Record<string, unknown>

  if (typeof obj.uri !== 'string') {
    throw new InvalidConfigError(path, 'uri must be a string')
  }

  // Token fields are optional extras: kept only as a complete pair
  if (typeof obj.tokenfilePath === 'string' && typeof obj.tokenfileUri === 'string') {
    return { uri: obj.uri, tokenfilePath: obj.tokenfilePath, tokenfileUri: obj.tokenfileUri }
  }
  return { uri: obj.uri }
}

/**
 * Resolve the server URI by searching upward from `cwd`.
 *
 * @throws ConfigNotFoundError if no ancestor holds a descriptor
 * @throws InvalidConfigError if the descriptor cannot be decoded
 * @throws IoFailureError if the descriptor exists but cannot be read
 */
export async function discoverServerUri(cwd: string): Promise<string> {
  const path = await findActiveFile(cwd)
  if (path === null) {
    throw new ConfigNotFoundError(resolve(cwd), ACTIVE_FILE_PATH)
  }

  let text: string
  try {
    text = await readFile(path, 'utf-8')
  } catch (err) {
    throw new IoFailureError(`could not read ${path}`, err)
  }

  return parseActive(text, path).uri
}
