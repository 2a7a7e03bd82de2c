/**
 * JSON configuration file loading with zod validation.
 */

import { readFile } from 'node:fs/promises'
import { resolve } from 'node:path'
import { ZodError, type ZodType, type ZodTypeDef } from 'zod'
import { configurationError, type PollError } from '../poller/errors.js'

export interface ConfigIssue {
  path: string
  message: string
}

export function formatZodIssues(error: ZodError): ConfigIssue[] {
  return error.issues.map((issue) => ({
    path: issue.path.join('.'),
    message: issue.message,
  }))
}

/**
 * Validate an already-parsed value, throwing a ConfigurationError that lists
 * every zod issue.
 */
export function parseConfig<T>(
  label: string,
  raw: unknown,
  schema: ZodType<T, ZodTypeDef, unknown>
): T {
  const result = schema.safeParse(raw)
  if (!result.success) {
    throw invalidConfig(label, formatZodIssues(result.error))
  }
  return result.data
}

export async function readJsonConfig<T>(
  label: string,
  path: string,
  schema: ZodType<T, ZodTypeDef, unknown>
): Promise<T> {
  const absolute = resolve(path)
  let text: string
  try {
    text = await readFile(absolute, 'utf8')
  } catch (error) {
    throw configurationError(`Cannot read ${label} file`, {
      path: absolute,
      reason: error instanceof Error ? error.message : String(error),
    })
  }

  let raw: unknown
  try {
    raw = JSON.parse(text)
  } catch (error) {
    throw configurationError(`${label} file is not valid JSON`, {
      path: absolute,
      reason: error instanceof Error ? error.message : String(error),
    })
  }

  return parseConfig(label, raw, schema)
}

function invalidConfig(label: string, issues: ConfigIssue[]): PollError {
  const summary = issues.map((i) => `${i.path || '(root)'}: ${i.message}`).join('; ')
  return configurationError(`Invalid ${label}: ${summary}`, { issues })
}
