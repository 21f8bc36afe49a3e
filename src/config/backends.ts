import { readFile } from 'fs/promises';
import { z } from 'zod';
import { ConfigError } from '../errors';
import { BackendConfig, IntegrationPattern, ProviderKind } from '../types';

const BackendSchema = z
  .object({
    name: z.string().min(1),
    model: z.string().min(1).optional(),
    endpoint: z.string().url().refine(url => /^https?:\/\//.test(url), 'endpoint must be http(s)'),
    provider: z.nativeEnum(ProviderKind).default(ProviderKind.OPENAI),
    pattern: z.nativeEnum(IntegrationPattern),
    dimension: z.number().int().positive(),
    weight: z.number().positive().default(1),
    timeoutMs: z.number().int().positive().default(30000),
    maxRetries: z.number().int().nonnegative().default(3),
  })
  .strict();

const BackendListSchema = z.array(BackendSchema).min(1);

/**
 * Validate an already-parsed backend list.
 */
export function parseBackends(raw: unknown): BackendConfig[] {
  const parsed = BackendListSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => ({
      field: issue.path.join('.'),
      message: issue.message,
    }));
    throw new ConfigError('Invalid backend configuration', { issues });
  }

  return parsed.data.map(entry => ({
    ...entry,
    model: entry.model ?? entry.name,
  }));
}

/**
 * Read the static backend registry from a JSON file.
 */
export async function loadBackends(file: string): Promise<BackendConfig[]> {
  let content: string;
  try {
    content = await readFile(file, 'utf8');
  } catch (error) {
    throw new ConfigError(`Cannot read backend configuration ${file}`, {
      reason: error instanceof Error ? error.message : String(error),
    });
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    throw new ConfigError(`Backend configuration ${file} is not valid JSON`, {
      reason: error instanceof Error ? error.message : String(error),
    });
  }

  return parseBackends(raw);
}
