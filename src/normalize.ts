import { z } from 'zod';
import { ValidationError } from './errors.js';

/**
 * Fields that hosts may declare either as one value or as a list. Each
 * union is resolved exactly once, here, so later stages only ever see
 * the canonical form.
 */
export const stringOrListSchema = z.union([z.string(), z.array(z.string())]);
export type StringOrList = z.infer<typeof stringOrListSchema>;

export const envInputSchema = z.union([
  z.record(z.union([z.string(), z.number(), z.boolean()])),
  z.string(),
  z.array(z.string()),
]);
export type EnvInput = z.infer<typeof envInputSchema>;

export const commandInputSchema = z.union([z.string(), z.array(z.string())]);
export type CommandInput = z.infer<typeof commandInputSchema>;

export const stateSchema = z.enum(['present', 'absent']);
export type ResourceState = z.infer<typeof stateSchema>;

const ENV_KEY_RE = /^[A-Za-z_][A-Za-z0-9_]*$/;

/**
 * A single string becomes a one-element list.
 */
export function toList(value: StringOrList | undefined): string[] {
  if (value === undefined) return [];
  return typeof value === 'string' ? [value] : [...value];
}

/**
 * A string command stays a single argv token. It is never split on
 * whitespace, since that would need shell semantics.
 */
export function toCommand(value: CommandInput | undefined): string[] {
  if (value === undefined) return [];
  return typeof value === 'string' ? [value] : [...value];
}

/**
 * Split `KEY=VALUE`. The value may be empty and may itself contain `=`.
 *
 * @throws ValidationError when the key is missing or not a valid name.
 */
export function parseEnvEntry(entry: string): [string, string] {
  const eq = entry.indexOf('=');
  const key = eq === -1 ? entry : entry.slice(0, eq);
  if (eq === -1 || !ENV_KEY_RE.test(key)) {
    throw new ValidationError(
      `Invalid env entry "${entry}".`,
      'Expected KEY=VALUE with KEY made of letters, digits and underscores.',
    );
  }
  return [key, entry.slice(eq + 1)];
}

/** Inverse of parseEnvEntry. */
export function formatEnvEntry(key: string, value: string): string {
  return `${key}=${value}`;
}

/**
 * Resolve the env union into an insertion-ordered mapping. A repeated
 * key keeps its first position and takes the last value.
 */
export function toEnv(value: EnvInput | undefined): Record<string, string> {
  const env: Record<string, string> = {};
  if (value === undefined) return env;

  if (typeof value === 'string' || Array.isArray(value)) {
    for (const entry of toList(value)) {
      const [k, v] = parseEnvEntry(entry);
      env[k] = v;
    }
    return env;
  }

  for (const [k, v] of Object.entries(value)) {
    if (!ENV_KEY_RE.test(k)) {
      throw new ValidationError(
        `Invalid env key "${k}".`,
        'Keys must be made of letters, digits and underscores.',
      );
    }
    env[k] = String(v);
  }
  return env;
}

/**
 * Parse raw operation input with a strict schema and report every issue
 * in a single ValidationError.
 *
 * @param operation Operation name used as the message prefix.
 */
export function parseInput<S extends z.ZodTypeAny>(
  schema: S,
  raw: unknown,
  operation: string,
): z.infer<S> {
  const result = schema.safeParse(raw);
  if (!result.success) {
    throw new ValidationError(
      `${operation}: invalid attributes`,
      result.error.issues
        .map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`)
        .join('; '),
    );
  }
  return result.data;
}
