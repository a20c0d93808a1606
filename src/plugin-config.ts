import * as fs from 'fs';
import * as path from 'path';
import * as yaml from 'yaml';
import { z } from 'zod';
import { ValidationError } from './errors.js';

export interface ReconcilerPluginConfig {
  /**
   * Path or name of the certbot binary. When omitted, falls back to
   * the `CERTBOT_BIN` environment variable, then `"certbot"`.
   */
  certbotPath?: string;

  /**
   * Path or name of the openssl binary used to read certificate
   * metadata. Falls back to `OPENSSL_BIN`, then `"openssl"`.
   */
  opensslPath?: string;

  /**
   * Path or name of the docker binary. Falls back to `DOCKER_BIN`,
   * then `"docker"`.
   */
  dockerPath?: string;

  /**
   * certbot configuration directory holding `live/<cert-name>/`.
   * Falls back to `LETSENCRYPT_DIR`, then `"/etc/letsencrypt"`.
   */
  letsencryptDir?: string;

  /**
   * Watchdog for every external command, in milliseconds. Falls back
   * to `RECONCILE_TIMEOUT_MS`, then ten minutes.
   */
  timeoutMs?: number;

  /**
   * Decide and report without changing the host. Falls back to
   * `RECONCILE_DRY_RUN=true`.
   */
  dryRun?: boolean;
}

const DEFAULT_TIMEOUT_MS = 600_000;

const pluginConfigSchema = z
  .object({
    certbotPath: z.string().min(1).optional(),
    opensslPath: z.string().min(1).optional(),
    dockerPath: z.string().min(1).optional(),
    letsencryptDir: z.string().min(1).optional(),
    timeoutMs: z.number().int().positive().optional(),
    dryRun: z.boolean().optional(),
  })
  .strict();

/**
 * ReconcilerConfig wraps the raw plugin config and exposes derived values
 * and safe defaults. It centralizes option reading so the operations
 * stay small and consistent.
 */
export class ReconcilerConfig {
  private readonly cfg: ReconcilerPluginConfig;

  constructor(cfg: ReconcilerPluginConfig = {}) {
    this.cfg = cfg;
  }

  /**
   * Load settings from a YAML file. Unknown keys and mistyped values
   * are rejected.
   *
   * @param filePath Path to a YAML document with a top-level mapping.
   * @throws ValidationError when the file is not a valid settings document.
   */
  static fromFile(filePath: string): ReconcilerConfig {
    const text = fs.readFileSync(filePath, 'utf8');
    let parsed: unknown;
    try {
      parsed = yaml.parse(text) ?? {};
    } catch (err: unknown) {
      throw new ValidationError(
        `Invalid YAML in ${filePath}`,
        err instanceof Error ? err.message : undefined,
      );
    }

    const result = pluginConfigSchema.safeParse(parsed);
    if (!result.success) {
      throw new ValidationError(
        `Invalid reconciler settings in ${filePath}`,
        result.error.issues
          .map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`)
          .join('; '),
      );
    }
    return new ReconcilerConfig(result.data);
  }

  /**
   * Path to the certbot binary. Falls back to `CERTBOT_BIN`, then to
   * `certbot` on PATH.
   */
  getCertbotPath(): string {
    return this.cfg.certbotPath ?? process.env.CERTBOT_BIN ?? 'certbot';
  }

  /**
   * Path to the openssl binary used to read certificates. Falls back to
   * `OPENSSL_BIN`, then to `openssl` on PATH.
   */
  getOpensslPath(): string {
    return this.cfg.opensslPath ?? process.env.OPENSSL_BIN ?? 'openssl';
  }

  /**
   * Path to the docker CLI. Falls back to `DOCKER_BIN`, then to `docker`
   * on PATH.
   */
  getDockerPath(): string {
    return this.cfg.dockerPath ?? process.env.DOCKER_BIN ?? 'docker';
  }

  /**
   * Root of certbot's configuration tree. Falls back to `LETSENCRYPT_DIR`,
   * then to `/etc/letsencrypt`.
   */
  getLetsencryptDir(): string {
    return (
      this.cfg.letsencryptDir ??
      process.env.LETSENCRYPT_DIR ??
      '/etc/letsencrypt'
    );
  }

  /**
   * Location of the leaf certificate certbot keeps for a cert name.
   *
   * @returns `<letsencryptDir>/live/<certName>/cert.pem`.
   */
  getLivePath(certName: string): string {
    return path.join(this.getLetsencryptDir(), 'live', certName, 'cert.pem');
  }

  /**
   * Watchdog applied to every external command.
   *
   * @throws ValidationError when `RECONCILE_TIMEOUT_MS` is not a positive
   *   integer.
   */
  getTimeoutMs(): number {
    if (this.cfg.timeoutMs !== undefined) return this.cfg.timeoutMs;
    const raw = process.env.RECONCILE_TIMEOUT_MS;
    if (raw === undefined || raw.length === 0) return DEFAULT_TIMEOUT_MS;
    const n = Number(raw);
    if (!Number.isInteger(n) || n <= 0) {
      throw new ValidationError(
        'Invalid RECONCILE_TIMEOUT_MS.',
        `Expected a positive integer, got "${raw}".`,
      );
    }
    return n;
  }

  /**
   * Whether operations only report what they would do. Falls back to
   * `RECONCILE_DRY_RUN=true` in the environment.
   */
  isDryRun(): boolean {
    return this.cfg.dryRun ?? process.env.RECONCILE_DRY_RUN === 'true';
  }
}
