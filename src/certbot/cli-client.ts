import * as fs from 'fs';
import { ProbeError } from '../errors.js';
import {
  defaultRunner,
  formatArgv,
  queryHostCmd,
  type Logger,
  type Runner,
} from '../command-runner.js';
import type { CertificateAction, ObservedCertificate } from './decide.js';
import type { CertificateRequest } from './request.js';

const MONTHS = [
  'Jan',
  'Feb',
  'Mar',
  'Apr',
  'May',
  'Jun',
  'Jul',
  'Aug',
  'Sep',
  'Oct',
  'Nov',
  'Dec',
];

const NOT_AFTER_RE =
  /^notAfter=([A-Z][a-z]{2})\s+(\d{1,2})\s+(\d{2}):(\d{2}):(\d{2})\s+(\d{4})\s+GMT\s*$/m;

/**
 * Parse the `notAfter=` line printed by `openssl x509 -enddate`, e.g.
 * `notAfter=Mar  5 09:30:00 2027 GMT`.
 *
 * @returns The instant in UTC, or `undefined` when no such line exists.
 */
export function parseNotAfter(output: string): Date | undefined {
  const m = NOT_AFTER_RE.exec(output);
  if (!m) return undefined;
  const [, mon, day, hh, mm, ss, year] = m;
  const month = MONTHS.indexOf(mon ?? '');
  if (month === -1) return undefined;
  return new Date(
    Date.UTC(
      Number(year),
      month,
      Number(day),
      Number(hh),
      Number(mm),
      Number(ss),
    ),
  );
}

/**
 * Collect the `DNS:` names of a printed subjectAltName extension.
 *
 * @returns Lower-cased names, or `undefined` when none are printed.
 */
export function parseSubjectAltNames(output: string): string[] | undefined {
  const names = [...output.matchAll(/DNS:([^\s,]+)/g)].map((m) =>
    (m[1] ?? '').toLowerCase(),
  );
  return names.length > 0 ? names : undefined;
}

const SUBJECT_CN_RE = /^subject=.*?\bCN\s*=\s*([^,/\s]+)/m;

/**
 * Common name from the `subject=` line printed by `openssl x509 -subject`,
 * in either the `CN = a` or the older `/CN=a` notation.
 */
export function parseCommonName(output: string): string | undefined {
  const m = SUBJECT_CN_RE.exec(output);
  return m?.[1]?.toLowerCase();
}

/**
 * Build the certbot invocations for a decided action. `noop` yields no
 * command. Each user-supplied value is its own element of the vector.
 *
 * `renew` adds `--force-renewal`: the decision to renew has already
 * been taken and certbot must not skip it.
 */
export function buildCertbotCommands(
  request: CertificateRequest,
  action: CertificateAction,
  certbot = 'certbot',
): string[][] {
  switch (action) {
    case 'noop':
      return [];
    case 'remove':
      return [
        [certbot, 'delete', '--cert-name', request.certName, '--non-interactive'],
      ];
    case 'issue':
    case 'renew': {
      const argv = [certbot, 'certonly', '--non-interactive', '--agree-tos'];
      if (request.email !== undefined) argv.push('-m', request.email);
      for (const d of request.domains) argv.push('-d', d);
      argv.push('--cert-name', request.certName);
      if (request.challenge.kind === 'webroot') {
        argv.push('--webroot', '-w', request.challenge.path);
      } else {
        argv.push('--standalone');
      }
      if (action === 'renew') argv.push('--force-renewal');
      if (request.staging) argv.push('--staging');
      argv.push(...request.extraArgs);
      return [argv];
    }
  }
}

export interface CertbotCliClientOptions {
  certbotPath?: string;
  opensslPath?: string;
  timeoutMs?: number;
  runner?: Runner;
  fileExists?: (p: string) => boolean;
}

/**
 * Reads certificate facts from the host through the certbot and openssl
 * CLIs. Nothing here changes host state.
 */
export class CertbotCliClient {
  private readonly certbot: string;
  private readonly openssl: string;
  private readonly timeoutMs: number;
  private readonly runFn: Runner;
  private readonly fileExists: (p: string) => boolean;

  constructor(opts: CertbotCliClientOptions = {}) {
    this.certbot = opts.certbotPath ?? 'certbot';
    this.openssl = opts.opensslPath ?? 'openssl';
    this.timeoutMs = opts.timeoutMs ?? 60_000;
    this.runFn = opts.runner ?? defaultRunner;
    this.fileExists = opts.fileExists ?? fs.existsSync;
  }

  /**
   * Fail early when certbot cannot be started.
   *
   * @throws ProbeError when `certbot --version` does not succeed.
   */
  async verifyCertbot(logger: Logger): Promise<void> {
    const argv = [this.certbot, '--version'];
    const res = queryHostCmd(argv, logger, {
      runner: this.runFn,
      timeoutMs: this.timeoutMs,
    });
    if (res.exitCode !== 0) {
      throw new ProbeError(
        'certbot not available.',
        res.stderr.trim() || 'certbot must be installed and on PATH.',
      );
    }
  }

  /**
   * Whether a declared webroot directory is present on this host.
   */
  hasWebroot(webroot: string): boolean {
    return this.fileExists(webroot);
  }

  /**
   * Existence of the certificate at `livePath` only. openssl is not run,
   * so an unreadable file still counts as present.
   */
  async probeExistence(
    livePath: string,
    logger: Logger,
  ): Promise<ObservedCertificate> {
    if (!this.fileExists(livePath)) {
      logger.log(`probe: no certificate at ${livePath}`);
      return { exists: false };
    }
    logger.log(`probe: certificate found at ${livePath}`);
    return { exists: true };
  }

  /**
   * Read expiry and covered domains of the certificate at `livePath`.
   * A missing file means the certificate does not exist. The covered
   * domains are the DNS subject alternative names, or the subject common
   * name when the certificate has none.
   *
   * @throws ProbeError when openssl fails or prints no expiry date.
   */
  async probe(livePath: string, logger: Logger): Promise<ObservedCertificate> {
    if (!this.fileExists(livePath)) {
      logger.log(`probe: no certificate at ${livePath}`);
      return { exists: false };
    }

    const argv = [
      this.openssl,
      'x509',
      '-noout',
      '-subject',
      '-enddate',
      '-ext',
      'subjectAltName',
      '-in',
      livePath,
    ];
    const res = queryHostCmd(argv, logger, {
      runner: this.runFn,
      timeoutMs: this.timeoutMs,
    });
    if (res.exitCode !== 0) {
      throw new ProbeError(
        `Failed to read certificate at ${livePath}`,
        res.stderr.trim() || `${formatArgv(argv)} exited ${res.exitCode}`,
      );
    }

    const expiryDate = parseNotAfter(res.stdout);
    if (expiryDate === undefined) {
      throw new ProbeError(
        `No expiry date found for certificate at ${livePath}`,
        res.stdout.trim(),
      );
    }

    const commonName = parseCommonName(res.stdout);
    return {
      exists: true,
      expiryDate,
      domains:
        parseSubjectAltNames(res.stdout) ??
        (commonName !== undefined ? [commonName] : undefined),
    };
  }
}
