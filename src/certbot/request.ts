import { z } from 'zod';
import { ValidationError } from '../errors.js';
import {
  parseInput,
  type ResourceState,
  stateSchema,
  stringOrListSchema,
  toList,
} from '../normalize.js';

export const CERT_OPERATION = 'letsencrypt_cert';

/**
 * How domain ownership is proven. Chosen once while normalizing and
 * never re-derived.
 */
export type Challenge =
  | { kind: 'webroot'; path: string }
  | { kind: 'standalone' };

/**
 * Canonical certificate request. Domains are lower-cased, unique and
 * ordered; the first one is the primary domain.
 */
export interface CertificateRequest {
  domains: string[];
  email?: string;
  challenge: Challenge;
  certName: string;
  renewBeforeDays: number;
  forceRenew: boolean;
  staging: boolean;
  extraArgs: string[];
  state: ResourceState;
}

const rawCertificateSchema = z
  .object({
    domains: stringOrListSchema.optional(),
    domain: stringOrListSchema.optional(),
    email: z.string().optional(),
    webroot: z.string().min(1).optional(),
    standalone: z.boolean().optional(),
    cert_name: z.string().min(1).optional(),
    renew_before_days: z.number().int().min(0).optional(),
    force_renew: z.boolean().optional(),
    staging: z.boolean().optional(),
    extra_args: z.array(z.string()).optional(),
    state: stateSchema.optional(),
  })
  .strict();

export type RawCertificateRequest = z.input<typeof rawCertificateSchema>;

const HOSTNAME_RE =
  /^(\*\.)?([a-z0-9]([a-z0-9-]{0,61}[a-z0-9])?\.)*[a-z0-9]([a-z0-9-]{0,61}[a-z0-9])?$/;

function normalizeDomains(raw: string[]): string[] {
  const seen = new Set<string>();
  const out: string[] = [];
  for (const d of raw) {
    const domain = d.trim().toLowerCase();
    if (!HOSTNAME_RE.test(domain)) {
      throw new ValidationError(
        `${CERT_OPERATION}: invalid domain "${d}"`,
        'Domains must be hostnames, optionally prefixed with "*.".',
      );
    }
    if (!seen.has(domain)) {
      seen.add(domain);
      out.push(domain);
    }
  }
  return out;
}

/**
 * Validate raw operation attributes and produce a CertificateRequest.
 *
 * @throws ValidationError for unknown fields, an empty domain list, a
 * missing email while present, or contradictory challenge settings.
 */
export function normalizeCertificateRequest(raw: unknown): CertificateRequest {
  const input = parseInput(rawCertificateSchema, raw, CERT_OPERATION);

  if (input.domains !== undefined && input.domain !== undefined) {
    throw new ValidationError(
      `${CERT_OPERATION}: both "domains" and "domain" given`,
      'Use "domains" only.',
    );
  }

  const domains = normalizeDomains(toList(input.domains ?? input.domain));
  const primary = domains[0];
  if (primary === undefined) {
    throw new ValidationError(
      `${CERT_OPERATION} requires at least one domain`,
    );
  }

  const state = input.state ?? 'present';
  const email = input.email?.trim();
  if (state === 'present' && !email) {
    throw new ValidationError(
      `${CERT_OPERATION} requires an email for registration`,
    );
  }

  let challenge: Challenge;
  if (input.webroot !== undefined) {
    if (input.standalone === true) {
      throw new ValidationError(
        `${CERT_OPERATION}: "webroot" and "standalone" are mutually exclusive`,
      );
    }
    challenge = { kind: 'webroot', path: input.webroot };
  } else {
    if (input.standalone === false) {
      throw new ValidationError(
        `${CERT_OPERATION}: standalone=false requires a webroot`,
      );
    }
    challenge = { kind: 'standalone' };
  }

  return {
    domains,
    email: email || undefined,
    challenge,
    certName: input.cert_name ?? primary,
    renewBeforeDays: input.renew_before_days ?? 30,
    forceRenew: input.force_renew ?? false,
    staging: input.staging ?? false,
    extraArgs: input.extra_args ?? [],
    state,
  };
}
