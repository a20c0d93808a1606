import { describe, it, expect } from '@jest/globals';
import { decideCertificate } from '../../src/certbot/decide.js';
import {
  normalizeCertificateRequest,
  type RawCertificateRequest,
} from '../../src/certbot/request.js';

const NOW = new Date('2026-06-01T12:00:00.000Z');
const DAY = 24 * 60 * 60 * 1000;
const inDays = (d: number) => new Date(NOW.getTime() + d * DAY);

function request(extra: RawCertificateRequest = {}) {
  return normalizeCertificateRequest({
    domains: ['example.com', 'www.example.com'],
    email: 'admin@example.com',
    ...extra,
  });
}

describe('decideCertificate', () => {
  it('issues when nothing is stored, whatever the other flags say', () => {
    for (const extra of [{}, { force_renew: true }, { renew_before_days: 0 }]) {
      expect(decideCertificate(request(extra), { exists: false }, NOW)).toEqual({
        action: 'issue',
        reason: 'no certificate stored under "example.com"',
      });
    }
  });

  it('renews when forced, regardless of the expiry date', () => {
    for (const expiryDate of [inDays(365), inDays(1), inDays(-5), undefined]) {
      const decision = decideCertificate(
        request({ force_renew: true }),
        { exists: true, expiryDate },
        NOW,
      );
      expect(decision).toEqual({
        action: 'renew',
        reason: 'force_renew requested',
      });
    }
  });

  it('treats the renewal window as inclusive', () => {
    const decide = (d: number) =>
      decideCertificate(request(), { exists: true, expiryDate: inDays(d) }, NOW)
        .action;

    expect(decide(29)).toBe('renew');
    expect(decide(30)).toBe('renew');
    expect(decide(31)).toBe('noop');
  });

  it('reports the expiry in the reason', () => {
    expect(
      decideCertificate(request(), { exists: true, expiryDate: inDays(31) }, NOW),
    ).toEqual({ action: 'noop', reason: 'valid until 2026-07-02T12:00:00.000Z' });
    expect(
      decideCertificate(request(), { exists: true, expiryDate: inDays(10) }, NOW),
    ).toEqual({
      action: 'renew',
      reason: 'expires 2026-06-11T12:00:00.000Z, within 30 day(s)',
    });
  });

  it('with renew_before_days=0 renews only at or after the expiry instant', () => {
    const req = request({ renew_before_days: 0 });
    const at = (expiryDate: Date) =>
      decideCertificate(req, { exists: true, expiryDate }, NOW).action;

    expect(at(new Date(NOW.getTime() + 1))).toBe('noop');
    expect(at(NOW)).toBe('renew');
    expect(at(new Date(NOW.getTime() - 1))).toBe('renew');
  });

  it('renews when the stored expiry is unknown', () => {
    expect(decideCertificate(request(), { exists: true }, NOW)).toEqual({
      action: 'renew',
      reason: 'expiry date of "example.com" is unknown',
    });
  });

  it('renews when the stored certificate misses a requested domain', () => {
    expect(
      decideCertificate(
        request(),
        { exists: true, expiryDate: inDays(80), domains: ['example.com'] },
        NOW,
      ),
    ).toEqual({
      action: 'renew',
      reason: 'certificate "example.com" does not cover www.example.com',
    });
  });

  it('accepts a stored certificate that covers more than requested', () => {
    expect(
      decideCertificate(
        request(),
        {
          exists: true,
          expiryDate: inDays(80),
          domains: ['www.example.com', 'example.com', 'api.example.com'],
        },
        NOW,
      ).action,
    ).toBe('noop');
  });

  it('removes an existing certificate when absent and is idempotent otherwise', () => {
    const req = request({ state: 'absent' });
    expect(
      decideCertificate(req, { exists: true, expiryDate: inDays(3) }, NOW),
    ).toEqual({ action: 'remove', reason: 'certificate "example.com" exists' });
    expect(decideCertificate(req, { exists: false }, NOW)).toEqual({
      action: 'noop',
      reason: 'certificate "example.com" already absent',
    });
  });
});
