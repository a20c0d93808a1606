import { defaultRunner, execHostCmd, formatArgv } from '../command-runner.js';
import { ValidationError } from '../errors.js';
import { ReconcilerConfig } from '../plugin-config.js';
import type { ReconcileContext, ReconcileResult } from '../reconcile.js';
import { buildCertbotCommands, CertbotCliClient } from './cli-client.js';
import { decideCertificate, type CertificateAction } from './decide.js';
import { CERT_OPERATION, normalizeCertificateRequest } from './request.js';

const DONE: Record<CertificateAction, string> = {
  noop: 'noop',
  issue: 'requested',
  renew: 'renewed',
  remove: 'deleted',
};

/**
 * Bring one certificate to its declared state.
 *
 * Attributes are validated before anything touches the host, including
 * that a declared webroot exists. The live certificate is then probed
 * fresh, for existence only when it should be absent. A decision is
 * taken and, unless the call is a dry run, the certbot commands for it
 * are executed in order. Dry runs build the same commands and report
 * them without running.
 *
 * @param raw Operation attributes as declared in the host plan.
 * @param context Logger plus optional config, runner and clock.
 * @throws ValidationError, ProbeError, ExecutionError or ExecutionTimeout.
 */
export async function reconcileCertificate(
  raw: unknown,
  context: ReconcileContext,
): Promise<ReconcileResult<CertificateAction>> {
  const { logger } = context;
  const cfg = context.config ?? new ReconcilerConfig();
  const runner = context.runner ?? defaultRunner;
  const now = (context.now ?? (() => new Date()))();

  const request = normalizeCertificateRequest(raw);
  const timeoutMs = cfg.getTimeoutMs();
  logger.log(
    `${CERT_OPERATION}: cert="${request.certName}" ` +
      `domains=${request.domains.join(',')} state=${request.state} ` +
      `mode=${request.challenge.kind}`,
  );

  const client = new CertbotCliClient({
    certbotPath: cfg.getCertbotPath(),
    opensslPath: cfg.getOpensslPath(),
    timeoutMs,
    runner,
  });
  const { challenge } = request;
  if (
    request.state === 'present' &&
    challenge.kind === 'webroot' &&
    !client.hasWebroot(challenge.path)
  ) {
    throw new ValidationError(
      `${CERT_OPERATION}: webroot path ${challenge.path} does not exist`,
      'Create the directory or use the standalone challenge.',
    );
  }

  await client.verifyCertbot(logger);
  const livePath = cfg.getLivePath(request.certName);
  const observed =
    request.state === 'absent'
      ? await client.probeExistence(livePath, logger)
      : await client.probe(livePath, logger);

  const { action, reason } = decideCertificate(request, observed, now);
  const commands = buildCertbotCommands(
    request,
    action,
    cfg.getCertbotPath(),
  );
  const changed = action !== 'noop';
  logger.log(`${CERT_OPERATION}: decided ${action} (${reason})`);

  if (cfg.isDryRun()) {
    for (const argv of commands) {
      logger.log(`${CERT_OPERATION}: dry run, skipping ${formatArgv(argv)}`);
    }
    return {
      changed,
      action,
      message: `would ${action}: ${reason}`,
      commands,
      dryRun: { action, reason, commands },
    };
  }

  for (const argv of commands) {
    execHostCmd(argv, logger, { runner, timeoutMs });
  }

  const mode =
    action === 'issue' || action === 'renew'
      ? ` mode=${request.challenge.kind}`
      : '';
  return {
    changed,
    action,
    message: `${DONE[action]}${mode}: ${reason}`,
    commands,
  };
}
