import { reconcileCertificate } from './certbot/certificate.js';
import type { CertificateAction } from './certbot/decide.js';
import { CERT_OPERATION } from './certbot/request.js';
import {
  reconcileContainer,
  type ContainerContext,
} from './docker/container.js';
import type { ContainerAction } from './docker/decide.js';
import { CONTAINER_OPERATION } from './docker/spec.js';
import type { ReconcileContext, ReconcileResult } from './reconcile.js';

export { ReconcilerConfig } from './plugin-config.js';
export type { ReconcilerPluginConfig } from './plugin-config.js';
export {
  ExecutionError,
  ExecutionTimeout,
  ProbeError,
  ValidationError,
} from './errors.js';
export { defaultRunner } from './command-runner.js';
export type { CommandResult, Logger, Runner } from './command-runner.js';
export type {
  Decision,
  DryRunReport,
  ReconcileContext,
  ReconcileResult,
} from './reconcile.js';
export { normalizeCertificateRequest } from './certbot/request.js';
export type { CertificateRequest, Challenge } from './certbot/request.js';
export { decideCertificate } from './certbot/decide.js';
export type {
  CertificateAction,
  ObservedCertificate,
} from './certbot/decide.js';
export {
  buildCertbotCommands,
  CertbotCliClient,
} from './certbot/cli-client.js';
export { normalizeContainerSpec } from './docker/spec.js';
export type { ContainerSpec, PortMapping, VolumeMount } from './docker/spec.js';
export { decideContainer, describeDrift } from './docker/decide.js';
export type { ContainerAction } from './docker/decide.js';
export {
  buildContainerCommands,
  DockerCliClient,
  parseDockerRun,
} from './docker/cli-client.js';
export type { DockerClient, ObservedContainer } from './docker/client.js';
export type { ContainerContext } from './docker/container.js';
export { reconcileCertificate, reconcileContainer };

/**
 * An operation as a host sees it: declared attributes in, result out.
 */
export type Operation = (
  raw: unknown,
  context: ReconcileContext,
) => Promise<ReconcileResult<string>>;

/**
 * `letsencrypt_cert` operation: issue, renew or delete a certificate with
 * certbot.
 *
 * @param spec Declared attributes from the host plan.
 * @param context Logger plus optional config, runner and clock.
 */
export async function letsencryptCert(
  spec: unknown,
  context: ReconcileContext,
): Promise<ReconcileResult<CertificateAction>> {
  return reconcileCertificate(spec, context);
}

/**
 * `docker_container` operation: create, recreate, start or remove a
 * container with the docker CLI.
 *
 * @param spec Declared attributes from the host plan.
 * @param context Logger plus optional config, runner and client.
 */
export async function dockerContainer(
  spec: unknown,
  context: ContainerContext,
): Promise<ReconcileResult<ContainerAction>> {
  return reconcileContainer(spec, context);
}

/**
 * Register both operations under the names plans refer to them by.
 */
export function registerOperations(registry: Record<string, Operation>): void {
  registry[CERT_OPERATION] = letsencryptCert;
  registry[CONTAINER_OPERATION] = dockerContainer;
}

// noinspection JSUnusedGlobalSymbols
export default { letsencryptCert, dockerContainer, registerOperations };
