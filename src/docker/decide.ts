import type { Decision } from '../reconcile.js';
import type { ObservedContainer } from './client.js';
import {
  formatPort,
  formatVolume,
  parsePort,
  type ContainerSpec,
  type PortMapping,
} from './spec.js';

export type ContainerAction =
  | 'noop'
  | 'create'
  | 'recreate'
  | 'start'
  | 'remove';

/**
 * Decide what to do with a container. Pure and total.
 *
 * An explicit `recreate` wins over everything else. Otherwise only a
 * change of image ID recreates, and only while recreateOnImageChange is
 * on and a pulled image ID is known. Drift in restart policy, network,
 * ports or volumes never triggers a recreate.
 *
 * @param pulledImageId ID the image tag resolves to after pulling, if any.
 */
export function decideContainer(
  spec: ContainerSpec,
  observed: ObservedContainer,
  pulledImageId?: string,
): Decision<ContainerAction> {
  const name = spec.name;

  if (spec.state === 'absent') {
    return observed.exists
      ? { action: 'remove', reason: `container "${name}" exists` }
      : { action: 'noop', reason: `container "${name}" already absent` };
  }

  if (!observed.exists) {
    return { action: 'create', reason: `container "${name}" does not exist` };
  }

  if (spec.recreate) {
    return { action: 'recreate', reason: 'recreate requested' };
  }

  if (
    spec.recreateOnImageChange &&
    pulledImageId !== undefined &&
    pulledImageId !== observed.runningImageId
  ) {
    return {
      action: 'recreate',
      reason:
        `image changed from ${observed.runningImageId ?? '(unknown)'} ` +
        `to ${pulledImageId}`,
    };
  }

  if (!observed.running) {
    return { action: 'start', reason: `container "${name}" is stopped` };
  }

  return { action: 'noop', reason: `container "${name}" is up to date` };
}

/**
 * Port string with the defaults docker applies spelled out, so that
 * `8080:80` and `0.0.0.0:8080:80/tcp` compare equal. Entries the
 * grammar does not accept are compared verbatim.
 */
function canonicalPort(entry: string): string {
  let p: PortMapping;
  try {
    p = parsePort(entry);
  } catch {
    return entry;
  }
  return formatPort({
    ip: p.ip === '0.0.0.0' ? undefined : p.ip,
    host: p.host,
    container: p.container,
    protocol: p.protocol ?? 'tcp',
  });
}

function sameSet(a: string[], b: string[]): boolean {
  const x = [...a].sort();
  const y = [...b].sort();
  return x.length === y.length && x.every((v, i) => v === y[i]);
}

/**
 * Names of declared settings that differ from the running container.
 * Reported to the caller only; see decideContainer.
 */
export function describeDrift(
  spec: ContainerSpec,
  observed: ObservedContainer,
): string[] {
  if (!observed.exists) return [];
  const cfg = observed.config;
  const drift: string[] = [];

  if ((spec.restartPolicy ?? 'no') !== (cfg.restartPolicy ?? 'no')) {
    drift.push('restart_policy');
  }
  if (spec.network !== undefined && spec.network !== cfg.network) {
    drift.push('network');
  }
  const wantPorts = spec.ports.map((p) => canonicalPort(formatPort(p)));
  if (!sameSet(wantPorts, cfg.ports.map(canonicalPort))) {
    drift.push('ports');
  }
  if (!sameSet(spec.volumes.map(formatVolume), cfg.volumes)) {
    drift.push('volumes');
  }
  return drift;
}
