import { defaultRunner, execHostCmd, formatArgv } from '../command-runner.js';
import { ReconcilerConfig } from '../plugin-config.js';
import type { ReconcileContext, ReconcileResult } from '../reconcile.js';
import {
  buildContainerCommands,
  buildDockerPull,
  DockerCliClient,
} from './cli-client.js';
import type { DockerClient } from './client.js';
import {
  decideContainer,
  describeDrift,
  type ContainerAction,
} from './decide.js';
import { CONTAINER_OPERATION, normalizeContainerSpec } from './spec.js';

const DONE: Record<ContainerAction, string> = {
  noop: 'noop',
  create: 'created',
  recreate: 'recreated',
  start: 'started',
  remove: 'removed',
};

export interface ContainerContext extends ReconcileContext {
  /**
   * Runtime view used for probing. Defaults to a DockerCliClient on the
   * context's runner.
   */
  client?: DockerClient;
}

/**
 * Bring one container to its declared state.
 *
 * Outside dry runs a declared `pull` is executed first, so the image ID
 * compared against the running container is the freshly pulled one. A
 * dry run never pulls: it compares against the image currently in the
 * local store instead. The container is then probed, a decision is taken
 * and the docker commands for it are executed in order.
 *
 * @param raw Operation attributes as declared in the host plan.
 * @param context Logger plus optional config, runner and client.
 * @throws ValidationError, ProbeError, ExecutionError or ExecutionTimeout.
 */
export async function reconcileContainer(
  raw: unknown,
  context: ContainerContext,
): Promise<ReconcileResult<ContainerAction>> {
  const { logger } = context;
  const cfg = context.config ?? new ReconcilerConfig();
  const runner = context.runner ?? defaultRunner;

  const spec = normalizeContainerSpec(raw);
  const timeoutMs = cfg.getTimeoutMs();
  const docker = cfg.getDockerPath();
  const dryRun = cfg.isDryRun();
  logger.log(
    `${CONTAINER_OPERATION}: name="${spec.name}" ` +
      `image=${spec.image ?? '(none)'} state=${spec.state}`,
  );

  const client =
    context.client ??
    new DockerCliClient({ dockerPath: docker, timeoutMs, runner });
  await client.verifyDocker(logger);

  let pulledImageId: string | undefined;
  if (spec.state === 'present' && spec.pull && spec.image !== undefined) {
    if (dryRun) {
      logger.log(`${CONTAINER_OPERATION}: dry run, not pulling ${spec.image}`);
    } else {
      execHostCmd(buildDockerPull(spec.image, docker), logger, {
        runner,
        timeoutMs,
      });
    }
    pulledImageId = await client.imageId(spec.image, logger);
  }

  const observed = await client.inspectContainer(spec.name, logger);
  const { action, reason } = decideContainer(spec, observed, pulledImageId);
  const commands = buildContainerCommands(spec, action, docker);
  const changed = action !== 'noop';
  logger.log(`${CONTAINER_OPERATION}: decided ${action} (${reason})`);

  const drift =
    action === 'noop' || action === 'start'
      ? describeDrift(spec, observed)
      : [];
  const note =
    drift.length > 0 ? ` (drift not applied: ${drift.join(', ')})` : '';
  if (note.length > 0) {
    logger.log(`${CONTAINER_OPERATION}:${note}`);
  }

  if (dryRun) {
    for (const argv of commands) {
      logger.log(
        `${CONTAINER_OPERATION}: dry run, skipping ${formatArgv(argv)}`,
      );
    }
    return {
      changed,
      action,
      message: `would ${action}: ${reason}${note}`,
      commands,
      dryRun: { action, reason, commands },
    };
  }

  for (const argv of commands) {
    execHostCmd(argv, logger, { runner, timeoutMs });
  }

  return {
    changed,
    action,
    message: `${DONE[action]}: ${reason}${note}`,
    commands,
  };
}
