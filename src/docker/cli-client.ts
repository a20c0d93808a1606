import { z } from 'zod';
import { ProbeError, ValidationError } from '../errors.js';
import {
  defaultRunner,
  queryHostCmd,
  type Logger,
  type Runner,
} from '../command-runner.js';
import { formatEnvEntry, parseEnvEntry } from '../normalize.js';
import type { ContainerAction } from './decide.js';
import type {
  ContainerConfigSnapshot,
  DockerClient,
  ObservedContainer,
} from './client.js';
import {
  CONTAINER_OPERATION,
  formatPort,
  formatVolume,
  parsePort,
  parseVolume,
  type ContainerSpec,
} from './spec.js';

/**
 * Build a docker pull argument vector for a given image.
 */
export function buildDockerPull(image: string, docker = 'docker'): string[] {
  return [docker, 'pull', image];
}

export function buildDockerRemove(name: string, docker = 'docker'): string[] {
  return [docker, 'rm', '-f', name];
}

export function buildDockerStart(name: string, docker = 'docker'): string[] {
  return [docker, 'start', name];
}

/**
 * Build a docker run argument vector. Options come in a fixed order:
 * detach, name, restart policy, network, working directory, env, ports,
 * volumes and extra args, then the image and the command tokens as
 * given. Every value is a separate element; nothing is quoted or joined.
 */
export function buildDockerRun(
  spec: ContainerSpec,
  docker = 'docker',
): string[] {
  if (spec.image === undefined) {
    throw new ValidationError(
      `${CONTAINER_OPERATION}: image is required to run a container`,
    );
  }

  const argv: string[] = [docker, 'run'];
  if (spec.detach) argv.push('-d');
  argv.push('--name', spec.name);
  if (spec.restartPolicy !== undefined) {
    argv.push('--restart', spec.restartPolicy);
  }
  if (spec.network !== undefined) argv.push('--network', spec.network);
  if (spec.workdir !== undefined) argv.push('-w', spec.workdir);
  for (const [k, v] of Object.entries(spec.env)) {
    argv.push('-e', formatEnvEntry(k, v));
  }
  for (const p of spec.ports) argv.push('-p', formatPort(p));
  for (const v of spec.volumes) argv.push('-v', formatVolume(v));
  argv.push(...spec.extraArgs);
  argv.push(spec.image);
  argv.push(...spec.command);
  return argv;
}

/**
 * Build the docker invocations for a decided action. `noop` yields no
 * command; `recreate` removes the old container before running anew.
 */
export function buildContainerCommands(
  spec: ContainerSpec,
  action: ContainerAction,
  docker = 'docker',
): string[][] {
  switch (action) {
    case 'noop':
      return [];
    case 'create':
      return [buildDockerRun(spec, docker)];
    case 'recreate':
      return [
        buildDockerRemove(spec.name, docker),
        buildDockerRun(spec, docker),
      ];
    case 'start':
      return [buildDockerStart(spec.name, docker)];
    case 'remove':
      return [buildDockerRemove(spec.name, docker)];
  }
}

function takeValue(argv: readonly string[], i: number, flag: string): string {
  const value = argv[i + 1];
  if (value === undefined) {
    throw new ValidationError(`docker run: ${flag} is missing its value`);
  }
  return value;
}

/**
 * Read a `docker run` vector produced by buildDockerRun back into a
 * spec, using the same grammar that validates declared attributes.
 *
 * Builder options are read until the first other token. With
 * `extraArgCount`, exactly that many tokens are then taken as extra args,
 * so split forms such as `--memory 512m` come back intact. Without it,
 * only tokens starting with `-` count as extra args. The next token is
 * the image and the rest is the command. Fields the vector does not carry
 * (pull, recreate flags) take their defaults.
 *
 * @param extraArgCount Number of extra args the vector was built with.
 */
export function parseDockerRun(
  argv: readonly string[],
  extraArgCount?: number,
): ContainerSpec {
  if (argv[1] !== 'run') {
    throw new ValidationError('Not a docker run argument vector.');
  }

  const spec: ContainerSpec = {
    name: '',
    image: undefined,
    state: 'present',
    pull: true,
    detach: false,
    restartPolicy: undefined,
    network: undefined,
    workdir: undefined,
    env: {},
    ports: [],
    volumes: [],
    command: [],
    extraArgs: [],
    recreate: false,
    recreateOnImageChange: true,
  };

  let i = 2;
  for (; i < argv.length; i++) {
    const tok = argv[i] ?? '';
    if (tok === '-d') {
      spec.detach = true;
    } else if (tok === '--name') {
      spec.name = takeValue(argv, i++, tok);
    } else if (tok === '--restart') {
      spec.restartPolicy = takeValue(argv, i++, tok);
    } else if (tok === '--network') {
      spec.network = takeValue(argv, i++, tok);
    } else if (tok === '-w') {
      spec.workdir = takeValue(argv, i++, tok);
    } else if (tok === '-e') {
      const [k, v] = parseEnvEntry(takeValue(argv, i++, tok));
      spec.env[k] = v;
    } else if (tok === '-p') {
      spec.ports.push(parsePort(takeValue(argv, i++, tok)));
    } else if (tok === '-v') {
      spec.volumes.push(parseVolume(takeValue(argv, i++, tok)));
    } else if (extraArgCount !== undefined) {
      spec.extraArgs = argv.slice(i, i + extraArgCount);
      i += extraArgCount;
      spec.image = argv[i];
      break;
    } else if (tok.startsWith('-')) {
      spec.extraArgs.push(tok);
    } else {
      spec.image = tok;
      break;
    }
  }

  if (spec.name.length === 0 || spec.image === undefined) {
    throw new ValidationError('docker run: --name and an image are required.');
  }
  spec.command = argv.slice(i + 1);
  return spec;
}

const inspectSchema = z.array(
  z.object({
    Image: z.string().optional(),
    State: z.object({ Running: z.boolean().optional() }).optional(),
    HostConfig: z
      .object({
        RestartPolicy: z
          .object({
            Name: z.string().optional(),
            MaximumRetryCount: z.number().optional(),
          })
          .optional(),
        NetworkMode: z.string().optional(),
        PortBindings: z
          .record(
            z
              .array(
                z.object({
                  HostIp: z.string().optional(),
                  HostPort: z.string().optional(),
                }),
              )
              .nullable(),
          )
          .nullable()
          .optional(),
        Binds: z.array(z.string()).nullable().optional(),
      })
      .optional(),
  }),
);

type InspectEntry = z.infer<typeof inspectSchema>[number];

function snapshotOf(entry: InspectEntry): ContainerConfigSnapshot {
  const hc = entry.HostConfig;
  const rp = hc?.RestartPolicy;
  let restartPolicy: string | undefined;
  if (rp?.Name) {
    restartPolicy =
      rp.Name === 'on-failure' && (rp.MaximumRetryCount ?? 0) > 0
        ? `on-failure:${rp.MaximumRetryCount}`
        : rp.Name;
  }

  const ports: string[] = [];
  for (const [key, bindings] of Object.entries(hc?.PortBindings ?? {})) {
    const [container = '', proto] = key.split('/');
    for (const b of bindings ?? []) {
      ports.push(
        formatPort({
          ip: b.HostIp ? b.HostIp : undefined,
          host: b.HostPort ?? '',
          container,
          protocol:
            proto === 'udp' || proto === 'sctp' || proto === 'tcp'
              ? proto
              : undefined,
        }),
      );
    }
  }

  return {
    restartPolicy,
    network: hc?.NetworkMode,
    ports,
    volumes: hc?.Binds ?? [],
  };
}

export interface DockerCliClientOptions {
  dockerPath?: string;
  timeoutMs?: number;
  runner?: Runner;
}

/**
 * A Docker client backed by the local Docker CLI. It only runs inspect
 * commands and delegates execution to a configurable runner.
 */
export class DockerCliClient implements DockerClient {
  private readonly docker: string;
  private readonly timeoutMs: number;
  private readonly runFn: Runner;

  constructor(opts: DockerCliClientOptions = {}) {
    this.docker = opts.dockerPath ?? 'docker';
    this.timeoutMs = opts.timeoutMs ?? 60_000;
    this.runFn = opts.runner ?? defaultRunner;
  }

  async verifyDocker(logger: Logger): Promise<void> {
    const res = queryHostCmd(
      [this.docker, 'version', '--format', '{{.Server.Version}}'],
      logger,
      { runner: this.runFn, timeoutMs: this.timeoutMs },
    );
    if (res.exitCode !== 0) {
      throw new ProbeError(
        'Docker not available.',
        res.stderr.trim() || 'Docker must be installed and on PATH.',
      );
    }
  }

  async inspectContainer(
    name: string,
    logger: Logger,
  ): Promise<ObservedContainer> {
    const res = queryHostCmd(
      [this.docker, 'container', 'inspect', name],
      logger,
      { runner: this.runFn, timeoutMs: this.timeoutMs },
    );
    if (res.exitCode !== 0) {
      if (/no such container/i.test(res.stderr)) {
        return { exists: false, running: false };
      }
      throw new ProbeError(
        `Failed to inspect container ${name}`,
        res.stderr.trim(),
      );
    }

    let json: unknown;
    try {
      json = JSON.parse(res.stdout);
    } catch (err: unknown) {
      throw new ProbeError(
        `Unreadable inspect output for container ${name}`,
        err instanceof Error ? err.message : undefined,
      );
    }
    const parsed = inspectSchema.safeParse(json);
    if (!parsed.success) {
      throw new ProbeError(
        `Unexpected inspect output for container ${name}`,
        parsed.error.message,
      );
    }

    const entry = parsed.data[0];
    if (entry === undefined) {
      return { exists: false, running: false };
    }
    return {
      exists: true,
      running: entry.State?.Running === true,
      runningImageId: entry.Image,
      config: snapshotOf(entry),
    };
  }

  /**
   * ID of the image a tag currently resolves to in the local store.
   *
   * @returns The ID, or `undefined` when the image is not present locally.
   */
  async imageId(image: string, logger: Logger): Promise<string | undefined> {
    const res = queryHostCmd(
      [this.docker, 'image', 'inspect', '--format', '{{.Id}}', image],
      logger,
      { runner: this.runFn, timeoutMs: this.timeoutMs },
    );
    if (res.exitCode !== 0) {
      if (/no such image/i.test(res.stderr)) return undefined;
      throw new ProbeError(
        `Failed to inspect image ${image}`,
        res.stderr.trim(),
      );
    }
    const id = res.stdout.trim();
    return id.length > 0 ? id : undefined;
  }
}
