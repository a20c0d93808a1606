import { z } from 'zod';
import { ValidationError } from '../errors.js';
import {
  commandInputSchema,
  envInputSchema,
  parseInput,
  type ResourceState,
  stateSchema,
  stringOrListSchema,
  toCommand,
  toEnv,
  toList,
} from '../normalize.js';

export const CONTAINER_OPERATION = 'docker_container';

/**
 * One `-p` publication: `[ip:]host:container[/protocol]`. Ports are kept
 * as strings so ranges such as `8000-8010` survive untouched.
 */
export interface PortMapping {
  ip?: string;
  host: string;
  container: string;
  protocol?: 'tcp' | 'udp' | 'sctp';
}

/**
 * One `-v` bind: `host:container[:opts]`. `host` may also be a named
 * volume.
 */
export interface VolumeMount {
  host: string;
  container: string;
  options?: string;
}

/**
 * Canonical container spec. `name` is the key the container is found by
 * on the host.
 */
export interface ContainerSpec {
  name: string;
  image?: string;
  state: ResourceState;
  pull: boolean;
  detach: boolean;
  restartPolicy?: string;
  network?: string;
  workdir?: string;
  env: Record<string, string>;
  ports: PortMapping[];
  volumes: VolumeMount[];
  command: string[];
  extraArgs: string[];
  recreate: boolean;
  recreateOnImageChange: boolean;
}

const PORT_RE =
  /^(?:(\d{1,3}(?:\.\d{1,3}){3}|\[[0-9A-Fa-f:.]+\]):)?(\d{1,5}(?:-\d{1,5})?):(\d{1,5}(?:-\d{1,5})?)(?:\/(tcp|udp|sctp))?$/;
const VOLUME_RE = /^([^:]+):(\/[^:]*)(?::([A-Za-z]+(?:,[A-Za-z]+)*))?$/;
const RESTART_RE = /^(no|always|unless-stopped|on-failure(:\d+)?)$/;

/**
 * @throws ValidationError unless the entry is `[ip:]host:container[/proto]`.
 */
export function parsePort(entry: string): PortMapping {
  const m = PORT_RE.exec(entry);
  if (!m) {
    throw new ValidationError(
      `Invalid port mapping "${entry}".`,
      'Expected host:container[/tcp|udp|sctp], optionally prefixed by an IP.',
    );
  }
  const [, ip, host, container, protocol] = m;
  const port: PortMapping = { host: host ?? '', container: container ?? '' };
  if (ip !== undefined) port.ip = ip;
  if (protocol === 'tcp' || protocol === 'udp' || protocol === 'sctp') {
    port.protocol = protocol;
  }
  return port;
}

/**
 * Render a mapping in the form docker's `-p` takes. Parsing the result
 * gives back the same mapping.
 */
export function formatPort(p: PortMapping): string {
  const ip = p.ip !== undefined ? `${p.ip}:` : '';
  const proto = p.protocol !== undefined ? `/${p.protocol}` : '';
  return `${ip}${p.host}:${p.container}${proto}`;
}

/**
 * @throws ValidationError unless the entry is `host:container[:opts]`
 * with an absolute container path.
 */
export function parseVolume(entry: string): VolumeMount {
  const m = VOLUME_RE.exec(entry);
  if (!m) {
    throw new ValidationError(
      `Invalid volume "${entry}".`,
      'Expected host:container[:opts] with an absolute container path.',
    );
  }
  const [, host, container, options] = m;
  const volume: VolumeMount = { host: host ?? '', container: container ?? '' };
  if (options !== undefined) volume.options = options;
  return volume;
}

/** `host:container[:opts]`, as docker's `-v` takes it. */
export function formatVolume(v: VolumeMount): string {
  const opts = v.options !== undefined ? `:${v.options}` : '';
  return `${v.host}:${v.container}${opts}`;
}

const rawContainerSchema = z
  .object({
    name: z.string().min(1).optional(),
    container: z.string().min(1).optional(),
    image: z.string().min(1).optional(),
    state: stateSchema.optional(),
    pull: z.boolean().optional(),
    detach: z.boolean().optional(),
    restart_policy: z.string().optional(),
    restart: z.string().optional(),
    network: z.string().min(1).optional(),
    workdir: z.string().min(1).optional(),
    env: envInputSchema.optional(),
    ports: stringOrListSchema.optional(),
    volumes: stringOrListSchema.optional(),
    command: commandInputSchema.optional(),
    extra_args: stringOrListSchema.optional(),
    recreate: z.boolean().optional(),
    recreate_on_image_change: z.boolean().optional(),
  })
  .strict();

export type RawContainerSpec = z.input<typeof rawContainerSchema>;

/**
 * Options buildDockerRun emits itself. Declaring one of them through
 * `extra_args` is rejected in favour of the dedicated attribute.
 */
export const RUN_FLAGS: readonly string[] = [
  '-d',
  '--name',
  '--restart',
  '--network',
  '-w',
  '-e',
  '-p',
  '-v',
];

function pickAlias(
  primary: string | undefined,
  alias: string | undefined,
  names: [string, string],
): string | undefined {
  if (primary !== undefined && alias !== undefined) {
    throw new ValidationError(
      `${CONTAINER_OPERATION}: both "${names[0]}" and "${names[1]}" given`,
      `Use "${names[0]}" only.`,
    );
  }
  return primary ?? alias;
}

/**
 * Validate raw operation attributes and produce a ContainerSpec.
 *
 * @throws ValidationError for unknown fields, a missing name, a missing
 * image while present, a malformed port, volume, env entry or restart
 * policy, or extra args that repeat an option the run builder emits.
 */
export function normalizeContainerSpec(raw: unknown): ContainerSpec {
  const input = parseInput(rawContainerSchema, raw, CONTAINER_OPERATION);

  const name = pickAlias(input.name, input.container, ['name', 'container']);
  if (name === undefined) {
    throw new ValidationError(`${CONTAINER_OPERATION} requires a name`);
  }

  const state = input.state ?? 'present';
  if (state === 'present' && input.image === undefined) {
    throw new ValidationError(
      `${CONTAINER_OPERATION} requires an image when state=present`,
    );
  }

  const restartPolicy = pickAlias(input.restart_policy, input.restart, [
    'restart_policy',
    'restart',
  ]);
  if (restartPolicy !== undefined && !RESTART_RE.test(restartPolicy)) {
    throw new ValidationError(
      `${CONTAINER_OPERATION}: invalid restart policy "${restartPolicy}"`,
      'Expected no, always, unless-stopped or on-failure[:N].',
    );
  }

  const extraArgs = toList(input.extra_args);
  const reserved = extraArgs.find((arg) => RUN_FLAGS.includes(arg));
  if (reserved !== undefined) {
    throw new ValidationError(
      `${CONTAINER_OPERATION}: "${reserved}" is not allowed in extra_args`,
      'Declare it through its own attribute instead.',
    );
  }

  return {
    name,
    image: input.image,
    state,
    pull: input.pull ?? true,
    detach: input.detach ?? true,
    restartPolicy,
    network: input.network,
    workdir: input.workdir,
    env: toEnv(input.env),
    ports: toList(input.ports).map(parsePort),
    volumes: toList(input.volumes).map(parseVolume),
    command: toCommand(input.command),
    extraArgs,
    recreate: input.recreate ?? false,
    recreateOnImageChange: input.recreate_on_image_change ?? true,
  };
}
