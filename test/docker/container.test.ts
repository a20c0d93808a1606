import { describe, it, expect } from '@jest/globals';
import { reconcileContainer } from '../../src/docker/container.js';
import { ReconcilerConfig } from '../../src/plugin-config.js';
import {
  ExecutionError,
  ExecutionTimeout,
  ProbeError,
  ValidationError,
} from '../../src/errors.js';
import {
  memoryLogger,
  scriptedRunner,
  type ScriptedReply,
} from '../utils/runner.js';

function inspectOf(imageId: string, runningFlag = true): string {
  return JSON.stringify([
    {
      Image: imageId,
      State: { Running: runningFlag },
      HostConfig: {
        RestartPolicy: { Name: 'no', MaximumRetryCount: 0 },
        NetworkMode: 'bridge',
        PortBindings: {},
        Binds: null,
      },
    },
  ]);
}

const NO_CONTAINER: ScriptedReply = {
  prefix: ['docker', 'container', 'inspect'],
  result: { exitCode: 1, stderr: 'Error: No such container: app' },
};

function container(imageId: string, runningFlag = true): ScriptedReply {
  return {
    prefix: ['docker', 'container', 'inspect'],
    result: { stdout: inspectOf(imageId, runningFlag) },
  };
}

function image(id: string): ScriptedReply {
  return {
    prefix: ['docker', 'image', 'inspect'],
    result: { stdout: `${id}\n` },
  };
}

function setup(replies: ScriptedReply[], dryRun = false) {
  const { runner, calls } = scriptedRunner([
    { prefix: ['docker', 'version'], result: { stdout: '27.1.1' } },
    ...replies,
    { prefix: ['docker', 'pull'] },
    { prefix: ['docker', 'run'] },
    { prefix: ['docker', 'rm'] },
    { prefix: ['docker', 'start'] },
  ]);
  const { logger, out } = memoryLogger();
  const config = new ReconcilerConfig({
    dockerPath: 'docker',
    timeoutMs: 1000,
    dryRun,
  });
  return { runner, calls, logger, out, config };
}

const MUTATING = new Set(['pull', 'run', 'rm', 'start']);
const mutations = (calls: string[][]) =>
  calls.filter((c) => MUTATING.has(c[1] ?? ''));

describe('reconcileContainer', () => {
  it('pulls, then creates a missing container', async () => {
    const ctx = setup([image('sha256:new'), NO_CONTAINER]);

    const result = await reconcileContainer(
      { name: 'app', image: 'app:1', ports: '8080:80' },
      ctx,
    );

    expect(result).toEqual({
      changed: true,
      action: 'create',
      message: 'created: container "app" does not exist',
      commands: [
        ['docker', 'run', '-d', '--name', 'app', '-p', '8080:80', 'app:1'],
      ],
    });
    expect(ctx.calls).toEqual([
      ['docker', 'version', '--format', '{{.Server.Version}}'],
      ['docker', 'pull', 'app:1'],
      ['docker', 'image', 'inspect', '--format', '{{.Id}}', 'app:1'],
      ['docker', 'container', 'inspect', 'app'],
      ['docker', 'run', '-d', '--name', 'app', '-p', '8080:80', 'app:1'],
    ]);
  });

  it('recreates when the pulled image differs from the running one', async () => {
    const ctx = setup([image('sha256:new'), container('sha256:old')]);

    const result = await reconcileContainer({ name: 'app', image: 'app:1' }, ctx);

    expect(result.action).toBe('recreate');
    expect(result.message).toBe(
      'recreated: image changed from sha256:old to sha256:new',
    );
    expect(mutations(ctx.calls)).toEqual([
      ['docker', 'pull', 'app:1'],
      ['docker', 'rm', '-f', 'app'],
      ['docker', 'run', '-d', '--name', 'app', 'app:1'],
    ]);
  });

  it('is a noop when the image is unchanged and reports ignored drift', async () => {
    const ctx = setup([image('sha256:same'), container('sha256:same')]);

    const result = await reconcileContainer(
      { name: 'app', image: 'app:1', restart_policy: 'always' },
      ctx,
    );

    expect(result).toEqual({
      changed: false,
      action: 'noop',
      message:
        'noop: container "app" is up to date (drift not applied: restart_policy)',
      commands: [],
    });
    expect(mutations(ctx.calls)).toEqual([['docker', 'pull', 'app:1']]);
  });

  it('skips the pull and image comparison when pull is false', async () => {
    const ctx = setup([container('sha256:old')]);

    const result = await reconcileContainer(
      { name: 'app', image: 'app:1', pull: false },
      ctx,
    );

    expect(result.action).toBe('noop');
    expect(ctx.calls.some((c) => c[1] === 'image' || c[1] === 'pull')).toBe(
      false,
    );
  });

  it('starts a stopped container', async () => {
    const ctx = setup([image('sha256:same'), container('sha256:same', false)]);

    const result = await reconcileContainer({ name: 'app', image: 'app:1' }, ctx);

    expect(result).toMatchObject({
      changed: true,
      action: 'start',
      commands: [['docker', 'start', 'app']],
    });
  });

  it('removes an existing container when absent and never pulls', async () => {
    const ctx = setup([container('sha256:old')]);

    const result = await reconcileContainer({ name: 'app', state: 'absent' }, ctx);

    expect(result).toEqual({
      changed: true,
      action: 'remove',
      message: 'removed: container "app" exists',
      commands: [['docker', 'rm', '-f', 'app']],
    });
    expect(mutations(ctx.calls)).toEqual([['docker', 'rm', '-f', 'app']]);
  });

  it('is a noop when absent and already gone', async () => {
    const ctx = setup([NO_CONTAINER]);

    const result = await reconcileContainer({ name: 'app', state: 'absent' }, ctx);

    expect(result.action).toBe('noop');
    expect(result.changed).toBe(false);
    expect(mutations(ctx.calls)).toEqual([]);
  });

  it('dry run decides from local state and never mutates', async () => {
    const ctx = setup([image('sha256:new'), container('sha256:old')], true);

    const result = await reconcileContainer({ name: 'app', image: 'app:1' }, ctx);

    expect(result.changed).toBe(true);
    expect(result.action).toBe('recreate');
    expect(result.message).toBe(
      'would recreate: image changed from sha256:old to sha256:new',
    );
    expect(result.dryRun).toEqual({
      action: 'recreate',
      reason: 'image changed from sha256:old to sha256:new',
      commands: [
        ['docker', 'rm', '-f', 'app'],
        ['docker', 'run', '-d', '--name', 'app', 'app:1'],
      ],
    });
    expect(mutations(ctx.calls)).toEqual([]);
  });

  it('rejects invalid attributes before running anything', async () => {
    const ctx = setup([]);
    await expect(
      reconcileContainer({ name: 'app', image: 'app:1', ports: ['eighty'] }, ctx),
    ).rejects.toBeInstanceOf(ValidationError);
    expect(ctx.calls).toEqual([]);
  });

  it('surfaces a probe failure without acting', async () => {
    const ctx = setup([
      image('sha256:new'),
      {
        prefix: ['docker', 'container', 'inspect'],
        result: { exitCode: 1, stderr: 'permission denied' },
      },
    ]);
    await expect(
      reconcileContainer({ name: 'app', image: 'app:1' }, ctx),
    ).rejects.toBeInstanceOf(ProbeError);
    expect(mutations(ctx.calls)).toEqual([['docker', 'pull', 'app:1']]);
  });

  it('surfaces a failed pull with its stderr', async () => {
    const ctx = setup([
      {
        prefix: ['docker', 'pull'],
        result: { exitCode: 1, stderr: 'manifest unknown\n' },
      },
    ]);
    await expect(
      reconcileContainer({ name: 'app', image: 'app:404' }, ctx),
    ).rejects.toMatchObject({
      code: 'EEXECFAILED',
      stderr: 'manifest unknown',
      argv: ['docker', 'pull', 'app:404'],
    });
  });

  it('surfaces a hung docker run as ExecutionTimeout', async () => {
    const ctx = setup([
      image('sha256:new'),
      NO_CONTAINER,
      {
        prefix: ['docker', 'run'],
        result: { exitCode: -1, timedOut: true },
      },
    ]);
    let caught: unknown;
    try {
      await reconcileContainer({ name: 'app', image: 'app:1' }, ctx);
    } catch (e) {
      caught = e;
    }
    expect(caught).toBeInstanceOf(ExecutionTimeout);
    expect(caught).not.toBeInstanceOf(ExecutionError);
    expect(caught).toMatchObject({ code: 'EEXECTIMEOUT', timeoutMs: 1000 });
  });
});
