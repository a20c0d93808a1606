import { describe, it, expect } from '@jest/globals';
import plugin, {
  dockerContainer,
  letsencryptCert,
  registerOperations,
  ReconcilerConfig,
  type Operation,
} from '../src/index.js';
import { memoryLogger, scriptedRunner } from './utils/runner.js';

describe('registerOperations', () => {
  it('registers both operations under their plan names', () => {
    const registry: Record<string, Operation> = {};

    registerOperations(registry);

    expect(Object.keys(registry).sort()).toEqual([
      'docker_container',
      'letsencrypt_cert',
    ]);
    expect(registry['letsencrypt_cert']).toBe(letsencryptCert);
    expect(registry['docker_container']).toBe(dockerContainer);
  });

  it('is also reachable from the default export', () => {
    expect(plugin.registerOperations).toBe(registerOperations);
  });
});

describe('operations', () => {
  it('letsencrypt_cert delegates to the certificate reconciler', async () => {
    const { logger } = memoryLogger();
    const { runner, calls } = scriptedRunner([
      { prefix: ['certbot', '--version'], result: { stdout: 'certbot 2.11.0' } },
    ]);
    const config = new ReconcilerConfig({
      certbotPath: 'certbot',
      opensslPath: 'openssl',
      letsencryptDir: '/nonexistent/reconcile-test',
      timeoutMs: 1000,
      dryRun: true,
    });

    const result = await letsencryptCert(
      { domain: 'example.com', email: 'ops@example.com' },
      { logger, runner, config },
    );

    expect(result.action).toBe('issue');
    expect(result.changed).toBe(true);
    expect(result.message).toBe(
      'would issue: no certificate stored under "example.com"',
    );
    expect(calls).toEqual([['certbot', '--version']]);
  });

  it('docker_container delegates to the container reconciler', async () => {
    const { logger } = memoryLogger();
    const { runner, calls } = scriptedRunner([
      { prefix: ['docker', 'version'], result: { stdout: '27.1.1' } },
      {
        prefix: ['docker', 'container', 'inspect'],
        result: { exitCode: 1, stderr: 'Error: No such container: gone' },
      },
    ]);
    const config = new ReconcilerConfig({
      dockerPath: 'docker',
      timeoutMs: 1000,
    });

    const result = await dockerContainer(
      { name: 'gone', state: 'absent' },
      { logger, runner, config },
    );

    expect(result).toEqual({
      changed: false,
      action: 'noop',
      message: 'noop: container "gone" already absent',
      commands: [],
    });
    expect(calls).toHaveLength(2);
  });
});
