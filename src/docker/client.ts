import type { Logger } from '../command-runner.js';

/**
 * Settings of an existing container that the spec also declares. They
 * are read for reporting only; a difference never forces a recreate.
 */
export interface ContainerConfigSnapshot {
  restartPolicy?: string;
  network?: string;
  ports: string[];
  volumes: string[];
}

/**
 * What the host currently runs under a container name. A container that
 * does not exist is never running.
 */
export type ObservedContainer =
  | { exists: false; running: false }
  | {
      exists: true;
      running: boolean;
      runningImageId?: string;
      config: ContainerConfigSnapshot;
    };

/**
 * A read-only view of the container runtime. The interface is narrow so
 * the decision flow stays independent of how the runtime is reached.
 */
export interface DockerClient {
  verifyDocker(logger: Logger): Promise<void>;

  inspectContainer(name: string, logger: Logger): Promise<ObservedContainer>;

  imageId(image: string, logger: Logger): Promise<string | undefined>;
}
