/**
 * Container model shared by the lifecycle controller and the engine adapter.
 */

export type MountType = 'bind' | 'volume';

/**
 * Bind mount or named volume attached to a container.
 */
export interface Mount {
  /** Host path (bind) or volume name (volume) */
  readonly source: string;
  readonly target: string;
  readonly type: MountType;
  readonly readOnly: boolean;
}

/**
 * Immutable description of a managed container. Built once by `parseContainerSpec`.
 */
export interface ContainerSpec {
  readonly image: string;
  /** Container name; required when `reuse` is set */
  readonly name?: string;
  /**
   * Container port (`"8161"` or `"53/udp"`) to requested host port. `0` lets the engine
   * assign a free port.
   */
  readonly ports: Readonly<Record<string, number>>;
  /** `KEY=VALUE` entries */
  readonly env: readonly string[];
  readonly mounts: readonly Mount[];
  /** Overrides the image command */
  readonly command?: readonly string[];
  /** Prefer an existing container with the same name over creating one */
  readonly reuse: boolean;
}

export interface ContainerState {
  /** Engine status string: created, running, exited, ... */
  status: string;
  running: boolean;
  exitCode: number;
  error: string;
  startedAt: string;
  finishedAt: string;
}

export interface PortBinding {
  hostIp: string;
  hostPort: number;
}

/**
 * Structured result of inspecting a container.
 */
export interface ContainerInspection {
  id: string;
  /** Name without the leading `/` */
  name: string;
  image: string;
  state: ContainerState;
  /** Published bindings keyed `<port>/<proto>` */
  ports: Record<string, PortBinding[]>;
}

export interface ContainerSummary {
  id: string;
  /** Names without the leading `/` */
  names: string[];
  image: string;
  state: string;
  status: string;
}

export interface ExecResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

export interface LogOptions {
  /** Number of lines from the end of the log */
  tail?: number;
  timestamps?: boolean;
}

/**
 * Lifecycle phases of a managed container.
 */
export type ContainerPhase =
  | 'unstarted'
  | 'locating'
  | 'starting'
  | 'stabilizing'
  | 'ready'
  | 'failed';

/**
 * Normalise a container port to its `<port>/<proto>` key.
 */
export function portKey(port: number | string): string {
  const value = String(port);
  return value.includes('/') ? value : `${value}/tcp`;
}
