/**
 * Certificate material a service is asked to switch to.
 */
export interface ReloadTarget {
  domain: string;
  certificateId: number;
  certificatePath: string;
  privateKeyPath: string;
  chainPath?: string;
  fullchainPath?: string;
}

/**
 * Returned by `renderConfig`; restores whatever the render step replaced.
 */
export interface RenderHandle {
  /** Paths written by the render step. */
  readonly paths: string[];
  rollback(): Promise<void>;
}

/**
 * The four operations the reloader drives a service through. Each throws on
 * failure; the reloader maps the failure to the step that raised it.
 */
export interface ManagedService {
  readonly name: string;
  renderConfig(target: ReloadTarget): Promise<RenderHandle>;
  /** Runs the service's own config check. Must not touch the running process. */
  validateConfig(): Promise<void>;
  /** Graceful reload, never a restart. */
  reload(): Promise<void>;
  /** Process is running and its ports accept connections. */
  probe(): Promise<void>;
}

export type RenderEntry =
  | {
      kind: 'file';
      path: string;
      /** `{{placeholder}}` template over the ReloadTarget fields. */
      template: string;
      /** Octal permission string, defaults to `644`. */
      mode?: string;
    }
  | {
      kind: 'link';
      path: string;
      /** `{{placeholder}}` template resolving to the link target. */
      target: string;
    };

/**
 * Declarative description of a command-driven service, as found in the
 * managed services definitions file.
 */
export interface ManagedServiceDefinition {
  name: string;
  render: RenderEntry[];
  /** argv lists run in order; the first non-zero exit fails validation. */
  validate: string[][];
  reload: string[][];
  /** Process names checked with `pgrep -x`. */
  processes: string[];
  host?: string;
  ports: number[];
  /** Ports probed but only logged when closed. */
  optionalPorts?: number[];
}
