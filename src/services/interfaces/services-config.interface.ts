/**
 * Configuration for the managed services the reloader drives.
 */
export interface ServicesConfig {
  /** JSON file with the managed service definitions. */
  definitionsPath: string;
  /** Names of the services to watch. Unknown names fail startup. */
  enabled: string[];
  /** Budget for each validate or reload command. */
  commandTimeoutMs: number;
  /** Budget for each port connection attempt. */
  probeTimeoutMs: number;
}
