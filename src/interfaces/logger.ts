/**
 * Console verbosity levels
 */
export enum Verbosity {
  Quiet = 0,
  Normal = 1,
  Verbose = 2,
}

/**
 * Severity tags written to the console and the sync log
 */
export type LogLevel = 'INFO' | 'SUCCESS' | 'WARNING' | 'ERROR';
