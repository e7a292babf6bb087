export { run, defaultOutputPath, USAGE } from './cli';
export type { CliIO } from './cli';
