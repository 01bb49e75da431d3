/**
 * oprun - run a declared operation as a tracked run
 */

export * from './errors';
export * from './logging';
export * from './config';
export * from './models';
export * from './command';
export * from './plugins';
export * from './deps';
export * from './supervisor';
export * from './orchestration';
export { CLI, CLIError, parseArgs, validateArgs, parseFlagArg, HELP_TEXT } from './cli/cli-interface';
