export { run, buildOptions, readPrompt, RUNNER_NAME } from './run.js';
export type { RunnerFlags, RunnerIO, ChatClient, Writer } from './run.js';
