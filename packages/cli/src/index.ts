export {
  CliCommands,
  type CommandDependencies,
  type CommandOutput,
  type CoordOptions,
  type CoordinateFormat,
} from './commands.js';
export { createCliContext, createTransport, type CliContext, type GlobalOptions } from './context.js';
export { createProgram, type ProgramOptions } from './program.js';
