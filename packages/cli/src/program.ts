import { readFileSync } from 'fs';
import { dirname, resolve } from 'path';
import { fileURLToPath } from 'url';

import { TetherError } from '@tetherfs/errors';
import { LOG_LEVELS } from '@tetherfs/logging';
import { Command, Option } from 'commander';

import { CliCommands, type CommandOutput, type CoordOptions } from './commands.js';
import { createCliContext, type CliContext, type GlobalOptions } from './context.js';

const packagePath = resolve(dirname(fileURLToPath(import.meta.url)), '..', 'package.json');

function packageVersion(): string {
  const parsed: unknown = JSON.parse(readFileSync(packagePath, 'utf-8'));
  if (typeof parsed === 'object' && parsed !== null && 'version' in parsed) {
    return String(parsed.version);
  }
  return '0.0.0';
}

export interface ProgramOptions {
  output?: CommandOutput;
  /** Replaces configuration loading, for embedding and tests */
  createContext?: (options: GlobalOptions) => Promise<CliContext>;
  setExitCode?: (code: number) => void;
}

/**
 * Build the `tetherfs` command. Exit codes: 0 success, 1 `exists` found
 * nothing, 2 the command failed.
 */
export function createProgram(options: ProgramOptions = {}): Command {
  const output = options.output ?? process.stdout;
  const createContext = options.createContext ?? createCliContext;
  const setExitCode =
    options.setExitCode ??
    ((code: number) => {
      process.exitCode = code;
    });
  const program = new Command();

  const run =
    <A extends unknown[]>(command: (commands: CliCommands, ...args: A) => Promise<number>) =>
    async (...args: A): Promise<void> => {
      const context = await createContext(program.opts<GlobalOptions>());
      try {
        setExitCode(
          await command(
            new CliCommands({ registry: context.registry, logger: context.logger, output }),
            ...args
          )
        );
      } catch (error) {
        if (!(error instanceof TetherError)) {
          throw error;
        }
        context.logger.error(error.message, error, { code: error.code });
        setExitCode(2);
      } finally {
        await context.close();
      }
    };

  program
    .name('tetherfs')
    .description('Read and write files on local, UNC network and tethered device paths')
    .version(packageVersion())
    .option('-c, --config <path>', 'Path to configuration file')
    .addOption(
      new Option('-l, --log-level <level>', 'Log level').choices([...LOG_LEVELS])
    )
    .option('--device-mount <path>', 'Directory the device is mounted at');

  program
    .command('classify <path>')
    .description('Show the kind of a path and the directories it is made of')
    .action(run((commands: CliCommands, path: string) => commands.classify(path)));

  program
    .command('mkdir <path>')
    .description('Create a directory and its missing parents')
    .action(run((commands: CliCommands, path: string) => commands.mkdir(path)));

  program
    .command('cat <path>')
    .description('Print the contents of a file')
    .action(run((commands: CliCommands, path: string) => commands.cat(path)));

  program
    .command('cp <source> <destination>')
    .description('Copy a file between any two paths')
    .action(
      run((commands: CliCommands, source: string, destination: string) =>
        commands.cp(source, destination)
      )
    );

  program
    .command('exists <path>')
    .description('Check whether a file exists (exit code 1 when it does not)')
    .action(run((commands: CliCommands, path: string) => commands.exists(path)));

  program
    .command('coord <value>')
    .description('Format decimal degrees; put `--` before negative values (coord -- -45.5)')
    .option('--longitude', 'Value is a longitude')
    .addOption(
      new Option('-f, --format <format>', 'Output format')
        .choices(['ddmmff', 'ddmmss'])
        .default('ddmmff')
    )
    .action(
      run((commands: CliCommands, value: string, coordOptions: CoordOptions) =>
        commands.coord(value, coordOptions)
      )
    );

  return program;
}
