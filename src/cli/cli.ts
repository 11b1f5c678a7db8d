/**
 * kops-gce CLI
 * Command-line surface for the cluster lifecycle orchestrator.
 */

import { Command, CommanderError } from 'commander';
import { readFileSync } from 'node:fs';
import { join } from 'node:path';
import { z } from 'zod';
import {
  createAppConfig,
  resolveNameBase,
  type AmbientDefaults,
  type CliOptions,
} from '../config/app-config';
import { DEFAULT_CLUSTER, DEFAULT_TIMEOUTS } from '../config/defaults';
import {
  createBootstrap,
  createContainer,
  type Bootstrap,
  type BootstrapOverrides,
  type DepsOverrides,
} from '../app/container';
import { ErrorCodes, UsageError, errorMessage, formatFatal, isProvisioningError } from '../lib/errors';
import { signalScope, using } from '../shared/scope';

export const COMMANDS = ['install', 'destroy', 'validate'] as const;
export type CommandName = (typeof COMMANDS)[number];

export const EXIT_SUCCESS = 0;
export const EXIT_FAILURE = 2;

const isCommandName = (value: string): value is CommandName =>
  COMMANDS.some((command) => command === value);

const packageJsonPath = __dirname.includes('dist')
  ? join(__dirname, '../../../package.json') // dist/src/cli/ -> root
  : join(__dirname, '../../package.json'); // src/cli/ -> root

function readVersion(): string {
  const parsed = z.object({ version: z.string() }).safeParse(JSON.parse(readFileSync(packageJsonPath, 'utf-8')));
  return parsed.success ? parsed.data.version : '0.0.0';
}

export interface CliIO {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
}

const processIO: CliIO = {
  stdout: (text) => process.stdout.write(text),
  stderr: (text) => process.stderr.write(text),
};

export interface RunOverrides extends BootstrapOverrides, DepsOverrides {
  env?: NodeJS.ProcessEnv;
  osType?: string;
  homeDir?: string;
}

/**
 * `-sc` is a two-letter short flag, which commander does not parse;
 * rewrite it to the long form before parsing.
 */
export function normalizeArgv(args: string[]): string[] {
  return args.map((arg) => (arg === '-sc' ? '--skip-credentials' : arg));
}

export function buildProgram(io: CliIO): Command {
  return new Command()
    .name('kops-gce')
    .description('Provision and tear down a self-managed kops cluster on Google Compute Engine')
    .version(readVersion())
    .argument('[command]', `command to run (${COMMANDS.join(', ')})`)
    .option('-c, --cluster-name <name>', `cluster identity base name (default: ${DEFAULT_CLUSTER.nameBase})`)
    .option('-z, --zone <zone>', 'compute zone (default: gcloud compute/zone)')
    .option('-p, --project-id <id>', 'project id (default: gcloud project)')
    .option('-s, --skip-credentials', 'skip the application-default login (also -sc)')
    .option('-w, --work-dir <path>', 'work directory (default: ~/.kops-gce/<cluster-name>)')
    .option('--log-level <level>', 'logging level: trace, debug, info, warn, error, silent')
    .addHelpText(
      'after',
      `

Commands:
  install     create the state store, fetch kops, create and validate the cluster,
              alias its context to <cluster-name> and grant you cluster-admin
  destroy     delete the cluster, its state store and the work directory
  validate    wait for an existing cluster to report ready

Environment Variables:
  KOPS_GCE_WORK_DIR            work directory root
  KOPS_GCE_NODE_COUNT          worker node count (default: ${DEFAULT_CLUSTER.nodeCount})
  KOPS_GCE_NODE_SIZE           worker machine type (default: ${DEFAULT_CLUSTER.nodeSize})
  KOPS_GCE_PLATFORM            force platform: linux, mac, cloudshell
  KOPS_GCE_SKIP_CREDENTIALS    true to skip the credential login
  LOG_LEVEL                    logging level
`,
    )
    .exitOverride()
    .configureOutput({
      writeOut: io.stdout,
      writeErr: io.stderr,
      outputError: (text, write) => write(`ERROR: ${text.replace(/^error: /, '')}`),
    });
}

/**
 * Fill project and zone from the active gcloud configuration when the
 * command line leaves them out. Missing values are reported by config
 * validation, so lookup failures are only logged here.
 */
async function resolveAmbient(
  options: CliOptions,
  command: CommandName,
  bootstrap: Bootstrap,
  timeout: number,
): Promise<AmbientDefaults> {
  const { cloud, logger } = bootstrap;
  const ambient: AmbientDefaults = {};

  const lookup = async (key: string): Promise<string | undefined> => {
    try {
      const result = await cloud.getConfigValue(key, { timeout });
      if (!result.ok) {
        logger.warn({ key, error: result.error }, 'Could not read gcloud default');
        return undefined;
      }
      return result.value;
    } catch (error) {
      logger.warn({ key, error: errorMessage(error) }, 'Could not read gcloud default');
      return undefined;
    }
  };

  if (!options.projectId) {
    ambient.projectId = await lookup('project');
  }
  if (!options.zone && command === 'install') {
    ambient.zone = await lookup('compute/zone');
  }
  return ambient;
}

/**
 * Run the CLI and resolve with the process exit code
 */
export async function run(
  argv: string[],
  io: CliIO = processIO,
  overrides: RunOverrides = {},
): Promise<number> {
  const program = buildProgram(io);

  try {
    program.parse(normalizeArgv(argv), { from: 'user' });
  } catch (error) {
    if (error instanceof CommanderError) {
      const informational = ['commander.helpDisplayed', 'commander.version', 'commander.help'];
      return informational.includes(error.code) ? EXIT_SUCCESS : EXIT_FAILURE;
    }
    throw error;
  }

  const [commandArg] = program.args;
  if (!commandArg) {
    io.stderr(`${formatFatal(new UsageError('command not supplied', ErrorCodes.COMMAND_NOT_SUPPLIED))}\n`);
    return EXIT_FAILURE;
  }
  if (!isCommandName(commandArg)) {
    io.stderr(`${formatFatal(new UsageError(`invalid command '${commandArg}'`))}\n`);
    io.stderr(program.helpInformation());
    return EXIT_FAILURE;
  }

  const options = program.opts<CliOptions>();
  const env = overrides.env ?? process.env;
  const bootstrap = createBootstrap(overrides, options.logLevel ?? env.LOG_LEVEL);
  const { logger } = bootstrap;

  try {
    const ambient = await resolveAmbient(options, commandArg, bootstrap, DEFAULT_TIMEOUTS.ambientLookup);
    const config = createAppConfig({
      options,
      env,
      ambient,
      osType: overrides.osType ?? process.platform,
      homeDir: overrides.homeDir,
    });

    logger.info(
      {
        command: commandArg,
        cluster: config.identity.fullyQualifiedName,
        store: config.store.uri,
        workDir: config.workDir.root,
      },
      `Running ${commandArg} for ${resolveNameBase(options)}`,
    );

    const report = await using(signalScope(), async ({ controller }) => {
      const signal = overrides.signal ?? controller.signal;
      const { lifecycle } = createContainer(config, bootstrap, { ...overrides, signal });
      switch (commandArg) {
        case 'install':
          return lifecycle.install();
        case 'destroy':
          return lifecycle.destroy();
        case 'validate':
          return lifecycle.validate();
      }
    });

    logger.info({ report }, `${commandArg} completed`);
    io.stdout(`${commandArg} completed for ${config.identity.fullyQualifiedName}\n`);
    return EXIT_SUCCESS;
  } catch (error) {
    logger.error(
      isProvisioningError(error) ? { error: error.toJSON() } : { error: errorMessage(error) },
      `${commandArg} failed`,
    );
    io.stderr(`${formatFatal(error)}\n`);
    return EXIT_FAILURE;
  }
}
