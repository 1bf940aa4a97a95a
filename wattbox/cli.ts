import { Command, CommanderError, Option } from 'commander';
import * as path from 'path';
import {
    CliOptions,
    DEFAULT_ACTION,
    DEFAULT_PASSWORD,
    DEFAULT_URL,
    DEFAULT_USERNAME,
    EnvSource,
    loadDotenvFile,
    normalizeBaseUrl,
    resolveConfig,
} from './config';
import { DescribeOptions, describeError } from './errors';
import { createConsoleReporter, Reporter } from './reporter';
import { OUTLET_ACTIONS, WattBoxConfig } from './types';
import { FetchLike, WattBoxClient } from './wattbox_client';

const HELP_EPILOG = `
Examples:
  $ wattbox --url http://172.16.19.184 --outlet 3 --action off
  $ wattbox -u http://172.16.19.184 -o 3 -a on --username admin --password pass

Environment Variables (also read from .env):
  WATTBOX_URL       Base URL of the WattBox (e.g., http://172.16.19.184)
  WATTBOX_USERNAME  Username for HTTP authentication
  WATTBOX_PASSWORD  Password for HTTP authentication
  WATTBOX_OUTLET    Default outlet number
  WATTBOX_ACTION    Default action (on/off/reset)`;

export interface RunOptions {
    env?: EnvSource;
    dotenvPath?: string;
    fetchImpl?: FetchLike;
    createReporter?: (verbose: boolean) => Reporter;
    writeOut?: (text: string) => void;
    writeErr?: (text: string) => void;
}

export function buildProgram(): Command {
    // No commander defaults here: an unset flag has to fall through to .env and the environment
    return new Command()
        .name('wattbox')
        .description('Control WattBox outlets via HTTP')
        .option('-u, --url <url>', `Base URL of the WattBox (default: ${DEFAULT_URL} or WATTBOX_URL)`)
        .option('--username <username>', `Username for HTTP authentication (default: ${DEFAULT_USERNAME} or WATTBOX_USERNAME)`)
        .option('--password <password>', `Password for HTTP authentication (default: ${DEFAULT_PASSWORD} or WATTBOX_PASSWORD)`)
        .option('-o, --outlet <number>', 'Outlet number (required, or set WATTBOX_OUTLET)')
        .addOption(
            new Option('-a, --action <action>', `Action to perform on the outlet (default: ${DEFAULT_ACTION} or WATTBOX_ACTION)`)
                .choices(OUTLET_ACTIONS),
        )
        .option('-v, --verbose', 'Enable verbose output')
        .addHelpText('after', HELP_EPILOG)
        .exitOverride();
}

/**
 * Runs one invocation and returns the process exit code.
 */
export async function runCli(args: string[], options: RunOptions = {}): Promise<number> {
    const program = buildProgram();
    if (options.writeOut || options.writeErr) {
        program.configureOutput({
            writeOut: options.writeOut ?? ((text) => process.stdout.write(text)),
            writeErr: options.writeErr ?? ((text) => process.stderr.write(text)),
        });
    }

    try {
        program.parse(args, { from: 'user' });
    } catch (error) {
        if (error instanceof CommanderError) {
            return error.exitCode;
        }
        throw error;
    }

    const cli = program.opts<CliOptions>();
    const createReporter = options.createReporter ?? createConsoleReporter;
    const fail = (reporter: Reporter, error: unknown, describe: DescribeOptions): number => {
        for (const line of describeError(error, describe)) {
            reporter.error(line);
        }
        return 1;
    };

    let config: WattBoxConfig;
    try {
        const dotenv = loadDotenvFile(options.dotenvPath ?? path.join(process.cwd(), '.env'));
        config = resolveConfig({ cli, dotenv, env: options.env ?? process.env });
    } catch (error) {
        // No resolved config yet, so the flags decide how much to print
        const verbose = cli.verbose ?? false;
        return fail(createReporter(verbose), error, { baseUrl: normalizeBaseUrl(cli.url ?? DEFAULT_URL), verbose });
    }

    const reporter = createReporter(config.verbose);
    const client = new WattBoxClient(config, { reporter, fetchImpl: options.fetchImpl });
    try {
        const result = await client.execute();
        reporter.info(`✓ Successfully executed '${result.action}' on outlet ${result.outlet}`);
        return 0;
    } catch (error) {
        return fail(reporter, error, { baseUrl: client.currentBaseUrl, verbose: config.verbose });
    }
}
