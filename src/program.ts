import { Command, CommanderError, Option } from 'commander';
import {
    DEFAULT_PROGRAM,
    DEFAULT_STDERR_LINES,
    type DashboardOutput,
    formatError,
    InterruptedError,
    LOG_THRESHOLDS,
    logger,
    Multiplexer,
    type MultiplexerHooks,
    parseThreshold,
    serializeError,
    TerminalDashboard
} from '../engine/src/index.js';
import { resolveCommands } from './cli/commandFile.js';
import { SHELLS, writeCompletion } from './cli/completion.js';
import { MANUAL_FORMATS, writeManual } from './cli/manual.js';
import { parseCliOptions, parseCompletionOptions, parseManualOptions, toEngineConfig } from './cli/options.js';
import { codecByName, OUTPUT_FORMATS, supportedExtensions } from './formats/index.js';
import { VERSION } from './version.js';

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_INTERRUPTED = 130;

export interface CliIO {
    stdout: (text: string) => void;
    /** Receives the dashboard and diagnostics. */
    stderr: DashboardOutput;
}

const defaultIO: CliIO = {
    stdout: (text) => {
        process.stdout.write(text);
    },
    stderr: process.stderr
};

function collect(value: string, previous: string[]) {
    return [...previous, value];
}

export function buildProgram(io: CliIO = defaultIO, hooks: MultiplexerHooks = {}) {
    const program = new Command()
        .name('cmdmux')
        .description('Runs shell commands concurrently and shows their status live.')
        .version(VERSION)
        .enablePositionalOptions()
        .option('-e, --experimental', 'enable experimental flags (--stdout, --parallelism)', false)
        .addOption(
            new Option('--program <prefix>', 'program used to execute each command').default(DEFAULT_PROGRAM).env('CMDMUX_PROGRAM')
        )
        .option('--stderr <lines>', 'number of recent stderr lines shown per task', String(DEFAULT_STDERR_LINES))
        .addOption(
            new Option('--stdout <format>', 'print the captured stdout of every task as a structured result').choices(OUTPUT_FORMATS)
        )
        .option('-p, --parallelism <n>', 'maximum number of commands running at once')
        .option('-c, --command <cmd>', 'a command to execute (repeatable)', collect, [])
        .option('-f, --file <path>', `a command-list file, ${supportedExtensions().join(', ')} (repeatable)`, collect, [])
        .addOption(
            new Option('--log-level <level>', 'diagnostics written to stderr')
                .choices(LOG_THRESHOLDS)
                .default('warn')
                .env('CMDMUX_LOG_LEVEL')
        )
        .action(async (_opts: unknown, command: Command) => {
            const options = parseCliOptions(command.opts());
            const commands = await resolveCommands(options.command, options.file);
            const multiplexer = new Multiplexer(commands, toEngineConfig(options), {
                renderer: new TerminalDashboard(io.stderr),
                ...hooks
            });
            const result = await multiplexer.run();
            if (options.stdout !== undefined) {
                io.stdout(codecByName(options.stdout).stringify(result));
            }
        });

    program.hook('preAction', (root) => {
        logger.setThreshold(parseThreshold(root.opts<{ logLevel?: string }>().logLevel));
    });
    program.exitOverride();
    program.configureOutput({
        writeOut: (text) => io.stdout(text),
        writeErr: (text) => {
            io.stderr.write(text);
        }
    });

    program
        .command('man')
        .description('Renders the manual.')
        .requiredOption('-o, --out <dir>', 'output directory')
        .addOption(new Option('-f, --format <format>', 'manual format').choices(MANUAL_FORMATS).default('markdown'))
        .action(async (_opts: unknown, command: Command) => {
            const options = parseManualOptions(command.opts());
            const targets = await writeManual(program, options.out, options.format);
            logger.info('manual: written', { targets });
        });

    program
        .command('autocomplete')
        .description('Renders shell completion scripts.')
        .requiredOption('-o, --out <dir>', 'output directory')
        .addOption(new Option('-s, --shell <shell>', 'target shell').choices(SHELLS).makeOptionMandatory())
        .action(async (_opts: unknown, command: Command) => {
            const options = parseCompletionOptions(command.opts());
            const target = await writeCompletion(program, options.out, options.shell);
            logger.info('autocomplete: written', { target, shell: options.shell });
        });

    return program;
}

/** The single diagnostic line written for a failed run. */
export function diagnosticLine(error: unknown) {
    return `error: ${formatError(error)}\n`;
}

/** Parses `argv` (without the node and script entries), runs it and returns the exit code. */
export async function runCli(argv: readonly string[], io: CliIO = defaultIO, hooks: MultiplexerHooks = {}): Promise<number> {
    const program = buildProgram(io, hooks);
    try {
        await program.parseAsync([...argv], { from: 'user' });
        return EXIT_OK;
    } catch (error) {
        if (error instanceof CommanderError) {
            // commander has already printed its own message
            return error.exitCode === 0 ? EXIT_OK : EXIT_FAILURE;
        }
        logger.debug('cli: run failed', serializeError(error));
        io.stderr.write(diagnosticLine(error));
        return error instanceof InterruptedError ? EXIT_INTERRUPTED : EXIT_FAILURE;
    }
}
