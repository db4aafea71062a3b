import type { CliOptions } from './types.js';

export const USAGE = [
    'Usage: tally [--workspace <dir>]',
    '',
    'Options:',
    '  -w, --workspace <dir>  Workspace directory (default: nearest with tally.yaml, else cwd)',
    '  -h, --help             Show this help',
    '  -v, --version          Show the version',
];

/**
 * Parse command-line arguments. Unknown arguments throw.
 */
export function parseCliArgs(args: readonly string[]): CliOptions {
    const options: CliOptions = { help: false, version: false };

    for (let i = 0; i < args.length; i++) {
        const arg = args[i];
        switch (arg) {
            case '-h':
            case '--help':
                options.help = true;
                break;
            case '-v':
            case '--version':
                options.version = true;
                break;
            case '-w':
            case '--workspace': {
                const value = args[i + 1];
                if (value === undefined || value.startsWith('-')) {
                    throw new Error(`${arg} needs a directory`);
                }
                options.workspace = value;
                i++;
                break;
            }
            default:
                throw new Error(`Unknown argument: ${arg}`);
        }
    }
    return options;
}
