import { Command } from 'commander';
import { ChatAnalysisError } from '../utils/errors';
import { DEFAULT_COURSE_NAME, DEFAULT_ENCODING, DEFAULT_SESSION_LABEL, DEFAULT_TOP_N } from '../utils/constants';
import { BANNER, logInfo, showError } from './cli.utils';
import { runAnalysis } from './analysis-runner';
import { runInteractiveCLI } from './interactive';

// ============================================================================
// CLI MAIN LOGIC
// ============================================================================

type ProgramOptions = {
    course: string;
    day: string;
    top: number;
    out?: string;
    encoding: string;
    sortByDate?: boolean;
    csv: boolean;
    html: boolean;
    interactive?: boolean;
    attendance?: string[];
};

export function createProgram(): Command {
    const program = new Command();

    program
        .name('chat-activity')
        .description('Rank the most active and most silent participants of chat transcripts')
        .version('1.0.0')
        .argument('[paths...]', 'chat transcript files (.txt) or directories containing them')
        .option('-c, --course <name>', 'course name shown in the report', DEFAULT_COURSE_NAME)
        .option('-d, --day <label>', 'session label shown in the report', DEFAULT_SESSION_LABEL)
        .option('-t, --top <n>', 'number of participants per ranking', (value: string) => Number(value), DEFAULT_TOP_N)
        .option('-o, --out <dir>', 'output directory (default: next to the first input)')
        .option('-e, --encoding <name>', 'text encoding of the transcripts', DEFAULT_ENCODING)
        .option('--sort-by-date', 'order files by the GMT<YYYYMMDD> date in their names')
        .option('--no-csv', 'skip the CSV export')
        .option('--no-html', 'skip the HTML report')
        .option('-a, --attendance <paths...>', 'meeting participants exports (.csv) or folders holding them; put after the chat paths')
        .option('-i, --interactive', 'prompt for every setting')
        .action(async (paths: string[], opts: ProgramOptions) => {
            if (opts.interactive || paths.length === 0) {
                await runInteractiveCLI();
                return;
            }

            console.log(BANNER);
            runAnalysis(paths, {
                courseName: opts.course,
                sessionLabel: opts.day,
                topN: opts.top,
                outDir: opts.out,
                encoding: opts.encoding,
                sortByDate: opts.sortByDate ?? false,
                csv: opts.csv,
                html: opts.html,
                attendance: opts.attendance
            });
        });

    return program;
}

/**
 * Main CLI execution function
 */
export async function runCLI(args: string[]): Promise<void> {
    try {
        await createProgram().parseAsync(args);
    } catch (error) {
        if (error instanceof ChatAnalysisError) {
            showError(error.message, `Error code: ${error.code}`);
            logInfo("Run with --help to see usage information.");
            process.exit(1);
        }
        throw error;
    }
}
