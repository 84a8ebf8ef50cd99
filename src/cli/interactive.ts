import { DEFAULT_COURSE_NAME, DEFAULT_ENCODING, DEFAULT_SESSION_LABEL, DEFAULT_TOP_N } from '../utils/constants';
import { ChatAnalysisError } from '../utils/errors';
import {
    BANNER,
    askQuestion,
    askWithDefault,
    colorize,
    createReadlineInterface,
    logError,
    logInfo,
    showError
} from './cli.utils';
import { runAnalysis } from './analysis-runner';

// ============================================================================
// INTERACTIVE CLI MAIN LOGIC
// ============================================================================

/**
 * Prompts for the transcript paths and report settings, then runs one analysis
 */
export async function runInteractiveCLI(): Promise<void> {
    const rl = createReadlineInterface();

    try {
        console.log(BANNER);
        logInfo("Welcome to the Chat Activity Analyser interactive mode!");
        logInfo("Point it at one or more chat transcripts (.txt) or a folder holding them.");
        console.log();

        const pathsAnswer = await askQuestion(rl, "Chat files or folder (separate several with commas): ");
        const inputPaths = pathsAnswer.split(',').map(p => p.trim()).filter(Boolean);
        if (inputPaths.length === 0) {
            logError("No chat files given.");
            return;
        }

        const courseName = await askWithDefault(rl, "Course name", DEFAULT_COURSE_NAME);
        const sessionLabel = await askWithDefault(rl, "Day", DEFAULT_SESSION_LABEL);
        const topN = Number(await askWithDefault(rl, "Participants per ranking", String(DEFAULT_TOP_N)));
        const sortAnswer = await askWithDefault(rl, "Order files by the date in their names? (y/n)", "n");
        const attendanceAnswer = await askQuestion(rl, "Attendance exports (.csv), optional (separate several with commas): ");

        runAnalysis(inputPaths, {
            courseName,
            sessionLabel,
            topN,
            encoding: DEFAULT_ENCODING,
            sortByDate: sortAnswer.toLowerCase().startsWith('y'),
            csv: true,
            html: true,
            attendance: attendanceAnswer.split(',').map(p => p.trim()).filter(Boolean)
        });

        console.log(`\n${colorize('Open the HTML report in your browser to see the charts.', 'dim')}`);
    } catch (error) {
        if (!(error instanceof ChatAnalysisError)) {
            throw error;
        }
        showError(error.message, `Error code: ${error.code}`);
        process.exitCode = 1;
    } finally {
        rl.close();
    }
}
