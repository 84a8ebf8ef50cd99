import path from "node:path";
import type { ActivityReport, AnalysisOptions, AttendanceRow } from '../types';
import { analyseChatFiles } from '../analysis/activity-report';
import { loadAttendanceFiles, loadChatFiles } from './file-processor';
import { getDefaultOutputDir, writeReportOutputs } from './output';
import { formatNumber } from '../html/format.utils';
import { colorize, createTable, logHeader, logSuccess, logWarning, printRanking } from './cli.utils';

// ============================================================================
// ANALYSIS RUN
// ============================================================================

export type RunSettings = AnalysisOptions & {
    outDir?: string;
    encoding: string;
    sortByDate: boolean;
    csv: boolean;
    html: boolean;
    attendance?: string[];      // meeting participants exports (.csv)
};

/**
 * Loads, analyses and reports on the given transcripts. Shared by both CLI modes.
 */
export function runAnalysis(inputPaths: string[], settings: RunSettings): ActivityReport {
    logHeader("PARSING CHAT FILES");
    const files = loadChatFiles(inputPaths, { encoding: settings.encoding, sortByDate: settings.sortByDate });

    createTable(
        [
            { header: '#', width: 3, align: 'right' },
            { header: 'File', width: 48 },
            { header: 'Messages', width: 8, align: 'right' }
        ],
        files.map((file, index) => [(index + 1).toString(), file.fileName, formatNumber(file.records.length)])
    );
    logSuccess(`Parsed ${formatNumber(files.length)} file(s)`);

    let attendanceRows: AttendanceRow[] | undefined;
    if (settings.attendance && settings.attendance.length > 0) {
        logHeader("READING ATTENDANCE");
        attendanceRows = loadAttendanceFiles(settings.attendance, settings.encoding);
        logSuccess(`Read ${formatNumber(attendanceRows.length)} attendance row(s)`);
    }

    logHeader("COMPUTING ACTIVITY");
    const report = analyseChatFiles(files, {
        courseName: settings.courseName,
        sessionLabel: settings.sessionLabel,
        topN: settings.topN
    }, attendanceRows);

    if (report.records.length === 0) {
        logWarning("No chat messages found in the given files");
    } else {
        const title = `${settings.courseName} ${settings.sessionLabel}`.trim();
        printRanking(`Top ${settings.topN} Most Active Participants - ${title}`, report.ranking.mostActive);
        printRanking(`Top ${settings.topN} Most Silent Participants - ${title}`, report.ranking.mostSilent);
    }

    if (report.attendance) {
        createTable(
            [
                { header: 'Session', width: 8 },
                { header: 'Weekday', width: 10 },
                { header: 'Present', width: 8, align: 'right' }
            ],
            report.attendance.sessions.map(session => [session.label, session.day, formatNumber(session.participants.length)])
        );
    }

    logHeader("GENERATING OUTPUTS");
    const outDir = settings.outDir ? path.resolve(settings.outDir) : getDefaultOutputDir(inputPaths[0]);
    const written = writeReportOutputs(report, outDir, { csv: settings.csv, html: settings.html });

    console.log(`${colorize('Summary:', 'bright')}`);
    console.log(`  ${colorize('Files:', 'cyan')} ${formatNumber(report.files.length)}`);
    console.log(`  ${colorize('Messages:', 'cyan')} ${formatNumber(report.records.length)}`);
    console.log(`  ${colorize('Participants:', 'cyan')} ${formatNumber(report.speakers.length)}`);
    console.log();
    console.log(`${colorize('Output Files:', 'bright')}`);
    console.log(`  ${colorize('JSON Summary:', 'green')} ${written.json}`);
    if (written.csv) console.log(`  ${colorize('CSV Export:', 'green')} ${written.csv}`);
    if (written.html) console.log(`  ${colorize('HTML Report:', 'green')} ${written.html}`);
    console.log();

    logSuccess("Analysis completed successfully!");
    return report;
}
