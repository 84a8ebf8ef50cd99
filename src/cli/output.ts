import fs from "node:fs";
import path from "node:path";
import type { ActivityReport } from '../types';
import { generateActivityReport } from '../html/html-generator';
import { recordsToCsv } from '../utils/csv.utils';
import { CSV_FILE_NAME, HTML_FILE_NAME, JSON_FILE_NAME } from '../utils/constants';

// ============================================================================
// OUTPUT UTILITIES
// ============================================================================

export type OutputSelection = {
    csv: boolean;
    html: boolean;
};

export type WrittenOutputs = {
    json: string;
    csv?: string;
    html?: string;
};

/**
 * Default output directory: the input directory itself, or the folder holding the input file
 */
export function getDefaultOutputDir(inputPath: string): string {
    const absolutePath = path.resolve(inputPath);
    if (fs.existsSync(absolutePath) && fs.statSync(absolutePath).isDirectory()) {
        return absolutePath;
    }
    return path.dirname(absolutePath);
}

/**
 * The JSON summary leaves out the records themselves; those go to the CSV export
 */
export function buildJsonSummary(report: ActivityReport) {
    return {
        courseName: report.options.courseName,
        sessionLabel: report.options.sessionLabel,
        topN: report.options.topN,
        files: report.files,
        totalMessages: report.records.length,
        speakers: report.speakers,
        mostActive: report.ranking.mostActive,
        mostSilent: report.ranking.mostSilent,
        sessions: report.activity.sessions,
        meanChatCount: report.activity.meanChatCount,
        meanReactionCount: report.activity.meanReactionCount,
        participantNotes: report.participantNotes,
        attendance: report.attendance
    };
}

export function writeReportOutputs(report: ActivityReport, outDir: string, selection: OutputSelection): WrittenOutputs {
    fs.mkdirSync(outDir, { recursive: true });

    const json = path.join(outDir, JSON_FILE_NAME);
    fs.writeFileSync(json, JSON.stringify(buildJsonSummary(report), null, 2), "utf8");
    const written: WrittenOutputs = { json };

    if (selection.csv) {
        written.csv = path.join(outDir, CSV_FILE_NAME);
        fs.writeFileSync(written.csv, recordsToCsv(report.records), "utf8");
    }

    if (selection.html) {
        written.html = path.join(outDir, HTML_FILE_NAME);
        fs.writeFileSync(written.html, generateActivityReport(report), "utf8");
    }

    return written;
}
