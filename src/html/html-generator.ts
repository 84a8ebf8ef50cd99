
// ============================================================================
// HTML REPORT GENERATOR
// ============================================================================
import type { ActivityReport, AttendanceReport, ChatRecord, ParticipantNote, SessionSummary, SpeakerStats } from '../types';
import { barWidthPercent, escapeHtml, formatNumber, formatSessionDate, formatSpeakerLabel } from './format.utils';

export type ReportRenderOptions = {
    maxRecords?: number;        // rows shown in the chat data table
};

const DEFAULT_MAX_RECORDS = 500;

function renderBarChart(title: string, stats: SpeakerStats[], variant: 'active' | 'silent'): string {
    if (stats.length === 0) {
        return `
            <div class="chart-wrapper">
                <div class="chart-label">${escapeHtml(title)}</div>
                <p class="empty">No messages found.</p>
            </div>`;
    }

    const max = Math.max(...stats.map(s => s.messageCount));
    const rows = stats.map(s => `
                <div class="hbar-row">
                    <div class="hbar-name" title="${escapeHtml(formatSpeakerLabel(s))}">${escapeHtml(formatSpeakerLabel(s))}</div>
                    <div class="hbar-track">
                        <div class="hbar ${variant}" style="width: ${barWidthPercent(s.messageCount, max)}%"></div>
                        <span class="hbar-value">${formatNumber(s.messageCount)}</span>
                    </div>
                </div>`).join('');

    return `
            <div class="chart-wrapper">
                <div class="chart-label">${escapeHtml(title)}</div>
                <div class="hbar-chart">${rows}
                </div>
                <div class="axis-label">Number of Messages</div>
            </div>`;
}

function renderRankedList(stats: SpeakerStats[]): string {
    if (stats.length === 0) return '';
    const items = stats.map(s => `<li>${escapeHtml(formatSpeakerLabel(s))}</li>`).join('');
    return `<ol class="ranked-list">${items}</ol>`;
}

function renderSessions(sessions: SessionSummary[]): string {
    const rows = sessions.map(session => `
                    <tr>
                        <td>${escapeHtml(session.label)}</td>
                        <td>${escapeHtml(formatSessionDate(session.date))}</td>
                        <td>${escapeHtml(session.fileName)}</td>
                        <td class="num">${formatNumber(session.participants.length)}</td>
                        <td class="num">${formatNumber(session.totalMessages)}</td>
                    </tr>`).join('');

    return `
            <table>
                <thead>
                    <tr><th>Session</th><th>Date</th><th>File</th><th class="num">Participants</th><th class="num">Messages</th></tr>
                </thead>
                <tbody>${rows}
                </tbody>
            </table>`;
}

function renderNotes(notes: ParticipantNote[]): string {
    const rows = notes.map(note => `
                    <tr>
                        <td>${escapeHtml(formatSpeakerLabel(note))}</td>
                        <td>${escapeHtml(note.notes)}</td>
                    </tr>`).join('');

    return `
            <table>
                <thead><tr><th>Participant</th><th>Notes</th></tr></thead>
                <tbody>${rows}
                </tbody>
            </table>`;
}

function renderAttendance(attendance: AttendanceReport): string {
    const days = attendance.sessions
        .map(session => `${escapeHtml(session.label)} (${escapeHtml(session.day)}): ${formatNumber(session.participants.length)} present`)
        .join(', ');

    const rows = attendance.notes.map(note => `
                    <tr>
                        <td>${escapeHtml(note.name)}</td>
                        <td>${escapeHtml(note.attendance)}</td>
                        <td>${escapeHtml(note.notes)}</td>
                    </tr>`).join('');

    return `
        <div class="section">
            <div class="section-title">Attendance</div>
            <p class="empty">${days || 'No attendance rows.'}</p>
            <table>
                <thead><tr><th>Participant</th><th>Attendance</th><th>Notes</th></tr></thead>
                <tbody>${rows}
                </tbody>
            </table>
        </div>`;
}

function renderRecords(records: ChatRecord[], maxRecords: number): string {
    const shown = records.slice(0, maxRecords);
    const rows = shown.map(record => `
                    <tr>
                        <td>${escapeHtml(record.timestamp)}</td>
                        <td>${escapeHtml(record.role ?? '')}</td>
                        <td>${escapeHtml(record.speaker)}</td>
                        <td class="message">${escapeHtml(record.message)}</td>
                        <td>${escapeHtml(record.sourceFile)}</td>
                    </tr>`).join('');

    const more = records.length > shown.length
        ? `<p class="empty">Showing ${formatNumber(shown.length)} of ${formatNumber(records.length)} messages. The CSV export has all of them.</p>`
        : '';

    return `
            <table>
                <thead><tr><th>Time</th><th>Role</th><th>Speaker</th><th>Message</th><th>File</th></tr></thead>
                <tbody>${rows}
                </tbody>
            </table>
            ${more}`;
}

/**
 * Generates a standalone HTML dashboard for one analysis run
 */
export function generateActivityReport(report: ActivityReport, renderOptions: ReportRenderOptions = {}): string {
    const { courseName, sessionLabel, topN } = report.options;
    const heading = `${courseName} ${sessionLabel}`.trim();
    const maxRecords = renderOptions.maxRecords ?? DEFAULT_MAX_RECORDS;

    const body = report.records.length === 0
        ? `
        <div class="section">
            <p class="empty">No chat messages were found in the uploaded files.</p>
        </div>`
        : `
        <div class="section">
            <div class="section-title">Overview</div>
            <div class="stats-row">
                <div class="stat-box"><div class="stat-value">${formatNumber(report.files.length)}</div><div class="stat-label">Files</div></div>
                <div class="stat-box"><div class="stat-value">${formatNumber(report.records.length)}</div><div class="stat-label">Messages</div></div>
                <div class="stat-box"><div class="stat-value">${formatNumber(report.speakers.length)}</div><div class="stat-label">Participants</div></div>
            </div>
        </div>

        <div class="section">
            <div class="section-title">Top ${topN} Most Active Participants</div>
            ${renderBarChart(`Top ${topN} Most Active Participants - ${heading}`, report.ranking.mostActive, 'active')}
            ${renderRankedList(report.ranking.mostActive)}
        </div>

        <div class="section">
            <div class="section-title">Top ${topN} Most Silent Participants</div>
            ${renderBarChart(`Top ${topN} Most Silent Participants - ${heading}`, report.ranking.mostSilent, 'silent')}
            ${renderRankedList(report.ranking.mostSilent)}
        </div>

        <div class="section">
            <div class="section-title">Sessions</div>
            ${renderSessions(report.activity.sessions)}
            <p class="empty">Mean chat messages per participant per session: ${formatNumber(report.activity.meanChatCount)}.
            Mean reactions: ${formatNumber(report.activity.meanReactionCount)}.</p>
        </div>

        <div class="section">
            <div class="section-title">Participant Notes</div>
            ${renderNotes(report.participantNotes)}
        </div>

        <div class="section">
            <div class="section-title">Chat Data Summary</div>
            ${renderRecords(report.records, maxRecords)}
        </div>`;

    return `<!DOCTYPE html>
    <html lang="en">
    <head>
        <meta charset="UTF-8">
        <meta name="viewport" content="width=device-width, initial-scale=1.0">
        <title>Chat Activity - ${escapeHtml(heading)}</title>
        <style>
            * {
                margin: 0;
                padding: 0;
                box-sizing: border-box;
            }

            body {
                font-family: -apple-system, BlinkMacSystemFont, 'Segoe UI', Roboto, sans-serif;
                background: #f5f5f5;
                color: #333;
                line-height: 1.5;
            }

            .container {
                max-width: 1200px;
                margin: 0 auto;
                padding: 40px 20px;
            }

            .header {
                background: white;
                padding: 32px;
                margin-bottom: 32px;
                border-bottom: 3px solid #2563eb;
            }

            .header h1 {
                font-size: 28px;
                font-weight: 600;
                color: #111;
                margin-bottom: 8px;
            }

            .subtitle {
                color: #666;
                font-size: 16px;
            }

            .section {
                background: white;
                padding: 28px;
                margin-bottom: 24px;
                border: 1px solid #e5e5e5;
            }

            .section-title {
                font-size: 20px;
                font-weight: 600;
                color: #111;
                margin-bottom: 24px;
                padding-bottom: 12px;
                border-bottom: 1px solid #e5e5e5;
            }

            .stats-row {
                display: grid;
                grid-template-columns: repeat(auto-fit, minmax(180px, 1fr));
                gap: 20px;
            }

            .stat-box {
                padding: 20px;
                background: #fafafa;
                border: 1px solid #e5e5e5;
            }

            .stat-value {
                font-size: 32px;
                font-weight: 700;
                color: #2563eb;
                margin-bottom: 4px;
            }

            .stat-label {
                font-size: 13px;
                color: #666;
                text-transform: uppercase;
                letter-spacing: 0.5px;
                font-weight: 500;
            }

            .chart-wrapper {
                margin: 24px 0;
            }

            .chart-label {
                font-size: 15px;
                font-weight: 600;
                color: #333;
                margin-bottom: 16px;
            }

            .hbar-chart {
                background: #fafafa;
                padding: 16px;
                border: 1px solid #e5e5e5;
            }

            .hbar-row {
                display: flex;
                align-items: center;
                gap: 12px;
                margin-bottom: 6px;
            }

            .hbar-name {
                width: 240px;
                text-align: right;
                font-size: 13px;
                white-space: nowrap;
                overflow: hidden;
                text-overflow: ellipsis;
            }

            .hbar-track {
                flex: 1;
                display: flex;
                align-items: center;
                gap: 6px;
            }

            .hbar {
                height: 18px;
                min-width: 3px;
            }

            .hbar.active {
                background: #2563eb;
            }

            .hbar.silent {
                background: #f59e0b;
            }

            .hbar-value {
                font-size: 12px;
                color: #333;
            }

            .axis-label {
                text-align: center;
                font-size: 12px;
                color: #666;
                margin-top: 8px;
            }

            .ranked-list {
                padding-left: 24px;
                font-size: 14px;
            }

            table {
                width: 100%;
                border-collapse: collapse;
                font-size: 13px;
            }

            th, td {
                text-align: left;
                padding: 8px;
                border-bottom: 1px solid #e5e5e5;
                vertical-align: top;
            }

            th {
                background: #fafafa;
                font-weight: 600;
            }

            .num {
                text-align: right;
            }

            td.message {
                white-space: pre-wrap;
                word-break: break-word;
            }

            .empty {
                color: #666;
                font-size: 14px;
                margin-top: 12px;
            }
        </style>
    </head>
    <body>
        <div class="container">
        <div class="header">
            <h1>Chat Activity - ${escapeHtml(heading)}</h1>
            <div class="subtitle">Most active and most silent participants across ${formatNumber(report.files.length)} chat file(s)</div>
        </div>
        ${body}
        ${report.attendance ? renderAttendance(report.attendance) : ''}
        </div>
    </body>
    </html>`;
}
