/**
 * CLI Utilities for console output and prompts
 */

import * as readline from 'node:readline';
import type { SpeakerStats } from '../types';
import { formatNumber, formatSpeakerLabel } from '../html/format.utils';

// ============================================================================
// BRANDING
// ============================================================================

export const BANNER = `
╔════════════════════════════════════════════════════════════╗
║                                                            ║
║                  CHAT ACTIVITY ANALYSER                    ║
║        Most active & most silent chat participants         ║
║                                                            ║
╚════════════════════════════════════════════════════════════╝
`;

export const SUCCESS_ICON = "✓";
export const ERROR_ICON = "✗";
export const INFO_ICON = "ℹ";
export const WARNING_ICON = "⚠";

// ============================================================================
// COLOR UTILITIES
// ============================================================================

export const colors = {
    reset: '\x1b[0m',
    bright: '\x1b[1m',
    dim: '\x1b[2m',
    red: '\x1b[31m',
    green: '\x1b[32m',
    yellow: '\x1b[33m',
    blue: '\x1b[34m',
    magenta: '\x1b[35m',
    cyan: '\x1b[36m'
};

export function colorize(text: string, color: keyof typeof colors): string {
    return `${colors[color]}${text}${colors.reset}`;
}

// ============================================================================
// MESSAGE UTILITIES
// ============================================================================

export function logSuccess(message: string): void {
    console.log(`${colorize(SUCCESS_ICON, 'green')} ${colorize(message, 'green')}`);
}

export function logError(message: string): void {
    console.error(`${colorize(ERROR_ICON, 'red')} ${colorize(message, 'red')}`);
}

export function logInfo(message: string): void {
    console.log(`${colorize(INFO_ICON, 'blue')} ${colorize(message, 'blue')}`);
}

export function logWarning(message: string): void {
    console.log(`${colorize(WARNING_ICON, 'yellow')} ${colorize(message, 'yellow')}`);
}

export function logHeader(message: string): void {
    const line = '═'.repeat(message.length + 4);
    console.log(`\n${colorize(line, 'cyan')}`);
    console.log(`${colorize('  ' + message + '  ', 'cyan')}`);
    console.log(`${colorize(line, 'cyan')}\n`);
}

export function showError(message: string, details?: string): void {
    console.error();
    logError(message);
    if (details) {
        console.error(`${colorize('Details:', 'dim')} ${details}`);
    }
    console.error();
}

// ============================================================================
// TABLE UTILITIES
// ============================================================================

export interface TableColumn {
    header: string;
    width: number;
    align?: 'left' | 'right';
}

/**
 * Renders a box-drawn table. Cells wider than their column are cut with "...".
 */
export function formatTable(columns: TableColumn[], data: string[][]): string[] {
    const headerRow = columns.map(col => col.header.padEnd(col.width)).join(' │ ');
    const separator = columns.map(col => '─'.repeat(col.width)).join('─┼─');

    const rows = data.map(row => row.map((cell, i) => {
        const col = columns[i];
        const truncated = cell.length > col.width ? cell.substring(0, col.width - 3) + '...' : cell;
        return col.align === 'right' ? truncated.padStart(col.width) : truncated.padEnd(col.width);
    }).join(' │ '));

    return [
        `┌─${separator}─┐`,
        `│ ${headerRow} │`,
        `├─${separator}─┤`,
        ...rows.map(row => `│ ${row} │`),
        `└─${separator}─┘`
    ];
}

export function createTable(columns: TableColumn[], data: string[][]): void {
    for (const line of formatTable(columns, data)) {
        console.log(line);
    }
}

export function rankingTableRows(stats: SpeakerStats[]): string[][] {
    return stats.map((s, index) => [
        (index + 1).toString(),
        formatSpeakerLabel(s),
        formatNumber(s.messageCount)
    ]);
}

export function printRanking(title: string, stats: SpeakerStats[]): void {
    console.log(colorize(title, 'bright'));
    if (stats.length === 0) {
        logWarning("No messages found");
        return;
    }
    createTable(
        [
            { header: '#', width: 3, align: 'right' },
            { header: 'Participant', width: 40 },
            { header: 'Messages', width: 8, align: 'right' }
        ],
        rankingTableRows(stats)
    );
    console.log();
}

// ============================================================================
// INTERACTIVE CLI UTILITIES
// ============================================================================

export function createReadlineInterface(): readline.Interface {
    return readline.createInterface({
        input: process.stdin,
        output: process.stdout
    });
}

export function askQuestion(rl: readline.Interface, question: string): Promise<string> {
    return new Promise((resolve) => {
        rl.question(`${colorize('?', 'cyan')} ${question}`, (answer) => {
            resolve(answer.trim());
        });
    });
}

/**
 * Asks a question and falls back to a default on an empty answer
 */
export async function askWithDefault(rl: readline.Interface, question: string, fallback: string): Promise<string> {
    const answer = await askQuestion(rl, `${question} ${colorize(`(${fallback})`, 'dim')}: `);
    return answer || fallback;
}
