// ============================================================================
// FORMATTING FUNCTIONS
// ============================================================================

/**
 * Formats a number with commas for better readability
 */
export function formatNumber(num: number): string {
    return num.toLocaleString('en-US');
}

export function escapeHtml(text: string): string {
    return text
        .replace(/&/g, '&amp;')
        .replace(/</g, '&lt;')
        .replace(/>/g, '&gt;')
        .replace(/"/g, '&quot;')
        .replace(/'/g, '&#39;');
}

/**
 * Display label for a speaker identity, e.g. "[TA] J. Robert Oppenheimer"
 */
export function formatSpeakerLabel(entry: { speaker: string; role?: string }): string {
    return entry.role ? `[${entry.role}] ${entry.speaker}` : entry.speaker;
}

/**
 * Formats a YYYYMMDD token as YYYY-MM-DD. Anything else is returned unchanged.
 */
export function formatSessionDate(date: string | undefined): string {
    if (!date) return 'Unknown Date';
    const match = /^(\d{4})(\d{2})(\d{2})$/.exec(date);
    return match ? `${match[1]}-${match[2]}-${match[3]}` : date;
}

/**
 * Bar width as a percentage of the largest value in the chart
 */
export function barWidthPercent(value: number, max: number): number {
    if (max <= 0) return 0;
    return Math.round(value / max * 1000) / 10;
}
