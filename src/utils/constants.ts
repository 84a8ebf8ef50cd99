/**
 * Constants and Configuration Values
 */

import emojiRegex from "emoji-regex";

// ============================================================================
// ANALYSIS DEFAULTS
// ============================================================================

export const DEFAULT_TOP_N = 10;
export const DEFAULT_COURSE_NAME = "EDA";
export const DEFAULT_SESSION_LABEL = "Day 1";
export const DEFAULT_ENCODING = "utf8";

// Continuation lines are joined to the message with this separator
export const CONTINUATION_SEPARATOR = "\n";

// ============================================================================
// OUTPUT FILES
// ============================================================================

export const CSV_FILE_NAME = "chat_data.csv";
export const HTML_FILE_NAME = "activity_report.html";
export const JSON_FILE_NAME = "activity_summary.json";

export const CSV_COLUMNS = ["timestamp", "role", "speaker", "message", "source_file"] as const;

// ============================================================================
// REGEX PATTERNS
// ============================================================================

export const EMOJI_REGEX = emojiRegex();

// Control & direction marks injected by some chat clients (e.g., U+200E)
export const CONTROL_MARKS_REGEX = /[\u200E\u200F\u202A-\u202E\u2066-\u2069\uFEFF]/g;

// "Reacted to "some text..." with 👏"
export const REACTION_REGEX = /^Reacted to\b/;

// Session date encoded in export file names, e.g. "meeting_saved_chat GMT20240205-021531.txt"
export const SESSION_DATE_REGEX = /GMT(\d{8})/;

export const CHAT_FILE_EXTENSIONS = ['.txt'];
export const ATTENDANCE_FILE_EXTENSIONS = ['.csv'];

// ============================================================================
// ATTENDANCE EXPORTS
// ============================================================================

// Column headers of a meeting participants export, matched case-insensitively
export const ATTENDANCE_COLUMNS = {
    name: "Name (original name)",
    email: "Email",
    joinTime: "Join time",
    leaveTime: "Leave time",
    duration: "Duration (minutes)"
} as const;

// "02/05/2024 09:01:23 AM"
export const ATTENDANCE_TIME_REGEX = /^(\d{1,2})\/(\d{1,2})\/(\d{4}) (\d{1,2}):(\d{2}):(\d{2}) ([AP]M)$/i;

export const WEEKDAY_NAMES = ["Sunday", "Monday", "Tuesday", "Wednesday", "Thursday", "Friday", "Saturday"] as const;

export const PRESENT_MARK = "✅";
export const ABSENT_MARK = "❌";
