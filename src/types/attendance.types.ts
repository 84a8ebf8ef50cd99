/**
 * Meeting Attendance Type Definitions
 */

/**
 * One row of a meeting participants export. A person who rejoins appears once per join.
 */
export type AttendanceRow = {
    name: string;
    email: string;
    joinTime: string;           // verbatim, e.g. "02/05/2024 09:01:23 AM"
    leaveTime: string;
    joinedAt: number;           // wall-clock join time read as UTC milliseconds, for ordering
    durationMinutes: number;
    sourceFile: string;
};

/**
 * All joins of one participant on one day, folded together
 */
export type AttendanceEntry = {
    name: string;
    email: string;
    joinTime: string;           // first join
    leaveTime: string;          // leave time of the last join
    durationMinutes: number;    // summed over every join
};

export type AttendanceSession = {
    label: string;              // "Day 1", "Day 2", ... in order of the earliest join
    day: string;                // weekday name, e.g. "Monday"
    participants: AttendanceEntry[];
};

export type AttendanceNote = {
    name: string;
    present: boolean[];         // one flag per attendance session
    attendance: string;         // "Day 1: ✅ | Day 2: ❌"
    notes: string;
};

export type AttendanceReport = {
    sessions: AttendanceSession[];
    notes: AttendanceNote[];
};
