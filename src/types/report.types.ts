/**
 * Report Type Definitions
 */

import type { AttendanceReport } from './attendance.types';
import type { ChatRecord } from './message.types';
import type { ParticipantNote, SessionActivity, SpeakerRanking, SpeakerStats } from './metrics.types';

/**
 * Presentation-only settings. Never interpreted by the parser or the ranker.
 */
export type AnalysisOptions = {
    courseName: string;
    sessionLabel: string;
    topN: number;
};

/**
 * Everything the presentation layer needs for one run
 */
export type ActivityReport = {
    options: AnalysisOptions;
    files: string[];
    records: ChatRecord[];
    speakers: SpeakerStats[];
    ranking: SpeakerRanking;
    activity: SessionActivity;
    participantNotes: ParticipantNote[];
    attendance?: AttendanceReport;      // only when attendance exports were given
};
