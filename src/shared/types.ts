import type { SKIP_REASONS } from './constants';

export type SkipReason = (typeof SKIP_REASONS)[number];

export interface ApiResponse<T = unknown> {
  success: boolean;
  data?: T;
  error?: string;
}

export interface CpeReportRow {
  certificationId: string;
  firstName: string;
  lastName: string;
  meetingTitle: string;
  credits: number;
  activityDate: string;
  qualifyingMinutes: string;
}

export interface SkippedAttendee {
  key: string;
  firstName: string;
  lastName: string;
  reason: SkipReason;
}
