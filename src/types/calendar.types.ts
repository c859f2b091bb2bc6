import type { Dayjs } from "dayjs";

// Shared types for calendar functionality
export interface CalendarEvent {
  id: string;
  summary: string;
  location: string;
  description: string;
  start: string;
  end: string;
  attendees: string[];
}

export interface EventCollection {
  events: CalendarEvent[];
}

export interface TimeWindow {
  start: Date;
  end: Date;
}

/**
 * A stored event with its timestamps parsed in the offset they were booked with
 */
export interface ScheduledEvent {
  event: CalendarEvent;
  start: Dayjs;
  end: Dayjs;
}

export interface BookEventInput {
  summary: string;
  startTime: string;
  endTime: string;
  description?: string;
  location?: string;
  attendees?: string[];
}

export interface CheckAvailabilityInput {
  date: string;
  startTime?: string;
  endTime?: string;
}

export interface CancelEventInput {
  eventId?: string;
  eventSummary?: string;
  // Accepted for call compatibility; not used to filter candidates
  date?: string;
}

export interface DailyReportInput {
  date: string;
}

export interface AvailabilityInfo {
  date: string;
  window: TimeWindow;
  customWindow: boolean;
  busy: ScheduledEvent[];
}

export interface DailyReportEntry extends ScheduledEvent {
  durationMinutes: number;
}

export interface DailyReport {
  date: Date;
  entries: DailyReportEntry[];
  totalMinutes: number;
}
