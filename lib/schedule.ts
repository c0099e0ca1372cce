import type { Activity, ScheduleDetails, Weekday } from '../types';

export const TIME_OF_DAY = /^([01]\d|2[0-3]):[0-5]\d$/;

export interface ScheduleQuery {
  day?: Weekday;
  startTime?: string;
  endTime?: string;
}

// "HH:MM" strings are zero-padded, so lexical order is chronological order.
export function overlapsWindow(details: ScheduleDetails, startTime?: string, endTime?: string): boolean {
  if (startTime && details.endTime <= startTime) return false;
  if (endTime && details.startTime >= endTime) return false;
  return true;
}

/**
 * Server-side schedule filter. Activities that only carry a display string
 * can't be matched against a day or window, so they are always kept.
 */
export function matchesSchedule(activity: Activity, query: ScheduleQuery): boolean {
  const details = activity.scheduleDetails;
  if (!details) return true;
  if (query.day && !details.days.includes(query.day)) return false;
  return overlapsWindow(details, query.startTime, query.endTime);
}

export function filterBySchedule(activities: Activity[], query: ScheduleQuery): Activity[] {
  return activities.filter(activity => matchesSchedule(activity, query));
}
