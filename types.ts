export const WEEKDAYS = [
  'Monday',
  'Tuesday',
  'Wednesday',
  'Thursday',
  'Friday',
  'Saturday',
  'Sunday',
] as const;

export type Weekday = (typeof WEEKDAYS)[number];

export enum ActivityCategory {
  SPORTS = 'sports',
  ARTS = 'arts',
  ACADEMIC = 'academic',
  COMMUNITY = 'community',
  TECHNOLOGY = 'technology',
}

export interface ScheduleDetails {
  days: Weekday[];
  startTime: string; // "HH:MM", 24h
  endTime: string;
}

export interface Activity {
  name: string;
  description: string;
  schedule: string;
  scheduleDetails?: ScheduleDetails;
  maxParticipants: number;
  participants: string[]; // emails, in enrollment order
  category?: ActivityCategory;
}

export interface Student {
  email: string;
  name: string;
  grade: string | null;
}

export interface Announcement {
  id: number;
  message: string;
  startsAt: string | null; // ISO instants on the wire
  expiresAt: string;
  createdAt: string;
  updatedAt: string;
  createdBy: string | null;
}

export enum StaffRole {
  TEACHER = 'teacher',
  ADMIN = 'admin',
}

export interface StaffUser {
  username: string;
  displayName: string;
  role: StaffRole;
}

export interface LoginResponse extends StaffUser {
  token: string;
}

export interface MessageResponse {
  message: string;
}

export interface ErrorResponse {
  detail: string;
}
