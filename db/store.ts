import type { Activity, StaffRole } from '../types';

export interface StudentInput {
  email: string;
  name?: string;
  grade?: string;
}

export interface TeacherRecord {
  username: string;
  displayName: string;
  role: StaffRole;
  passwordHash: string;
}

export interface AnnouncementRecord {
  id: number;
  message: string;
  startsAt: Date | null;
  expiresAt: Date;
  createdAt: Date;
  updatedAt: Date;
  createdBy: string | null;
}

export interface AnnouncementInput {
  message: string;
  startsAt: Date | null;
  expiresAt: Date;
}

export interface ActivityRepository {
  list(): Promise<Activity[]>;
  /**
   * Appends the student to the activity in one atomic step. Rejects with
   * NotFoundError for an unknown activity and ConflictError when the email is
   * already enrolled or the activity is full.
   */
  addParticipant(activityName: string, student: StudentInput): Promise<void>;
  /** Rejects with NotFoundError or ConflictError (email not enrolled). */
  removeParticipant(activityName: string, email: string): Promise<void>;
}

export interface TeacherRepository {
  find(username: string): Promise<TeacherRecord | null>;
}

export interface AnnouncementRepository {
  /** Active at `now`: started (or no start) and not yet expired, soonest expiry first. */
  listActive(now: Date): Promise<AnnouncementRecord[]>;
  /** Every record, newest first. */
  listAll(): Promise<AnnouncementRecord[]>;
  create(input: AnnouncementInput, createdBy: string, now: Date): Promise<AnnouncementRecord>;
  /** Resolves to null when no record has the id. */
  update(id: number, input: AnnouncementInput, now: Date): Promise<AnnouncementRecord | null>;
  delete(id: number): Promise<boolean>;
}

export interface DataStore {
  activities: ActivityRepository;
  teachers: TeacherRepository;
  announcements: AnnouncementRepository;
}

export const defaultStudentName = (email: string): string => email.split('@')[0] || email;
