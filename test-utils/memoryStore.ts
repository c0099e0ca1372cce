import bcrypt from 'bcryptjs';
import { defaultStudentName } from '../db/store';
import type { AnnouncementInput, AnnouncementRecord, DataStore, StudentInput, TeacherRecord } from '../db/store';
import { ConflictError, NotFoundError } from '../errors';
import { StaffRole } from '../types';
import type { Activity, Student } from '../types';

export const TEST_PASSWORD = 'test-secret';
export const TEST_JWT_SECRET = 'test-jwt-secret';

export interface MemoryStoreSeed {
  activities?: Activity[];
  teachers?: TeacherRecord[];
  announcements?: AnnouncementRecord[];
}

const copy = (activity: Activity): Activity => ({ ...activity, participants: [...activity.participants] });

export const testTeacher = (username: string, displayName: string, role = StaffRole.TEACHER): TeacherRecord => ({
  username,
  displayName,
  role,
  // Low cost factor keeps the suite fast.
  passwordHash: bcrypt.hashSync(TEST_PASSWORD, 4),
});

export interface MemoryStore extends DataStore {
  activity(name: string): Activity | null;
  student(email: string): Student | null;
}

/**
 * In-process DataStore. Each mutation runs without awaiting between its check
 * and its write, so concurrent requests cannot interleave inside one.
 */
export function createMemoryStore(seed: MemoryStoreSeed = {}): MemoryStore {
  const activities = new Map<string, Activity>((seed.activities ?? []).map(a => [a.name, copy(a)]));
  const students = new Map<string, Student>();
  const teachers = new Map<string, TeacherRecord>((seed.teachers ?? []).map(t => [t.username, t]));
  const announcements = new Map<number, AnnouncementRecord>((seed.announcements ?? []).map(a => [a.id, { ...a }]));
  let nextAnnouncementId = Math.max(0, ...announcements.keys()) + 1;

  return {
    activity(name) {
      const activity = activities.get(name);
      return activity ? copy(activity) : null;
    },
    student(email) {
      return students.get(email) ?? null;
    },
    activities: {
      async list() {
        return [...activities.values()].sort((a, b) => a.name.localeCompare(b.name)).map(copy);
      },
      async addParticipant(activityName: string, student: StudentInput) {
        const activity = activities.get(activityName);
        if (!activity) throw new NotFoundError('Activity not found');
        if (activity.participants.includes(student.email)) {
          throw new ConflictError('Student is already signed up for this activity');
        }
        if (activity.participants.length >= activity.maxParticipants) {
          throw new ConflictError('Activity is full');
        }
        if (!students.has(student.email)) {
          students.set(student.email, {
            email: student.email,
            name: student.name ?? defaultStudentName(student.email),
            grade: student.grade ?? null,
          });
        }
        activity.participants.push(student.email);
      },
      async removeParticipant(activityName, email) {
        const activity = activities.get(activityName);
        if (!activity) throw new NotFoundError('Activity not found');
        const index = activity.participants.indexOf(email);
        if (index === -1) throw new ConflictError('Student is not signed up for this activity');
        activity.participants.splice(index, 1);
      },
    },
    teachers: {
      async find(username) {
        return teachers.get(username) ?? null;
      },
    },
    announcements: {
      async listActive(now) {
        return [...announcements.values()]
          .filter(a => a.expiresAt.getTime() > now.getTime() && (a.startsAt === null || a.startsAt.getTime() <= now.getTime()))
          .sort((a, b) => a.expiresAt.getTime() - b.expiresAt.getTime());
      },
      async listAll() {
        return [...announcements.values()].sort(
          (a, b) => b.createdAt.getTime() - a.createdAt.getTime() || b.id - a.id
        );
      },
      async create(input: AnnouncementInput, createdBy: string, now: Date) {
        const record: AnnouncementRecord = {
          id: nextAnnouncementId++,
          ...input,
          createdAt: now,
          updatedAt: now,
          createdBy,
        };
        announcements.set(record.id, record);
        return { ...record };
      },
      async update(id, input, now) {
        const existing = announcements.get(id);
        if (!existing) return null;
        const updated = { ...existing, ...input, updatedAt: now };
        announcements.set(id, updated);
        return { ...updated };
      },
      async delete(id) {
        return announcements.delete(id);
      },
    },
  };
}
