import type { Request, RequestHandler } from 'express';
import jwt from 'jsonwebtoken';
import { z } from 'zod';
import type { TeacherRecord, TeacherRepository } from '../db/store';
import { AuthenticationError, ForbiddenError } from '../errors';
import { StaffRole } from '../types';
import type { StaffUser } from '../types';
import { asyncHandler } from './asyncHandler';

export interface TokenOptions {
  secret: string;
  ttlSeconds: number;
}

export type AuthRequest = Request & {
  teacher?: StaffUser;
};

const tokenPayloadSchema = z.object({
  username: z.string(),
  displayName: z.string(),
  role: z.nativeEnum(StaffRole),
});

export const toStaffUser = ({ username, displayName, role }: TeacherRecord | StaffUser): StaffUser => ({
  username,
  displayName,
  role,
});

export const issueToken = (user: StaffUser, { secret, ttlSeconds }: TokenOptions): string =>
  jwt.sign(toStaffUser(user), secret, { expiresIn: ttlSeconds });

export function verifyToken(token: string, secret: string): StaffUser {
  try {
    return tokenPayloadSchema.parse(jwt.verify(token, secret));
  } catch {
    throw new AuthenticationError();
  }
}

const bearerToken = (req: Request): string | undefined => {
  const [scheme, token] = req.headers.authorization?.split(' ') ?? [];
  return scheme?.toLowerCase() === 'bearer' && token ? token : undefined;
};

/**
 * Resolves the signed-in staff member from the bearer token and checks the
 * account still exists. A `teacher_username` query parameter, when present,
 * has to name the same account.
 */
export const requireTeacher = (teachers: TeacherRepository, secret: string): RequestHandler =>
  asyncHandler<AuthRequest>(async (req, res, next) => {
    const token = bearerToken(req);
    if (!token) throw new AuthenticationError();

    const claims = verifyToken(token, secret);
    const teacher = await teachers.find(claims.username);
    if (!teacher) throw new AuthenticationError();

    const claimed = req.query.teacher_username;
    if (typeof claimed === 'string' && claimed !== '' && claimed !== teacher.username) {
      throw new ForbiddenError();
    }

    req.teacher = toStaffUser(teacher);
    next();
  });

export function currentTeacher(req: AuthRequest): StaffUser {
  if (!req.teacher) throw new AuthenticationError();
  return req.teacher;
}
