import bcrypt from 'bcryptjs';
import { Router } from 'express';
import type { RequestHandler, Response } from 'express';
import { z } from 'zod';
import type { TeacherRepository } from '../db/store';
import { AuthenticationError } from '../errors';
import { asyncHandler } from '../middleware/asyncHandler';
import { currentTeacher, issueToken, toStaffUser } from '../middleware/auth';
import type { AuthRequest, TokenOptions } from '../middleware/auth';
import type { LoginResponse, StaffUser } from '../types';

const INVALID_CREDENTIALS = 'Invalid username or password';

const credentialsSchema = z.object({
  username: z.string().trim().default(''),
  password: z.string().default(''),
});

/**
 * Unknown usernames and wrong passwords are rejected with the same message.
 */
export async function authenticate(
  teachers: TeacherRepository,
  username: string,
  password: string
): Promise<StaffUser> {
  const teacher = username ? await teachers.find(username) : null;
  if (!teacher || !password) throw new AuthenticationError(INVALID_CREDENTIALS);

  const validPassword = await bcrypt.compare(password, teacher.passwordHash);
  if (!validPassword) throw new AuthenticationError(INVALID_CREDENTIALS);

  return toStaffUser(teacher);
}

export function authRouter(teachers: TeacherRepository, requireTeacher: RequestHandler, tokens: TokenOptions): Router {
  const router = Router();

  // Credentials arrive as query parameters from the page, or as a JSON body.
  router.post(
    '/login',
    asyncHandler(async (req, res: Response<LoginResponse>) => {
      const body: unknown = req.body;
      const source = typeof body === 'object' && body !== null && 'username' in body ? body : req.query;
      const { username, password } = credentialsSchema.parse(source);
      const user = await authenticate(teachers, username, password);
      console.log(`${user.username} signed in`);
      res.json({ ...user, token: issueToken(user, tokens) });
    })
  );

  router.get(
    '/check-session',
    requireTeacher,
    asyncHandler<AuthRequest>(async (req, res: Response<StaffUser>) => {
      const teacher = currentTeacher(req);
      const { username } = req.query;
      if (typeof username === 'string' && username !== '' && username !== teacher.username) {
        throw new AuthenticationError();
      }
      res.json(teacher);
    })
  );

  return router;
}
