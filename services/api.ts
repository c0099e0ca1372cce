import { buildActivityQuery } from '../lib/activityView';
import type { TimeRangeKey } from '../lib/activityView';
import type { Activity, Announcement, LoginResponse, MessageResponse, StaffUser, Weekday } from '../types';

export class ApiError extends Error {
  constructor(public readonly status: number, message: string) {
    super(message);
    this.name = 'ApiError';
  }
}

export interface AnnouncementDraft {
  message: string;
  expiresAt: string;
  startsAt: string | null;
}

const readDetail = async (response: Response, fallback: string): Promise<string> => {
  try {
    const body: unknown = await response.json();
    if (typeof body === 'object' && body !== null && 'detail' in body && typeof body.detail === 'string') {
      return body.detail;
    }
  } catch (err) {
    console.error('Unreadable error response:', err);
  }
  return fallback;
};

async function request<T>(url: string, init: RequestInit = {}, token?: string | null, fallback = 'An error occurred'): Promise<T> {
  const headers = new Headers(init.headers);
  if (token) headers.set('Authorization', `Bearer ${token}`);
  const response = await fetch(url, { ...init, headers });
  if (!response.ok) {
    throw new ApiError(response.status, await readDetail(response, fallback));
  }
  const data: T = await response.json();
  return data;
}

const withQuery = (path: string, params: Record<string, string | null | undefined>): string => {
  const search = new URLSearchParams();
  Object.entries(params).forEach(([key, value]) => {
    if (value) search.set(key, value);
  });
  const query = search.toString();
  return query ? `${path}?${query}` : path;
};

// --- AUTH ---
export const login = (username: string, password: string) =>
  request<LoginResponse>(withQuery('/auth/login', { username, password }), { method: 'POST' }, null, 'Invalid username or password');

export const checkSession = (token: string, username: string) =>
  request<StaffUser>(withQuery('/auth/check-session', { username }), {}, token);

// --- ACTIVITIES ---
export const fetchActivities = (day: Weekday | '', timeRange: TimeRangeKey | '') =>
  request<Activity[]>(`/activities${buildActivityQuery(day, timeRange)}`, {}, null, 'Failed to load activities');

const activityAction = (action: 'signup' | 'unregister', activity: string, email: string, token: string) =>
  request<MessageResponse>(
    withQuery(`/activities/${encodeURIComponent(activity)}/${action}`, { email }),
    { method: 'POST' },
    token
  );

export const signupStudent = (activity: string, email: string, token: string) =>
  activityAction('signup', activity, email, token);

export const unregisterStudent = (activity: string, email: string, token: string) =>
  activityAction('unregister', activity, email, token);

// --- ANNOUNCEMENTS ---
export const fetchActiveAnnouncements = () => request<Announcement[]>('/announcements');

export const fetchManagedAnnouncements = (token: string) =>
  request<Announcement[]>('/announcements/manage', {}, token, 'Failed to load announcements');

const draftParams = (draft: AnnouncementDraft) => ({
  message: draft.message,
  expires_at: draft.expiresAt,
  starts_at: draft.startsAt,
});

export const createAnnouncement = (draft: AnnouncementDraft, token: string) =>
  request<Announcement>(withQuery('/announcements', draftParams(draft)), { method: 'POST' }, token, 'Failed to save announcement');

export const updateAnnouncement = (id: number, draft: AnnouncementDraft, token: string) =>
  request<Announcement>(withQuery(`/announcements/${id}`, draftParams(draft)), { method: 'PUT' }, token, 'Failed to save announcement');

export const deleteAnnouncement = (id: number, token: string) =>
  request<MessageResponse>(`/announcements/${id}`, { method: 'DELETE' }, token, 'Failed to delete announcement');
