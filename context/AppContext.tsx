import React, { createContext, useCallback, useEffect, useMemo, useState } from 'react';
import { z } from 'zod';
import { ApiError, checkSession, login as loginRequest } from '../services/api';
import { StaffRole } from '../types';
import type { StaffUser } from '../types';

const STORAGE_KEY = 'currentUser';

export type MessageType = 'success' | 'error' | 'info';

export interface Notice {
  text: string;
  type: MessageType;
}

interface AuthState {
  isAuthenticated: boolean;
  user: StaffUser | null;
  token: string | null;
}

interface AppContextValue {
  auth: AuthState;
  login: (username: string, password: string) => Promise<StaffUser>;
  logout: (message?: string) => void;
  notice: Notice | null;
  showMessage: (text: string, type: MessageType) => void;
}

const storedSessionSchema = z.object({
  token: z.string(),
  user: z.object({
    username: z.string(),
    displayName: z.string(),
    role: z.nativeEnum(StaffRole),
  }),
});

type StoredSession = z.infer<typeof storedSessionSchema>;

const signedOut: AuthState = { isAuthenticated: false, user: null, token: null };

function readStoredSession(): StoredSession | null {
  const saved = localStorage.getItem(STORAGE_KEY);
  if (!saved) return null;
  try {
    const parsed = storedSessionSchema.safeParse(JSON.parse(saved));
    if (parsed.success) return parsed.data;
  } catch (error) {
    console.error('Error parsing saved user', error);
  }
  localStorage.removeItem(STORAGE_KEY);
  return null;
}

const toAuthState = (session: StoredSession | null): AuthState =>
  session ? { isAuthenticated: true, user: session.user, token: session.token } : signedOut;

export const AppContext = createContext<AppContextValue>({
  auth: signedOut,
  login: () => Promise.reject(new Error('AppProvider is missing')),
  logout: () => undefined,
  notice: null,
  showMessage: () => undefined,
});

export const AppProvider: React.FC<{ children: React.ReactNode }> = ({ children }) => {
  const [auth, setAuth] = useState<AuthState>(() => toAuthState(readStoredSession()));
  const [notice, setNotice] = useState<Notice | null>(null);

  const showMessage = useCallback((text: string, type: MessageType) => {
    setNotice({ text, type });
  }, []);

  useEffect(() => {
    if (!notice) return;
    const timer = setTimeout(() => setNotice(null), 5000);
    return () => clearTimeout(timer);
  }, [notice]);

  const persist = useCallback((session: StoredSession | null) => {
    if (session) {
      localStorage.setItem(STORAGE_KEY, JSON.stringify(session));
    } else {
      localStorage.removeItem(STORAGE_KEY);
    }
    setAuth(toAuthState(session));
  }, []);

  const logout = useCallback(
    (message = 'You have been logged out.') => {
      persist(null);
      showMessage(message, 'info');
    },
    [persist, showMessage]
  );

  const login = useCallback(
    async (username: string, password: string) => {
      const { token, ...user } = await loginRequest(username, password);
      persist({ token, user });
      showMessage(`Welcome, ${user.displayName}!`, 'success');
      return user;
    },
    [persist, showMessage]
  );

  // Re-validate a stored session once on load.
  useEffect(() => {
    const session = readStoredSession();
    if (!session) return;
    checkSession(session.token, session.user.username)
      .then(user => persist({ token: session.token, user }))
      .catch((error: unknown) => {
        if (error instanceof ApiError) {
          logout('Your session has ended. Please sign in again.');
        } else {
          console.error('Error validating session:', error);
        }
      });
  }, [persist, logout]);

  const value = useMemo(
    () => ({ auth, login, logout, notice, showMessage }),
    [auth, login, logout, notice, showMessage]
  );

  return <AppContext.Provider value={value}>{children}</AppContext.Provider>;
};
