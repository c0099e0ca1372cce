import React, { useCallback, useContext, useEffect, useState } from 'react';
import { HashRouter, Routes, Route, Navigate } from 'react-router-dom';
import AnnouncementBanner from './components/AnnouncementBanner';
import Header from './components/Header';
import MessageBanner from './components/MessageBanner';
import Activities from './pages/Activities';
import ManageAnnouncements from './pages/ManageAnnouncements';
import { AppContext } from './context/AppContext';
import { fetchActiveAnnouncements } from './services/api';
import type { Announcement } from './types';

const ProtectedRoute: React.FC<{ children: React.ReactNode }> = ({ children }) => {
  const { auth } = useContext(AppContext);
  if (!auth.isAuthenticated) {
    return <Navigate to="/" replace />;
  }
  return <>{children}</>;
};

const App: React.FC = () => {
  const { notice } = useContext(AppContext);
  const [announcements, setAnnouncements] = useState<Announcement[]>([]);

  const refreshAnnouncements = useCallback(() => {
    fetchActiveAnnouncements()
      .then(setAnnouncements)
      .catch((error: unknown) => {
        console.error('Error loading announcements:', error);
        setAnnouncements([]);
      });
  }, []);

  useEffect(() => {
    refreshAnnouncements();
  }, [refreshAnnouncements]);

  return (
    <HashRouter>
      <div className="flex min-h-screen flex-col bg-slate-50 font-sans">
        <AnnouncementBanner announcements={announcements} />
        <Header />
        {notice && (
          <div className="mx-auto w-full max-w-6xl px-4 pt-4">
            <MessageBanner text={notice.text} type={notice.type} />
          </div>
        )}
        <main className="flex-grow">
          <Routes>
            <Route path="/" element={<Activities />} />
            <Route
              path="/announcements"
              element={
                <ProtectedRoute>
                  <ManageAnnouncements onChanged={refreshAnnouncements} />
                </ProtectedRoute>
              }
            />
            <Route path="*" element={<Navigate to="/" />} />
          </Routes>
        </main>
      </div>
    </HashRouter>
  );
};

export default App;
