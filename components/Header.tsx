import React, { useContext, useState } from 'react';
import { Link } from 'react-router-dom';
import { LogIn, LogOut, Megaphone } from 'lucide-react';
import { AppContext } from '../context/AppContext';
import LoginModal from './LoginModal';

const Header: React.FC = () => {
  const { auth, logout } = useContext(AppContext);
  const [isLoginOpen, setIsLoginOpen] = useState(false);

  return (
    <header className="bg-blue-900 text-white">
      <div className="mx-auto flex max-w-6xl items-center justify-between px-4 py-4">
        <Link to="/" className="text-xl font-bold">
          Extracurricular Activities
        </Link>
        {auth.user ? (
          <div className="flex items-center gap-3 text-sm">
            <Link to="/announcements" className="flex items-center gap-1 hover:underline">
              <Megaphone size={16} /> Manage Announcements
            </Link>
            <span>{auth.user.displayName}</span>
            <button onClick={() => logout()} className="flex items-center gap-1 rounded bg-blue-800 px-3 py-1 hover:bg-blue-700">
              <LogOut size={16} /> Logout
            </button>
          </div>
        ) : (
          <button
            onClick={() => setIsLoginOpen(true)}
            className="flex items-center gap-1 rounded bg-blue-800 px-3 py-1 text-sm hover:bg-blue-700"
          >
            <LogIn size={16} /> Teacher Login
          </button>
        )}
      </div>
      {isLoginOpen && <LoginModal onClose={() => setIsLoginOpen(false)} />}
    </header>
  );
};

export default Header;
