import React, { useContext, useState } from 'react';
import { AppContext } from '../context/AppContext';
import { ApiError } from '../services/api';
import MessageBanner from './MessageBanner';
import Modal from './Modal';

const LoginModal: React.FC<{ onClose: () => void }> = ({ onClose }) => {
  const { login } = useContext(AppContext);
  const [username, setUsername] = useState('');
  const [password, setPassword] = useState('');
  const [error, setError] = useState<string | null>(null);
  const [isSubmitting, setIsSubmitting] = useState(false);

  const handleSubmit = async (event: React.FormEvent) => {
    event.preventDefault();
    setIsSubmitting(true);
    setError(null);
    try {
      await login(username, password);
      onClose();
    } catch (err) {
      console.error('Error during login:', err);
      setError(err instanceof ApiError ? err.message : 'Login failed. Please try again.');
    } finally {
      setIsSubmitting(false);
    }
  };

  return (
    <Modal title="Teacher Login" onClose={onClose}>
      <form onSubmit={event => void handleSubmit(event)} className="space-y-4">
        <label className="block text-sm text-slate-600">
          Username
          <input
            value={username}
            onChange={e => setUsername(e.target.value)}
            required
            className="mt-1 w-full rounded border border-slate-300 px-3 py-2"
          />
        </label>
        <label className="block text-sm text-slate-600">
          Password
          <input
            type="password"
            value={password}
            onChange={e => setPassword(e.target.value)}
            required
            className="mt-1 w-full rounded border border-slate-300 px-3 py-2"
          />
        </label>
        {error && <MessageBanner text={error} type="error" />}
        <button
          type="submit"
          disabled={isSubmitting}
          className="w-full rounded bg-blue-700 py-2 font-semibold text-white hover:bg-blue-800 disabled:opacity-60"
        >
          {isSubmitting ? 'Signing in...' : 'Login'}
        </button>
      </form>
    </Modal>
  );
};

export default LoginModal;
