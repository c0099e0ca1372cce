import React, { useState } from 'react';
import Modal from './Modal';

interface RegistrationModalProps {
  activityName: string;
  onSubmit: (email: string) => Promise<boolean>;
  onClose: () => void;
}

const RegistrationModal: React.FC<RegistrationModalProps> = ({ activityName, onSubmit, onClose }) => {
  const [email, setEmail] = useState('');
  const [isSubmitting, setIsSubmitting] = useState(false);

  const handleSubmit = async (event: React.FormEvent) => {
    event.preventDefault();
    setIsSubmitting(true);
    const succeeded = await onSubmit(email);
    setIsSubmitting(false);
    if (succeeded) onClose();
  };

  return (
    <Modal title={`Register Student for ${activityName}`} onClose={onClose}>
      <form onSubmit={event => void handleSubmit(event)} className="space-y-4">
        <label className="block text-sm text-slate-600">
          Student Email
          <input
            type="email"
            value={email}
            onChange={e => setEmail(e.target.value)}
            required
            placeholder="student@school.edu"
            className="mt-1 w-full rounded border border-slate-300 px-3 py-2"
          />
        </label>
        <button
          type="submit"
          disabled={isSubmitting}
          className="w-full rounded bg-blue-700 py-2 font-semibold text-white hover:bg-blue-800 disabled:opacity-60"
        >
          Register
        </button>
      </form>
    </Modal>
  );
};

export default RegistrationModal;
