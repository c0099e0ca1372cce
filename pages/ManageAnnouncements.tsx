import React, { useCallback, useContext, useEffect, useState } from 'react';
import { Edit2, Trash2 } from 'lucide-react';
import ConfirmDialog from '../components/ConfirmDialog';
import MessageBanner from '../components/MessageBanner';
import { AppContext } from '../context/AppContext';
import type { Notice } from '../context/AppContext';
import { formatDateTimeLabel, toIsoStringFromLocalInput, toLocalInputValue } from '../lib/dates';
import {
  ApiError,
  createAnnouncement,
  deleteAnnouncement,
  fetchManagedAnnouncements,
  updateAnnouncement,
} from '../services/api';
import type { Announcement } from '../types';

const emptyForm = { message: '', startsAt: '', expiresAt: '' };

const ManageAnnouncements: React.FC<{ onChanged: () => void }> = ({ onChanged }) => {
  const { auth } = useContext(AppContext);
  const token = auth.token;
  const [announcements, setAnnouncements] = useState<Announcement[]>([]);
  const [isLoading, setIsLoading] = useState(true);
  const [form, setForm] = useState(emptyForm);
  const [editingId, setEditingId] = useState<number | null>(null);
  const [pendingDelete, setPendingDelete] = useState<Announcement | null>(null);
  const [notice, setNotice] = useState<Notice | null>(null);

  const fail = (error: unknown, fallback: string) => {
    console.error(fallback, error);
    setNotice({ text: error instanceof ApiError ? error.message : fallback, type: 'error' });
  };

  const load = useCallback(async () => {
    if (!token) return;
    setIsLoading(true);
    try {
      setAnnouncements(await fetchManagedAnnouncements(token));
    } catch (error) {
      fail(error, 'Failed to load announcements.');
    } finally {
      setIsLoading(false);
    }
  }, [token]);

  useEffect(() => {
    void load();
  }, [load]);

  const resetForm = () => {
    setEditingId(null);
    setForm(emptyForm);
  };

  const startEditing = (announcement: Announcement) => {
    setEditingId(announcement.id);
    setForm({
      message: announcement.message,
      startsAt: toLocalInputValue(announcement.startsAt),
      expiresAt: toLocalInputValue(announcement.expiresAt),
    });
  };

  const handleSubmit = async (event: React.FormEvent) => {
    event.preventDefault();
    if (!token) return;

    const message = form.message.trim();
    const startsAt = toIsoStringFromLocalInput(form.startsAt);
    const expiresAt = toIsoStringFromLocalInput(form.expiresAt);
    if (!message) return setNotice({ text: 'Message is required.', type: 'error' });
    if (!expiresAt) return setNotice({ text: 'Expiration date is required.', type: 'error' });
    if (startsAt && startsAt >= expiresAt) {
      return setNotice({ text: 'Expiration date must be after the start date.', type: 'error' });
    }

    const draft = { message, startsAt, expiresAt };
    try {
      if (editingId === null) {
        await createAnnouncement(draft, token);
      } else {
        await updateAnnouncement(editingId, draft, token);
      }
      setNotice({ text: editingId === null ? 'Announcement added.' : 'Announcement updated.', type: 'success' });
      resetForm();
      await load();
      onChanged();
    } catch (error) {
      fail(error, 'Failed to save announcement.');
    }
  };

  const confirmDelete = async () => {
    const target = pendingDelete;
    setPendingDelete(null);
    if (!target || !token) return;
    try {
      await deleteAnnouncement(target.id, token);
      setNotice({ text: 'Announcement deleted.', type: 'success' });
      await load();
      onChanged();
    } catch (error) {
      fail(error, 'Failed to delete announcement.');
    }
  };

  return (
    <div className="mx-auto max-w-3xl space-y-6 px-4 py-6">
      <h2 className="text-2xl font-bold text-slate-800">Manage Announcements</h2>
      {notice && <MessageBanner text={notice.text} type={notice.type} />}

      <form onSubmit={event => void handleSubmit(event)} className="space-y-3 rounded-lg border border-slate-200 bg-white p-4">
        <label className="block text-sm text-slate-600">
          Message
          <textarea
            value={form.message}
            onChange={e => setForm({ ...form, message: e.target.value })}
            maxLength={500}
            required
            className="mt-1 w-full rounded border border-slate-300 px-3 py-2"
          />
        </label>
        <div className="grid gap-3 sm:grid-cols-2">
          <label className="block text-sm text-slate-600">
            Start (optional)
            <input
              type="datetime-local"
              value={form.startsAt}
              onChange={e => setForm({ ...form, startsAt: e.target.value })}
              className="mt-1 w-full rounded border border-slate-300 px-3 py-2"
            />
          </label>
          <label className="block text-sm text-slate-600">
            Expiration
            <input
              type="datetime-local"
              value={form.expiresAt}
              onChange={e => setForm({ ...form, expiresAt: e.target.value })}
              required
              className="mt-1 w-full rounded border border-slate-300 px-3 py-2"
            />
          </label>
        </div>
        <div className="flex gap-2">
          <button type="submit" className="rounded bg-blue-700 px-4 py-2 font-semibold text-white hover:bg-blue-800">
            {editingId === null ? 'Add Announcement' : 'Save Changes'}
          </button>
          {editingId !== null && (
            <button type="button" onClick={resetForm} className="rounded bg-slate-100 px-4 py-2 text-slate-700">
              Cancel
            </button>
          )}
        </div>
      </form>

      {isLoading ? (
        <p className="text-slate-500">Loading announcements...</p>
      ) : announcements.length === 0 ? (
        <p className="text-slate-500">No announcements yet.</p>
      ) : (
        <ul className="space-y-3">
          {announcements.map(announcement => (
            <li key={announcement.id} className="flex justify-between rounded-lg border border-slate-200 bg-white p-4">
              <div>
                <p className="text-slate-800">{announcement.message}</p>
                <p className="mt-1 text-xs text-slate-500">
                  Starts: {formatDateTimeLabel(announcement.startsAt)}
                  <br />
                  Expires: {formatDateTimeLabel(announcement.expiresAt)}
                </p>
              </div>
              <div className="flex items-start gap-2">
                <button onClick={() => startEditing(announcement)} className="text-slate-500 hover:text-blue-700" title="Edit">
                  <Edit2 size={18} />
                </button>
                <button onClick={() => setPendingDelete(announcement)} className="text-red-400 hover:text-red-600" title="Delete">
                  <Trash2 size={18} />
                </button>
              </div>
            </li>
          ))}
        </ul>
      )}

      {pendingDelete && (
        <ConfirmDialog
          message={`Delete this announcement? "${pendingDelete.message}"`}
          onConfirm={() => void confirmDelete()}
          onCancel={() => setPendingDelete(null)}
        />
      )}
    </div>
  );
};

export default ManageAnnouncements;
