import React from 'react';
import Modal from './Modal';

interface ConfirmDialogProps {
  message: string;
  onConfirm: () => void;
  onCancel: () => void;
}

const ConfirmDialog: React.FC<ConfirmDialogProps> = ({ message, onConfirm, onCancel }) => (
  <Modal title="Confirm Action" onClose={onCancel}>
    <p className="text-slate-600">{message}</p>
    <div className="mt-5 flex justify-end gap-2">
      <button onClick={onCancel} className="rounded bg-slate-100 px-4 py-2 text-slate-700 hover:bg-slate-200">
        Cancel
      </button>
      <button onClick={onConfirm} className="rounded bg-red-600 px-4 py-2 text-white hover:bg-red-700">
        Confirm
      </button>
    </div>
  </Modal>
);

export default ConfirmDialog;
