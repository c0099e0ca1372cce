import React from 'react';
import type { MessageType } from '../context/AppContext';

const styles: Record<MessageType, string> = {
  success: 'bg-green-50 text-green-800 border-green-200',
  error: 'bg-red-50 text-red-800 border-red-200',
  info: 'bg-blue-50 text-blue-800 border-blue-200',
};

const MessageBanner: React.FC<{ text: string; type: MessageType }> = ({ text, type }) => (
  <div role="status" className={`rounded border px-4 py-2 text-sm ${styles[type]}`}>
    {text}
  </div>
);

export default MessageBanner;
