import React from 'react';

export type BannerKind = 'error' | 'warning' | 'info';

const STYLES: Record<BannerKind, string> = {
  error: 'bg-red-50 border-red-200 text-red-800',
  warning: 'bg-amber-50 border-amber-200 text-amber-800',
  info: 'bg-blue-50 border-blue-200 text-blue-800',
};

interface StatusBannerProps {
  kind: BannerKind;
  message: string;
}

const StatusBanner: React.FC<StatusBannerProps> = ({ kind, message }) => (
  <div role={kind === 'info' ? 'status' : 'alert'} className={`p-4 rounded border text-sm ${STYLES[kind]}`}>
    {message}
  </div>
);

export default StatusBanner;
