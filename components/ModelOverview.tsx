import React, { useState } from 'react';
import { MODEL_IMAGE_PATH } from '../config';
import StatusBanner from './StatusBanner';

export const missingImageMessage = (path: string) => `Image not found at ${path}. Please check the filename.`;

const ModelOverview: React.FC = () => {
  const [open, setOpen] = useState(true);
  const [imageMissing, setImageMissing] = useState(false);

  return (
    <div className="bg-white rounded-lg shadow border border-gray-100">
      <button
        type="button"
        onClick={() => setOpen(o => !o)}
        aria-expanded={open}
        className="w-full px-6 py-4 flex justify-between items-center text-lg font-semibold text-gray-700"
      >
        Simulation Model
        <svg className={`w-5 h-5 transition-transform ${open ? 'rotate-180' : ''}`} fill="none" stroke="currentColor" viewBox="0 0 24 24"><path strokeLinecap="round" strokeLinejoin="round" strokeWidth={2} d="M19 9l-7 7-7-7" /></svg>
      </button>

      {open && (
        <div className="px-6 pb-6 space-y-4">
          <div className="text-sm text-gray-700">
            <p className="font-bold mb-1">System Topology:</p>
            <ul className="list-disc pl-6 space-y-1">
              <li><span className="font-semibold">Source:</span> NREL solar data for coordinates near Phoenix, AZ</li>
              <li><span className="font-semibold">MPPT:</span> Perturb &amp; Observe (P&amp;O) algorithm controlling a boost converter</li>
              <li><span className="font-semibold">Tracking logic:</span> hybrid approach, switching between astronomical tracking and flat stow</li>
            </ul>
          </div>

          {imageMissing ? (
            <StatusBanner kind="warning" message={missingImageMessage(MODEL_IMAGE_PATH)} />
          ) : (
            <figure>
              <img
                src={MODEL_IMAGE_PATH}
                alt="Tracker logic and power electronics model"
                className="w-full rounded border border-gray-200"
                onError={() => {
                  console.warn(missingImageMessage(MODEL_IMAGE_PATH));
                  setImageMissing(true);
                }}
              />
              <figcaption className="text-xs text-gray-500 mt-2 text-center">Simulation model: tracker logic &amp; power electronics</figcaption>
            </figure>
          )}
        </div>
      )}
    </div>
  );
};

export default ModelOverview;
