import React, { useEffect, useState } from 'react';
import type { NameStanzasResponse } from '../types';
import { generatorClient } from '../services/generatorClient';
import { he } from '../i18n';

interface StanzaPreviewProps {
  name: string;
}

const PREVIEW_DEBOUNCE_MS = 300;

export const StanzaPreview: React.FC<StanzaPreviewProps> = ({ name }) => {
  const [preview, setPreview] = useState<NameStanzasResponse | null>(null);
  const [error, setError] = useState<string | null>(null);

  useEffect(() => {
    const trimmed = name.trim();
    if (!trimmed) {
      setPreview(null);
      setError(null);
      return;
    }

    let cancelled = false;
    const timer = window.setTimeout(() => {
      generatorClient
        .getNameStanzas(trimmed)
        .then((data) => {
          if (!cancelled) {
            setPreview(data);
            setError(null);
          }
        })
        .catch((err: unknown) => {
          console.error(err);
          if (!cancelled) {
            setPreview(null);
            setError(he.genericError);
          }
        });
    }, PREVIEW_DEBOUNCE_MS);

    return () => {
      cancelled = true;
      window.clearTimeout(timer);
    };
  }, [name]);

  if (error) {
    return <p className="text-sm text-red-700">{error}</p>;
  }
  if (!preview) return null;

  if (!preview.sections.length) {
    return <p className="text-sm text-slate-500">{he.previewEmpty}</p>;
  }

  return (
    <section className="mt-4">
      <h3 className="text-sm font-semibold text-slate-700 mb-2">{he.previewTitle}</h3>
      <ol className="space-y-2">
        {preview.sections.map((section, position) => (
          <li
            key={`${section.letter}-${position}`}
            className="rounded-md border border-slate-200 bg-white px-3 py-2"
          >
            <div className="flex items-baseline gap-2">
              <span className="text-xl font-bold text-gold font-hebrew">{section.letter}</span>
              <span className="text-xs text-slate-400">
                {section.verses.length} {he.previewVerses}
              </span>
            </div>
            <p className="text-sm text-ink font-hebrew leading-relaxed truncate">{section.verses[0]}</p>
          </li>
        ))}
      </ol>
    </section>
  );
};
